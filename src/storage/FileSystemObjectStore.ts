import { readdir, readFile, stat } from "node:fs/promises";
import path from "node:path";
import { StorageError, errorMessage } from "../errors";
import { logger } from "../utils/logger";
import type { ObjectStore, ObjectSummary } from "./ObjectStore";

/**
 * Object store over a local directory: key "3424/Output/a.pdf" maps to
 * `${rootDir}/3424/Output/a.pdf`.
 */
export class FileSystemObjectStore implements ObjectStore {
  private rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
  }

  async listObjects(prefix: string): Promise<ObjectSummary[]> {
    let entries: string[];
    try {
      entries = await readdir(this.rootDir, { recursive: true });
    } catch (error) {
      throw StorageError.unreachable(prefix, toError(error), { rootDir: this.rootDir });
    }

    const summaries: ObjectSummary[] = [];
    for (const entry of entries) {
      const key = entry.split(path.sep).join("/");
      if (!key.startsWith(prefix)) continue;

      const info = await stat(path.join(this.rootDir, entry));
      if (!info.isFile()) continue;
      summaries.push({ key, size: info.size, lastModified: info.mtime });
    }

    summaries.sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
    logger.debug("Listed objects", { prefix, count: summaries.length });
    return summaries;
  }

  async getObject(key: string): Promise<Uint8Array> {
    const fullPath = this.resolveKey(key);
    try {
      const content = await readFile(fullPath);
      return new Uint8Array(content.buffer, content.byteOffset, content.byteLength);
    } catch (error) {
      if (isErrnoCode(error, "ENOENT") || isErrnoCode(error, "EISDIR")) {
        throw StorageError.notFound(key);
      }
      throw StorageError.transient(key, toError(error));
    }
  }

  private resolveKey(key: string): string {
    const fullPath = path.resolve(this.rootDir, key);
    if (fullPath !== this.rootDir && !fullPath.startsWith(this.rootDir + path.sep)) {
      throw StorageError.notFound(key, { reason: "key escapes storage root" });
    }
    return fullPath;
  }
}

function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(errorMessage(error));
}
