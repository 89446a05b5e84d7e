import { StorageError } from "../errors";
import type { ObjectStore, ObjectSummary } from "./ObjectStore";

interface StoredObject {
  body: Uint8Array;
  lastModified: Date;
}

/**
 * Map-backed object store. Keys are listed in lexicographic order, like S3.
 */
export class InMemoryObjectStore implements ObjectStore {
  private objects = new Map<string, StoredObject>();

  put(key: string, body: Uint8Array | string, lastModified: Date = new Date()): void {
    const bytes = typeof body === "string" ? new TextEncoder().encode(body) : body;
    this.objects.set(key, { body: bytes, lastModified });
  }

  delete(key: string): boolean {
    return this.objects.delete(key);
  }

  async listObjects(prefix: string): Promise<ObjectSummary[]> {
    return [...this.objects.entries()]
      .filter(([key]) => key.startsWith(prefix))
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, obj]) => ({
        key,
        size: obj.body.byteLength,
        lastModified: obj.lastModified,
      }));
  }

  async getObject(key: string): Promise<Uint8Array> {
    const obj = this.objects.get(key);
    if (!obj) throw StorageError.notFound(key);
    return obj.body;
  }
}
