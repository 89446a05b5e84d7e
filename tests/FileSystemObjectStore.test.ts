import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, mkdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { FileSystemObjectStore } from "../src/storage/FileSystemObjectStore";
import { ErrorCode } from "../src/errors";
import { decode } from "./setup";

describe("FileSystemObjectStore", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), "version-compare-"));
    await mkdir(path.join(root, "3424", "Output"), { recursive: true });
    await mkdir(path.join(root, "3424", "GroundTruth"), { recursive: true });
    await writeFile(path.join(root, "3424", "Output", "202503140930-3424-LCP.pdf"), "first");
    await writeFile(path.join(root, "3424", "GroundTruth", "final.pdf"), "truth");
    await writeFile(path.join(root, "other.txt"), "x");
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("should list files under a prefix with forward-slash keys", async () => {
    const objects = await new FileSystemObjectStore(root).listObjects("3424/");

    expect(objects.map((o) => [o.key, o.size])).toEqual([
      ["3424/GroundTruth/final.pdf", 5],
      ["3424/Output/202503140930-3424-LCP.pdf", 5],
    ]);
    expect(objects[0].lastModified).toBeInstanceOf(Date);
  });

  it("should read objects by key", async () => {
    const bytes = await new FileSystemObjectStore(root).getObject("3424/Output/202503140930-3424-LCP.pdf");
    expect(decode(bytes)).toBe("first");
  });

  it("should report missing keys and directories as not found", async () => {
    const store = new FileSystemObjectStore(root);

    await expect(store.getObject("3424/Output/missing.pdf")).rejects.toMatchObject({
      code: ErrorCode.OBJECT_NOT_FOUND,
    });
    await expect(store.getObject("3424/Output")).rejects.toMatchObject({ code: ErrorCode.OBJECT_NOT_FOUND });
  });

  it("should refuse keys that escape the root", async () => {
    await expect(new FileSystemObjectStore(root).getObject("../etc/passwd")).rejects.toMatchObject({
      code: ErrorCode.OBJECT_NOT_FOUND,
    });
  });

  it("should report an unreadable root as unreachable", async () => {
    const store = new FileSystemObjectStore(path.join(root, "does-not-exist"));

    await expect(store.listObjects("3424/")).rejects.toMatchObject({
      code: ErrorCode.STORAGE_UNREACHABLE,
      isRetryable: true,
    });
  });
});
