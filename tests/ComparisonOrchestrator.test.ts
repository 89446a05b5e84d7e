import { describe, it, expect, vi } from "vitest";
import {
  ComparisonOrchestrator,
  assertComplete,
  validateSelection,
} from "../src/services/ComparisonOrchestrator";
import { TextExtractor } from "../src/services/TextExtractor";
import { PlainTextExtractor } from "../src/services/extractors/PlainTextExtractor";
import { DEFAULT_COMPARISON_POLICY } from "../src/config/ComparisonPolicy";
import type { ObjectStore } from "../src/storage/ObjectStore";
import {
  ComparisonError,
  ComparisonTimeoutError,
  ErrorCode,
  InsufficientVersionsError,
  StorageError,
  ValidationError,
} from "../src/errors";
import { createCaseStore, versionKey } from "./setup";

const CASE = "3424";

const INTRO = "Section 1: Introduction\nPlan prepared for Test Client.";
const CARE = "Section 2: Medical Care\nAnnual check-up.";
const EQUIPMENT = "Section 3: Equipment\nWheelchair replacement every 5 years.";
const HOME = "Section 9: Home Modifications\nRamp installation.";

const V1 = versionKey(CASE, "202501010900");
const V2 = versionKey(CASE, "202502010900");
const V3 = versionKey(CASE, "202503010900");

const TEXTS: Array<[string, string]> = [
  ["202501010900", [INTRO, CARE, EQUIPMENT].join("\n")],
  ["202502010900", [INTRO, CARE].join("\n")],
  ["202503010900", [INTRO, CARE, HOME].join("\n")],
];

const policy = { ...DEFAULT_COMPARISON_POLICY, fetchInitialDelayMs: 1 };

function orchestrator(store: ObjectStore) {
  return new ComparisonOrchestrator({
    store,
    extractor: new TextExtractor([new PlainTextExtractor()]),
    policy,
  });
}

function statuses(sections: Array<{ sectionName: string; status: string }>) {
  return sections.map((s) => [s.sectionName, s.status]);
}

describe("validateSelection", () => {
  it("should accept sequential mode", () => {
    expect(validateSelection({ mode: "sequential" })).toEqual({ mode: "sequential" });
  });

  it("should accept two or more distinct ids", () => {
    expect(validateSelection({ mode: "selective", versionIds: ["a", "b"] })).toEqual({
      mode: "selective",
      versionIds: ["a", "b"],
    });
  });

  it.each([
    [undefined, ErrorCode.VALIDATION_MISSING_PARAM],
    [{}, ErrorCode.VALIDATION_MISSING_PARAM],
    [{ mode: "random" }, ErrorCode.VALIDATION_INVALID_SELECTION],
    [{ mode: "selective" }, ErrorCode.VALIDATION_MISSING_PARAM],
    [{ mode: "selective", versionIds: ["a"] }, ErrorCode.VALIDATION_INVALID_SELECTION],
    [{ mode: "selective", versionIds: ["a", "a"] }, ErrorCode.VALIDATION_INVALID_SELECTION],
    [{ mode: "selective", versionIds: ["a", 7] }, ErrorCode.VALIDATION_INVALID_SELECTION],
    [{ mode: "selective", versionIds: ["a", " "] }, ErrorCode.VALIDATION_INVALID_SELECTION],
  ])("should reject %j", (selection, code) => {
    expect(() => validateSelection(selection)).toThrow(ValidationError);
    try {
      validateSelection(selection);
    } catch (error) {
      expect(error).toMatchObject({ code });
    }
  });
});

describe("ComparisonOrchestrator", () => {
  it("should compare consecutive versions in sequential mode", async () => {
    const result = await orchestrator(createCaseStore(CASE, TEXTS)).compare(CASE, { mode: "sequential" });

    expect(result.caseId).toBe(CASE);
    expect(result.mode).toBe("sequential");
    expect(result.versions.map((v) => v.id)).toEqual([V1, V2, V3]);
    expect(result.pairs).toHaveLength(2);

    expect([result.pairs[0].left.id, result.pairs[0].right.id]).toEqual([V1, V2]);
    expect(statuses(result.pairs[0].sections)).toEqual([
      ["Section 1: Introduction", "unchanged"],
      ["Section 2: Medical Care", "unchanged"],
      ["Section 3: Equipment", "removed"],
    ]);

    expect([result.pairs[1].left.id, result.pairs[1].right.id]).toEqual([V2, V3]);
    expect(statuses(result.pairs[1].sections)).toEqual([
      ["Section 1: Introduction", "unchanged"],
      ["Section 2: Medical Care", "unchanged"],
      ["Section 9: Home Modifications", "added"],
    ]);

    expect(result.summary).toEqual({ total: 6, added: 1, removed: 1, modified: 0, unchanged: 4 });
    expect(result.versionErrors).toEqual([]);
  });

  it("should diff only the first and last selected versions", async () => {
    const result = await orchestrator(createCaseStore(CASE, TEXTS)).compare(CASE, {
      mode: "selective",
      versionIds: [V1, V2, V3],
    });

    expect(result.pairs).toHaveLength(1);
    const [pair] = result.pairs;
    expect([pair.left.id, pair.right.id]).toEqual([V1, V3]);
    expect(statuses(pair.sections)).toEqual([
      ["Section 1: Introduction", "unchanged"],
      ["Section 2: Medical Care", "unchanged"],
      ["Section 3: Equipment", "removed"],
      ["Section 9: Home Modifications", "added"],
    ]);
    expect(result.summary).toEqual({ total: 4, added: 1, removed: 1, modified: 0, unchanged: 2 });
  });

  it("should follow the caller's order in selective mode", async () => {
    const result = await orchestrator(createCaseStore(CASE, TEXTS)).compare(CASE, {
      mode: "selective",
      versionIds: [V3, V1],
    });

    const [pair] = result.pairs;
    expect([pair.left.id, pair.right.id]).toEqual([V3, V1]);
    expect(statuses(pair.sections)).toEqual([
      ["Section 1: Introduction", "unchanged"],
      ["Section 2: Medical Care", "unchanged"],
      ["Section 9: Home Modifications", "removed"],
      ["Section 3: Equipment", "added"],
    ]);
  });

  it("should report an unreadable version without inventing a pair", async () => {
    const store = createCaseStore(CASE, TEXTS);
    store.put(V2, new Uint8Array([0xff, 0xfe, 0xfd]));

    const result = await orchestrator(store).compare(CASE, { mode: "sequential" });

    expect(result.versionErrors).toEqual([
      {
        versionId: V2,
        stage: "extract",
        code: ErrorCode.EXTRACTION_FAILED,
        message: "No text could be extracted (tried: plain-text)",
      },
    ]);
    expect(result.pairs.map((p) => [p.left.id, p.right.id, p.comparable])).toEqual([
      [V1, V2, false],
      [V2, V3, false],
    ]);
    expect(result.pairs[0].errors).toEqual(result.versionErrors);
    expect(result.pairs[0].sections).toEqual([]);
    expect(result.summary.total).toBe(0);
  });

  it("should skip an unreadable interior version in selective mode", async () => {
    const store = createCaseStore(CASE, TEXTS);
    store.put(V2, new Uint8Array([0xff]));

    const result = await orchestrator(store).compare(CASE, { mode: "selective", versionIds: [V1, V2, V3] });

    expect(result.pairs).toHaveLength(1);
    expect(result.pairs[0]).toMatchObject({ comparable: true, left: { id: V1 }, right: { id: V3 } });
    expect(result.versionErrors.map((e) => [e.versionId, e.stage])).toEqual([[V2, "extract"]]);
    expect(() => assertComplete(result)).toThrow(ComparisonError);
  });

  it("should record unknown selected ids as fetch errors", async () => {
    const missing = `${CASE}/Output/202512310000-${CASE}-LCP.pdf`;

    const result = await orchestrator(createCaseStore(CASE, TEXTS)).compare(CASE, {
      mode: "selective",
      versionIds: [V1, missing, V3],
    });

    expect(result.versions.map((v) => v.id)).toEqual([V1, V3]);
    expect(result.versionErrors).toEqual([
      {
        versionId: missing,
        stage: "fetch",
        code: ErrorCode.OBJECT_NOT_FOUND,
        message: `Version ${missing} is not in the catalog for case ${CASE}`,
      },
    ]);
    expect(result.pairs[0].comparable).toBe(true);
  });

  it("should fail when fewer than two versions are usable", async () => {
    const store = createCaseStore(CASE, TEXTS.slice(0, 2));
    store.put(V2, new Uint8Array([0xff]));

    const error = await orchestrator(store).compare(CASE, { mode: "sequential" }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InsufficientVersionsError);
    expect(error).toMatchObject({
      code: ErrorCode.COMPARISON_INSUFFICIENT_VERSIONS,
      usableCount: 1,
      versionErrors: [{ versionId: V2, stage: "extract" }],
    });
  });

  it("should fail before fetching when the case has a single version", async () => {
    const store = createCaseStore(CASE, TEXTS.slice(0, 1));
    const getObject = vi.spyOn(store, "getObject");

    await expect(orchestrator(store).compare(CASE, { mode: "sequential" })).rejects.toMatchObject({
      name: "InsufficientVersionsError",
      usableCount: 1,
    });
    expect(getObject).not.toHaveBeenCalled();
  });

  it("should retry transient fetch failures", async () => {
    const store = createCaseStore(CASE, TEXTS.slice(0, 2));
    const real = store.getObject.bind(store);
    const getObject = vi.spyOn(store, "getObject")
      .mockRejectedValueOnce(StorageError.transient(V1))
      .mockImplementation(real);

    const result = await orchestrator(store).compare(CASE, { mode: "sequential" });

    expect(result.versionErrors).toEqual([]);
    expect(result.pairs[0].comparable).toBe(true);
    expect(getObject).toHaveBeenCalledTimes(3);
  });

  it("should not retry objects that disappeared after listing", async () => {
    const store = createCaseStore(CASE, TEXTS);
    const list = store.listObjects.bind(store);
    vi.spyOn(store, "listObjects").mockImplementation(async (prefix) => {
      const listed = await list(prefix);
      store.delete(V3);
      return listed;
    });
    const getObject = vi.spyOn(store, "getObject");

    const result = await orchestrator(store).compare(CASE, { mode: "sequential" });

    expect(result.versionErrors).toEqual([
      { versionId: V3, stage: "fetch", code: ErrorCode.OBJECT_NOT_FOUND, message: `Object not found: ${V3}` },
    ]);
    expect(result.pairs.map((p) => p.comparable)).toEqual([true, false]);
    expect(getObject.mock.calls.filter(([key]) => key === V3)).toHaveLength(1);
  });

  it("should time out as a whole", async () => {
    const store = createCaseStore(CASE, TEXTS);
    vi.spyOn(store, "getObject").mockImplementation(() => new Promise<Uint8Array>(() => undefined));

    const error = await orchestrator(store)
      .compare(CASE, { mode: "sequential" }, { timeoutMs: 20 })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ComparisonTimeoutError);
    expect(error).toMatchObject({ code: ErrorCode.COMPARISON_TIMEOUT, timeoutMs: 20 });
  });

  it("should stop retrying the listing after the timeout", async () => {
    const store = createCaseStore(CASE, TEXTS);
    const listObjects = vi.spyOn(store, "listObjects").mockRejectedValue(StorageError.unreachable(`${CASE}/`));

    const error = await orchestrator(store)
      .compare(CASE, { mode: "sequential" }, { timeoutMs: 20 })
      .catch((e: unknown) => e);
    // Longer than the first listing backoff (500ms)
    await new Promise((resolve) => setTimeout(resolve, 700));

    expect(error).toBeInstanceOf(ComparisonTimeoutError);
    expect(listObjects).toHaveBeenCalledTimes(1);
  });

  it("should limit concurrent loads", async () => {
    const store = createCaseStore(CASE, TEXTS);
    const real = store.getObject.bind(store);
    let active = 0;
    let peak = 0;
    vi.spyOn(store, "getObject").mockImplementation(async (key) => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active--;
      return real(key);
    });

    await orchestrator(store).compare(CASE, { mode: "sequential" }, { concurrency: 1 });

    expect(peak).toBe(1);
  });

  it("should reject an invalid case id", async () => {
    await expect(
      orchestrator(createCaseStore(CASE, TEXTS)).compare("../3424", { mode: "sequential" })
    ).rejects.toMatchObject({ code: ErrorCode.VALIDATION_INVALID_CASE_ID });
  });

  it("should pass complete results through assertComplete", async () => {
    const result = await orchestrator(createCaseStore(CASE, TEXTS)).compare(CASE, { mode: "sequential" });
    expect(assertComplete(result)).toBe(result);
  });
});
