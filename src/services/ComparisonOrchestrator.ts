/**
 * Drives selective and sequential comparisons.
 *
 * Selective: the caller orders ≥2 version ids; only the first and last usable
 * ones are diffed. Sequential: every catalog version, consecutive pairs.
 * Versions that cannot be fetched or extracted are skipped and reported;
 * the call only fails outright when fewer than two usable versions remain.
 */

import { DEFAULT_COMPARISON_POLICY, type ComparisonPolicy } from "../config/ComparisonPolicy";
import {
  ComparisonError,
  ComparisonTimeoutError,
  ErrorCode,
  InsufficientVersionsError,
  ValidationError,
  errorMessage,
  getErrorCode,
} from "../errors";
import type { ObjectStore } from "../storage/ObjectStore";
import { mapWithConcurrency, withTimeout } from "../utils/concurrency";
import { createLogger } from "../utils/logger";
import { withRetry } from "../utils/retry";
import { addSummaries, DiffEngine } from "./DiffEngine";
import { SectionSegmenter } from "./SectionSegmenter";
import { TextExtractor } from "./TextExtractor";
import { assertCaseId, VersionCatalog } from "./VersionCatalog";
import {
  emptySummary,
  type ComparisonResult,
  type ComparisonSelection,
  type ExtractedDocument,
  type PairComparison,
  type SegmentedDocument,
  type VersionDescriptor,
  type VersionError,
  type VersionErrorStage,
} from "./VersionComparison.types";

const log = createLogger({ component: "ComparisonOrchestrator" });

export interface CompareOptions {
  /** Overrides the policy's whole-call budget; 0 disables it */
  timeoutMs?: number;
  concurrency?: number;
}

export interface OrchestratorDeps {
  store: ObjectStore;
  catalog?: VersionCatalog;
  extractor?: TextExtractor;
  segmenter?: SectionSegmenter;
  diffEngine?: DiffEngine;
  policy?: ComparisonPolicy;
}

interface LoadedVersion {
  descriptor: VersionDescriptor;
  extracted?: ExtractedDocument;
  document?: SegmentedDocument;
  error?: VersionError;
}

function versionError(versionId: string, stage: VersionErrorStage, error: unknown): VersionError {
  return { versionId, stage, code: getErrorCode(error), message: errorMessage(error) };
}

export function validateSelection(selection: unknown): ComparisonSelection {
  if (typeof selection !== "object" || selection === null || !("mode" in selection)) {
    throw ValidationError.missingParam("selection.mode");
  }

  if (selection.mode === "sequential") return { mode: "sequential" };

  if (selection.mode !== "selective") {
    throw ValidationError.invalidSelection(`unknown mode "${String(selection.mode)}"`);
  }

  const ids = "versionIds" in selection ? selection.versionIds : undefined;
  if (!Array.isArray(ids)) {
    throw ValidationError.missingParam("selection.versionIds");
  }

  const versionIds: string[] = [];
  for (const id of ids) {
    if (typeof id !== "string" || id.trim() === "") {
      throw ValidationError.invalidSelection("version ids must be non-empty strings");
    }
    if (versionIds.includes(id)) {
      throw ValidationError.invalidSelection(`version id listed twice: ${id}`);
    }
    versionIds.push(id);
  }

  if (versionIds.length < 2) {
    throw ValidationError.invalidSelection(`selective mode needs at least 2 version ids, got ${versionIds.length}`);
  }

  return { mode: "selective", versionIds };
}

/**
 * Throw when a result carries per-version failures.
 */
export function assertComplete(result: ComparisonResult): ComparisonResult {
  if (result.versionErrors.length > 0) {
    throw ComparisonError.fromVersionErrors(result.caseId, result.versionErrors, { operation: "assertComplete" });
  }
  return result;
}

export class ComparisonOrchestrator {
  private readonly store: ObjectStore;
  private readonly catalog: VersionCatalog;
  private readonly extractor: TextExtractor;
  private readonly segmenter: SectionSegmenter;
  private readonly diffEngine: DiffEngine;
  private readonly policy: ComparisonPolicy;

  constructor(deps: OrchestratorDeps) {
    this.store = deps.store;
    this.catalog = deps.catalog ?? new VersionCatalog(deps.store);
    this.extractor = deps.extractor ?? new TextExtractor();
    this.segmenter = deps.segmenter ?? new SectionSegmenter();
    this.diffEngine = deps.diffEngine ?? new DiffEngine();
    this.policy = deps.policy ?? DEFAULT_COMPARISON_POLICY;
  }

  async compare(
    caseId: string,
    selection: ComparisonSelection,
    options: CompareOptions = {}
  ): Promise<ComparisonResult> {
    assertCaseId(caseId);
    const validated = validateSelection(selection);
    const timeoutMs = options.timeoutMs ?? this.policy.timeoutMs;
    const concurrency = options.concurrency ?? this.policy.concurrency;

    return withTimeout(
      (signal) => this.run(caseId, validated, concurrency, signal),
      timeoutMs,
      () => new ComparisonTimeoutError(caseId, timeoutMs, { operation: "compareVersions" })
    );
  }

  private async run(
    caseId: string,
    selection: ComparisonSelection,
    concurrency: number,
    signal: AbortSignal
  ): Promise<ComparisonResult> {
    const startedAt = Date.now();
    const catalogVersions = await this.catalog.listVersions(caseId, { signal });
    signal.throwIfAborted();

    const versionErrors: VersionError[] = [];
    let targets: VersionDescriptor[];

    if (selection.mode === "selective") {
      const byId = new Map(catalogVersions.map((v): [string, VersionDescriptor] => [v.id, v]));
      targets = [];
      for (const id of selection.versionIds) {
        const descriptor = byId.get(id);
        if (descriptor) {
          targets.push(descriptor);
        } else {
          versionErrors.push({
            versionId: id,
            stage: "fetch",
            code: ErrorCode.OBJECT_NOT_FOUND,
            message: `Version ${id} is not in the catalog for case ${caseId}`,
          });
        }
      }
    } else {
      targets = catalogVersions;
    }

    if (targets.length < 2) {
      throw new InsufficientVersionsError(caseId, targets.length, versionErrors, { operation: "compareVersions" });
    }

    const loaded = await mapWithConcurrency(targets, concurrency, (descriptor) =>
      this.loadVersion(descriptor, signal)
    );
    signal.throwIfAborted();

    for (const version of loaded) {
      if (version.error) versionErrors.push(version.error);
    }

    const usable = loaded.filter((v) => v.document !== undefined);
    if (usable.length < 2) {
      log.warn("Not enough usable versions", { caseId, usable: usable.length, errors: versionErrors.length });
      throw new InsufficientVersionsError(caseId, usable.length, versionErrors, { operation: "compareVersions" });
    }

    const pairs =
      selection.mode === "selective"
        ? [this.comparePair(usable[0], usable[usable.length - 1])]
        : loaded.slice(1).map((right, i) => this.comparePair(loaded[i], right));

    const summary = pairs.reduce((acc, pair) => addSummaries(acc, pair.summary), emptySummary());

    log.info("Comparison complete", {
      caseId,
      mode: selection.mode,
      versions: targets.length,
      pairs: pairs.length,
      errors: versionErrors.length,
      durationMs: Date.now() - startedAt,
    });

    return {
      caseId,
      mode: selection.mode,
      generatedAt: new Date().toISOString(),
      versions: targets,
      pairs,
      summary,
      versionErrors,
    };
  }

  private async loadVersion(descriptor: VersionDescriptor, signal: AbortSignal): Promise<LoadedVersion> {
    signal.throwIfAborted();

    let bytes: Uint8Array;
    try {
      bytes = await withRetry(
        () => this.store.getObject(descriptor.id),
        {
          maxAttempts: this.policy.fetchAttempts,
          initialDelayMs: this.policy.fetchInitialDelayMs,
          signal,
        },
        `getObject(${descriptor.id})`
      );
    } catch (error) {
      log.warn("Skipping version: fetch failed", { versionId: descriptor.id }, error);
      return { descriptor, error: versionError(descriptor.id, "fetch", error) };
    }

    signal.throwIfAborted();

    try {
      const result = await this.extractor.extract(bytes, descriptor.id);
      const extracted: ExtractedDocument = {
        versionId: descriptor.id,
        rawText: result.text,
        extractionMethod: result.method,
      };
      const document = this.segmenter.segment(extracted.rawText);
      log.debug("Version loaded", {
        versionId: descriptor.id,
        method: extracted.extractionMethod,
        sections: document.sections.length,
        rule: document.rule,
      });
      return { descriptor, extracted, document };
    } catch (error) {
      log.warn("Skipping version: extraction failed", { versionId: descriptor.id }, error);
      return { descriptor, error: versionError(descriptor.id, "extract", error) };
    }
  }

  private comparePair(left: LoadedVersion, right: LoadedVersion): PairComparison {
    if (!left.document || !right.document) {
      const errors = [left.error, right.error].filter((e): e is VersionError => e !== undefined);
      return {
        left: left.descriptor,
        right: right.descriptor,
        comparable: false,
        sections: [],
        summary: emptySummary(),
        errors,
      };
    }

    const diff = this.diffEngine.diff(left.document, right.document);
    return {
      left: left.descriptor,
      right: right.descriptor,
      comparable: true,
      sections: diff.sections,
      summary: diff.summary,
      errors: [],
    };
  }
}
