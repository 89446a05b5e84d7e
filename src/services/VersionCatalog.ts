/**
 * Enumerates the stored renditions of a case's report.
 *
 * Generated renditions live under `{caseId}/Output/` and are named
 * `{YYYYMMDDHHMM}-{caseId}-{type}.pdf`; the ground-truth rendition sits in a
 * `GroundTruth/` (or `Ground Truth/`) folder and is dated by its mtime.
 */

import { CATALOG_DEFAULTS } from "../config/constants";
import { CatalogError, ValidationError, isVersionCompareError } from "../errors";
import type { ObjectStore, ObjectSummary } from "../storage/ObjectStore";
import { createLogger } from "../utils/logger";
import { RetryPresets, withRetry, type RetryConfig } from "../utils/retry";
import type { VersionDescriptor } from "./VersionComparison.types";

const log = createLogger({ component: "VersionCatalog" });

const CASE_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

export interface ListVersionsOptions {
  /** Throw CatalogError.caseNotFound instead of returning [] */
  requireVersions?: boolean;
  /** Cuts listing retries short once aborted */
  signal?: AbortSignal;
}

export function assertCaseId(caseId: unknown): asserts caseId is string {
  if (typeof caseId !== "string" || caseId.trim() === "") {
    throw ValidationError.missingParam("caseId");
  }
  if (!CASE_ID_PATTERN.test(caseId)) {
    throw ValidationError.invalidCaseId(caseId);
  }
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function buildGeneratedPattern(caseId: string): RegExp {
  const types = CATALOG_DEFAULTS.DOCUMENT_TYPES.join("|");
  return new RegExp(`^(\\d{12})-${escapeRegExp(caseId)}-(${types})(?![A-Za-z])`, "i");
}

/**
 * Parse `YYYYMMDDHHMM` as UTC. Returns null for impossible dates.
 */
export function parseVersionTimestamp(stamp: string): Date | null {
  const match = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})$/.exec(stamp);
  if (!match) return null;

  const [, y, mo, d, h, mi] = match.map(Number);
  const date = new Date(Date.UTC(y, mo - 1, d, h, mi));
  if (
    date.getUTCFullYear() !== y ||
    date.getUTCMonth() !== mo - 1 ||
    date.getUTCDate() !== d ||
    date.getUTCHours() !== h ||
    date.getUTCMinutes() !== mi
  ) {
    return null;
  }
  return date;
}

/** "2025-03-14 09:30" (UTC) */
export function formatVersionLabel(date: Date): string {
  return date.toISOString().slice(0, 16).replace("T", " ");
}

function isGroundTruthKey(segments: string[]): boolean {
  const folders = segments.slice(1, -1).map((s) => s.toLowerCase());
  return folders.some((folder) =>
    CATALOG_DEFAULTS.GROUND_TRUTH_MARKERS.some((marker) => folder === marker)
  );
}

function compareVersions(a: VersionDescriptor, b: VersionDescriptor): number {
  const byTime = a.timestamp.getTime() - b.timestamp.getTime();
  if (byTime !== 0) return byTime;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export class VersionCatalog {
  constructor(
    private store: ObjectStore,
    private retry: Partial<RetryConfig> = RetryPresets.listing
  ) {}

  async listVersions(caseId: string, options: ListVersionsOptions = {}): Promise<VersionDescriptor[]> {
    assertCaseId(caseId);

    const prefix = `${caseId}/`;
    let objects: ObjectSummary[];
    try {
      objects = await withRetry(
        () => this.store.listObjects(prefix),
        { ...this.retry, signal: options.signal },
        `listObjects(${prefix})`
      );
    } catch (error) {
      log.error("Version listing failed", { caseId }, error);
      throw CatalogError.storageUnreachable(
        caseId,
        error instanceof Error ? error : undefined,
        { operation: "listVersions", storageCode: isVersionCompareError(error) ? error.code : undefined }
      );
    }

    const versions = objects
      .map((obj) => this.toDescriptor(caseId, obj))
      .filter((v): v is VersionDescriptor => v !== null)
      .sort(compareVersions);

    log.info("Listed versions", {
      caseId,
      objects: objects.length,
      versions: versions.length,
    });

    if (versions.length === 0 && options.requireVersions) {
      throw CatalogError.caseNotFound(caseId, { operation: "listVersions" });
    }

    return versions;
  }

  /**
   * Map a storage key to a version, or null when it does not follow the
   * naming grammar.
   */
  toDescriptor(caseId: string, obj: ObjectSummary): VersionDescriptor | null {
    const segments = obj.key.split("/");
    const filename = segments[segments.length - 1];

    if (segments[0] !== caseId) return null;
    if (!filename.toLowerCase().endsWith(CATALOG_DEFAULTS.FILE_EXTENSION)) return null;

    if (isGroundTruthKey(segments)) {
      return {
        id: obj.key,
        caseId,
        timestamp: obj.lastModified,
        size: obj.size,
        filename,
        kind: "ground-truth",
        label: `Ground truth (${formatVersionLabel(obj.lastModified)})`,
      };
    }

    if (segments.length !== 3 || segments[1] !== CATALOG_DEFAULTS.OUTPUT_FOLDER) return null;

    const match = buildGeneratedPattern(caseId).exec(filename);
    if (!match) return null;

    const timestamp = parseVersionTimestamp(match[1]);
    if (!timestamp) {
      log.debug("Skipping key with invalid timestamp", { key: obj.key });
      return null;
    }

    return {
      id: obj.key,
      caseId,
      timestamp,
      size: obj.size,
      filename,
      kind: "generated",
      documentType: canonicalDocumentType(match[2]),
      label: formatVersionLabel(timestamp),
    };
  }
}

function canonicalDocumentType(raw: string): string {
  const lower = raw.toLowerCase();
  return CATALOG_DEFAULTS.DOCUMENT_TYPES.find((t) => t.toLowerCase() === lower) ?? raw;
}
