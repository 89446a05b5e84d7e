import type { VersionError } from "../services/VersionComparison.types";
import { VersionCompareError, ErrorCode, type ErrorContext } from "./VersionCompareError";

/**
 * Wraps the per-version failures accumulated during a comparison.
 * Carrying errors does not by itself mean the comparison failed.
 */
export class ComparisonError extends VersionCompareError {
  public readonly versionErrors: VersionError[];

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.COMPARISON_PARTIAL,
    context: Partial<ErrorContext> = {},
    options?: { cause?: Error; versionErrors?: VersionError[] }
  ) {
    super(message, code, context, { cause: options?.cause, isRetryable: false });
    this.name = "ComparisonError";
    this.versionErrors = options?.versionErrors ?? [];
  }

  static fromVersionErrors(caseId: string, versionErrors: VersionError[], context: Partial<ErrorContext> = {}) {
    const ids = versionErrors.map((e) => e.versionId).join(", ");
    return new ComparisonError(
      `${versionErrors.length} version(s) could not be compared for case ${caseId}: ${ids}`,
      ErrorCode.COMPARISON_PARTIAL,
      { ...context, caseId },
      { versionErrors }
    );
  }
}

/**
 * Fewer than two usable versions remained after skipping failures.
 */
export class InsufficientVersionsError extends ComparisonError {
  public readonly usableCount: number;

  constructor(
    caseId: string,
    usableCount: number,
    versionErrors: VersionError[] = [],
    context: Partial<ErrorContext> = {}
  ) {
    super(
      `Need at least 2 usable versions to compare case ${caseId}, found ${usableCount}`,
      ErrorCode.COMPARISON_INSUFFICIENT_VERSIONS,
      { ...context, caseId, usableCount },
      { versionErrors }
    );
    this.name = "InsufficientVersionsError";
    this.usableCount = usableCount;
  }
}

export class ComparisonTimeoutError extends ComparisonError {
  public readonly timeoutMs: number;

  constructor(caseId: string, timeoutMs: number, context: Partial<ErrorContext> = {}) {
    super(
      `Comparison for case ${caseId} timed out after ${timeoutMs}ms`,
      ErrorCode.COMPARISON_TIMEOUT,
      { ...context, caseId, timeoutMs }
    );
    this.name = "ComparisonTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}
