import { VersionCompareError, ErrorCode, type ErrorContext } from "./VersionCompareError";

export interface StrategyFailure {
  strategy: string;
  reason: string;
}

/**
 * Error for unreadable documents. Extraction is deterministic, so these are
 * never retryable.
 */
export class ExtractionError extends VersionCompareError {
  public readonly failures: StrategyFailure[];

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.EXTRACTION_FAILED,
    context: Partial<ErrorContext> & { failures?: StrategyFailure[] } = {},
    options?: { cause?: Error }
  ) {
    super(message, code, context, { ...options, isRetryable: false });
    this.name = "ExtractionError";
    this.failures = context.failures ?? [];
  }

  static allStrategiesFailed(failures: StrategyFailure[], context: Partial<ErrorContext> = {}) {
    const tried = failures.map((f) => f.strategy).join(", ") || "none";
    return new ExtractionError(
      `No text could be extracted (tried: ${tried})`,
      ErrorCode.EXTRACTION_FAILED,
      { ...context, failures }
    );
  }

  static emptyInput(context: Partial<ErrorContext> = {}) {
    return new ExtractionError(
      "Document is empty (0 bytes)",
      ErrorCode.EXTRACTION_EMPTY_INPUT,
      context
    );
  }
}
