/**
 * Base error class for all version-comparison errors.
 * Provides error codes, operation context, and structured metadata.
 */

export enum ErrorCode {
  // Validation errors (1xxx)
  VALIDATION_MISSING_PARAM = 1001,
  VALIDATION_INVALID_CASE_ID = 1002,
  VALIDATION_INVALID_SELECTION = 1003,
  VALIDATION_INVALID_FORMAT = 1004,

  // Storage errors (2xxx)
  OBJECT_NOT_FOUND = 2001,
  STORAGE_TRANSIENT = 2002,
  STORAGE_UNREACHABLE = 2003,

  // Catalog errors (3xxx)
  CATALOG_CASE_NOT_FOUND = 3001,
  CATALOG_STORAGE_UNREACHABLE = 3002,

  // Extraction errors (4xxx)
  EXTRACTION_FAILED = 4001,
  EXTRACTION_EMPTY_INPUT = 4002,

  // Comparison errors (5xxx)
  COMPARISON_PARTIAL = 5001,
  COMPARISON_INSUFFICIENT_VERSIONS = 5002,
  COMPARISON_TIMEOUT = 5003,

  // Render errors (6xxx)
  RENDER_UNSUPPORTED_ENCODING = 6001,
  RENDER_MALFORMED_INPUT = 6002,
  RENDER_FAILED = 6003,

  // General errors (9xxx)
  UNKNOWN = 9999,
  INTERNAL = 9998,
}

export interface ErrorContext {
  operation: string;
  caseId?: string;
  versionId?: string;
  key?: string;
  timestamp?: string;
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  code: ErrorCode;
  message: string;
  context: ErrorContext;
  cause?: string;
  stack?: string;
}

/**
 * Base error class for the comparison engine.
 * All engine-specific errors should extend this class.
 */
export class VersionCompareError extends Error {
  public readonly code: ErrorCode;
  public readonly context: ErrorContext;
  public readonly isRetryable: boolean;
  public readonly timestamp: string;
  public readonly cause?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context: Partial<ErrorContext> = {},
    options?: { cause?: Error; isRetryable?: boolean }
  ) {
    super(message);
    this.name = "VersionCompareError";
    this.code = code;
    this.cause = options?.cause;
    this.timestamp = new Date().toISOString();
    this.isRetryable = options?.isRetryable ?? false;
    this.context = {
      ...context,
      operation: context.operation || "unknown",
      timestamp: this.timestamp,
    };

    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Serialize error for logging or transmission.
   */
  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
      stack: this.stack,
    };
  }

  /**
   * Create detailed error message for logging.
   */
  toLogMessage(): string {
    const parts = [
      `[${this.name}]`,
      `Code: ${this.code}`,
      `Op: ${this.context.operation}`,
      this.message,
    ];
    if (this.context.caseId) parts.push(`Case: ${this.context.caseId}`);
    if (this.context.versionId) parts.push(`Version: ${this.context.versionId}`);
    if (this.cause instanceof Error) parts.push(`Cause: ${this.cause.message}`);
    return parts.join(" | ");
  }
}

/**
 * Helper to wrap unknown errors in VersionCompareError.
 */
export function wrapError(
  error: unknown,
  code: ErrorCode = ErrorCode.UNKNOWN,
  context: Partial<ErrorContext> = {}
): VersionCompareError {
  if (error instanceof VersionCompareError) {
    return new VersionCompareError(error.message, error.code, {
      ...error.context,
      ...context,
    }, { cause: error.cause, isRetryable: error.isRetryable });
  }

  if (error instanceof Error) {
    return new VersionCompareError(error.message, code, context, { cause: error });
  }

  return new VersionCompareError(
    typeof error === "string" ? error : "An unknown error occurred",
    code,
    context
  );
}

export function isVersionCompareError(error: unknown): error is VersionCompareError {
  return error instanceof VersionCompareError;
}

/**
 * Get error code from any error type.
 */
export function getErrorCode(error: unknown): ErrorCode {
  if (isVersionCompareError(error)) return error.code;
  return ErrorCode.UNKNOWN;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
