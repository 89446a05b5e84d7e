import { VersionCompareError, ErrorCode, type ErrorContext } from "./VersionCompareError";

/**
 * Error raised by object store implementations.
 * NotFound is permanent; transient and unreachable failures may be retried.
 */
export class StorageError extends VersionCompareError {
  public readonly key?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.STORAGE_TRANSIENT,
    context: Partial<ErrorContext> = {},
    options?: { cause?: Error; isRetryable?: boolean }
  ) {
    super(message, code, context, {
      cause: options?.cause,
      isRetryable: options?.isRetryable ?? code !== ErrorCode.OBJECT_NOT_FOUND,
    });
    this.name = "StorageError";
    this.key = context.key;
  }

  static notFound(key: string, context: Partial<ErrorContext> = {}) {
    return new StorageError(
      `Object not found: ${key}`,
      ErrorCode.OBJECT_NOT_FOUND,
      { ...context, key },
      { isRetryable: false }
    );
  }

  static transient(key: string, cause?: Error, context: Partial<ErrorContext> = {}) {
    return new StorageError(
      `Transient storage failure reading ${key}`,
      ErrorCode.STORAGE_TRANSIENT,
      { ...context, key },
      { cause, isRetryable: true }
    );
  }

  static unreachable(prefix: string, cause?: Error, context: Partial<ErrorContext> = {}) {
    return new StorageError(
      `Storage backend unreachable while listing ${prefix}`,
      ErrorCode.STORAGE_UNREACHABLE,
      { ...context, prefix },
      { cause, isRetryable: true }
    );
  }
}

export function isNotFound(error: unknown): boolean {
  return error instanceof StorageError && error.code === ErrorCode.OBJECT_NOT_FOUND;
}
