import { VersionCompareError, ErrorCode, type ErrorContext } from "./VersionCompareError";

/**
 * Error for version enumeration failures.
 * "Case has no versions" and "storage unreachable" carry distinct codes.
 */
export class CatalogError extends VersionCompareError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CATALOG_STORAGE_UNREACHABLE,
    context: Partial<ErrorContext> = {},
    options?: { cause?: Error; isRetryable?: boolean }
  ) {
    super(message, code, context, options);
    this.name = "CatalogError";
  }

  static caseNotFound(caseId: string, context: Partial<ErrorContext> = {}) {
    return new CatalogError(
      `No document versions found for case ${caseId}`,
      ErrorCode.CATALOG_CASE_NOT_FOUND,
      { ...context, caseId },
      { isRetryable: false }
    );
  }

  static storageUnreachable(caseId: string, cause?: Error, context: Partial<ErrorContext> = {}) {
    return new CatalogError(
      `Unable to list versions for case ${caseId}: storage unreachable`,
      ErrorCode.CATALOG_STORAGE_UNREACHABLE,
      { ...context, caseId },
      { cause, isRetryable: true }
    );
  }

  get isCaseNotFound(): boolean {
    return this.code === ErrorCode.CATALOG_CASE_NOT_FOUND;
  }
}
