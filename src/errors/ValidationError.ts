import { VersionCompareError, ErrorCode, type ErrorContext } from "./VersionCompareError";

/**
 * Error for input validation failures.
 */
export class ValidationError extends VersionCompareError {
  public readonly field?: string;
  public readonly value?: unknown;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.VALIDATION_INVALID_FORMAT,
    context: Partial<ErrorContext> & { field?: string; value?: unknown } = {},
    options?: { cause?: Error }
  ) {
    super(message, code, context, { ...options, isRetryable: false });
    this.name = "ValidationError";
    this.field = context.field;
    this.value = context.value;
  }

  static missingParam(paramName: string, context: Partial<ErrorContext> = {}) {
    return new ValidationError(
      `Missing required parameter: ${paramName}`,
      ErrorCode.VALIDATION_MISSING_PARAM,
      { ...context, field: paramName }
    );
  }

  static invalidCaseId(caseId: string, context: Partial<ErrorContext> = {}) {
    return new ValidationError(
      `Invalid case id: "${caseId}"`,
      ErrorCode.VALIDATION_INVALID_CASE_ID,
      { ...context, field: "caseId", value: caseId }
    );
  }

  static invalidSelection(reason: string, context: Partial<ErrorContext> = {}) {
    return new ValidationError(
      `Invalid version selection: ${reason}`,
      ErrorCode.VALIDATION_INVALID_SELECTION,
      { ...context, field: "selection" }
    );
  }
}
