import { VersionCompareError, ErrorCode, type ErrorContext } from "./VersionCompareError";

/**
 * Error for report rendering failures.
 */
export class RenderError extends VersionCompareError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.RENDER_FAILED,
    context: Partial<ErrorContext> = {},
    options?: { cause?: Error }
  ) {
    super(message, code, context, { ...options, isRetryable: false });
    this.name = "RenderError";
  }

  static unsupportedEncoding(encoding: unknown, context: Partial<ErrorContext> = {}) {
    return new RenderError(
      `Unsupported report encoding: ${String(encoding)}`,
      ErrorCode.RENDER_UNSUPPORTED_ENCODING,
      { ...context, encoding }
    );
  }

  static malformedInput(reason: string, context: Partial<ErrorContext> = {}) {
    return new RenderError(
      `Malformed comparison result: ${reason}`,
      ErrorCode.RENDER_MALFORMED_INPUT,
      context
    );
  }

  static failed(encoding: string, cause?: Error, context: Partial<ErrorContext> = {}) {
    return new RenderError(
      `Failed to render ${encoding} report`,
      ErrorCode.RENDER_FAILED,
      { ...context, encoding },
      { cause }
    );
  }
}
