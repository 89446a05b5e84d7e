export {
  VersionCompareError,
  ErrorCode,
  wrapError,
  isVersionCompareError,
  getErrorCode,
  errorMessage,
  type ErrorContext,
  type SerializedError,
} from "./VersionCompareError";

export { ValidationError } from "./ValidationError";
export { StorageError, isNotFound } from "./StorageError";
export { CatalogError } from "./CatalogError";
export { ExtractionError, type StrategyFailure } from "./ExtractionError";
export {
  ComparisonError,
  InsufficientVersionsError,
  ComparisonTimeoutError,
} from "./ComparisonError";
export { RenderError } from "./RenderError";
