import { VersionComparisonService } from "./services/VersionComparisonService";

export { VersionComparisonService };
export type { VersionComparisonServiceOptions } from "./services/VersionComparisonService";

export default VersionComparisonService;

// ============================================================================
// RE-EXPORTS (for external consumers)
// ============================================================================

// Pipeline stages
export {
  VersionCatalog,
  assertCaseId,
  parseVersionTimestamp,
  formatVersionLabel,
  type ListVersionsOptions,
} from "./services/VersionCatalog";

export {
  TextExtractor,
  defaultExtractionChain,
  normalizeExtractedText,
  type ExtractionResult,
} from "./services/TextExtractor";
export type { ExtractionStrategy } from "./services/extractors/ExtractionStrategy";
export { UnpdfExtractor } from "./services/extractors/UnpdfExtractor";
export { PdfParseExtractor } from "./services/extractors/PdfParseExtractor";
export { PlainTextExtractor } from "./services/extractors/PlainTextExtractor";

export { SectionSegmenter, DEFAULT_HEADING_RULES, type HeadingRule } from "./services/SectionSegmenter";
export { DiffEngine, flattenDocument, summarize, addSummaries } from "./services/DiffEngine";
export { diffLines, collapseEditScript, type EditOp } from "./services/LineDiff";

export {
  ComparisonOrchestrator,
  validateSelection,
  assertComplete,
  type CompareOptions,
  type OrchestratorDeps,
} from "./services/ComparisonOrchestrator";

export {
  ReportRenderer,
  reportFilename,
  validateResult,
  REPORT_CONTENT_TYPES,
} from "./services/ReportRenderer";

// Storage
export type { ObjectStore, ObjectSummary } from "./storage/ObjectStore";
export { InMemoryObjectStore } from "./storage/InMemoryObjectStore";
export { FileSystemObjectStore } from "./storage/FileSystemObjectStore";

// Data model
export * from "./services/VersionComparison.types";

// Configuration
export {
  DEFAULT_COMPARISON_POLICY,
  resolveComparisonPolicy,
  type ComparisonPolicy,
} from "./config/ComparisonPolicy";

// Error types
export {
  VersionCompareError,
  ValidationError,
  StorageError,
  CatalogError,
  ExtractionError,
  ComparisonError,
  InsufficientVersionsError,
  ComparisonTimeoutError,
  RenderError,
  ErrorCode,
  wrapError,
  isVersionCompareError,
  getErrorCode,
  type ErrorContext,
  type SerializedError,
} from "./errors";

// Utilities
export { logger, createLogger, type LogLevel, type LogEntry } from "./utils/logger";
export { withRetry, RetryPresets, type RetryConfig } from "./utils/retry";
