/**
 * Centralized constants for the comparison engine.
 * Avoids magic numbers scattered throughout codebase
 */

export const CATALOG_DEFAULTS = {
  /** Folder under the case prefix holding generated renditions */
  OUTPUT_FOLDER: "Output",
  /** Generated report types recognised in `{timestamp}-{caseId}-{type}.pdf` */
  DOCUMENT_TYPES: ["CompleteAIGeneratedReport", "LCP", "LifeCarePlan"],
  /** Path segments marking the ground-truth rendition */
  GROUND_TRUTH_MARKERS: ["groundtruth", "ground truth"],
  FILE_EXTENSION: ".pdf",
} as const;

export const COMPARISON_DEFAULTS = {
  CONCURRENCY: 4,
  TIMEOUT_MS: 120_000,
  FETCH_ATTEMPTS: 3,
  FETCH_INITIAL_DELAY_MS: 250,
} as const;

export const SEGMENTER_DEFAULTS = {
  PREAMBLE_SECTION: "Preamble",
  IMPLICIT_SECTION: "Full Document",
} as const;

export const REPORT_DEFAULTS = {
  /** Lines shown per change group before "... and N more" */
  MAX_LINES_PER_SECTION: 10,
  TITLE: "Document Version Comparison Report",
} as const;
