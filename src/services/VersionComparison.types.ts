/**
 * Type definitions for version comparison.
 * Transient values only: nothing here is persisted by the engine.
 */

export type VersionKind = "generated" | "ground-truth";

export interface VersionDescriptor {
  /** Opaque storage key; unique per case */
  id: string;
  caseId: string;
  timestamp: Date;
  size: number;
  filename: string;
  kind: VersionKind;
  /** "CompleteAIGeneratedReport" | "LCP" | "LifeCarePlan" for generated renditions */
  documentType?: string;
  /** Display form, e.g. "2025-03-14 09:30" */
  label: string;
}

export interface ExtractedDocument {
  versionId: string;
  rawText: string;
  extractionMethod: string;
}

export interface Section {
  name: string;
  orderIndex: number;
  body: string;
  /** Set on the text before the first heading; its name is not a heading line */
  untitled?: true;
}

export interface SegmentedDocument {
  sections: Section[];
  /** Name of the heading rule that fixed the grammar, null when none matched */
  rule: string | null;
  /** True when no heading matched and the whole text is one section */
  implicit: boolean;
}

export type LineChangeKind = "added" | "removed" | "unchanged";

export interface LineChange {
  kind: LineChangeKind;
  content: string;
}

export interface ModifiedPair {
  before: string;
  after: string;
}

export type SectionStatus = "added" | "removed" | "modified" | "unchanged";

export interface SectionDiff {
  sectionName: string;
  orderIndex: number;
  status: SectionStatus;
  addedLines: string[];
  removedLines: string[];
  modifiedPairs: ModifiedPair[];
  /**
   * Line-level content: the edit script for modified sections, every line for
   * added/removed sections, empty for unchanged ones.
   */
  lines: LineChange[];
}

export interface DiffSummary {
  total: number;
  added: number;
  removed: number;
  modified: number;
  unchanged: number;
}

export interface DocumentDiff {
  sections: SectionDiff[];
  summary: DiffSummary;
}

export type VersionErrorStage = "fetch" | "extract";

export interface VersionError {
  versionId: string;
  stage: VersionErrorStage;
  code: number;
  message: string;
}

export interface PairComparison {
  left: VersionDescriptor;
  right: VersionDescriptor;
  /** False when either side failed fetch or extraction */
  comparable: boolean;
  sections: SectionDiff[];
  summary: DiffSummary;
  errors: VersionError[];
}

export type ComparisonMode = "selective" | "sequential";

export type ComparisonSelection =
  | { mode: "selective"; versionIds: string[] }
  | { mode: "sequential" };

export interface ComparisonResult {
  caseId: string;
  mode: ComparisonMode;
  /** ISO timestamp */
  generatedAt: string;
  /** Versions that took part, in comparison order */
  versions: VersionDescriptor[];
  pairs: PairComparison[];
  /** Sum over comparable pairs */
  summary: DiffSummary;
  versionErrors: VersionError[];
}

export type ReportEncoding = "html" | "pdf";

export const REPORT_ENCODINGS: readonly ReportEncoding[] = ["html", "pdf"];

export function isReportEncoding(value: unknown): value is ReportEncoding {
  return REPORT_ENCODINGS.some((encoding) => encoding === value);
}

export function emptySummary(): DiffSummary {
  return { total: 0, added: 0, removed: 0, modified: 0, unchanged: 0 };
}
