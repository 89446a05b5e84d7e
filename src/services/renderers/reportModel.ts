/**
 * Presentation helpers shared by the HTML and PDF renderers.
 * Nothing here looks at document text beyond what the diff already holds.
 */

import type {
  ComparisonResult,
  DiffSummary,
  PairComparison,
  SectionDiff,
  SectionStatus,
} from "../VersionComparison.types";

export interface CappedLines<T> {
  shown: T[];
  hidden: number;
}

export function capLines<T>(lines: readonly T[], max: number): CappedLines<T> {
  if (lines.length <= max) return { shown: [...lines], hidden: 0 };
  return { shown: lines.slice(0, max), hidden: lines.length - max };
}

export const STATUS_LABELS: Record<SectionStatus, string> = {
  added: "ADDED",
  removed: "REMOVED",
  modified: "MODIFIED",
  unchanged: "UNCHANGED",
};

export const NOT_COMPARABLE_LABEL = "NOT COMPARABLE";

export function pairTitle(pair: PairComparison): string {
  return `${pair.left.label} -> ${pair.right.label}`;
}

export function summaryEntries(summary: DiffSummary): Array<[string, number]> {
  return [
    ["Total", summary.total],
    ["Added", summary.added],
    ["Removed", summary.removed],
    ["Modified", summary.modified],
    ["Unchanged", summary.unchanged],
  ];
}

export function modeLabel(result: ComparisonResult): string {
  return result.mode === "selective" ? "Selective" : "Sequential";
}

export function versionsCompared(result: ComparisonResult): string {
  return result.versions.map((v) => v.filename).join(", ");
}

/**
 * One labelled group of lines inside a section, e.g. "Added lines".
 */
export interface LineGroup {
  kind: "added" | "removed";
  label: string;
  lines: string[];
}

export function sectionLineGroups(section: SectionDiff): LineGroup[] {
  switch (section.status) {
    case "added":
      return [{ kind: "added", label: "Section added", lines: section.addedLines }];
    case "removed":
      return [{ kind: "removed", label: "Section removed", lines: section.removedLines }];
    case "modified": {
      const groups: LineGroup[] = [];
      if (section.addedLines.length > 0) {
        groups.push({ kind: "added", label: "Added lines", lines: section.addedLines });
      }
      if (section.removedLines.length > 0) {
        groups.push({ kind: "removed", label: "Removed lines", lines: section.removedLines });
      }
      return groups;
    }
    case "unchanged":
      return [];
  }
}

export const UNCHANGED_NOTE = "No changes detected in this section.";
