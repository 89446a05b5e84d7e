/**
 * Section-level and line-level comparison of two documents.
 *
 * Section order is the left document's order, followed by right-only
 * sections in the right document's order. Everything is array-driven, so the
 * same inputs always produce the same output.
 */

import { SEGMENTER_DEFAULTS } from "../config/constants";
import { collapseEditScript, diffLines, linesEqual, toLineChanges, toLines } from "./LineDiff";
import {
  emptySummary,
  type DiffSummary,
  type DocumentDiff,
  type LineChange,
  type Section,
  type SectionDiff,
  type SegmentedDocument,
} from "./VersionComparison.types";

function isBlankDocument(doc: SegmentedDocument): boolean {
  return doc.implicit && doc.sections.every((s) => s.body.trim() === "");
}

/**
 * Re-assemble a segmented document as one text, headings included.
 */
export function flattenDocument(doc: SegmentedDocument): string {
  if (doc.implicit) return doc.sections.map((s) => s.body).join("\n");
  return doc.sections
    .map((s) => (s.untitled ? s.body : [s.name, s.body].filter(Boolean).join("\n")))
    .filter(Boolean)
    .join("\n");
}

/**
 * Sections to compare. A blank document contributes none; when either side
 * has no heading structure both sides are compared as whole texts.
 */
function comparableSections(left: SegmentedDocument, right: SegmentedDocument): [Section[], Section[]] {
  const leftBlank = isBlankDocument(left);
  const rightBlank = isBlankDocument(right);

  if (leftBlank || rightBlank) {
    return [leftBlank ? [] : left.sections, rightBlank ? [] : right.sections];
  }

  if (left.implicit || right.implicit) {
    const whole = (doc: SegmentedDocument): Section[] => [
      { name: SEGMENTER_DEFAULTS.IMPLICIT_SECTION, orderIndex: 0, body: flattenDocument(doc) },
    ];
    return [whole(left), whole(right)];
  }

  return [left.sections, right.sections];
}

export function summarize(sections: readonly SectionDiff[]): DiffSummary {
  const summary = emptySummary();
  for (const section of sections) {
    summary.total++;
    summary[section.status]++;
  }
  return summary;
}

export function addSummaries(a: DiffSummary, b: DiffSummary): DiffSummary {
  return {
    total: a.total + b.total,
    added: a.added + b.added,
    removed: a.removed + b.removed,
    modified: a.modified + b.modified,
    unchanged: a.unchanged + b.unchanged,
  };
}

export class DiffEngine {
  /**
   * Compare `left` (older) against `right` (newer).
   */
  diff(left: SegmentedDocument, right: SegmentedDocument): DocumentDiff {
    const [leftSections, rightSections] = comparableSections(left, right);

    const leftByName = new Map(leftSections.map((s): [string, Section] => [s.name, s]));
    const rightByName = new Map(rightSections.map((s): [string, Section] => [s.name, s]));

    const names = leftSections.map((s) => s.name);
    for (const section of rightSections) {
      if (!leftByName.has(section.name)) names.push(section.name);
    }

    const sections = names.map((name, orderIndex) =>
      this.diffSection(name, orderIndex, leftByName.get(name), rightByName.get(name))
    );

    return { sections, summary: summarize(sections) };
  }

  diffSection(
    name: string,
    orderIndex: number,
    left: Section | undefined,
    right: Section | undefined
  ): SectionDiff {
    const base = { sectionName: name, orderIndex };

    if (left && !right) {
      const removedLines = toLines(left.body);
      return {
        ...base,
        status: "removed",
        addedLines: [],
        removedLines,
        modifiedPairs: [],
        lines: removedLines.map((content): LineChange => ({ kind: "removed", content })),
      };
    }

    if (right && !left) {
      const addedLines = toLines(right.body);
      return {
        ...base,
        status: "added",
        addedLines,
        removedLines: [],
        modifiedPairs: [],
        lines: addedLines.map((content): LineChange => ({ kind: "added", content })),
      };
    }

    const before = toLines(left?.body ?? "");
    const after = toLines(right?.body ?? "");

    if (linesEqual(before, after)) {
      return { ...base, status: "unchanged", addedLines: [], removedLines: [], modifiedPairs: [], lines: [] };
    }

    const ops = diffLines(before, after);
    return {
      ...base,
      status: "modified",
      ...collapseEditScript(ops),
      lines: toLineChanges(ops),
    };
  }
}
