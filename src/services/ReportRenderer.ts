/**
 * Turns a ComparisonResult into downloadable report bytes.
 *
 * Never recomputes a diff: it only lays out what the result already holds,
 * after checking the result is internally consistent.
 */

import { REPORT_DEFAULTS } from "../config/constants";
import { RenderError, isVersionCompareError } from "../errors";
import { createLogger } from "../utils/logger";
import { addSummaries, summarize } from "./DiffEngine";
import { HtmlReportRenderer } from "./renderers/HtmlReportRenderer";
import { PdfReportRenderer } from "./renderers/PdfReportRenderer";
import {
  emptySummary,
  isReportEncoding,
  type ComparisonResult,
  type DiffSummary,
  type ReportEncoding,
  type SectionStatus,
} from "./VersionComparison.types";

const log = createLogger({ component: "ReportRenderer" });

export const REPORT_CONTENT_TYPES: Record<ReportEncoding, string> = {
  html: "text/html; charset=utf-8",
  pdf: "application/pdf",
};

const SUMMARY_COUNTS = ["total", "added", "removed", "modified", "unchanged"] as const;
const SECTION_STATUSES: readonly SectionStatus[] = ["added", "removed", "modified", "unchanged"];

function isSummary(value: unknown): value is DiffSummary {
  if (typeof value !== "object" || value === null) return false;
  return SUMMARY_COUNTS.every((field) => {
    const count: unknown = Reflect.get(value, field);
    return typeof count === "number" && Number.isInteger(count) && count >= 0;
  });
}

function hasValidStatus(section: unknown): boolean {
  if (typeof section !== "object" || section === null) return false;
  const status: unknown = Reflect.get(section, "status");
  return SECTION_STATUSES.some((known) => known === status);
}

function sameSummary(a: DiffSummary, b: DiffSummary): boolean {
  return (
    a.total === b.total &&
    a.added === b.added &&
    a.removed === b.removed &&
    a.modified === b.modified &&
    a.unchanged === b.unchanged
  );
}

/**
 * Reject results whose summaries disagree with their section statuses.
 */
export function validateResult(result: ComparisonResult): void {
  if (typeof result !== "object" || result === null) {
    throw RenderError.malformedInput("result is not an object");
  }
  if (!Array.isArray(result.pairs) || !Array.isArray(result.versionErrors)) {
    throw RenderError.malformedInput("pairs and versionErrors must be arrays", { caseId: result.caseId });
  }

  let total = emptySummary();
  result.pairs.forEach((pair, index) => {
    if (!Array.isArray(pair.sections)) {
      throw RenderError.malformedInput(`pair ${index} has no sections array`, { caseId: result.caseId });
    }
    if (!pair.comparable) {
      if (pair.sections.length > 0) {
        throw RenderError.malformedInput(`pair ${index} is not comparable but lists sections`, { caseId: result.caseId });
      }
      return;
    }
    const invalid = pair.sections.findIndex((section) => !hasValidStatus(section));
    if (invalid >= 0) {
      throw RenderError.malformedInput(`pair ${index} section ${invalid} has no valid status`, { caseId: result.caseId });
    }
    if (!isSummary(pair.summary)) {
      throw RenderError.malformedInput(`pair ${index} has no summary`, { caseId: result.caseId });
    }
    if (!sameSummary(summarize(pair.sections), pair.summary)) {
      throw RenderError.malformedInput(`pair ${index} summary does not match its sections`, { caseId: result.caseId });
    }
    total = addSummaries(total, pair.summary);
  });

  if (!isSummary(result.summary)) {
    throw RenderError.malformedInput("result has no summary", { caseId: result.caseId });
  }
  if (!sameSummary(total, result.summary)) {
    throw RenderError.malformedInput("result summary does not match its pairs", { caseId: result.caseId });
  }
}

export function reportFilename(result: ComparisonResult, encoding: ReportEncoding): string {
  const stamp = result.generatedAt.replace(/[-:T]/g, "").slice(0, 12);
  return `version-comparison-${result.caseId}-${stamp}.${encoding}`;
}

export class ReportRenderer {
  private readonly html: HtmlReportRenderer;
  private readonly pdf: PdfReportRenderer;

  constructor(maxLinesPerSection: number = REPORT_DEFAULTS.MAX_LINES_PER_SECTION) {
    this.html = new HtmlReportRenderer(maxLinesPerSection);
    this.pdf = new PdfReportRenderer(maxLinesPerSection);
  }

  async render(result: ComparisonResult, encoding: unknown): Promise<Uint8Array> {
    if (!isReportEncoding(encoding)) {
      throw RenderError.unsupportedEncoding(encoding, { operation: "renderReport" });
    }
    validateResult(result);

    try {
      const bytes = encoding === "html" ? this.html.render(result) : await this.pdf.render(result);
      log.info("Report rendered", { caseId: result.caseId, encoding, bytes: bytes.byteLength });
      return bytes;
    } catch (error) {
      if (isVersionCompareError(error)) throw error;
      log.error("Report rendering failed", { caseId: result.caseId, encoding }, error);
      throw RenderError.failed(encoding, error instanceof Error ? error : undefined, {
        operation: "renderReport",
        caseId: result.caseId,
      });
    }
  }
}
