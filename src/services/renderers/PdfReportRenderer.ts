/**
 * Paginated PDF report drawn with pdf-lib.
 * A4 pages, standard Helvetica fonts, word-wrapped lines, new page on overflow.
 */

import { PDFDocument, StandardFonts, rgb, type PDFFont, type PDFPage } from "pdf-lib";
import { REPORT_DEFAULTS } from "../../config/constants";
import type { ComparisonResult, PairComparison, SectionDiff, SectionStatus } from "../VersionComparison.types";
import {
  capLines,
  modeLabel,
  NOT_COMPARABLE_LABEL,
  pairTitle,
  sectionLineGroups,
  STATUS_LABELS,
  summaryEntries,
  UNCHANGED_NOTE,
  versionsCompared,
} from "./reportModel";

type Color = ReturnType<typeof rgb>;

const PAGE_WIDTH = 595.28;
const PAGE_HEIGHT = 841.89;
const PAGE_MARGIN = 50;
const BODY_SIZE = 10;
const LINE_GAP = 4;

const COLOR_TEXT = rgb(0.2, 0.2, 0.2);
const COLOR_MUTED = rgb(0.4, 0.4, 0.4);
const COLOR_TITLE = rgb(0.4, 0.49, 0.92);
const STATUS_COLORS: Record<SectionStatus, Color> = {
  added: rgb(0.08, 0.5, 0.24),
  removed: rgb(0.74, 0.12, 0.12),
  modified: rgb(0.52, 0.39, 0.02),
  unchanged: rgb(0.05, 0.33, 0.38),
};

/**
 * Standard fonts only encode WinAnsi; map common typography to ASCII and
 * replace anything else outside Latin-1.
 */
export function toWinAnsi(value: string): string {
  return value
    .replace(/\t/g, "    ")
    .replace(/[\r\n]+/g, " ")
    .replace(/[‘’‚]/g, "'")
    .replace(/[“”„]/g, '"')
    .replace(/[‐-―]/g, "-")
    .replace(/…/g, "...")
    .replace(/[•·]/g, "*")
    .replace(/→/g, "->")
    .replace(/[^\x20-\x7E\xA0-\xFF]/g, "?");
}

interface TextStyle {
  font: PDFFont;
  size: number;
  color: Color;
  indent?: number;
}

/**
 * Top-down text cursor that wraps words and starts new pages as needed.
 */
class PageWriter {
  private page: PDFPage;
  private y: number;

  constructor(private doc: PDFDocument) {
    this.page = this.addPage();
    this.y = PAGE_HEIGHT - PAGE_MARGIN;
  }

  private addPage(): PDFPage {
    this.page = this.doc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
    this.y = PAGE_HEIGHT - PAGE_MARGIN;
    return this.page;
  }

  private ensureSpace(height: number): void {
    if (this.y - height < PAGE_MARGIN) this.addPage();
  }

  space(height: number): void {
    this.y -= height;
    if (this.y < PAGE_MARGIN) this.addPage();
  }

  newPage(): void {
    this.addPage();
  }

  write(text: string, style: TextStyle): void {
    const indent = style.indent ?? 0;
    const maxWidth = PAGE_WIDTH - PAGE_MARGIN * 2 - indent;
    const lineHeight = style.size + LINE_GAP;

    for (const line of wrapText(toWinAnsi(text), style.font, style.size, maxWidth)) {
      this.ensureSpace(lineHeight);
      this.y -= style.size;
      this.page.drawText(line, {
        x: PAGE_MARGIN + indent,
        y: this.y,
        font: style.font,
        size: style.size,
        color: style.color,
      });
      this.y -= LINE_GAP;
    }
  }
}

/**
 * Greedy word wrap; words wider than the line are broken by character.
 */
export function wrapText(text: string, font: PDFFont, size: number, maxWidth: number): string[] {
  const words = text.split(" ");
  const lines: string[] = [];
  let current = "";

  const fits = (value: string) => font.widthOfTextAtSize(value, size) <= maxWidth;

  for (const word of words) {
    const candidate = current ? `${current} ${word}` : word;
    if (fits(candidate)) {
      current = candidate;
      continue;
    }
    if (current) lines.push(current);

    let rest = word;
    while (rest && !fits(rest)) {
      let cut = rest.length - 1;
      while (cut > 1 && !fits(rest.slice(0, cut))) cut--;
      lines.push(rest.slice(0, cut));
      rest = rest.slice(cut);
    }
    current = rest;
  }

  if (current || lines.length === 0) lines.push(current);
  return lines;
}

export class PdfReportRenderer {
  constructor(private maxLinesPerSection: number = REPORT_DEFAULTS.MAX_LINES_PER_SECTION) {}

  async render(result: ComparisonResult): Promise<Uint8Array> {
    const generatedAt = new Date(result.generatedAt);
    const doc = await PDFDocument.create({ updateMetadata: false });
    doc.setTitle(`${REPORT_DEFAULTS.TITLE} - Case ${result.caseId}`);
    doc.setCreationDate(generatedAt);
    doc.setModificationDate(generatedAt);

    const [regular, bold] = await Promise.all([
      doc.embedFont(StandardFonts.Helvetica),
      doc.embedFont(StandardFonts.HelveticaBold),
    ]);
    const body: TextStyle = { font: regular, size: BODY_SIZE, color: COLOR_TEXT };
    const writer = new PageWriter(doc);

    writer.write(REPORT_DEFAULTS.TITLE, { font: bold, size: 20, color: COLOR_TITLE });
    writer.space(10);
    writer.write(`Case ID: ${result.caseId}`, body);
    writer.write(`Mode: ${modeLabel(result)}`, body);
    writer.write(`Generated: ${result.generatedAt}`, body);
    writer.write(`Versions: ${versionsCompared(result)}`, body);

    if (result.versionErrors.length > 0) {
      writer.space(8);
      writer.write("Versions that could not be compared:", { ...body, font: bold });
      for (const error of result.versionErrors) {
        writer.write(`${error.versionId} (${error.stage}): ${error.message}`, { ...body, indent: 12 });
      }
    }

    result.pairs.forEach((pair, index) => {
      if (index > 0) writer.newPage();
      else writer.space(20);
      this.renderPair(writer, pair, body, bold);
    });

    return doc.save();
  }

  private renderPair(writer: PageWriter, pair: PairComparison, body: TextStyle, bold: PDFFont): void {
    writer.write(pairTitle(pair), { font: bold, size: 15, color: COLOR_TEXT });
    writer.write(`${pair.left.filename} -> ${pair.right.filename}`, { ...body, size: 8, color: COLOR_MUTED });
    writer.space(6);

    if (!pair.comparable) {
      writer.write(`[${NOT_COMPARABLE_LABEL}]`, { ...body, font: bold });
      for (const error of pair.errors) {
        writer.write(`${error.versionId} (${error.stage}): ${error.message}`, { ...body, indent: 12 });
      }
      return;
    }

    const counts = summaryEntries(pair.summary)
      .map(([label, count]) => `${label}: ${count}`)
      .join("   ");
    writer.write(counts, { ...body, font: bold });
    writer.space(8);

    for (const section of pair.sections) {
      this.renderSection(writer, section, body, bold);
    }
  }

  private renderSection(writer: PageWriter, section: SectionDiff, body: TextStyle, bold: PDFFont): void {
    writer.write(`${section.sectionName} [${STATUS_LABELS[section.status]}]`, {
      font: bold,
      size: 12,
      color: STATUS_COLORS[section.status],
    });

    if (section.status === "unchanged") {
      writer.write(UNCHANGED_NOTE, { ...body, color: COLOR_MUTED, indent: 12 });
      writer.space(6);
      return;
    }

    for (const group of sectionLineGroups(section)) {
      writer.write(`${group.label}:`, { ...body, font: bold, indent: 12 });
      const sign = group.kind === "added" ? "+" : "-";
      const { shown, hidden } = capLines(group.lines, this.maxLinesPerSection);
      for (const line of shown) writer.write(`${sign} ${line}`, { ...body, indent: 24 });
      if (hidden > 0) writer.write(`... and ${hidden} more lines`, { ...body, color: COLOR_MUTED, indent: 24 });
    }

    if (section.modifiedPairs.length > 0) {
      writer.write("Modified lines:", { ...body, font: bold, indent: 12 });
      const { shown, hidden } = capLines(section.modifiedPairs, this.maxLinesPerSection);
      for (const pair of shown) {
        writer.write(`Old: ${pair.before}`, { ...body, indent: 24 });
        writer.write(`New: ${pair.after}`, { ...body, indent: 24 });
      }
      if (hidden > 0) writer.write(`... and ${hidden} more changes`, { ...body, color: COLOR_MUTED, indent: 24 });
    }

    writer.space(6);
  }
}
