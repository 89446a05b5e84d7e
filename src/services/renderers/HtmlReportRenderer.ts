/**
 * HTML report with collapsible sections.
 * Builds the page as a DOM with linkedom; all document text goes through
 * textContent, never innerHTML.
 */

import { parseHTML } from "linkedom";
import { REPORT_DEFAULTS } from "../../config/constants";
import type { ComparisonResult, PairComparison, SectionDiff, VersionError } from "../VersionComparison.types";
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

const STYLES = `
body { font-family: 'Segoe UI', Tahoma, Geneva, Verdana, sans-serif; max-width: 1200px; margin: 0 auto; padding: 20px; background: #f5f5f5; }
.header { background: linear-gradient(135deg, #667eea 0%, #764ba2 100%); color: white; padding: 30px; border-radius: 10px; margin-bottom: 30px; }
.pair { margin-bottom: 40px; }
.summary { display: flex; gap: 12px; margin: 10px 0 20px; }
.summary span { background: white; padding: 6px 12px; border-radius: 6px; box-shadow: 0 1px 2px rgba(0,0,0,0.1); }
.section { background: white; padding: 20px; margin-bottom: 20px; border-radius: 8px; box-shadow: 0 2px 4px rgba(0,0,0,0.1); }
.section > summary { font-size: 1.2em; font-weight: bold; color: #333; cursor: pointer; }
.status-badge { display: inline-block; padding: 5px 12px; border-radius: 20px; font-size: 0.75em; font-weight: bold; margin-left: 10px; }
.status-added { background: #d4edda; color: #155724; }
.status-removed { background: #f8d7da; color: #721c24; }
.status-modified { background: #fff3cd; color: #856404; }
.status-unchanged { background: #d1ecf1; color: #0c5460; }
.status-not-comparable { background: #e2e3e5; color: #383d41; }
.change-item { margin: 10px 0; padding: 10px; border-left: 3px solid #ddd; background: #f9f9f9; }
.change-item.added { border-left-color: #28a745; background: #d4edda; }
.change-item.removed { border-left-color: #dc3545; background: #f8d7da; }
.change-item.changed { border-left-color: #ffc107; background: #fff3cd; }
.change-label { font-weight: bold; margin-bottom: 5px; }
.line { margin: 2px 0; white-space: pre-wrap; }
.more { font-style: italic; color: #666; }
.errors { background: #fff; border-left: 3px solid #6c757d; padding: 10px 20px; margin-bottom: 20px; }
`;

type HtmlDocument = ReturnType<typeof parseHTML>["document"];
type HtmlElement = ReturnType<HtmlDocument["createElement"]>;

class HtmlBuilder {
  constructor(private doc: HtmlDocument) {}

  el(tag: string, attrs: Record<string, string> = {}, text?: string): HtmlElement {
    const node = this.doc.createElement(tag);
    for (const [name, value] of Object.entries(attrs)) node.setAttribute(name, value);
    if (text !== undefined) node.textContent = text;
    return node;
  }

  append(parent: HtmlElement, ...children: HtmlElement[]): HtmlElement {
    for (const child of children) parent.appendChild(child);
    return parent;
  }
}

export class HtmlReportRenderer {
  constructor(private maxLinesPerSection: number = REPORT_DEFAULTS.MAX_LINES_PER_SECTION) {}

  render(result: ComparisonResult): Uint8Array {
    const { document } = parseHTML(
      '<!DOCTYPE html><html lang="en"><head></head><body></body></html>'
    );
    const b = new HtmlBuilder(document);

    const title = `Version Comparison - Case ${result.caseId}`;
    b.append(
      document.head,
      b.el("meta", { charset: "UTF-8" }),
      b.el("title", {}, title),
      b.el("style", {}, STYLES)
    );

    const header = b.append(
      b.el("div", { class: "header" }),
      b.el("h1", {}, REPORT_DEFAULTS.TITLE),
      this.metaLine(b, "Case ID", result.caseId),
      this.metaLine(b, "Comparison Mode", modeLabel(result)),
      this.metaLine(b, "Generated", result.generatedAt),
      this.metaLine(b, "Versions Compared", versionsCompared(result))
    );
    document.body.appendChild(header);

    if (result.versionErrors.length > 0) {
      document.body.appendChild(this.errorBlock(b, "Versions that could not be compared", result.versionErrors));
    }

    result.pairs.forEach((pair, index) => {
      document.body.appendChild(this.renderPair(b, pair, index));
    });

    return new TextEncoder().encode(document.toString());
  }

  private metaLine(b: HtmlBuilder, label: string, value: string): HtmlElement {
    return b.append(b.el("p"), b.el("strong", {}, `${label}: `), b.el("span", {}, value));
  }

  private errorBlock(b: HtmlBuilder, heading: string, errors: VersionError[]): HtmlElement {
    const list = b.el("ul");
    for (const error of errors) {
      list.appendChild(b.el("li", { "data-version": error.versionId }, `${error.versionId} (${error.stage}): ${error.message}`));
    }
    return b.append(b.el("div", { class: "errors" }), b.el("h3", {}, heading), list);
  }

  private renderPair(b: HtmlBuilder, pair: PairComparison, index: number): HtmlElement {
    const container = b.el("section", { class: "pair", "data-pair": String(index) });
    container.appendChild(b.el("h2", {}, pairTitle(pair)));
    container.appendChild(b.el("p", { class: "files" }, `${pair.left.filename} -> ${pair.right.filename}`));

    if (!pair.comparable) {
      const badge = b.el("span", { class: "status-badge status-not-comparable" }, NOT_COMPARABLE_LABEL);
      container.appendChild(badge);
      container.appendChild(this.errorBlock(b, "Extraction or fetch failed", pair.errors));
      return container;
    }

    const summary = b.el("div", { class: "summary" });
    for (const [label, count] of summaryEntries(pair.summary)) {
      summary.appendChild(b.el("span", { "data-count": label.toLowerCase() }, `${label}: ${count}`));
    }
    container.appendChild(summary);

    for (const section of pair.sections) {
      container.appendChild(this.renderSection(b, section));
    }
    return container;
  }

  private renderSection(b: HtmlBuilder, section: SectionDiff): HtmlElement {
    const attrs: Record<string, string> = { class: "section", "data-status": section.status };
    if (section.status !== "unchanged") attrs.open = "";
    const details = b.el("details", attrs);

    details.appendChild(
      b.append(
        b.el("summary"),
        b.el("span", { class: "section-name" }, section.sectionName),
        b.el("span", { class: `status-badge status-${section.status}` }, STATUS_LABELS[section.status])
      )
    );

    if (section.status === "unchanged") {
      details.appendChild(b.el("p", {}, UNCHANGED_NOTE));
      return details;
    }

    for (const group of sectionLineGroups(section)) {
      const item = b.el("div", { class: `change-item ${group.kind}` });
      item.appendChild(b.el("div", { class: "change-label" }, `${group.label}:`));
      const { shown, hidden } = capLines(group.lines, this.maxLinesPerSection);
      for (const line of shown) item.appendChild(b.el("p", { class: "line" }, line));
      if (hidden > 0) item.appendChild(b.el("p", { class: "more" }, `... and ${hidden} more lines`));
      details.appendChild(item);
    }

    if (section.modifiedPairs.length > 0) {
      const item = b.el("div", { class: "change-item changed" });
      item.appendChild(b.el("div", { class: "change-label" }, "Modified lines:"));
      const { shown, hidden } = capLines(section.modifiedPairs, this.maxLinesPerSection);
      for (const pair of shown) {
        item.appendChild(b.append(b.el("p", { class: "line" }), b.el("strong", {}, "Old: "), b.el("span", {}, pair.before)));
        item.appendChild(b.append(b.el("p", { class: "line" }), b.el("strong", {}, "New: "), b.el("span", {}, pair.after)));
      }
      if (hidden > 0) item.appendChild(b.el("p", { class: "more" }, `... and ${hidden} more changes`));
      details.appendChild(item);
    }

    return details;
  }
}
