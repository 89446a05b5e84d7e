/**
 * Splits report text into named, ordered sections.
 *
 * Heading rules are tried in priority order against the whole document. The
 * first rule that matches any line fixes the grammar: only that rule's
 * headings delimit sections, even where a lower-priority rule would also match.
 */

import { SEGMENTER_DEFAULTS } from "../config/constants";
import type { Section, SegmentedDocument } from "./VersionComparison.types";

export interface HeadingRule {
  name: string;
  /** Tested against each trimmed, non-blank line */
  pattern: RegExp;
  /** Builds the section name from a match */
  label: (match: RegExpExecArray) => string;
}

const clean = (value: string | undefined): string => (value ?? "").replace(/\s+/g, " ").trim();

export const DEFAULT_HEADING_RULES: readonly HeadingRule[] = [
  {
    // "Section 3: Future Medical Care", "SECTION 3 - Future Medical Care"
    name: "section",
    pattern: /^section\s+(\d+)[:\-\s]+(.+)$/i,
    label: (m) => `Section ${m[1]}: ${clean(m[2])}`,
  },
  {
    // "Part IV: Cost Projections"
    name: "part",
    pattern: /^part\s+([IVXLC]+)[:\-\s]+(.+)$/i,
    label: (m) => `Part ${m[1].toUpperCase()}: ${clean(m[2])}`,
  },
  {
    // "3. Future Medical Care"
    name: "numbered",
    pattern: /^(\d+)\.\s+([A-Z].*)$/,
    label: (m) => `Section ${m[1]}: ${clean(m[2])}`,
  },
  {
    // "## Future Medical Care"
    name: "markdown",
    pattern: /^#{1,3}\s+(.+)$/,
    label: (m) => clean(m[1]),
  },
];

interface Heading {
  lineIndex: number;
  name: string;
}

function findHeadings(lines: string[], rule: HeadingRule): Heading[] {
  const headings: Heading[] = [];
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (!line) continue;
    // Fresh regex state per line in case a caller passes a /g pattern
    rule.pattern.lastIndex = 0;
    const match = rule.pattern.exec(line);
    if (match) {
      headings.push({ lineIndex: i, name: rule.label(match) });
    }
  }
  return headings;
}

/** "Preamble", or a numbered variant when a heading in the document already uses that name */
function preambleName(headings: Heading[]): string {
  const taken = new Set(headings.map((h) => h.name));
  let name: string = SEGMENTER_DEFAULTS.PREAMBLE_SECTION;
  for (let n = 2; taken.has(name); n++) {
    name = `${SEGMENTER_DEFAULTS.PREAMBLE_SECTION} (${n})`;
  }
  return name;
}

function bodyOf(lines: string[]): string {
  return lines.filter((line) => line.length > 0).join("\n");
}

export class SectionSegmenter {
  private readonly rules: readonly HeadingRule[];

  constructor(rules: readonly HeadingRule[] = DEFAULT_HEADING_RULES) {
    this.rules = rules;
  }

  segment(text: string): SegmentedDocument {
    const lines = text.replace(/\r\n?/g, "\n").split("\n").map((line) => line.trim());

    for (const rule of this.rules) {
      const headings = findHeadings(lines, rule);
      if (headings.length === 0) continue;
      return { sections: this.buildSections(lines, headings), rule: rule.name, implicit: false };
    }

    return {
      sections: [{ name: SEGMENTER_DEFAULTS.IMPLICIT_SECTION, orderIndex: 0, body: bodyOf(lines) }],
      rule: null,
      implicit: true,
    };
  }

  private buildSections(lines: string[], headings: Heading[]): Section[] {
    const sections: Section[] = [];
    const byName = new Map<string, Section>();

    const preamble = bodyOf(lines.slice(0, headings[0].lineIndex));
    // Kept out of byName: headings never merge into untitled text
    if (preamble) {
      sections.push({ name: preambleName(headings), orderIndex: 0, body: preamble, untitled: true });
    }

    for (let h = 0; h < headings.length; h++) {
      const end = h + 1 < headings.length ? headings[h + 1].lineIndex : lines.length;
      const body = bodyOf(lines.slice(headings[h].lineIndex + 1, end));
      const existing = byName.get(headings[h].name);

      if (existing) {
        // First heading keeps the name and position; repeated headings extend it
        if (body) existing.body = existing.body ? `${existing.body}\n${body}` : body;
        continue;
      }

      const section = { name: headings[h].name, orderIndex: sections.length, body };
      sections.push(section);
      byName.set(section.name, section);
    }

    return sections;
  }
}
