import { describe, it, expect } from "vitest";
import { DiffEngine, addSummaries, flattenDocument, summarize } from "../src/services/DiffEngine";
import { SectionSegmenter } from "../src/services/SectionSegmenter";
import { emptySummary } from "../src/services/VersionComparison.types";

const segmenter = new SectionSegmenter();
const engine = new DiffEngine();
const seg = (text: string) => segmenter.segment(text);

const LEFT = "Section 1: Intro\nHello\nSection 2: Care\nOld line\nSection 3: Costs\n$100";
const RIGHT = "Section 1: Intro\nHello\nSection 2: Care\nNew line\nSection 4: Notes\nExtra";

describe("DiffEngine", () => {
  it("should classify every section", () => {
    const diff = engine.diff(seg(LEFT), seg(RIGHT));

    expect(diff.sections).toEqual([
      {
        sectionName: "Section 1: Intro",
        orderIndex: 0,
        status: "unchanged",
        addedLines: [],
        removedLines: [],
        modifiedPairs: [],
        lines: [],
      },
      {
        sectionName: "Section 2: Care",
        orderIndex: 1,
        status: "modified",
        addedLines: [],
        removedLines: [],
        modifiedPairs: [{ before: "Old line", after: "New line" }],
        lines: [
          { kind: "removed", content: "Old line" },
          { kind: "added", content: "New line" },
        ],
      },
      {
        sectionName: "Section 3: Costs",
        orderIndex: 2,
        status: "removed",
        addedLines: [],
        removedLines: ["$100"],
        modifiedPairs: [],
        lines: [{ kind: "removed", content: "$100" }],
      },
      {
        sectionName: "Section 4: Notes",
        orderIndex: 3,
        status: "added",
        addedLines: ["Extra"],
        removedLines: [],
        modifiedPairs: [],
        lines: [{ kind: "added", content: "Extra" }],
      },
    ]);
    expect(diff.summary).toEqual({ total: 4, added: 1, removed: 1, modified: 1, unchanged: 1 });
  });

  it("should report a document against itself as unchanged", () => {
    const diff = engine.diff(seg(LEFT), seg(LEFT));

    expect(diff.sections.every((s) => s.status === "unchanged")).toBe(true);
    expect(diff.summary).toEqual({ total: 3, added: 0, removed: 0, modified: 0, unchanged: 3 });
  });

  it("should show an appended sentence as a single added line", () => {
    const diff = engine.diff(seg("Section 1: A\nline one"), seg("Section 1: A\nline one\nline two"));

    expect(diff.sections[0]).toMatchObject({
      status: "modified",
      addedLines: ["line two"],
      removedLines: [],
      modifiedPairs: [],
      lines: [
        { kind: "unchanged", content: "line one" },
        { kind: "added", content: "line two" },
      ],
    });
  });

  it("should order left sections first, then right-only sections", () => {
    const left = seg("Section 1: A\na\nSection 3: C\nc");
    const right = seg("Section 2: B\nb\nSection 1: A\na\nSection 4: D\nd\nSection 3: C\nc");

    const diff = engine.diff(left, right);

    expect(diff.sections.map((s) => [s.orderIndex, s.sectionName, s.status])).toEqual([
      [0, "Section 1: A", "unchanged"],
      [1, "Section 3: C", "unchanged"],
      [2, "Section 2: B", "added"],
      [3, "Section 4: D", "added"],
    ]);
  });

  it("should compare whole texts when one side has no headings", () => {
    const diff = engine.diff(seg("plain text"), seg("Section 1: A\nbody"));

    expect(diff.sections).toHaveLength(1);
    expect(diff.sections[0]).toMatchObject({
      sectionName: "Full Document",
      status: "modified",
      addedLines: ["body"],
      modifiedPairs: [{ before: "plain text", after: "Section 1: A" }],
    });
  });

  it("should treat every section as added when the left document is blank", () => {
    const diff = engine.diff(seg(""), seg("Section 1: A\nx"));

    expect(diff.sections.map((s) => [s.sectionName, s.status])).toEqual([["Section 1: A", "added"]]);
    expect(diff.summary).toEqual({ total: 1, added: 1, removed: 0, modified: 0, unchanged: 0 });
  });

  it("should treat every section as removed when the right document is blank", () => {
    const diff = engine.diff(seg("Section 1: A\nx\nSection 2: B\ny"), seg("   \n"));
    expect(diff.summary).toEqual({ total: 2, added: 0, removed: 2, modified: 0, unchanged: 0 });
  });

  it("should produce nothing for two blank documents", () => {
    const diff = engine.diff(seg(""), seg(""));
    expect(diff).toEqual({ sections: [], summary: emptySummary() });
  });

  it("should produce identical output for identical input", () => {
    expect(engine.diff(seg(LEFT), seg(RIGHT))).toEqual(engine.diff(seg(LEFT), seg(RIGHT)));
  });
});

describe("flattenDocument", () => {
  it("should rebuild text with headings and preamble", () => {
    expect(flattenDocument(seg("Title\nSection 1: A\nb"))).toBe("Title\nSection 1: A\nb");
  });

  it("should keep the heading line of a section named Preamble", () => {
    expect(flattenDocument(seg("intro text\n# Preamble\nbody"))).toBe("intro text\nPreamble\nbody");
  });

  it("should return the body of an implicit document", () => {
    expect(flattenDocument(seg("one\n\ntwo"))).toBe("one\ntwo");
  });
});

describe("summarize and addSummaries", () => {
  it("should count by status and add field-wise", () => {
    const diff = engine.diff(seg(LEFT), seg(RIGHT));
    const summary = summarize(diff.sections);

    expect(addSummaries(summary, summary)).toEqual({ total: 8, added: 2, removed: 2, modified: 2, unchanged: 2 });
  });
});
