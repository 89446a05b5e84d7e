import { describe, it, expect, vi } from "vitest";
import { TextExtractor, normalizeExtractedText, defaultExtractionChain } from "../src/services/TextExtractor";
import { PlainTextExtractor } from "../src/services/extractors/PlainTextExtractor";
import { isPdfBytes, type ExtractionStrategy } from "../src/services/extractors/ExtractionStrategy";
import { ErrorCode, ExtractionError } from "../src/errors";
import { PDFDocument, StandardFonts } from "pdf-lib";

const bytes = (text: string) => new TextEncoder().encode(text);

function strategy(name: string, impl: () => Promise<string>) {
  const stub = { name, extract: vi.fn(impl) };
  return stub satisfies ExtractionStrategy;
}

describe("normalizeExtractedText", () => {
  it("should unify line endings and strip trailing whitespace", () => {
    expect(normalizeExtractedText("  a  \r\nb\t\rc\fd  \n\n")).toBe("a\nb\nc\nd");
  });
});

describe("isPdfBytes", () => {
  it("should detect the PDF header", () => {
    expect(isPdfBytes(bytes("%PDF-1.7"))).toBe(true);
    expect(isPdfBytes(bytes("hello"))).toBe(false);
    expect(isPdfBytes(new Uint8Array())).toBe(false);
  });
});

describe("TextExtractor", () => {
  it("should use the default PDF chain", () => {
    expect(new TextExtractor().strategyNames).toEqual(["unpdf", "pdf-parse"]);
    expect(defaultExtractionChain()).toHaveLength(2);
  });

  it("should refuse an empty chain", () => {
    expect(() => new TextExtractor([])).toThrow("TextExtractor needs at least one extraction strategy");
  });

  it("should return the first strategy's text", async () => {
    const first = strategy("first", async () => "Section 1: Intro\r\nBody   ");
    const second = strategy("second", async () => "unused");

    const result = await new TextExtractor([first, second]).extract(bytes("x"));

    expect(result).toEqual({
      text: "Section 1: Intro\nBody",
      method: "first",
      diagnostics: ["first: 21 chars"],
    });
    expect(second.extract).not.toHaveBeenCalled();
  });

  it("should fall back when a strategy throws or returns blank text", async () => {
    const broken = strategy("broken", async () => {
      throw new Error("bad xref table");
    });
    const blank = strategy("blank", async () => "  \n\f  ");
    const working = strategy("working", async () => "hello");

    const result = await new TextExtractor([broken, blank, working]).extract(bytes("x"));

    expect(result.method).toBe("working");
    expect(result.text).toBe("hello");
    expect(result.diagnostics).toEqual([
      "broken: failed (bad xref table)",
      "blank: returned empty text",
      "working: 5 chars",
    ]);
  });

  it("should throw with every failure when nothing works", async () => {
    const a = strategy("a", async () => {
      throw new Error("boom");
    });
    const b = strategy("b", async () => "");

    const error = await new TextExtractor([a, b]).extract(bytes("x"), "v1").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExtractionError);
    expect(error).toMatchObject({
      code: ErrorCode.EXTRACTION_FAILED,
      message: "No text could be extracted (tried: a, b)",
      failures: [
        { strategy: "a", reason: "boom" },
        { strategy: "b", reason: "empty text" },
      ],
    });
  });

  it("should reject zero bytes without running strategies", async () => {
    const a = strategy("a", async () => "text");

    await expect(new TextExtractor([a]).extract(new Uint8Array())).rejects.toMatchObject({
      code: ErrorCode.EXTRACTION_EMPTY_INPUT,
    });
    expect(a.extract).not.toHaveBeenCalled();
  });

  it("should extract UTF-8 text with the plain-text strategy", async () => {
    const result = await new TextExtractor([new PlainTextExtractor()]).extract(bytes("Café\nnaïve"));
    expect(result.text).toBe("Café\nnaïve");
    expect(result.method).toBe("plain-text");
  });

  it("should fail plain-text on invalid UTF-8", async () => {
    const invalid = new Uint8Array([0xff, 0xfe, 0xfd]);
    await expect(new TextExtractor([new PlainTextExtractor()]).extract(invalid)).rejects.toBeInstanceOf(
      ExtractionError
    );
  });
});

describe("default PDF chain", () => {
  it("should report non-PDF input from both strategies", async () => {
    const error = await new TextExtractor().extract(bytes("not a pdf")).catch((e: unknown) => e);

    expect(error).toMatchObject({
      message: "No text could be extracted (tried: unpdf, pdf-parse)",
      failures: [
        { strategy: "unpdf", reason: "missing %PDF header" },
        { strategy: "pdf-parse", reason: "missing %PDF header" },
      ],
    });
  });

  it("should read text back from a generated PDF", async () => {
    const doc = await PDFDocument.create();
    const font = await doc.embedFont(StandardFonts.Helvetica);
    const page = doc.addPage();
    page.drawText("Section 1: Introduction", { x: 50, y: 700, font, size: 12 });
    const pdf = await doc.save();

    const result = await new TextExtractor().extract(pdf);

    expect(result.text).toContain("Section 1: Introduction");
    expect(result.diagnostics.at(-1)).toMatch(/^(unpdf|pdf-parse): \d+ chars$/);
  });
});
