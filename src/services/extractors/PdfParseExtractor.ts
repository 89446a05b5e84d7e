/**
 * Secondary PDF text strategy via pdf-parse.
 * Different text-layer heuristics than pdf.js proper; catches files whose
 * content streams unpdf reads as empty.
 */

import pdfParse from "pdf-parse/lib/pdf-parse.js";
import { isPdfBytes, type ExtractionStrategy } from "./ExtractionStrategy";

export class PdfParseExtractor implements ExtractionStrategy {
  readonly name = "pdf-parse";

  async extract(bytes: Uint8Array): Promise<string> {
    if (!isPdfBytes(bytes)) throw new Error("missing %PDF header");
    const result = await pdfParse(Buffer.from(bytes));
    return result.text;
  }
}
