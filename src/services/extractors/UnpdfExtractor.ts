/**
 * Primary PDF text strategy, using unpdf (serverless pdf.js build).
 * Plain text only, pages merged with blank lines between them.
 */

import { extractText, getDocumentProxy } from "unpdf";
import { isPdfBytes, type ExtractionStrategy } from "./ExtractionStrategy";

export class UnpdfExtractor implements ExtractionStrategy {
  readonly name = "unpdf";

  async extract(bytes: Uint8Array): Promise<string> {
    if (!isPdfBytes(bytes)) throw new Error("missing %PDF header");
    // pdf.js may transfer the buffer to its worker; hand it a copy
    const doc = await getDocumentProxy(new Uint8Array(bytes));
    try {
      const { text } = await extractText(doc, { mergePages: false });
      return text.join("\n\n");
    } finally {
      await doc.destroy();
    }
  }
}
