import type { ExtractionStrategy } from "./ExtractionStrategy";

/**
 * UTF-8 passthrough. Used for text renditions and as a stand-in for the PDF
 * strategies in tests.
 */
export class PlainTextExtractor implements ExtractionStrategy {
  readonly name = "plain-text";

  async extract(bytes: Uint8Array): Promise<string> {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  }
}
