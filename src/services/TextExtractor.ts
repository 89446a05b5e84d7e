/**
 * Bytes to plain text through an ordered fallback chain.
 *
 * PURE service: no storage access, no retries. A strategy that throws or
 * yields whitespace-only text hands over to the next one.
 */

import { ExtractionError, errorMessage, type StrategyFailure } from "../errors";
import { createLogger } from "../utils/logger";
import type { ExtractionStrategy } from "./extractors/ExtractionStrategy";
import { PdfParseExtractor } from "./extractors/PdfParseExtractor";
import { UnpdfExtractor } from "./extractors/UnpdfExtractor";

const log = createLogger({ component: "TextExtractor" });

export interface ExtractionResult {
  text: string;
  /** Name of the strategy that produced the text */
  method: string;
  diagnostics: string[];
}

/**
 * Unify line endings and drop trailing whitespace on every line.
 */
export function normalizeExtractedText(text: string): string {
  return text
    .replace(/\r\n?/g, "\n")
    .replace(/\f/g, "\n")
    .split("\n")
    .map((line) => line.trimEnd())
    .join("\n")
    .trim();
}

export function defaultExtractionChain(): ExtractionStrategy[] {
  return [new UnpdfExtractor(), new PdfParseExtractor()];
}

export class TextExtractor {
  private readonly strategies: readonly ExtractionStrategy[];

  constructor(strategies: ExtractionStrategy[] = defaultExtractionChain()) {
    if (strategies.length === 0) {
      throw new Error("TextExtractor needs at least one extraction strategy");
    }
    this.strategies = [...strategies];
  }

  get strategyNames(): string[] {
    return this.strategies.map((s) => s.name);
  }

  async extract(bytes: Uint8Array, versionId?: string): Promise<ExtractionResult> {
    if (bytes.byteLength === 0) {
      throw ExtractionError.emptyInput({ operation: "extract", versionId });
    }

    const diagnostics: string[] = [];
    const failures: StrategyFailure[] = [];

    for (const strategy of this.strategies) {
      let raw: string;
      try {
        raw = await strategy.extract(bytes);
      } catch (error) {
        const reason = errorMessage(error);
        failures.push({ strategy: strategy.name, reason });
        diagnostics.push(`${strategy.name}: failed (${reason})`);
        continue;
      }

      const text = normalizeExtractedText(raw);
      if (!text) {
        failures.push({ strategy: strategy.name, reason: "empty text" });
        diagnostics.push(`${strategy.name}: returned empty text`);
        continue;
      }

      diagnostics.push(`${strategy.name}: ${text.length} chars`);
      if (failures.length > 0) {
        log.info("Extraction fell back", { versionId, method: strategy.name, failures: failures.length });
      }
      return { text, method: strategy.name, diagnostics };
    }

    log.warn("All extraction strategies failed", { versionId, failures });
    throw ExtractionError.allStrategiesFailed(failures, { operation: "extract", versionId });
  }
}
