/**
 * One link in the extraction fallback chain.
 * Implementations may throw or return empty text; either moves the chain on.
 */
export interface ExtractionStrategy {
  readonly name: string;
  extract(bytes: Uint8Array): Promise<string>;
}

/** %PDF magic bytes */
export function isPdfBytes(bytes: Uint8Array): boolean {
  return (
    bytes.length >= 4 &&
    bytes[0] === 0x25 &&
    bytes[1] === 0x50 &&
    bytes[2] === 0x44 &&
    bytes[3] === 0x46
  );
}
