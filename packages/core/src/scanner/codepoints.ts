/** Highest code point of 7-bit ASCII. */
export const ASCII_MAX = 0x7f;

export interface NonAsciiChar {
  char: string;
  codePoint: number;
  /** Lowercase hex without padding or prefix, the form stored in the whitelist */
  hex: string;
}

/**
 * Yields every character of `text` above U+007F, in order, iterating over
 * Unicode scalar values so astral characters come out whole. Repeats are
 * yielded per occurrence unless `dedupe` is set.
 */
export function* nonAsciiChars(
  text: string,
  options: { dedupe?: boolean } = {},
): Generator<NonAsciiChar> {
  const seen = options.dedupe ? new Set<number>() : undefined;

  for (const char of text) {
    const codePoint = char.codePointAt(0);
    if (codePoint === undefined || codePoint <= ASCII_MAX) {
      continue;
    }
    if (seen) {
      if (seen.has(codePoint)) continue;
      seen.add(codePoint);
    }
    yield { char, codePoint, hex: toHex(codePoint) };
  }
}

/** `%x` rendering: 233 → `e9`. */
export function toHex(codePoint: number): string {
  return codePoint.toString(16);
}

/** Display form of a stored code point: `e9` → `U+E9`. */
export function formatCodePoint(hex: string): string {
  return `U+${hex.toUpperCase()}`;
}
