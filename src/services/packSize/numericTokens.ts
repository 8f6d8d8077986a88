// Integer or decimal. A leading minus is never captured: in labels like "600-800 g"
// the hyphen separates a range.
const NUMERIC_TOKEN_RE = /\d+(?:\.\d+)?/g;

/**
 * Decimal numbers in `text`, left to right.
 *
 * - "600-800 g" -> [600, 800]
 * - "1.5 kg"    -> [1.5]
 * - "1.2.3"     -> [1.2, 3]
 * - "5. kg"     -> [5]
 */
export function extractNumericTokens(text: string): number[] {
  const matches = String(text || '').match(NUMERIC_TOKEN_RE);
  if (!matches) return [];
  return matches.map(Number).filter((n) => Number.isFinite(n));
}
