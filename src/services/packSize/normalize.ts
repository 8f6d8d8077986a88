import { extractNumericTokens } from './numericTokens';
import { FALLBACK_RULE, PACK_SIZE_RULES } from './rules';
import type { NormalizedPackSize, RawLabel } from './types';

/**
 * Parse a free-text pack size ("600-800 g", "1 kg", "4 pcs") into a canonical
 * quantity/unit pair.
 *
 * Returns `null` when the label is absent or contains no number. A label with a number
 * but no recognised unit keyword comes back as `unknown` with the number untouched so it
 * can be reclassified by hand. Never throws.
 */
export function normalizePackSize(raw: RawLabel): NormalizedPackSize | null {
  if (raw === null || raw === undefined) return null;

  const label = String(raw).toLowerCase();
  const tokens = extractNumericTokens(label);
  if (tokens.length === 0) return null;

  const rule = PACK_SIZE_RULES.find((r) => r.matches(label)) ?? FALLBACK_RULE;
  return {
    quantity: rule.convert(tokens),
    unit: rule.unit,
    rule: rule.id,
  };
}
