export const PACK_UNITS = ['g', 'mg', 'ml', 'pcs', 'unknown'] as const;

export type PackUnit = (typeof PACK_UNITS)[number];

export const PackUnit = {
  GRAM: 'g',
  MILLIGRAM: 'mg',
  MILLILITER: 'ml',
  PIECE: 'pcs',
  UNKNOWN: 'unknown',
} as const satisfies Record<string, PackUnit>;

export const PACK_SIZE_RULE_IDS = ['piece', 'kilogram', 'milligram', 'milliliter', 'liter', 'gram', 'fallback'] as const;

export type PackSizeRuleId = (typeof PACK_SIZE_RULE_IDS)[number];

export type RawLabel = string | null | undefined;

/**
 * Canonical pack size. Quantity and unit always travel together: a label that cannot be
 * parsed yields `null` from `normalizePackSize`, never a half-filled object.
 */
export type NormalizedPackSize = {
  quantity: number;
  unit: PackUnit;
  /** Rule that produced this result, for tracing ambiguous labels. */
  rule: PackSizeRuleId;
};

export type PackSizeRule = {
  id: PackSizeRuleId;
  unit: PackUnit;
  matches: (label: string) => boolean;
  /** Receives at least one token. */
  convert: (tokens: number[]) => number;
};
