import { PackSizeRule, PackUnit } from './types';

const first = (tokens: number[]) => tokens[0];

// Range labels ("600-800 g") resolve to the midpoint of the first two tokens.
const firstOrMidpoint = (tokens: number[]) => (tokens.length === 1 ? tokens[0] : (tokens[0] + tokens[1]) / 2);

const PIECE_KEYWORDS = ['pc', 'pcs', 'piece', 'pack'];

/**
 * Ordered rule table; the first rule whose keyword appears in the lowercased label wins.
 *
 * Order matters: "kg" is tested before the bare "g" rule and "ml" before the " l" liter
 * marker. Only the milliliter and gram rules average ranges; piece, kilogram and milligram
 * labels keep the first number and drop the rest (compatibility with the existing
 * catalog data, see DESIGN.md).
 */
export const PACK_SIZE_RULES: readonly PackSizeRule[] = [
  {
    id: 'piece',
    unit: PackUnit.PIECE,
    matches: (label) => PIECE_KEYWORDS.some((k) => label.includes(k)),
    convert: first,
  },
  {
    id: 'kilogram',
    unit: PackUnit.GRAM,
    matches: (label) => label.includes('kg'),
    convert: (tokens) => tokens[0] * 1000,
  },
  {
    id: 'milligram',
    unit: PackUnit.MILLIGRAM,
    matches: (label) => label.includes('mg'),
    convert: first,
  },
  {
    id: 'milliliter',
    unit: PackUnit.MILLILITER,
    matches: (label) => label.includes('ml'),
    convert: firstOrMidpoint,
  },
  {
    // Space + "l": "1 l", "2 litre". Known to misfire on labels like "l 500".
    id: 'liter',
    unit: PackUnit.MILLILITER,
    matches: (label) => label.includes(' l'),
    convert: (tokens) => tokens[0] * 1000,
  },
  {
    id: 'gram',
    unit: PackUnit.GRAM,
    matches: (label) => label.includes('gm') || label.includes('g'),
    convert: firstOrMidpoint,
  },
];

export const FALLBACK_RULE: PackSizeRule = {
  id: 'fallback',
  unit: PackUnit.UNKNOWN,
  matches: () => true,
  convert: first,
};
