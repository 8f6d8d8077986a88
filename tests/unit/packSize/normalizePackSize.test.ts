import { describe, expect, it } from 'vitest';
import { normalizePackSize, PACK_SIZE_RULES, PackUnit } from '../../../src/services/packSize';

describe('normalizePackSize', () => {
  it('returns null for absent labels', () => {
    expect(normalizePackSize(null)).toBeNull();
    expect(normalizePackSize(undefined)).toBeNull();
  });

  it('returns null when the label has no number', () => {
    expect(normalizePackSize('')).toBeNull();
    expect(normalizePackSize('family pack')).toBeNull();
    expect(normalizePackSize('kg')).toBeNull();
  });

  it.each([
    ['4 pcs', 4, PackUnit.PIECE, 'piece'],
    ['1 kg', 1000, PackUnit.GRAM, 'kilogram'],
    ['600-800 g', 700, PackUnit.GRAM, 'gram'],
    ['200-300 ml', 250, PackUnit.MILLILITER, 'milliliter'],
    ['1 l', 1000, PackUnit.MILLILITER, 'liter'],
    ['500 mg', 500, PackUnit.MILLIGRAM, 'milligram'],
    ['12345', 12345, PackUnit.UNKNOWN, 'fallback'],
  ])('%s -> %d %s', (label, quantity, unit, rule) => {
    expect(normalizePackSize(label)).toEqual({ quantity, unit, rule });
  });

  it('lowercases before matching keywords', () => {
    expect(normalizePackSize('1.5 KG')).toEqual({ quantity: 1500, unit: 'g', rule: 'kilogram' });
    expect(normalizePackSize('6 Pieces')).toEqual({ quantity: 6, unit: 'pcs', rule: 'piece' });
  });

  it('accepts "gm" and liter spellings', () => {
    expect(normalizePackSize('250 gm')).toEqual({ quantity: 250, unit: 'g', rule: 'gram' });
    expect(normalizePackSize('1.5 litre')).toEqual({ quantity: 1500, unit: 'ml', rule: 'liter' });
  });

  it('keeps only the first number for piece, kilogram and milligram ranges', () => {
    expect(normalizePackSize('6-8 pcs')?.quantity).toBe(6);
    expect(normalizePackSize('2-3 kg')?.quantity).toBe(2000);
    expect(normalizePackSize('100-200 mg')?.quantity).toBe(100);
  });

  it('resolves a label matching several keywords by the earliest rule', () => {
    // "kg" also contains "g"
    expect(normalizePackSize('1 kg bag')?.rule).toBe('kilogram');
    // "mg" also contains "g"
    expect(normalizePackSize('10 mg')?.rule).toBe('milligram');
    // "pack" wins over the gram suffix
    expect(normalizePackSize('2 pack of 100 g')).toEqual({ quantity: 2, unit: 'pcs', rule: 'piece' });
  });

  it('does not read "ml" as the liter marker', () => {
    expect(normalizePackSize('250 ml')).toEqual({ quantity: 250, unit: 'ml', rule: 'milliliter' });
  });

  it('distinguishes a zero quantity from an unparseable label', () => {
    expect(normalizePackSize('0 g')).toEqual({ quantity: 0, unit: 'g', rule: 'gram' });
  });

  it('is idempotent on canonical gram labels', () => {
    const first = normalizePackSize('700 g');
    const second = normalizePackSize(`${first?.quantity} g`);
    expect(second).toEqual(first);
  });

  it('averages gram ranges to a value inside the range', () => {
    const ranges: [number, number][] = [
      [100, 200],
      [250, 251],
      [0.5, 1.5],
      [75, 75],
    ];
    for (const [a, b] of ranges) {
      const res = normalizePackSize(`${a}-${b} g`);
      expect(res?.quantity).toBe((a + b) / 2);
      expect(res?.quantity).toBeGreaterThanOrEqual(a);
      expect(res?.quantity).toBeLessThanOrEqual(b);
    }
  });

  it('keeps only the first token of kilogram ranges', () => {
    expect(normalizePackSize('1-2 kg')).toEqual({ quantity: 1000, unit: 'g', rule: 'kilogram' });
  });

  it('needs a space before the liter marker', () => {
    expect(normalizePackSize('1l')).toEqual({ quantity: 1, unit: 'unknown', rule: 'fallback' });
    expect(normalizePackSize('1 lb')).toEqual({ quantity: 1000, unit: 'ml', rule: 'liter' });
  });

  it('averages the split tokens of a malformed decimal', () => {
    expect(normalizePackSize('1.2.3 g')?.quantity).toBeCloseTo(2.1, 10);
  });

  it('checks rules in a fixed priority order', () => {
    expect(PACK_SIZE_RULES.map((r) => r.id)).toEqual(['piece', 'kilogram', 'milligram', 'milliliter', 'liter', 'gram']);
  });
});
