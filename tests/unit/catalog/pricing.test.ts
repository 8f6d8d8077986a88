import { describe, expect, it } from 'vitest';
import { derivePricing, roundTo } from '../../../src/services/catalog';

describe('derivePricing', () => {
  it('computes unit price and price per 100g for gram rows', () => {
    const res = derivePricing({ price: 140, originalPrice: 160, size: { quantity: 700, unit: 'g', rule: 'gram' } });
    expect(res.unitPrice).toBe(0.2);
    expect(res.pricePer100g).toBe(20);
    expect(res.discount).toBe(20);
    expect(res.discountPercentage).toBe(12.5);
  });

  it('leaves price per 100g empty for non-gram units', () => {
    const res = derivePricing({ price: 120, originalPrice: null, size: { quantity: 1000, unit: 'ml', rule: 'liter' } });
    expect(res.unitPrice).toBe(0.12);
    expect(res.pricePer100g).toBeNull();
  });

  it('skips unit pricing when the size is missing or zero', () => {
    expect(derivePricing({ price: 10, originalPrice: null, size: null })).toEqual({
      unitPrice: null,
      pricePer100g: null,
      discount: null,
      discountPercentage: null,
    });
    const zero = derivePricing({ price: 10, originalPrice: null, size: { quantity: 0, unit: 'g', rule: 'gram' } });
    expect(zero.unitPrice).toBeNull();
    expect(zero.pricePer100g).toBeNull();
  });

  it('rounds discount percentage to 2dp and ignores a non-positive original price', () => {
    expect(derivePricing({ price: 180, originalPrice: 220, size: null }).discountPercentage).toBe(18.18);
    expect(derivePricing({ price: 99, originalPrice: 99, size: null }).discountPercentage).toBe(0);
    expect(derivePricing({ price: 5, originalPrice: 0, size: null }).discount).toBeNull();
  });

  it('keeps price per 100g equal to (price / quantity) * 100 within rounding', () => {
    const cases: [number, number][] = [
      [37.5, 125],
      [99, 150],
      [249, 907],
    ];
    for (const [price, quantity] of cases) {
      const res = derivePricing({ price, originalPrice: null, size: { quantity, unit: 'g', rule: 'gram' } });
      expect(res.pricePer100g).toBeCloseTo((price / quantity) * 100, 2);
    }
  });
});

describe('roundTo', () => {
  it('rounds half away from zero at the requested precision', () => {
    expect(roundTo(0.00486, 4)).toBe(0.0049);
    expect(roundTo(27.4532, 2)).toBe(27.45);
  });
});
