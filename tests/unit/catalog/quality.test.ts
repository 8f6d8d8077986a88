import { describe, expect, it } from 'vitest';
import { computeRowQuality, hasNegativeQuantityText, isQualityWarnReason } from '../../../src/services/catalog';
import { normalizePackSize } from '../../../src/services/packSize';

function quality(packSize: string | null, price = 100, originalPrice: number | null = null) {
  return computeRowQuality({ packSize, price, originalPrice }, normalizePackSize(packSize));
}

describe('hasNegativeQuantityText', () => {
  it('flags a minus sign in front of a number', () => {
    expect(hasNegativeQuantityText('-5 g')).toBe(true);
    expect(hasNegativeQuantityText('pack of -2')).toBe(true);
    expect(hasNegativeQuantityText('2 x -3 g')).toBe(true);
  });

  it('does not flag ranges', () => {
    expect(hasNegativeQuantityText('600-800 g')).toBe(false);
    expect(hasNegativeQuantityText('600 - 800 g')).toBe(false);
  });

  it('does not flag ranges whose bounds carry a unit', () => {
    expect(hasNegativeQuantityText('1 kg - 2 kg')).toBe(false);
    expect(hasNegativeQuantityText('200 ml-300 ml')).toBe(false);
    expect(hasNegativeQuantityText('500g-1kg')).toBe(false);
    expect(hasNegativeQuantityText('2 pcs - 4 pcs')).toBe(false);
    expect(hasNegativeQuantityText(null)).toBe(false);
  });
});

describe('computeRowQuality', () => {
  it('is OK for a priced gram row', () => {
    expect(quality('1 kg', 180, 220)).toEqual({ qualityStatus: 'OK', warnReasons: [] });
  });

  it('separates a missing label from an unparseable one', () => {
    expect(quality(null).warnReasons).toEqual(['MISSING_PACK_SIZE']);
    expect(quality('family size').warnReasons).toEqual(['UNPARSEABLE_PACK_SIZE']);
  });

  it('warns on unknown units and zero quantities', () => {
    expect(quality('12345')).toEqual({ qualityStatus: 'WARN', warnReasons: ['UNKNOWN_UNIT'] });
    expect(quality('0 g').warnReasons).toEqual(['NON_POSITIVE_QUANTITY']);
  });

  it('flags negative-looking labels', () => {
    expect(quality('-5 g').warnReasons).toEqual(['NEGATIVE_QUANTITY_TEXT']);
  });

  it('checks prices against the original price', () => {
    expect(quality('1 kg', 0).warnReasons).toEqual(['NON_POSITIVE_PRICE']);
    expect(quality('1 kg', 15, 12).warnReasons).toEqual(['PRICE_ABOVE_ORIGINAL']);
  });
});

describe('isQualityWarnReason', () => {
  it('accepts only known reasons', () => {
    expect(isQualityWarnReason('UNKNOWN_UNIT')).toBe(true);
    expect(isQualityWarnReason('SOMETHING_ELSE')).toBe(false);
  });
});
