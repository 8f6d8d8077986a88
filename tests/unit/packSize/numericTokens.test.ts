import { describe, expect, it } from 'vitest';
import { extractNumericTokens } from '../../../src/services/packSize';

describe('extractNumericTokens', () => {
  it('returns integers and decimals left to right', () => {
    expect(extractNumericTokens('600-800 g')).toEqual([600, 800]);
    expect(extractNumericTokens('1.5 kg')).toEqual([1.5]);
    expect(extractNumericTokens('2 x 250 ml')).toEqual([2, 250]);
  });

  it('never treats a hyphen as a minus sign', () => {
    expect(extractNumericTokens('-5 g')).toEqual([5]);
  });

  it('splits malformed decimals instead of rejecting the label', () => {
    expect(extractNumericTokens('1.2.3')).toEqual([1.2, 3]);
    expect(extractNumericTokens('5. kg')).toEqual([5]);
  });

  it('returns an empty list when there is no digit', () => {
    expect(extractNumericTokens('family pack')).toEqual([]);
    expect(extractNumericTokens('')).toEqual([]);
  });
});
