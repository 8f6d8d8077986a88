import { PackUnit, type NormalizedPackSize } from '../packSize';
import { QUALITY_WARN_REASONS, type CatalogRow, type QualityStatus, type QualityWarnReason } from './types';

export function isQualityWarnReason(v: string): v is QualityWarnReason {
  return QUALITY_WARN_REASONS.some((r) => r === v);
}

const MINUS_BEFORE_NUMBER_RE = /-(?=\s*\d)/g;

// Text ending in a number, optionally followed by its unit: the left side of a range such as
// "600-800 g", "1 kg - 2 kg" or "500g-1kg".
const RANGE_START_RE = /\d\s*(?:kg|gms?|g|mg|ml|ltr|l|pcs?|pieces?|packs?)?\.?\s*$/i;

// A minus sign in front of a number that is not a range hyphen: "-5 g", "pack of -2".
export function hasNegativeQuantityText(packSize: string | null): boolean {
  if (packSize === null) return false;
  for (const m of packSize.matchAll(MINUS_BEFORE_NUMBER_RE)) {
    if (!RANGE_START_RE.test(packSize.slice(0, m.index ?? 0))) return true;
  }
  return false;
}

export function computeRowQuality(
  row: Pick<CatalogRow, 'price' | 'packSize' | 'originalPrice'>,
  size: NormalizedPackSize | null
): { qualityStatus: QualityStatus; warnReasons: QualityWarnReason[] } {
  const warnReasons: QualityWarnReason[] = [];

  if (row.packSize === null) {
    warnReasons.push('MISSING_PACK_SIZE');
  } else if (size === null) {
    warnReasons.push('UNPARSEABLE_PACK_SIZE');
  }

  if (size) {
    if (size.unit === PackUnit.UNKNOWN) warnReasons.push('UNKNOWN_UNIT');
    if (size.quantity <= 0) warnReasons.push('NON_POSITIVE_QUANTITY');
  }
  if (hasNegativeQuantityText(row.packSize)) warnReasons.push('NEGATIVE_QUANTITY_TEXT');

  if (row.price <= 0) warnReasons.push('NON_POSITIVE_PRICE');
  if (row.originalPrice !== null && row.price > row.originalPrice) warnReasons.push('PRICE_ABOVE_ORIGINAL');

  return {
    qualityStatus: warnReasons.length > 0 ? 'WARN' : 'OK',
    warnReasons,
  };
}
