import { PackUnit, type NormalizedPackSize } from '../packSize';

export function roundTo(n: number, dp: number): number {
  const p = Math.pow(10, dp);
  return Math.round(n * p) / p;
}

export type DerivedPricing = {
  unitPrice: number | null;
  pricePer100g: number | null;
  discount: number | null;
  discountPercentage: number | null;
};

/**
 * Price metrics for one catalog row.
 *
 * - unitPrice: price per native unit (4dp); only for a positive quantity.
 * - pricePer100g: gram-denominated rows only (2dp), computed from the unrounded unit price.
 * - discount / discountPercentage: relative to originalPrice (2dp); only when it is positive.
 */
export function derivePricing(input: {
  price: number;
  originalPrice: number | null;
  size: NormalizedPackSize | null;
}): DerivedPricing {
  const { price, originalPrice, size } = input;

  let unitPrice: number | null = null;
  let pricePer100g: number | null = null;
  if (size && size.quantity > 0) {
    const ratio = price / size.quantity;
    unitPrice = roundTo(ratio, 4);
    if (size.unit === PackUnit.GRAM) pricePer100g = roundTo(ratio * 100, 2);
  }

  let discount: number | null = null;
  let discountPercentage: number | null = null;
  if (originalPrice !== null && originalPrice > 0) {
    discount = roundTo(originalPrice - price, 2);
    discountPercentage = roundTo(((originalPrice - price) / originalPrice) * 100, 2);
  }

  return { unitPrice, pricePer100g, discount, discountPercentage };
}
