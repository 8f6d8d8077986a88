import { PackUnit } from '../packSize';
import type { ProductRecord, ValueLabel } from './types';

/** Mean price per 100g over gram rows that have one; `null` when there are none. */
export function meanPricePer100g(records: Pick<ProductRecord, 'unit' | 'pricePer100g'>[]): number | null {
  const values: number[] = [];
  for (const r of records) {
    if (r.unit === PackUnit.GRAM && r.pricePer100g !== null) values.push(r.pricePer100g);
  }
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

// Mirrors the SQL CASE: anything not strictly above the mean (including a missing value) is Budget.
export function classifyValue(pricePer100g: number | null, mean: number | null): ValueLabel {
  if (pricePer100g === null || mean === null) return 'Budget';
  return pricePer100g > mean ? 'Premium' : 'Budget';
}
