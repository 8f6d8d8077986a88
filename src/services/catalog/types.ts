import type { PackUnit } from '../packSize';

export type CatalogRow = {
  category: string | null;
  productName: string;
  price: number;
  packSize: string | null;
  rating: number | null;
  originalPrice: number | null;
};

export const QUALITY_WARN_REASONS = [
  'MISSING_PACK_SIZE',
  'UNPARSEABLE_PACK_SIZE',
  'UNKNOWN_UNIT',
  'NON_POSITIVE_QUANTITY',
  'NEGATIVE_QUANTITY_TEXT',
  'NON_POSITIVE_PRICE',
  'PRICE_ABOVE_ORIGINAL',
] as const;

export type QualityWarnReason = (typeof QUALITY_WARN_REASONS)[number];

export type QualityStatus = 'OK' | 'WARN';

/**
 * One row of `catalog_products`. Computed once per import from the raw catalog row and
 * replaced wholesale by the next import.
 */
export type ProductRecord = CatalogRow & {
  quantity: number | null;
  unit: PackUnit | null;
  unitPrice: number | null;
  discount: number | null;
  discountPercentage: number | null;
  pricePer100g: number | null;
  qualityWarnReasons: QualityWarnReason[];
};

export type ValueLabel = 'Premium' | 'Budget';

export type CatalogIssue = {
  /** 0-based position in the imported batch. */
  rowIndex: number;
  productName: string;
  packSize: string | null;
  reasons: QualityWarnReason[];
};

export type CatalogQualityReport = {
  totalRows: number;
  unitCounts: Record<PackUnit | 'unparsed', number>;
  pricedRows: number;
  meanPricePer100g: number | null;
  valueLabelCounts: Record<ValueLabel, number>;
  issues: CatalogIssue[];
};
