export { transformCatalog, transformRow, buildQualityReport } from './transform';
export { derivePricing, roundTo } from './pricing';
export { computeRowQuality, hasNegativeQuantityText, isQualityWarnReason } from './quality';
export { QUALITY_WARN_REASONS } from './types';
export { classifyValue, meanPricePer100g } from './segmentation';
export { parseCatalogCsv, canonicalHeader } from './csv';
export type { CatalogCsvError, ParsedCatalogCsv } from './csv';
export type {
  CatalogIssue,
  CatalogQualityReport,
  CatalogRow,
  ProductRecord,
  QualityStatus,
  QualityWarnReason,
  ValueLabel,
} from './types';
