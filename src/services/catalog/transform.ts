import { normalizePackSize, PackUnit } from '../packSize';
import { derivePricing } from './pricing';
import { computeRowQuality } from './quality';
import { classifyValue, meanPricePer100g } from './segmentation';
import type { CatalogIssue, CatalogQualityReport, CatalogRow, ProductRecord } from './types';

export function transformRow(row: CatalogRow): ProductRecord {
  const size = normalizePackSize(row.packSize);
  const { warnReasons } = computeRowQuality(row, size);

  // Negative-looking labels keep their parsed size for review but stay out of pricing.
  const rejectedFromPricing = warnReasons.includes('NEGATIVE_QUANTITY_TEXT');
  const pricing = derivePricing({
    price: row.price,
    originalPrice: row.originalPrice,
    size: rejectedFromPricing ? null : size,
  });

  return {
    ...row,
    quantity: size?.quantity ?? null,
    unit: size?.unit ?? null,
    ...pricing,
    qualityWarnReasons: warnReasons,
  };
}

export function buildQualityReport(records: ProductRecord[]): CatalogQualityReport {
  const unitCounts: CatalogQualityReport['unitCounts'] = { g: 0, mg: 0, ml: 0, pcs: 0, unknown: 0, unparsed: 0 };

  const issues: CatalogIssue[] = [];
  let pricedRows = 0;

  records.forEach((r, rowIndex) => {
    unitCounts[r.unit ?? 'unparsed'] += 1;
    if (r.pricePer100g !== null) pricedRows += 1;
    if (r.qualityWarnReasons.length > 0) {
      issues.push({
        rowIndex,
        productName: r.productName,
        packSize: r.packSize,
        reasons: r.qualityWarnReasons,
      });
    }
  });

  const mean = meanPricePer100g(records);
  const valueLabelCounts = { Premium: 0, Budget: 0 };
  for (const r of records) {
    if (r.unit !== PackUnit.GRAM) continue;
    valueLabelCounts[classifyValue(r.pricePer100g, mean)] += 1;
  }

  return {
    totalRows: records.length,
    unitCounts,
    pricedRows,
    meanPricePer100g: mean,
    valueLabelCounts,
    issues,
  };
}

/**
 * Normalize every row of a catalog batch. Output order follows input order; rows that
 * cannot be sized are kept (with null quantity/unit) and listed in the report.
 */
export function transformCatalog(rows: CatalogRow[]): { records: ProductRecord[]; report: CatalogQualityReport } {
  const records = rows.map(transformRow);
  return { records, report: buildQualityReport(records) };
}
