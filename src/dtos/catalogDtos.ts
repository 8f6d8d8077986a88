import z from 'zod';
import { PACK_UNITS } from '../services/packSize';
import { QUALITY_WARN_REASONS } from '../services/catalog';

const unitCounts = z.object({
  g: z.number(),
  mg: z.number(),
  ml: z.number(),
  pcs: z.number(),
  unknown: z.number(),
  unparsed: z.number(),
});

export const CatalogIssue = z.object({
  rowIndex: z.number(),
  productName: z.string(),
  packSize: z.string().nullable(),
  reasons: z.array(z.enum(QUALITY_WARN_REASONS)),
});

export const CatalogQualityReport = z.object({
  totalRows: z.number(),
  unitCounts,
  pricedRows: z.number(),
  meanPricePer100g: z.number().nullable(),
  valueLabelCounts: z.object({ Premium: z.number(), Budget: z.number() }),
  issues: z.array(CatalogIssue),
});

export const CatalogCsvError = z.object({
  row: z.number(),
  message: z.string(),
});

export const CatalogImportResponse = z.object({
  source: z.string(),
  importedAt: z.string(),
  inserted: z.number(),
  csvErrors: z.array(CatalogCsvError),
  report: CatalogQualityReport,
});

export const ProductRecordDto = z.object({
  category: z.string().nullable(),
  productName: z.string(),
  price: z.number(),
  packSize: z.string().nullable(),
  quantity: z.number().nullable(),
  unit: z.enum(PACK_UNITS).nullable(),
  unitPrice: z.number().nullable(),
  rating: z.number().nullable(),
  originalPrice: z.number().nullable(),
  discount: z.number().nullable(),
  discountPercentage: z.number().nullable(),
  pricePer100g: z.number().nullable(),
  qualityWarnReasons: z.array(z.enum(QUALITY_WARN_REASONS)),
});

export const ErrorResponse = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.unknown().optional(),
  }),
});
