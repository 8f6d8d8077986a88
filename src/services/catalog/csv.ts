import Papa from 'papaparse';
import { z } from 'zod';
import type { CatalogRow } from './types';

// Normalized header -> canonical column.
const HEADER_ALIASES: Record<string, string> = {
  category: 'category',
  product_name: 'product_name',
  productname: 'product_name',
  name: 'product_name',
  price: 'price',
  discounted_price: 'price',
  discountedsellingprice: 'price',
  selling_price: 'price',
  packsize: 'packsize',
  pack_size: 'packsize',
  weight: 'packsize',
  rating: 'rating',
  original_price: 'original_price',
  mrp: 'original_price',
};

export function canonicalHeader(header: string): string {
  const normalized = header.trim().toLowerCase().replace(/[\s-]+/g, '_');
  return HEADER_ALIASES[normalized] ?? normalized;
}

const optionalTextCell = z
  .string()
  .optional()
  .transform((v) => {
    const s = (v ?? '').trim();
    return s ? s : null;
  });

const optionalNumberCell = z
  .string()
  .optional()
  .transform((v, ctx) => {
    // Currency symbols and thousands separators are common in exported price columns.
    const s = (v ?? '').replace(/[₹$€£,]/g, '').trim();
    if (!s) return null;
    const n = Number(s);
    if (!Number.isFinite(n)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a number: "${v}"` });
      return z.NEVER;
    }
    return n;
  });

const catalogCsvRowSchema = z.object({
  category: optionalTextCell,
  product_name: z.string({ required_error: 'product name is required' }).trim().min(1, 'product name is required'),
  price: optionalNumberCell.pipe(z.number({ invalid_type_error: 'price is required' })),
  packsize: optionalTextCell,
  rating: optionalNumberCell,
  original_price: optionalNumberCell,
});

export type CatalogCsvError = {
  /** 1-based data row (the header is not counted). */
  row: number;
  message: string;
};

export type ParsedCatalogCsv = {
  rows: CatalogRow[];
  errors: CatalogCsvError[];
};

export function parseCatalogCsv(text: string): ParsedCatalogCsv {
  const result = Papa.parse<Record<string, string>>(text, {
    header: true,
    skipEmptyLines: 'greedy',
    transformHeader: canonicalHeader,
  });

  const errors: CatalogCsvError[] = result.errors.map((e) => ({
    row: (e.row ?? -1) + 1,
    message: e.message,
  }));

  // Field-count mismatches shift columns, so those rows are reported but never imported.
  const malformedRows = new Set(result.errors.flatMap((e) => (e.row === undefined ? [] : [e.row])));

  const rows: CatalogRow[] = [];
  result.data.forEach((raw, i) => {
    if (malformedRows.has(i)) return;
    const parsed = catalogCsvRowSchema.safeParse(raw);
    if (!parsed.success) {
      const message = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      errors.push({ row: i + 1, message });
      return;
    }
    const r = parsed.data;
    rows.push({
      category: r.category,
      productName: r.product_name,
      price: r.price,
      packSize: r.packsize,
      rating: r.rating,
      originalPrice: r.original_price,
    });
  });

  return { rows, errors };
}
