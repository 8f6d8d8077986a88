import db, { Queryable } from '../infrastructure/db';
import { PACK_UNITS, type PackUnit } from '../services/packSize';
import { isQualityWarnReason, type ProductRecord, type ValueLabel } from '../services/catalog';

export const PRODUCTS_TABLE = 'catalog_products';

// Unconstrained NUMERIC: unknown-unit quantities can be barcode-sized and tiny gram rows give
// large unit prices. quantity/unit are separate columns so standardized pricing can filter on
// unit = 'g'.
export const CREATE_PRODUCTS_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS ${PRODUCTS_TABLE} (
    id SERIAL PRIMARY KEY,
    category TEXT,
    product_name TEXT NOT NULL,
    price NUMERIC NOT NULL,
    packsize TEXT,
    quantity NUMERIC,
    unit TEXT,
    unit_price NUMERIC,
    rating NUMERIC,
    original_price NUMERIC,
    discount NUMERIC,
    discount_percentage NUMERIC,
    price_per_100g NUMERIC,
    quality_warn_reasons TEXT[] NOT NULL DEFAULT '{}'
  )
`;

const INSERT_COLUMNS = [
  'category',
  'product_name',
  'price',
  'packsize',
  'quantity',
  'unit',
  'unit_price',
  'rating',
  'original_price',
  'discount',
  'discount_percentage',
  'price_per_100g',
  'quality_warn_reasons',
] as const;

// 13 params per row keeps a full chunk well under the 65535 bind-parameter limit.
export const INSERT_CHUNK_SIZE = 500;

// pg returns NUMERIC and COUNT(*) as strings.
type NumericCell = string | number | null;

function num(v: NumericCell): number | null {
  if (v === null) return null;
  const n = Number(v);
  return Number.isFinite(n) ? n : null;
}

function numOrZero(v: NumericCell): number {
  return num(v) ?? 0;
}

function toPackUnit(v: string | null): PackUnit | null {
  return PACK_UNITS.find((u) => u === v) ?? null;
}

function toValueLabel(v: string): ValueLabel {
  return v === 'Premium' ? 'Premium' : 'Budget';
}

function recordParams(r: ProductRecord): unknown[] {
  return [
    r.category,
    r.productName,
    r.price,
    r.packSize,
    r.quantity,
    r.unit,
    r.unitPrice,
    r.rating,
    r.originalPrice,
    r.discount,
    r.discountPercentage,
    r.pricePer100g,
    r.qualityWarnReasons,
  ];
}

export function buildInsertStatement(records: ProductRecord[]): { text: string; params: unknown[] } {
  const params: unknown[] = [];
  const tuples = records.map((r) => {
    const placeholders = recordParams(r).map((value) => {
      params.push(value);
      return `$${params.length}`;
    });
    return `(${placeholders.join(', ')})`;
  });
  return {
    text: `INSERT INTO ${PRODUCTS_TABLE} (${INSERT_COLUMNS.join(', ')}) VALUES ${tuples.join(', ')}`,
    params,
  };
}

type ProductRow = {
  category: string | null;
  product_name: string;
  price: NumericCell;
  packsize: string | null;
  quantity: NumericCell;
  unit: string | null;
  unit_price: NumericCell;
  rating: NumericCell;
  original_price: NumericCell;
  discount: NumericCell;
  discount_percentage: NumericCell;
  price_per_100g: NumericCell;
  quality_warn_reasons: string[] | null;
};

function mapProductRow(row: ProductRow): ProductRecord {
  return {
    category: row.category,
    productName: row.product_name,
    price: numOrZero(row.price),
    packSize: row.packsize,
    quantity: num(row.quantity),
    unit: toPackUnit(row.unit),
    unitPrice: num(row.unit_price),
    rating: num(row.rating),
    originalPrice: num(row.original_price),
    discount: num(row.discount),
    discountPercentage: num(row.discount_percentage),
    pricePer100g: num(row.price_per_100g),
    qualityWarnReasons: (row.quality_warn_reasons ?? []).filter(isQualityWarnReason),
  };
}

export type PricedProduct = { productName: string; category: string | null; price: number };
export type CheapestPer100gProduct = { productName: string; price: number; pricePer100g: number | null };
export type CategoryDiscount = { category: string | null; avgDiscountPercentage: number | null };
export type DiscountedProduct = {
  productName: string;
  price: number;
  originalPrice: number | null;
  discountPercentage: number | null;
};
export type CategorySummary = {
  category: string | null;
  productCount: number;
  avgPrice: number | null;
  avgRating: number | null;
};
export type ValuePer100gProduct = { productName: string; category: string | null; pricePer100g: number | null };
export type ValueSegment = ValuePer100gProduct & { valueLabel: ValueLabel };
export type PremiumProduct = ValuePer100gProduct & { rating: number | null };
export type CategoryValueScore = {
  category: string | null;
  avgPricePer100g: number | null;
  avgRating: number | null;
  totalProducts: number;
};
export type PriceRatingPoint = {
  category: string | null;
  price: number;
  rating: number | null;
  pricePer100g: number | null;
  discountPercentage: number | null;
  valueLabel: ValueLabel;
};
export type RatedProduct = { productName: string; category: string | null; rating: number | null };

// Premium = strictly above the mean price_per_100g of gram rows; everything else (NULL included) is Budget.
const VALUE_LABEL_SQL = `
  CASE
    WHEN price_per_100g > (
      SELECT AVG(price_per_100g) FROM ${PRODUCTS_TABLE} WHERE unit = 'g'
    ) THEN 'Premium'
    ELSE 'Budget'
  END`;

const VALUE_SEGMENT_CTE = `
  WITH value_segment AS (
    SELECT product_name, category, price_per_100g, rating, ${VALUE_LABEL_SQL} AS value_label
    FROM ${PRODUCTS_TABLE}
    WHERE unit = 'g'
  )`;

export const productRepository = {
  async ensureSchema(): Promise<void> {
    await db.query(CREATE_PRODUCTS_TABLE_SQL);
  },

  /**
   * Swap the whole table for a freshly transformed batch in one transaction. Readers see
   * either the previous import or the new one, never a mix.
   */
  async replaceAll(records: ProductRecord[]): Promise<{ inserted: number }> {
    return db.withTransaction(async (tx: Queryable) => {
      await tx.query(`TRUNCATE ${PRODUCTS_TABLE} RESTART IDENTITY`);
      for (let i = 0; i < records.length; i += INSERT_CHUNK_SIZE) {
        const { text, params } = buildInsertStatement(records.slice(i, i + INSERT_CHUNK_SIZE));
        await tx.query(text, params);
      }
      return { inserted: records.length };
    });
  },

  async sample(limit = 10): Promise<ProductRecord[]> {
    const rows = await db.query<ProductRow>(`SELECT * FROM ${PRODUCTS_TABLE} ORDER BY id LIMIT $1`, [limit]);
    return rows.map(mapProductRow);
  },

  async countProducts(): Promise<number> {
    const rows = await db.query<{ total_products: NumericCell }>(
      `SELECT COUNT(*) AS total_products FROM ${PRODUCTS_TABLE}`
    );
    return numOrZero(rows[0]?.total_products ?? null);
  },

  async countDistinctCategories(): Promise<number> {
    const rows = await db.query<{ distinct_categories: NumericCell }>(
      `SELECT COUNT(DISTINCT category) AS distinct_categories FROM ${PRODUCTS_TABLE}`
    );
    return numOrZero(rows[0]?.distinct_categories ?? null);
  },

  async mostExpensive(limit = 10): Promise<PricedProduct[]> {
    const rows = await db.query<{ productName: string; category: string | null; price: NumericCell }>(
      `SELECT product_name AS "productName", category, price
       FROM ${PRODUCTS_TABLE}
       ORDER BY price DESC
       LIMIT $1`,
      [limit]
    );
    return rows.map((r) => ({ productName: r.productName, category: r.category, price: numOrZero(r.price) }));
  },

  async cheapestPer100g(limit = 10): Promise<CheapestPer100gProduct[]> {
    const rows = await db.query<{ productName: string; price: NumericCell; pricePer100g: NumericCell }>(
      `SELECT product_name AS "productName", price, price_per_100g AS "pricePer100g"
       FROM ${PRODUCTS_TABLE}
       WHERE price_per_100g <> 0 AND unit = 'g'
       ORDER BY price_per_100g ASC
       LIMIT $1`,
      [limit]
    );
    return rows.map((r) => ({
      productName: r.productName,
      price: numOrZero(r.price),
      pricePer100g: num(r.pricePer100g),
    }));
  },

  async avgDiscountByCategory(): Promise<CategoryDiscount[]> {
    const rows = await db.query<{ category: string | null; avgDiscountPercentage: NumericCell }>(
      `SELECT category, AVG(discount_percentage) AS "avgDiscountPercentage"
       FROM ${PRODUCTS_TABLE}
       GROUP BY category
       ORDER BY "avgDiscountPercentage" DESC NULLS LAST`
    );
    return rows.map((r) => ({ category: r.category, avgDiscountPercentage: num(r.avgDiscountPercentage) }));
  },

  async discountedProducts(): Promise<DiscountedProduct[]> {
    const rows = await db.query<{
      productName: string;
      price: NumericCell;
      originalPrice: NumericCell;
      discountPercentage: NumericCell;
    }>(
      `SELECT product_name AS "productName", price, original_price AS "originalPrice",
              discount_percentage AS "discountPercentage"
       FROM ${PRODUCTS_TABLE}
       WHERE price < original_price
       ORDER BY id`
    );
    return rows.map((r) => ({
      productName: r.productName,
      price: numOrZero(r.price),
      originalPrice: num(r.originalPrice),
      discountPercentage: num(r.discountPercentage),
    }));
  },

  async categorySummary(): Promise<CategorySummary[]> {
    const rows = await db.query<{
      category: string | null;
      productCount: NumericCell;
      avgPrice: NumericCell;
      avgRating: NumericCell;
    }>(
      `SELECT category,
              COUNT(product_name) AS "productCount",
              AVG(price) AS "avgPrice",
              AVG(rating) AS "avgRating"
       FROM ${PRODUCTS_TABLE}
       GROUP BY category
       ORDER BY "avgRating" DESC NULLS LAST`
    );
    return rows.map((r) => ({
      category: r.category,
      productCount: numOrZero(r.productCount),
      avgPrice: num(r.avgPrice),
      avgRating: num(r.avgRating),
    }));
  },

  async bestValuePer100g(limit = 15): Promise<ValuePer100gProduct[]> {
    const rows = await db.query<{ productName: string; category: string | null; pricePer100g: NumericCell }>(
      `SELECT product_name AS "productName", category, price_per_100g AS "pricePer100g"
       FROM ${PRODUCTS_TABLE}
       WHERE unit = 'g'
       ORDER BY price_per_100g ASC
       LIMIT $1`,
      [limit]
    );
    return rows.map((r) => ({ productName: r.productName, category: r.category, pricePer100g: num(r.pricePer100g) }));
  },

  async valueSegments(): Promise<ValueSegment[]> {
    const rows = await db.query<{
      productName: string;
      category: string | null;
      pricePer100g: NumericCell;
      valueLabel: string;
    }>(
      `SELECT product_name AS "productName", category, price_per_100g AS "pricePer100g",
              ${VALUE_LABEL_SQL} AS "valueLabel"
       FROM ${PRODUCTS_TABLE}
       WHERE unit = 'g'
       ORDER BY price_per_100g`
    );
    return rows.map((r) => ({
      productName: r.productName,
      category: r.category,
      pricePer100g: num(r.pricePer100g),
      valueLabel: toValueLabel(r.valueLabel),
    }));
  },

  async topPremium(limit = 10): Promise<PremiumProduct[]> {
    const rows = await db.query<{
      productName: string;
      category: string | null;
      pricePer100g: NumericCell;
      rating: NumericCell;
    }>(
      `${VALUE_SEGMENT_CTE}
       SELECT product_name AS "productName", category, price_per_100g AS "pricePer100g", rating
       FROM value_segment
       WHERE value_label = 'Premium'
       ORDER BY price_per_100g DESC
       LIMIT $1`,
      [limit]
    );
    return rows.map((r) => ({
      productName: r.productName,
      category: r.category,
      pricePer100g: num(r.pricePer100g),
      rating: num(r.rating),
    }));
  },

  async categoryValueScores(): Promise<CategoryValueScore[]> {
    const rows = await db.query<{
      category: string | null;
      avgPricePer100g: NumericCell;
      avgRating: NumericCell;
      totalProducts: NumericCell;
    }>(
      `${VALUE_SEGMENT_CTE}
       SELECT category,
              AVG(price_per_100g) AS "avgPricePer100g",
              AVG(rating) AS "avgRating",
              COUNT(*) AS "totalProducts"
       FROM value_segment
       GROUP BY category
       ORDER BY "avgPricePer100g" ASC`
    );
    return rows.map((r) => ({
      category: r.category,
      avgPricePer100g: num(r.avgPricePer100g),
      avgRating: num(r.avgRating),
      totalProducts: numOrZero(r.totalProducts),
    }));
  },

  /** Gram rows with a positive price_per_100g below `maxPricePer100g` (drops extreme outliers). */
  async priceRatingDataset(maxPricePer100g: number): Promise<PriceRatingPoint[]> {
    const rows = await db.query<{
      category: string | null;
      price: NumericCell;
      rating: NumericCell;
      pricePer100g: NumericCell;
      discountPercentage: NumericCell;
      valueLabel: string;
    }>(
      `SELECT category, price, rating, price_per_100g AS "pricePer100g",
              discount_percentage AS "discountPercentage",
              ${VALUE_LABEL_SQL} AS "valueLabel"
       FROM ${PRODUCTS_TABLE}
       WHERE unit = 'g'
         AND price_per_100g IS NOT NULL
         AND price_per_100g > 0
         AND price_per_100g < $1
       ORDER BY id`,
      [maxPricePer100g]
    );
    return rows.map((r) => ({
      category: r.category,
      price: numOrZero(r.price),
      rating: num(r.rating),
      pricePer100g: num(r.pricePer100g),
      discountPercentage: num(r.discountPercentage),
      valueLabel: toValueLabel(r.valueLabel),
    }));
  },

  async topRated(limit = 10): Promise<RatedProduct[]> {
    const rows = await db.query<{ productName: string; category: string | null; rating: NumericCell }>(
      `SELECT product_name AS "productName", category, rating
       FROM ${PRODUCTS_TABLE}
       ORDER BY rating DESC NULLS LAST
       LIMIT $1`,
      [limit]
    );
    return rows.map((r) => ({ productName: r.productName, category: r.category, rating: num(r.rating) }));
  },
};

export type ProductRepository = typeof productRepository;
