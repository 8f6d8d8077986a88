import z from 'zod';
import { ProductRecordDto } from './catalogDtos';

export const LimitQuery = z.object({
  limit: z.coerce.number().int().min(1).max(100).optional(),
});

export const PriceRatingQuery = z.object({
  maxPricePer100g: z.coerce.number().positive().optional(),
});

const valueLabel = z.enum(['Premium', 'Budget']);

export const OverviewResponse = z.object({
  totalProducts: z.number(),
  distinctCategories: z.number(),
});

export const SampleResponse = z.array(ProductRecordDto);

export const MostExpensiveResponse = z.array(
  z.object({ productName: z.string(), category: z.string().nullable(), price: z.number() })
);

export const CheapestPer100gResponse = z.array(
  z.object({ productName: z.string(), price: z.number(), pricePer100g: z.number().nullable() })
);

export const CategoryDiscountResponse = z.array(
  z.object({ category: z.string().nullable(), avgDiscountPercentage: z.number().nullable() })
);

export const DiscountedProductsResponse = z.array(
  z.object({
    productName: z.string(),
    price: z.number(),
    originalPrice: z.number().nullable(),
    discountPercentage: z.number().nullable(),
  })
);

export const CategorySummaryResponse = z.array(
  z.object({
    category: z.string().nullable(),
    productCount: z.number(),
    avgPrice: z.number().nullable(),
    avgRating: z.number().nullable(),
  })
);

const valuePer100gProduct = z.object({
  productName: z.string(),
  category: z.string().nullable(),
  pricePer100g: z.number().nullable(),
});

export const BestValueResponse = z.array(valuePer100gProduct);

export const ValueSegmentsResponse = z.array(valuePer100gProduct.extend({ valueLabel }));

export const PremiumProductsResponse = z.array(valuePer100gProduct.extend({ rating: z.number().nullable() }));

export const CategoryValueResponse = z.array(
  z.object({
    category: z.string().nullable(),
    avgPricePer100g: z.number().nullable(),
    avgRating: z.number().nullable(),
    totalProducts: z.number(),
  })
);

export const PriceRatingResponse = z.array(
  z.object({
    category: z.string().nullable(),
    price: z.number(),
    rating: z.number().nullable(),
    pricePer100g: z.number().nullable(),
    discountPercentage: z.number().nullable(),
    valueLabel,
  })
);

export const TopRatedResponse = z.array(
  z.object({ productName: z.string(), category: z.string().nullable(), rating: z.number().nullable() })
);
