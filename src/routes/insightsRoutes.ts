import { FastifyInstance } from 'fastify';
import { ZodTypeProvider } from 'fastify-type-provider-zod';
import {
  BestValueResponse,
  CategoryDiscountResponse,
  CategorySummaryResponse,
  CategoryValueResponse,
  CheapestPer100gResponse,
  DiscountedProductsResponse,
  LimitQuery,
  MostExpensiveResponse,
  OverviewResponse,
  PremiumProductsResponse,
  PriceRatingQuery,
  PriceRatingResponse,
  SampleResponse,
  TopRatedResponse,
  ValueSegmentsResponse,
} from '../dtos/insightsDtos';
import { catalogInsightsService } from '../services/catalogInsightsService';

const TAGS = ['Insights'];

export default async function insightsRoutes(fastify: FastifyInstance) {
  const app = fastify.withTypeProvider<ZodTypeProvider>();

  app.get(
    '/overview',
    { schema: { tags: TAGS, summary: 'Product and category counts', response: { 200: OverviewResponse } } },
    async () => catalogInsightsService.getOverview()
  );

  app.get(
    '/sample',
    { schema: { tags: TAGS, querystring: LimitQuery, response: { 200: SampleResponse } } },
    async (request) => catalogInsightsService.getSample(request.query.limit)
  );

  app.get(
    '/most-expensive',
    { schema: { tags: TAGS, querystring: LimitQuery, response: { 200: MostExpensiveResponse } } },
    async (request) => catalogInsightsService.getMostExpensive(request.query.limit)
  );

  app.get(
    '/cheapest-per-100g',
    { schema: { tags: TAGS, querystring: LimitQuery, response: { 200: CheapestPer100gResponse } } },
    async (request) => catalogInsightsService.getCheapestPer100g(request.query.limit)
  );

  app.get(
    '/discounts/by-category',
    { schema: { tags: TAGS, response: { 200: CategoryDiscountResponse } } },
    async () => catalogInsightsService.getAvgDiscountByCategory()
  );

  app.get(
    '/discounts/products',
    { schema: { tags: TAGS, response: { 200: DiscountedProductsResponse } } },
    async () => catalogInsightsService.getDiscountedProducts()
  );

  app.get(
    '/categories',
    { schema: { tags: TAGS, response: { 200: CategorySummaryResponse } } },
    async () => catalogInsightsService.getCategorySummary()
  );

  app.get(
    '/best-value',
    { schema: { tags: TAGS, querystring: LimitQuery, response: { 200: BestValueResponse } } },
    async (request) => catalogInsightsService.getBestValue(request.query.limit)
  );

  app.get(
    '/value-segments',
    { schema: { tags: TAGS, response: { 200: ValueSegmentsResponse } } },
    async () => catalogInsightsService.getValueSegments()
  );

  app.get(
    '/premium',
    { schema: { tags: TAGS, querystring: LimitQuery, response: { 200: PremiumProductsResponse } } },
    async (request) => catalogInsightsService.getTopPremium(request.query.limit)
  );

  app.get(
    '/category-value',
    { schema: { tags: TAGS, response: { 200: CategoryValueResponse } } },
    async () => catalogInsightsService.getCategoryValueScores()
  );

  app.get(
    '/price-rating',
    { schema: { tags: TAGS, querystring: PriceRatingQuery, response: { 200: PriceRatingResponse } } },
    async (request) => catalogInsightsService.getPriceRatingDataset(request.query.maxPricePer100g)
  );

  app.get(
    '/top-rated',
    { schema: { tags: TAGS, querystring: LimitQuery, response: { 200: TopRatedResponse } } },
    async (request) => catalogInsightsService.getTopRated(request.query.limit)
  );
}
