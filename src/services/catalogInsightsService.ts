import { config } from '../config/env';
import { productRepository } from '../repositories/productRepository';

export type CatalogOverview = {
  totalProducts: number;
  distinctCategories: number;
};

export const catalogInsightsService = {
  async getOverview(): Promise<CatalogOverview> {
    const [totalProducts, distinctCategories] = await Promise.all([
      productRepository.countProducts(),
      productRepository.countDistinctCategories(),
    ]);
    return { totalProducts, distinctCategories };
  },

  getSample(limit = 10) {
    return productRepository.sample(limit);
  },

  getMostExpensive(limit = 10) {
    return productRepository.mostExpensive(limit);
  },

  getCheapestPer100g(limit = 10) {
    return productRepository.cheapestPer100g(limit);
  },

  getAvgDiscountByCategory() {
    return productRepository.avgDiscountByCategory();
  },

  getDiscountedProducts() {
    return productRepository.discountedProducts();
  },

  getCategorySummary() {
    return productRepository.categorySummary();
  },

  getBestValue(limit = 15) {
    return productRepository.bestValuePer100g(limit);
  },

  getValueSegments() {
    return productRepository.valueSegments();
  },

  getTopPremium(limit = 10) {
    return productRepository.topPremium(limit);
  },

  getCategoryValueScores() {
    return productRepository.categoryValueScores();
  },

  // Drops extreme price_per_100g outliers so scatter plots stay readable.
  getPriceRatingDataset(maxPricePer100g: number = config.PRICE_PER_100G_OUTLIER_MAX) {
    return productRepository.priceRatingDataset(maxPricePer100g);
  },

  getTopRated(limit = 10) {
    return productRepository.topRated(limit);
  },
};
