import { Order, Product, RecommendationTier, SearchEntry } from '../models.js';
import { productMatches, topRated } from '../productQueries.js';

export interface RecommendationContext {
  userId: string;
  limit: number;
  catalog: readonly Product[]; // catalog order
  orders: readonly Order[];
  searches: readonly SearchEntry[];
}

// a tier returns an empty list to hand over to the next one
export interface IRecommendationStrategy {
  readonly tier: RecommendationTier;
  recommend(context: RecommendationContext): Product[];
}

// products sharing a category with anything the user has ordered
export class OrderHistoryStrategy implements IRecommendationStrategy {
  readonly tier = 'order-history' as const;

  recommend({ catalog, orders, limit }: RecommendationContext): Product[] {
    if (orders.length === 0) return [];

    const byId = new Map<string, Product>(
      catalog.map((product): [string, Product] => [product.productId, product])
    );
    const categoryCount = new Map<string, number>();

    for (const order of orders) {
      for (const item of order.items) {
        const product = byId.get(item.productId);
        if (!product) continue; // no longer in the catalog
        categoryCount.set(product.category, (categoryCount.get(product.category) ?? 0) + 1);
      }
    }

    if (categoryCount.size === 0) return [];

    const recommendations: Product[] = [];
    for (const product of catalog) {
      if (recommendations.length >= limit) break;
      if ((categoryCount.get(product.category) ?? 0) > 0) {
        recommendations.push(product);
      }
    }
    return recommendations;
  }
}

// products whose name or description contains a past query, oldest query first
export class SearchHistoryStrategy implements IRecommendationStrategy {
  readonly tier = 'search-history' as const;

  recommend({ catalog, searches, limit }: RecommendationContext): Product[] {
    const recommendations: Product[] = [];
    const seen = new Set<string>();

    for (const search of searches) {
      for (const product of catalog) {
        if (recommendations.length >= limit) return recommendations;
        if (seen.has(product.productId)) continue;
        if (productMatches(product, search.query, ['name', 'description'])) {
          seen.add(product.productId);
          recommendations.push(product);
        }
      }
    }
    return recommendations;
  }
}

export class PopularityStrategy implements IRecommendationStrategy {
  readonly tier = 'popularity' as const;

  recommend({ catalog, limit }: RecommendationContext): Product[] {
    return topRated(catalog, limit);
  }
}

export const defaultRecommendationTiers = (): IRecommendationStrategy[] => [
  new OrderHistoryStrategy(),
  new SearchHistoryStrategy(),
  new PopularityStrategy(),
];
