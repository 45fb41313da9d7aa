import { RecommendationResult } from '../models.js';
import { ICatalogStore } from '../../infrastructure/stores/ICatalogStore.js';
import { IOrderStore } from '../../infrastructure/stores/IOrderStore.js';
import { ISearchLogStore } from '../../infrastructure/stores/ISearchLogStore.js';
import {
  IRecommendationStrategy,
  RecommendationContext,
  defaultRecommendationTiers,
} from '../strategies/IRecommendationStrategy.js';
import { DEFAULT_RESULT_LIMIT, normalizeLimit } from '../productQueries.js';

/**
 * Runs the recommendation tiers in order and returns the first non-empty
 * result. Tiers are never mixed; if every tier comes back empty the result
 * is reported as popularity with no products.
 */
export class RecommendationService {
  constructor(
    private readonly catalog: ICatalogStore,
    private readonly orders: IOrderStore,
    private readonly searchLog: ISearchLogStore,
    private readonly tiers: readonly IRecommendationStrategy[] = defaultRecommendationTiers(),
    private readonly defaultLimit: number = DEFAULT_RESULT_LIMIT
  ) {}

  async getRecommendations(userId: string, limit?: number): Promise<RecommendationResult> {
    const [catalog, orders, searches] = await Promise.all([
      this.catalog.listProducts(),
      this.orders.listOrdersByUser(userId),
      this.searchLog.listSearchesByUser(userId),
    ]);
    const context: RecommendationContext = {
      userId,
      limit: normalizeLimit(limit, this.defaultLimit),
      catalog,
      orders,
      searches,
    };

    for (const strategy of this.tiers) {
      const products = strategy.recommend(context);
      if (products.length > 0) {
        return { userId, tier: strategy.tier, products: products.slice(0, context.limit) };
      }
    }

    return { userId, tier: 'popularity', products: [] };
  }
}
