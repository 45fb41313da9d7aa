import { v4 as uuidv4 } from 'uuid';
import { Product } from '../models.js';
import { ICatalogStore } from '../../infrastructure/stores/ICatalogStore.js';
import { ISearchLogStore } from '../../infrastructure/stores/ISearchLogStore.js';
import { ResourceNotFoundError, ValidationError } from '../errors/index.js';
import { DEFAULT_RESULT_LIMIT, normalizeLimit, productMatches, topRated } from '../productQueries.js';

export class CatalogService {
  constructor(
    private readonly catalog: ICatalogStore,
    private readonly searchLog: ISearchLogStore,
    private readonly defaultLimit: number = DEFAULT_RESULT_LIMIT
  ) {}

  async listProducts(): Promise<Product[]> {
    return this.catalog.listProducts();
  }

  async getProduct(productId: string): Promise<Product> {
    const product = await this.catalog.getProduct(productId);
    if (!product) throw new ResourceNotFoundError('Product', productId);
    return product;
  }

  async getTopProducts(limit?: number): Promise<Product[]> {
    const products = await this.catalog.listProducts();
    return topRated(products, normalizeLimit(limit, this.defaultLimit));
  }

  // searches are only recorded when they carry a user id
  async searchProducts(query: string, userId?: string): Promise<Product[]> {
    if (typeof query !== 'string' || query.trim() === '') {
      throw new ValidationError('Search query is required.');
    }

    if (userId !== undefined && userId.trim() !== '') {
      await this.searchLog.recordSearch({
        searchId: uuidv4(),
        userId,
        query,
        searchedAt: new Date(),
      });
    }

    const products = await this.catalog.listProducts();
    return products.filter((product) =>
      productMatches(product, query, ['name', 'description', 'category'])
    );
  }
}
