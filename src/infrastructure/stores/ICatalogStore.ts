import { CatalogSnapshot, Product } from '../../domain/models.js';

export interface ICatalogStore {
  getProduct(productId: string): Promise<Product | null>;
  listProducts(): Promise<Product[]>;
  snapshot(): Promise<CatalogSnapshot>;
}
