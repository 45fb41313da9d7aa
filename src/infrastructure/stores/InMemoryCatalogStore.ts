import { CatalogSnapshot, Product } from '../../domain/models.js';
import { ICatalogStore } from './ICatalogStore.js';

// seeded once at startup; iteration order is insertion order
export class InMemoryCatalogStore implements ICatalogStore {
  private products: Map<string, Product> = new Map();

  constructor(seed: readonly Product[] = []) {
    for (const product of seed) {
      this.products.set(product.productId, { ...product });
    }
  }

  async getProduct(productId: string): Promise<Product | null> {
    const product = this.products.get(productId);
    return product ? { ...product } : null;
  }

  async listProducts(): Promise<Product[]> {
    return Array.from(this.products.values(), (product) => ({ ...product }));
  }

  async snapshot(): Promise<CatalogSnapshot> {
    return new Map(
      Array.from(this.products, ([id, product]): [string, Product] => [id, { ...product }])
    );
  }

  // Utility methods for testing
  setProduct(product: Product): void {
    this.products.set(product.productId, { ...product });
  }

  removeProduct(productId: string): void {
    this.products.delete(productId);
  }

  getProductCount(): number {
    return this.products.size;
  }
}
