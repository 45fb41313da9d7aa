import { Cart, CatalogSnapshot } from '../models.js';

export interface IPricingStrategy {
  calculatePricing(cart: Cart, catalog: CatalogSnapshot): Cart;
}

// catalog pricing - sum of current price x quantity, no tax
export class CatalogPricingStrategy implements IPricingStrategy {
  calculatePricing(cart: Cart, catalog: CatalogSnapshot): Cart {
    const total = cart.items.reduce((sum, item) => {
      // lines whose product left the catalog contribute nothing
      const product = catalog.get(item.productId);
      return product ? sum + product.price * item.quantity : sum;
    }, 0);

    return {
      ...cart,
      // rounding to 2 decimals to avoid floating point weirdness
      total: Math.round(total * 100) / 100,
      updatedAt: new Date(),
    };
  }
}
