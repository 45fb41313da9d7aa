import { Cart } from '../../domain/models.js';
import { ICartStore } from './ICartStore.js';
import { ConflictError, ResourceNotFoundError } from '../../domain/errors/index.js';

// copies line items and dates too so callers can't reach into stored state
const cloneCart = (cart: Cart): Cart => ({
  ...cart,
  items: cart.items.map((item) => ({ ...item })),
  createdAt: new Date(cart.createdAt.getTime()),
  updatedAt: new Date(cart.updatedAt.getTime()),
});

// in-memory cart storage, one live cart per user
export class InMemoryCartStore implements ICartStore {
  private carts: Map<string, Cart> = new Map();
  private userCarts: Map<string, string> = new Map(); // userId -> cartId

  async createCart(cart: Cart): Promise<Cart> {
    const existing = this.userCarts.get(cart.userId);
    if (existing && existing !== cart.cartId) {
      throw new ConflictError(
        `User '${cart.userId}' already has cart '${existing}'.`
      );
    }

    this.carts.set(cart.cartId, cloneCart(cart));
    this.userCarts.set(cart.userId, cart.cartId);
    return cloneCart(cart);
  }

  async getCart(cartId: string): Promise<Cart | null> {
    const cart = this.carts.get(cartId);
    return cart ? cloneCart(cart) : null;
  }

  async getCartByUserId(userId: string): Promise<Cart | null> {
    const cartId = this.userCarts.get(userId);
    if (!cartId) return null;
    return this.getCart(cartId);
  }

  async updateCart(cart: Cart): Promise<Cart> {
    if (!this.carts.has(cart.cartId)) {
      throw new ResourceNotFoundError('Cart', cart.cartId);
    }

    this.carts.set(cart.cartId, cloneCart(cart));
    return cloneCart(cart);
  }

  // Utility methods for testing
  getCartCount(): number {
    return this.carts.size;
  }

  clearAllCarts(): void {
    this.carts.clear();
    this.userCarts.clear();
  }
}
