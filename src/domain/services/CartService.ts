import { v4 as uuidv4 } from 'uuid';
import { Cart, CartItemRequest, Order } from '../models.js';
import { ICartStore } from '../../infrastructure/stores/ICartStore.js';
import { ICatalogStore } from '../../infrastructure/stores/ICatalogStore.js';
import { IOrderStore } from '../../infrastructure/stores/IOrderStore.js';
import { KeyedLock } from '../../infrastructure/concurrency/KeyedLock.js';
import { IPricingStrategy } from '../strategies/IPricingStrategy.js';
import {
  InsufficientStockError,
  ResourceNotFoundError,
  ValidationError,
} from '../errors/index.js';

// cart ledger + checkout; every mutation of a user's cart holds that user's lock
export class CartService {
  private readonly locks = new KeyedLock();

  constructor(
    private readonly carts: ICartStore,
    private readonly catalog: ICatalogStore,
    private readonly orders: IOrderStore,
    private readonly pricing: IPricingStrategy
  ) {}

  async getCart(userId: string): Promise<Cart> {
    this.validateUserId(userId);
    const cart = await this.carts.getCartByUserId(userId);
    if (!cart) throw new ResourceNotFoundError('Cart for user', userId);

    // reprice against the current catalog without counting a read as an update
    const priced = this.pricing.calculatePricing(cart, await this.catalog.snapshot());
    return { ...priced, updatedAt: cart.updatedAt };
  }

  // merges quantities if product already exists; stock is checked per call, not per cart
  async addItem(userId: string, request: CartItemRequest): Promise<Cart> {
    this.validateUserId(userId);
    this.validateProductId(request.productId);
    this.validateQuantity(request.quantity);

    return this.locks.run(userId, async () => {
      const snapshot = await this.catalog.snapshot();
      const product = snapshot.get(request.productId);
      if (!product) {
        throw new ValidationError(`Unknown product '${request.productId}'.`);
      }
      if (product.stock < request.quantity) {
        throw new InsufficientStockError(product.productId, request.quantity, product.stock);
      }

      const existing = await this.carts.getCartByUserId(userId);
      const cart = existing ?? this.newCart(userId);

      const item = cart.items.find((line) => line.productId === request.productId);
      if (item) {
        item.quantity += request.quantity;
      } else {
        cart.items.push({ productId: request.productId, quantity: request.quantity });
      }

      const priced = this.pricing.calculatePricing(cart, snapshot);
      return existing ? this.carts.updateCart(priced) : this.carts.createCart(priced);
    });
  }

  // removing a product that isn't in the cart leaves the lines untouched
  async removeItem(userId: string, request: CartItemRequest): Promise<Cart> {
    this.validateUserId(userId);
    this.validateProductId(request.productId);
    this.validateQuantity(request.quantity);

    return this.locks.run(userId, async () => {
      const cart = await this.carts.getCartByUserId(userId);
      if (!cart) throw new ResourceNotFoundError('Cart for user', userId);

      const idx = cart.items.findIndex((line) => line.productId === request.productId);
      if (idx >= 0) {
        const item = cart.items[idx];
        if (request.quantity >= item.quantity) {
          cart.items.splice(idx, 1);
        } else {
          item.quantity -= request.quantity;
        }
      }

      const snapshot = await this.catalog.snapshot();
      return this.carts.updateCart(this.pricing.calculatePricing(cart, snapshot));
    });
  }

  // snapshot into an order and clear the cart under one lock hold; stock is left alone
  async checkout(userId: string): Promise<Order> {
    this.validateUserId(userId);

    return this.locks.run(userId, async () => {
      const cart = await this.carts.getCartByUserId(userId);
      if (!cart) {
        throw new ValidationError(`No cart found for user '${userId}'.`);
      }
      if (cart.items.length === 0) {
        throw new ValidationError('Cannot check out an empty cart.');
      }

      const priced = this.pricing.calculatePricing(cart, await this.catalog.snapshot());
      const checkedOutAt = Date.now();

      const order = await this.orders.createOrder({
        orderId: uuidv4(),
        userId,
        items: priced.items.map((item) => ({ ...item })),
        total: priced.total,
        status: 'completed',
        createdAt: new Date(checkedOutAt),
        completedAt: new Date(checkedOutAt),
      });

      await this.carts.updateCart({
        ...cart,
        items: [],
        total: 0,
        updatedAt: new Date(checkedOutAt),
      });
      return order;
    });
  }

  private newCart(userId: string): Cart {
    const now = new Date();
    return {
      cartId: uuidv4(),
      userId,
      items: [],
      total: 0,
      createdAt: now,
      updatedAt: now,
    };
  }

  private validateUserId(userId: string): void {
    if (typeof userId !== 'string' || userId.trim() === '') {
      throw new ValidationError('User ID is required.');
    }
  }

  private validateProductId(productId: string): void {
    if (typeof productId !== 'string' || productId.trim() === '') {
      throw new ValidationError('Product ID is required.');
    }
  }

  private validateQuantity(quantity: number): void {
    if (!Number.isInteger(quantity)) {
      throw new ValidationError('Quantity must be an integer.');
    }
    if (quantity < 1) {
      throw new ValidationError('Quantity must be at least 1.');
    }
  }
}
