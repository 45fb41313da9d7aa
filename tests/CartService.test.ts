import { describe, it, expect, beforeEach } from 'vitest';
import { CartService } from '../src/domain/services/CartService.js';
import { CatalogPricingStrategy } from '../src/domain/strategies/IPricingStrategy.js';
import { InMemoryCartStore } from '../src/infrastructure/stores/InMemoryCartStore.js';
import { InMemoryCatalogStore } from '../src/infrastructure/stores/InMemoryCatalogStore.js';
import { InMemoryOrderStore } from '../src/infrastructure/stores/InMemoryOrderStore.js';
import {
  InsufficientStockError,
  ResourceNotFoundError,
  ValidationError,
} from '../src/domain/errors/index.js';
import { Product } from '../src/domain/models.js';

const makeProduct = (overrides: Partial<Product> & { productId: string }): Product => ({
  name: `Product ${overrides.productId}`,
  description: '',
  price: 10,
  category: 'Electronics',
  stock: 50,
  rating: 4,
  imageUrl: '',
  ...overrides,
});

describe('CartService', () => {
  let cartService: CartService;
  let cartStore: InMemoryCartStore;
  let catalogStore: InMemoryCatalogStore;
  let orderStore: InMemoryOrderStore;

  beforeEach(() => {
    cartStore = new InMemoryCartStore();
    orderStore = new InMemoryOrderStore();
    catalogStore = new InMemoryCatalogStore([
      makeProduct({ productId: '1', price: 999.99, stock: 50 }),
      makeProduct({ productId: '2', price: 50, stock: 5 }),
      makeProduct({ productId: '3', price: 30, stock: 0 }),
    ]);
    cartService = new CartService(
      cartStore,
      catalogStore,
      orderStore,
      new CatalogPricingStrategy()
    );
  });

  describe('addItem', () => {
    it('creates a cart on first add', async () => {
      const cart = await cartService.addItem('u1', { productId: '1', quantity: 2 });

      expect(cart.userId).toBe('u1');
      expect(cart.cartId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i);
      expect(cart.items).toEqual([{ productId: '1', quantity: 2 }]);
      expect(cart.total).toBe(1999.98);
      expect(cartStore.getCartCount()).toBe(1);
    });

    it('merges quantities for same product', async () => {
      await cartService.addItem('u1', { productId: '1', quantity: 2 });
      const updated = await cartService.addItem('u1', { productId: '1', quantity: 1 });

      expect(updated.items).toEqual([{ productId: '1', quantity: 3 }]);
      expect(updated.total).toBe(2999.97);
    });

    it('keeps the same cart across adds', async () => {
      const first = await cartService.addItem('u1', { productId: '1', quantity: 1 });
      const second = await cartService.addItem('u1', { productId: '2', quantity: 1 });

      expect(second.cartId).toBe(first.cartId);
      expect(second.items).toHaveLength(2);
      expect(second.total).toBe(1049.99);
    });

    it('gives each user their own cart', async () => {
      const a = await cartService.addItem('u1', { productId: '2', quantity: 1 });
      const b = await cartService.addItem('u2', { productId: '2', quantity: 2 });

      expect(a.cartId).not.toBe(b.cartId);
      expect(cartStore.getCartCount()).toBe(2);
    });

    it('rejects an unknown product without creating a cart', async () => {
      await expect(
        cartService.addItem('u1', { productId: 'missing', quantity: 1 })
      ).rejects.toThrow(ValidationError);

      expect(cartStore.getCartCount()).toBe(0);
    });

    it('rejects an unknown product without touching an existing cart', async () => {
      const before = await cartService.addItem('u1', { productId: '2', quantity: 1 });

      await expect(
        cartService.addItem('u1', { productId: 'missing', quantity: 1 })
      ).rejects.toThrow(ValidationError);

      const after = await cartService.getCart('u1');
      expect(after.items).toEqual(before.items);
      expect(after.total).toBe(before.total);
    });

    it('rejects quantities above current stock', async () => {
      await expect(
        cartService.addItem('u1', { productId: '2', quantity: 6 })
      ).rejects.toThrow(InsufficientStockError);
      await expect(
        cartService.addItem('u1', { productId: '3', quantity: 1 })
      ).rejects.toThrow(InsufficientStockError);

      expect(cartStore.getCartCount()).toBe(0);
    });

    it('checks stock per call rather than against the cart total', async () => {
      await cartService.addItem('u1', { productId: '2', quantity: 5 });
      const cart = await cartService.addItem('u1', { productId: '2', quantity: 5 });

      expect(cart.items).toEqual([{ productId: '2', quantity: 10 }]);
    });

    it('rejects quantity < 1 and fractional quantities', async () => {
      await expect(
        cartService.addItem('u1', { productId: '1', quantity: 0 })
      ).rejects.toThrow(ValidationError);
      await expect(
        cartService.addItem('u1', { productId: '1', quantity: 1.5 })
      ).rejects.toThrow(ValidationError);
    });

    it('requires a user id', async () => {
      await expect(
        cartService.addItem('  ', { productId: '1', quantity: 1 })
      ).rejects.toThrow(ValidationError);
    });

    it('serializes concurrent adds for the same user', async () => {
      await Promise.all(
        Array.from({ length: 10 }, () =>
          cartService.addItem('u1', { productId: '2', quantity: 1 })
        )
      );

      const cart = await cartService.getCart('u1');
      expect(cartStore.getCartCount()).toBe(1);
      expect(cart.items).toEqual([{ productId: '2', quantity: 10 }]);
      expect(cart.total).toBe(500);
    });
  });

  describe('removeItem', () => {
    it('decrements when removing less than the line quantity', async () => {
      await cartService.addItem('u1', { productId: '1', quantity: 3 });
      const cart = await cartService.removeItem('u1', { productId: '1', quantity: 1 });

      expect(cart.items).toEqual([{ productId: '1', quantity: 2 }]);
      expect(cart.total).toBe(1999.98);
    });

    it('deletes the line when removing the whole quantity or more', async () => {
      await cartService.addItem('u1', { productId: '1', quantity: 2 });
      await cartService.addItem('u1', { productId: '2', quantity: 1 });

      const exact = await cartService.removeItem('u1', { productId: '2', quantity: 1 });
      expect(exact.items).toEqual([{ productId: '1', quantity: 2 }]);

      const over = await cartService.removeItem('u1', { productId: '1', quantity: 7 });
      expect(over.items).toEqual([]);
      expect(over.total).toBe(0);
    });

    it('is a silent no-op for a product not in the cart', async () => {
      const before = await cartService.addItem('u1', { productId: '2', quantity: 2 });
      const after = await cartService.removeItem('u1', { productId: '1', quantity: 1 });

      expect(after.cartId).toBe(before.cartId);
      expect(after.items).toEqual([{ productId: '2', quantity: 2 }]);
      expect(after.total).toBe(100);
    });

    it('throws 404 when the user has no cart', async () => {
      await expect(
        cartService.removeItem('nobody', { productId: '1', quantity: 1 })
      ).rejects.toThrow(ResourceNotFoundError);
    });

    it('requires a user id', async () => {
      await expect(
        cartService.removeItem('', { productId: '1', quantity: 1 })
      ).rejects.toThrow(ValidationError);
    });
  });

  describe('getCart', () => {
    it('throws 404 for a user without a cart', async () => {
      await expect(cartService.getCart('nobody')).rejects.toThrow(ResourceNotFoundError);
    });

    it('reprices a standing cart when the catalog price changes', async () => {
      await cartService.addItem('u1', { productId: '2', quantity: 2 });
      catalogStore.setProduct(makeProduct({ productId: '2', price: 75, stock: 5 }));

      const cart = await cartService.getCart('u1');
      expect(cart.total).toBe(150);
    });

    it('keeps the total equal to price x quantity over any add/remove sequence', async () => {
      const steps: Array<['add' | 'remove', string, number]> = [
        ['add', '1', 2],
        ['add', '2', 3],
        ['remove', '1', 1],
        ['add', '2', 1],
        ['remove', '2', 10],
        ['add', '1', 4],
      ];
      const prices: Record<string, number> = { '1': 999.99, '2': 50 };

      for (const [op, productId, quantity] of steps) {
        const cart =
          op === 'add'
            ? await cartService.addItem('u1', { productId, quantity })
            : await cartService.removeItem('u1', { productId, quantity });

        const expected = cart.items.reduce(
          (sum, item) => sum + prices[item.productId] * item.quantity,
          0
        );
        expect(cart.total).toBe(Math.round(expected * 100) / 100);
        expect(cart.total).toBeGreaterThanOrEqual(0);
        expect(cart.items.every((item) => item.quantity >= 1)).toBe(true);
      }
    });
  });

  describe('checkout', () => {
    it('snapshots the cart into a completed order and empties the cart', async () => {
      await cartService.addItem('u1', { productId: '1', quantity: 2 });
      await cartService.addItem('u1', { productId: '1', quantity: 1 });
      const beforeCheckout = await cartService.removeItem('u1', { productId: '1', quantity: 1 });

      const order = await cartService.checkout('u1');

      expect(order.userId).toBe('u1');
      expect(order.status).toBe('completed');
      expect(order.items).toEqual([{ productId: '1', quantity: 2 }]);
      expect(order.total).toBe(1999.98);
      expect(order.createdAt.getTime()).toBe(order.completedAt.getTime());

      const after = await cartService.getCart('u1');
      expect(after.cartId).toBe(beforeCheckout.cartId);
      expect(after.items).toEqual([]);
      expect(after.total).toBe(0);
      expect(orderStore.getOrderCount()).toBe(1);
    });

    it('gives the order and the cleared cart their own timestamps', async () => {
      await cartService.addItem('u1', { productId: '2', quantity: 1 });
      const order = await cartService.checkout('u1');
      const createdAt = order.createdAt.getTime();

      const cart = await cartService.getCart('u1');
      cart.updatedAt.setUTCFullYear(1999);
      order.completedAt.setUTCFullYear(1998);

      const [stored] = await orderStore.listOrdersByUser('u1');
      expect(stored.createdAt.getTime()).toBe(createdAt);
      expect(stored.completedAt.getTime()).toBe(createdAt);
      expect((await cartService.getCart('u1')).updatedAt.getTime()).toBe(createdAt);
    });

    it('does not decrement stock', async () => {
      await cartService.addItem('u1', { productId: '2', quantity: 5 });
      await cartService.checkout('u1');

      const product = await catalogStore.getProduct('2');
      expect(product?.stock).toBe(5);
    });

    it('rejects checkout without a cart', async () => {
      await expect(cartService.checkout('nobody')).rejects.toThrow(ValidationError);
      expect(orderStore.getOrderCount()).toBe(0);
    });

    it('rejects checkout of an empty cart', async () => {
      await cartService.addItem('u1', { productId: '2', quantity: 1 });
      await cartService.checkout('u1');

      await expect(cartService.checkout('u1')).rejects.toThrow('Cannot check out an empty cart.');
      expect(orderStore.getOrderCount()).toBe(1);
    });

    it('does not let a concurrent add slip between snapshot and clear', async () => {
      await cartService.addItem('u1', { productId: '1', quantity: 2 });

      const [order, cart] = await Promise.all([
        cartService.checkout('u1'),
        cartService.addItem('u1', { productId: '2', quantity: 1 }),
      ]);

      expect(order.items).toEqual([{ productId: '1', quantity: 2 }]);
      expect(cart.items).toEqual([{ productId: '2', quantity: 1 }]);
      expect(cart.total).toBe(50);
    });

    it('keeps stored orders independent of the returned copy', async () => {
      await cartService.addItem('u1', { productId: '2', quantity: 1 });
      const order = await cartService.checkout('u1');

      order.items[0].quantity = 99;

      const stored = await orderStore.getOrder(order.orderId);
      expect(stored?.items).toEqual([{ productId: '2', quantity: 1 }]);
    });
  });
});
