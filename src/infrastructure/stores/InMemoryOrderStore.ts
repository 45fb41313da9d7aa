import { Order } from '../../domain/models.js';
import { IOrderStore } from './IOrderStore.js';
import { ConflictError } from '../../domain/errors/index.js';

const freezeOrder = (order: Order): Readonly<Order> =>
  Object.freeze({
    ...order,
    items: order.items.map((item) => Object.freeze({ ...item })),
    createdAt: new Date(order.createdAt.getTime()),
    completedAt: new Date(order.completedAt.getTime()),
  });

// Date objects are mutable even inside a frozen record, so they are copied too
const cloneOrder = (order: Readonly<Order>): Order => ({
  ...order,
  items: order.items.map((item) => ({ ...item })),
  createdAt: new Date(order.createdAt.getTime()),
  completedAt: new Date(order.completedAt.getTime()),
});

export class InMemoryOrderStore implements IOrderStore {
  private orders: Map<string, Readonly<Order>> = new Map();

  async createOrder(order: Order): Promise<Order> {
    if (this.orders.has(order.orderId)) {
      throw new ConflictError(`Order '${order.orderId}' already exists.`);
    }

    this.orders.set(order.orderId, freezeOrder(order));
    return cloneOrder(order);
  }

  async getOrder(orderId: string): Promise<Order | null> {
    const order = this.orders.get(orderId);
    return order ? cloneOrder(order) : null;
  }

  // creation order, since Map keeps insertion order
  async listOrdersByUser(userId: string): Promise<Order[]> {
    const result: Order[] = [];
    for (const order of this.orders.values()) {
      if (order.userId === userId) result.push(cloneOrder(order));
    }
    return result;
  }

  // Utility methods for testing
  getOrderCount(): number {
    return this.orders.size;
  }
}
