import { Order } from '../models.js';
import { IOrderStore } from '../../infrastructure/stores/IOrderStore.js';
import { ResourceNotFoundError } from '../errors/index.js';

// read side of the order ledger; orders are only written by CartService.checkout
export class OrderService {
  constructor(private readonly orders: IOrderStore) {}

  async getOrderHistory(userId: string): Promise<Order[]> {
    return this.orders.listOrdersByUser(userId);
  }

  async getOrder(userId: string, orderId: string): Promise<Order> {
    const order = await this.orders.getOrder(orderId);
    // another user's order is reported the same as a missing one
    if (!order || order.userId !== userId) {
      throw new ResourceNotFoundError('Order', orderId);
    }
    return order;
  }
}
