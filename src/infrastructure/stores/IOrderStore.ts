import { Order } from '../../domain/models.js';

// append-only: orders are never updated or deleted
export interface IOrderStore {
  createOrder(order: Order): Promise<Order>;
  getOrder(orderId: string): Promise<Order | null>;
  listOrdersByUser(userId: string): Promise<Order[]>;
}
