import { Cart } from '../../domain/models.js';

export interface ICartStore {
  createCart(cart: Cart): Promise<Cart>;
  getCart(cartId: string): Promise<Cart | null>;
  getCartByUserId(userId: string): Promise<Cart | null>;
  updateCart(cart: Cart): Promise<Cart>;
}
