export interface Product {
  productId: string;
  name: string;
  description: string;
  price: number;
  category: string;
  stock: number;
  rating: number;
  imageUrl: string;
}

// read-only view of the catalog taken once per operation
export type CatalogSnapshot = ReadonlyMap<string, Product>;

export interface CartLineItem {
  productId: string;
  quantity: number;
}

export interface Cart {
  cartId: string;
  userId: string;
  items: CartLineItem[];
  total: number; // derived from current catalog prices, never trusted on its own
  createdAt: Date;
  updatedAt: Date;
}

export type OrderStatus = 'completed';

export interface Order {
  orderId: string;
  userId: string;
  items: CartLineItem[];
  total: number;
  status: OrderStatus;
  createdAt: Date;
  completedAt: Date;
}

export interface SearchEntry {
  searchId: string;
  userId: string;
  query: string;
  searchedAt: Date;
}

export interface CartItemRequest {
  productId: string;
  quantity: number;
}

export type RecommendationTier = 'order-history' | 'search-history' | 'popularity';

export interface RecommendationResult {
  userId: string;
  tier: RecommendationTier;
  products: Product[];
}
