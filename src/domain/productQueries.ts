import { Product } from './models.js';

export const DEFAULT_RESULT_LIMIT = 5;

export type ProductTextField = 'name' | 'description' | 'category';

// plain case-sensitive containment, not a ranking search
export function productMatches(
  product: Product,
  query: string,
  fields: readonly ProductTextField[]
): boolean {
  return fields.some((field) => product[field].includes(query));
}

// absent, fractional or non-positive limits fall back to the default
export function normalizeLimit(
  limit: number | undefined,
  fallback: number = DEFAULT_RESULT_LIMIT
): number {
  if (limit === undefined || !Number.isInteger(limit) || limit <= 0) {
    return fallback;
  }
  return limit;
}

// rating descending, ties broken by product id so ordering is deterministic
export function compareByRating(a: Product, b: Product): number {
  if (a.rating !== b.rating) return b.rating - a.rating;
  if (a.productId < b.productId) return -1;
  if (a.productId > b.productId) return 1;
  return 0;
}

export function topRated(products: readonly Product[], limit: number): Product[] {
  return [...products].sort(compareByRating).slice(0, limit);
}
