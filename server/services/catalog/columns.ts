import type { AnyPgColumn } from "drizzle-orm/pg-core";
import { categories, products } from "@shared/schema";

/** Stored scalar columns the data layer can order by directly. */
export const SORTABLE_COLUMNS = {
  id: products.id,
  name: products.name,
  brand: products.brand,
  price: products.price,
  color: products.color,
  memory: products.memory,
  screenSize: products.screenSize,
  batteryCapacity: products.batteryCapacity,
  operatingSystem: products.operatingSystem,
  category: categories.name,
  createdAt: products.createdAt,
  updatedAt: products.updatedAt,
} satisfies Record<string, AnyPgColumn>;

export type SortableKey = keyof typeof SORTABLE_COLUMNS;

export const RATING_SORT_KEYS = ["rating", "ratings", "averageRating"] as const;

export function isSortableKey(key: string): key is SortableKey {
  return Object.prototype.hasOwnProperty.call(SORTABLE_COLUMNS, key);
}

export function isRatingSortKey(key: string): boolean {
  return RATING_SORT_KEYS.some((candidate) => candidate.toLowerCase() === key.toLowerCase());
}
