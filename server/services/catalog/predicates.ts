import { and, ilike, inArray, sql, type SQL } from "drizzle-orm";
import type { AnyPgColumn } from "drizzle-orm/pg-core";
import { categories, products, type ProductFilter } from "@shared/schema";

/**
 * A filter condition over a product row joined with its category.
 * `undefined` is the neutral predicate: it matches every row and is dropped
 * from composition.
 */
export type Predicate = SQL | undefined;

export const MATCH_ALL: Predicate = undefined;

function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

/** Trims and lower-cases raw list tokens, dropping blanks and duplicates. */
export function normalizeTokens(values: readonly string[] | undefined): string[] {
  if (!values) return [];
  const tokens = values.map((value) => value.trim().toLowerCase()).filter((value) => value.length > 0);
  return Array.from(new Set(tokens));
}

export function nameContains(name: string | undefined): Predicate {
  const term = name?.trim();
  if (!term) return MATCH_ALL;
  return ilike(products.name, `%${escapeLike(term)}%`);
}

export function matchesAny(column: AnyPgColumn, values: readonly string[] | undefined): Predicate {
  const tokens = normalizeTokens(values);
  if (tokens.length === 0) return MATCH_ALL;
  return inArray(sql`lower(trim(${column}))`, tokens);
}

/** Matches by category name through the product → category join, never by id. */
export function inCategories(names: readonly string[] | undefined): Predicate {
  return matchesAny(categories.name, names);
}

/** AND over every active predicate; no active predicate means match everything. */
export function composePredicates(predicates: readonly Predicate[]): Predicate {
  const active = predicates.filter((predicate): predicate is SQL => predicate !== undefined);
  if (active.length === 0) return MATCH_ALL;
  if (active.length === 1) return active[0];
  return and(...active);
}

/** Predicates for every criterion except price, which the bound resolver owns. */
export function filterPredicates(filter: Omit<ProductFilter, "minPrice" | "maxPrice">): Predicate[] {
  return [
    nameContains(filter.name),
    matchesAny(products.brand, filter.brand),
    matchesAny(products.color, filter.color),
    matchesAny(products.memory, filter.memory),
    matchesAny(products.screenSize, filter.screenSize),
    matchesAny(products.batteryCapacity, filter.batteryCapacity),
    matchesAny(products.operatingSystem, filter.operatingSystem),
    inCategories(filter.category),
  ];
}
