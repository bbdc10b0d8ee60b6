import type { SortDirection } from "@shared/schema";
import type { RatingSortStrategyName } from "../../config";
import { InvalidSortError } from "../../errors";
import type { IStorage, PageWindow, ProductRow } from "../../storage";
import { isRatingSortKey, isSortableKey, type SortableKey } from "./columns";
import type { Predicate } from "./predicates";
import { averageRatingsFor } from "./rating";

export type SortPlan =
  | { kind: "pushdown"; key: SortableKey; direction: SortDirection }
  | { kind: "rating"; direction: SortDirection };

export function parseSortDirection(token: string): SortDirection {
  const normalized = token.trim().toLowerCase();
  if (normalized === "asc" || normalized === "desc") return normalized;
  throw new InvalidSortError(`Invalid sort direction: ${token}`, "sortDir");
}

/** Decides whether ordering is pushed down to a stored column or needs the rating aggregate. */
export function planSort(sortBy: string, sortDir: string): SortPlan {
  const direction = parseSortDirection(sortDir);
  const key = sortBy.trim();
  if (isRatingSortKey(key)) {
    return { kind: "rating", direction };
  }
  if (isSortableKey(key)) {
    return { kind: "pushdown", key, direction };
  }
  throw new InvalidSortError(`Invalid property: ${sortBy}`, "sortBy");
}

export function pageWindow(pageNumber: number, pageSize: number): PageWindow {
  return { limit: pageSize, offset: pageNumber * pageSize };
}

/**
 * Orders matching products by average rating and returns one page of them.
 * Ties keep ascending id order in every implementation.
 */
export interface RatingSortStrategy {
  readonly name: RatingSortStrategyName;
  page(storage: IStorage, where: Predicate, direction: SortDirection, window: PageWindow): Promise<ProductRow[]>;
}

/** GROUP BY product, ORDER BY AVG(rating) in the store. */
export const aggregateRatingSort: RatingSortStrategy = {
  name: "aggregate",
  async page(storage, where, direction, window) {
    const ids = await storage.findProductIdsByAverageRating(where, direction, window);
    const rows = await storage.findProductsByIds(ids);
    const byId = new Map(rows.map((row) => [row.product.id, row]));
    return ids.flatMap((id) => {
      const row = byId.get(id);
      return row ? [row] : [];
    });
  },
};

/** Pulls every matching row, averages ratings in process, sorts stably and slices. */
export const inMemoryRatingSort: RatingSortStrategy = {
  name: "in-memory",
  async page(storage, where, direction, window) {
    const rows = await storage.findProducts(where, { key: "id", direction: "asc" });
    const ids = rows.map((row) => row.product.id);
    const averages = averageRatingsFor(ids, await storage.findRatingValues(ids));
    const sign = direction === "asc" ? 1 : -1;
    const sorted = [...rows].sort(
      (a, b) => sign * ((averages.get(a.product.id) ?? 0) - (averages.get(b.product.id) ?? 0)),
    );
    return sorted.slice(window.offset, window.offset + window.limit);
  },
};

export function ratingSortStrategy(name: RatingSortStrategyName): RatingSortStrategy {
  return name === "in-memory" ? inMemoryRatingSort : aggregateRatingSort;
}
