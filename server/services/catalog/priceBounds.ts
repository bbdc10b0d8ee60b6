import { between, sql } from "drizzle-orm";
import { products, type PriceRange } from "@shared/schema";
import type { IStorage } from "../../storage";
import { NoMatchingRecordsError } from "../../errors";
import type { Predicate } from "./predicates";

export interface RequestedPriceRange {
  min?: number;
  max?: number;
}

export interface ResolvedPriceBounds {
  /** Bounds reported to the caller; always inside the observed range. */
  range: PriceRange;
  /** Observed min/max among rows matching every non-price filter. */
  observed: PriceRange;
  predicate: Predicate;
}

/**
 * Clamps a requested window into the observed [min, max] of the non-price
 * filtered set. A window that misses the observed range entirely yields a
 * predicate matching nothing, and the observed range is reported instead.
 */
export function clampPriceRange(requested: RequestedPriceRange, observed: PriceRange): PriceRange | null {
  const min = requested.min === undefined || requested.min < observed.min ? observed.min : requested.min;
  const max = requested.max === undefined || requested.max > observed.max ? observed.max : requested.max;
  return min <= max ? { min, max } : null;
}

export async function resolvePriceBounds(
  storage: IStorage,
  basePredicate: Predicate,
  requested: RequestedPriceRange,
): Promise<ResolvedPriceBounds> {
  const aggregate = await storage.findPriceBounds(basePredicate);
  if (aggregate.min === null || aggregate.max === null) {
    throw new NoMatchingRecordsError();
  }

  const observed = { min: Number(aggregate.min), max: Number(aggregate.max) };
  const effective = clampPriceRange(requested, observed);
  if (!effective) {
    return { range: observed, observed, predicate: sql`false` };
  }

  return {
    range: effective,
    observed,
    predicate: between(products.price, String(effective.min), String(effective.max)),
  };
}
