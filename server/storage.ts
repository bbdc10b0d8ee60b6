import { asc, count, desc, eq, inArray, max, min, sql } from "drizzle-orm";
import { categories, products, ratings, type Product, type SortDirection } from "@shared/schema";
import type { CatalogDatabase } from "./db";
import { translateStoreError } from "./errors";
import { SORTABLE_COLUMNS, type SortableKey } from "./services/catalog/columns";
import type { Predicate } from "./services/catalog/predicates";
import type { RatingValue } from "./services/catalog/rating";

export interface ProductRow {
  product: Product;
  categoryName: string;
}

export interface PageWindow {
  limit: number;
  offset: number;
}

export interface ColumnOrder {
  key: SortableKey;
  direction: SortDirection;
}

export interface PriceAggregate {
  min: string | null;
  max: string | null;
}

/**
 * Read access to the catalog. Every product query joins the product's category,
 * so predicates may reference `categories` columns.
 */
export interface IStorage {
  countProducts(where: Predicate): Promise<number>;
  findPriceBounds(where: Predicate): Promise<PriceAggregate>;
  findProducts(where: Predicate, order: ColumnOrder, window?: PageWindow): Promise<ProductRow[]>;
  findProductIdsByAverageRating(
    where: Predicate,
    direction: SortDirection,
    window: PageWindow,
  ): Promise<number[]>;
  findProductsByIds(ids: readonly number[]): Promise<ProductRow[]>;
  findProductById(id: number): Promise<ProductRow | undefined>;
  findRatingValues(productIds: readonly number[]): Promise<RatingValue[]>;
}

const orderBy = (direction: SortDirection) => (direction === "asc" ? asc : desc);

// Postgres caps a statement at 65535 bind parameters.
const DEFAULT_ID_BATCH_SIZE = 10_000;

export interface DatabaseStorageOptions {
  /** Largest id list bound into a single `IN (...)`. */
  idBatchSize?: number;
}

function batches<T>(items: readonly T[], size: number): T[][] {
  const result: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    result.push(items.slice(start, start + size));
  }
  return result;
}

export class DatabaseStorage implements IStorage {
  private readonly idBatchSize: number;

  constructor(
    private readonly db: CatalogDatabase,
    options: DatabaseStorageOptions = {},
  ) {
    this.idBatchSize = Math.max(1, options.idBatchSize ?? DEFAULT_ID_BATCH_SIZE);
  }

  private async run<T>(query: () => Promise<T>): Promise<T> {
    try {
      return await query();
    } catch (error) {
      throw translateStoreError(error);
    }
  }

  private selectRows() {
    return this.db
      .select({ product: products, categoryName: categories.name })
      .from(products)
      .innerJoin(categories, eq(products.categoryId, categories.id));
  }

  async countProducts(where: Predicate): Promise<number> {
    const [row] = await this.run(() =>
      this.db
        .select({ total: count() })
        .from(products)
        .innerJoin(categories, eq(products.categoryId, categories.id))
        .where(where),
    );
    return row?.total ?? 0;
  }

  async findPriceBounds(where: Predicate): Promise<PriceAggregate> {
    const [row] = await this.run(() =>
      this.db
        .select({ min: min(products.price), max: max(products.price) })
        .from(products)
        .innerJoin(categories, eq(products.categoryId, categories.id))
        .where(where),
    );
    return { min: row?.min ?? null, max: row?.max ?? null };
  }

  async findProducts(where: Predicate, order: ColumnOrder, window?: PageWindow): Promise<ProductRow[]> {
    const direction = orderBy(order.direction);
    let query = this.selectRows()
      .where(where)
      .orderBy(direction(SORTABLE_COLUMNS[order.key]), direction(products.id))
      .$dynamic();
    if (window) {
      query = query.limit(window.limit).offset(window.offset);
    }
    return this.run(() => query);
  }

  async findProductIdsByAverageRating(
    where: Predicate,
    direction: SortDirection,
    window: PageWindow,
  ): Promise<number[]> {
    const average = sql<number>`coalesce(avg(${ratings.rating}), 0)`;
    const rows = await this.run(() =>
      this.db
        .select({ id: products.id })
        .from(products)
        .innerJoin(categories, eq(products.categoryId, categories.id))
        .leftJoin(ratings, eq(ratings.productId, products.id))
        .where(where)
        .groupBy(products.id)
        .orderBy(orderBy(direction)(average), asc(products.id))
        .limit(window.limit)
        .offset(window.offset),
    );
    return rows.map((row) => row.id);
  }

  async findProductsByIds(ids: readonly number[]): Promise<ProductRow[]> {
    if (ids.length === 0) return [];
    return this.run(() =>
      this.selectRows()
        .where(inArray(products.id, [...ids]))
        .orderBy(asc(products.id)),
    );
  }

  async findProductById(id: number): Promise<ProductRow | undefined> {
    const [row] = await this.run(() => this.selectRows().where(eq(products.id, id)).limit(1));
    return row;
  }

  async findRatingValues(productIds: readonly number[]): Promise<RatingValue[]> {
    let values: RatingValue[] = [];
    for (const batch of batches(productIds, this.idBatchSize)) {
      const rows = await this.run(() =>
        this.db
          .select({ productId: ratings.productId, rating: ratings.rating })
          .from(ratings)
          .where(inArray(ratings.productId, batch))
          .orderBy(asc(ratings.id)),
      );
      values = values.concat(rows);
    }
    return values;
  }
}
