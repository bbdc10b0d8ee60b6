import type { Logger } from "pino";
import type { ProductFilter, ProductFilterOptions, ProductPage, ProductResponse } from "@shared/schema";
import type { IStorage, ProductRow } from "../storage";
import { InvalidPaginationError, ResourceNotFoundError } from "../errors";
import { componentLogger } from "../logger";
import { assembleFilterOptions, assemblePage, toProductResponse, totalPagesFor } from "./catalog/assembler";
import type { ProductCriteria } from "./catalog/params";
import { composePredicates, filterPredicates, type Predicate } from "./catalog/predicates";
import { resolvePriceBounds } from "./catalog/priceBounds";
import { averageRating, averageRatingsFor, groupRatingsByProduct } from "./catalog/rating";
import {
  aggregateRatingSort,
  pageWindow,
  planSort,
  type RatingSortStrategy,
} from "./catalog/sortPlanner";

export interface ProductServiceOptions {
  ratingSort?: RatingSortStrategy;
  logger?: Logger;
}

export class ProductService {
  private readonly ratingSort: RatingSortStrategy;
  private readonly log: Logger;

  constructor(
    private readonly storage: IStorage,
    options: ProductServiceOptions = {},
  ) {
    this.ratingSort = options.ratingSort ?? aggregateRatingSort;
    this.log = options.logger ?? componentLogger("product-service");
  }

  async getProducts(criteria: ProductCriteria): Promise<ProductPage> {
    const plan = planSort(criteria.sortBy, criteria.sortDir);
    const { pageNumber, pageSize } = criteria;

    const base = composePredicates(filterPredicates(criteria));
    const bounds = await resolvePriceBounds(this.storage, base, {
      min: criteria.minPrice,
      max: criteria.maxPrice,
    });
    const where = composePredicates([base, bounds.predicate]);

    const totalProducts = await this.storage.countProducts(where);
    const totalPages = totalPagesFor(totalProducts, pageSize);
    if (pageNumber > 0 && pageNumber >= totalPages) {
      throw new InvalidPaginationError(
        `Page Number ${pageNumber} Exceeds totalPages ${totalPages}`,
        "pageNumber",
      );
    }

    const window = pageWindow(pageNumber, pageSize);
    this.log.debug(
      { plan, strategy: plan.kind === "rating" ? this.ratingSort.name : undefined, window, totalProducts },
      "planned product query",
    );

    const rows =
      plan.kind === "pushdown"
        ? await this.storage.findProducts(where, { key: plan.key, direction: plan.direction }, window)
        : await this.ratingSort.page(this.storage, where, plan.direction, window);

    return assemblePage({
      rows,
      averages: await this.averagesFor(rows),
      totalProducts,
      pageNumber,
      pageSize,
      priceRange: bounds.range,
    });
  }

  async getProduct(id: number): Promise<ProductResponse> {
    const row = await this.storage.findProductById(id);
    if (!row) {
      throw new ResourceNotFoundError("Product", "id", id);
    }
    const grouped = groupRatingsByProduct(await this.storage.findRatingValues([id]));
    return toProductResponse(row, averageRating(grouped.get(id) ?? []));
  }

  async getFilterOptions(filter: ProductFilter): Promise<ProductFilterOptions> {
    const base = composePredicates(filterPredicates(filter));
    const bounds = await resolvePriceBounds(this.storage, base, {
      min: filter.minPrice,
      max: filter.maxPrice,
    });
    const rows = await this.findAll(composePredicates([base, bounds.predicate]));
    return assembleFilterOptions(rows, bounds.range);
  }

  private findAll(where: Predicate): Promise<ProductRow[]> {
    return this.storage.findProducts(where, { key: "id", direction: "asc" });
  }

  private async averagesFor(rows: readonly ProductRow[]): Promise<Map<number, number>> {
    const ids = rows.map((row) => row.product.id);
    return averageRatingsFor(ids, await this.storage.findRatingValues(ids));
  }
}
