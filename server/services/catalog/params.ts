import type { ZodError } from "zod";
import {
  productFilterSchema,
  productIdSchema,
  productQuerySchema,
  type ProductFilter,
  type SortDirection,
} from "@shared/schema";
import {
  CatalogError,
  InvalidFilterPropertyError,
  InvalidPaginationError,
  InvalidSortError,
} from "../../errors";

export interface PaginationLimits {
  defaultPageSize: number;
  maxPageSize: number;
}

export type ProductCriteria = ProductFilter & {
  pageNumber: number;
  pageSize: number;
  sortDir: SortDirection;
  sortBy: string;
};

function toCatalogError(error: ZodError): CatalogError {
  const issue = error.issues[0];
  const parameter = issue ? String(issue.path[0] ?? "query") : "query";
  const message = `Invalid value for ${parameter}: ${issue?.message ?? "unreadable"}`;
  switch (parameter) {
    case "pageNumber":
    case "pageSize":
      return new InvalidPaginationError(message, parameter);
    case "sortBy":
    case "sortDir":
      return new InvalidSortError(message, parameter);
    default:
      return new InvalidFilterPropertyError(message, parameter);
  }
}

export function parseProductQuery(raw: unknown, limits: PaginationLimits): ProductCriteria {
  const parsed = productQuerySchema.safeParse(raw);
  if (!parsed.success) {
    throw toCatalogError(parsed.error);
  }

  const pageSize = parsed.data.pageSize ?? limits.defaultPageSize;
  if (pageSize > limits.maxPageSize) {
    throw new InvalidPaginationError(
      `Page size ${pageSize} exceeds the maximum of ${limits.maxPageSize}`,
      "pageSize",
    );
  }

  return { ...parsed.data, pageSize };
}

export function parseFilterQuery(raw: unknown): ProductFilter {
  const parsed = productFilterSchema.safeParse(raw);
  if (!parsed.success) {
    throw toCatalogError(parsed.error);
  }
  return parsed.data;
}

export function parseProductId(raw: unknown): number {
  const parsed = productIdSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidFilterPropertyError(`Invalid product id: ${String(raw)}`, "id");
  }
  return parsed.data;
}

/** Rejects any parameter name outside the endpoint's declared set. */
export function assertAllowedParameters(names: Iterable<string>, allowed: ReadonlySet<string>): void {
  for (const name of names) {
    if (!allowed.has(name)) {
      throw new InvalidFilterPropertyError(`Unexpected parameter: ${name}`, name);
    }
  }
}
