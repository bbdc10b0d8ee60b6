import type { PriceRange, ProductFilterOptions, ProductPage, ProductResponse } from "@shared/schema";
import type { ProductRow } from "../../storage";

export function toProductResponse({ product, categoryName }: ProductRow, averageRating: number): ProductResponse {
  return {
    id: product.id,
    name: product.name,
    brand: product.brand,
    price: Number(product.price),
    description: product.description,
    image: product.image,
    category: categoryName,
    memory: product.memory,
    screenSize: product.screenSize,
    batteryCapacity: product.batteryCapacity,
    operatingSystem: product.operatingSystem,
    color: product.color,
    averageRating,
    createdAt: product.createdAt.toISOString(),
    updatedAt: product.updatedAt.toISOString(),
  };
}

export function totalPagesFor(totalProducts: number, pageSize: number): number {
  return Math.ceil(totalProducts / pageSize);
}

export interface PageInput {
  rows: readonly ProductRow[];
  averages: ReadonlyMap<number, number>;
  totalProducts: number;
  pageNumber: number;
  pageSize: number;
  priceRange: PriceRange;
}

export function assemblePage(input: PageInput): ProductPage {
  const totalPages = totalPagesFor(input.totalProducts, input.pageSize);
  return {
    totalProducts: input.totalProducts,
    pageNumber: input.pageNumber,
    pageSize: input.pageSize,
    totalPages,
    isFirst: input.pageNumber === 0,
    isLast: input.pageNumber === totalPages - 1,
    priceRange: input.priceRange,
    products: input.rows.map((row) => toProductResponse(row, input.averages.get(row.product.id) ?? 0)),
  };
}

function distinct(values: ReadonlyArray<string | null>): string[] {
  const seen = new Set<string>();
  for (const value of values) {
    if (value !== null) seen.add(value);
  }
  return Array.from(seen);
}

/** Distinct non-null attribute values, in order of first appearance. */
export function assembleFilterOptions(rows: readonly ProductRow[], priceRange: PriceRange): ProductFilterOptions {
  const list = rows.map((row) => row.product);
  return {
    brands: distinct(list.map((p) => p.brand)),
    priceRange,
    colors: distinct(list.map((p) => p.color)),
    memories: distinct(list.map((p) => p.memory)),
    screenSizes: distinct(list.map((p) => p.screenSize)),
    batteryCapacities: distinct(list.map((p) => p.batteryCapacity)),
    operatingSystems: distinct(list.map((p) => p.operatingSystem)),
    categories: distinct(rows.map((row) => row.categoryName)),
  };
}
