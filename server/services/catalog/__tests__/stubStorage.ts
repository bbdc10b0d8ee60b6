import type { IStorage, PriceAggregate, ProductRow } from "../../../storage";
import type { RatingValue } from "../rating";

export function productRow(id: number, price = "100.00", categoryName = "Cellular"): ProductRow {
  const timestamp = new Date("2024-01-01T00:00:00.000Z");
  return {
    product: {
      id,
      name: `Product ${id}`,
      brand: "Acme",
      price,
      image: null,
      description: null,
      memory: null,
      screenSize: null,
      batteryCapacity: null,
      operatingSystem: null,
      color: null,
      categoryId: 1,
      createdAt: timestamp,
      updatedAt: timestamp,
    },
    categoryName,
  };
}

export interface StubData {
  rows?: ProductRow[];
  ratings?: RatingValue[];
  bounds?: PriceAggregate;
}

/** In-memory IStorage that ignores predicates; it serves the rows it is given in id order. */
export function stubStorage({ rows = [], ratings = [], bounds = { min: null, max: null } }: StubData): IStorage {
  const byId = [...rows].sort((a, b) => a.product.id - b.product.id);
  return {
    countProducts: async () => byId.length,
    findPriceBounds: async () => bounds,
    findProducts: async (_where, _order, window) =>
      window ? byId.slice(window.offset, window.offset + window.limit) : byId,
    findProductIdsByAverageRating: async () => byId.map((row) => row.product.id),
    findProductsByIds: async (ids) => byId.filter((row) => ids.includes(row.product.id)),
    findProductById: async (id) => byId.find((row) => row.product.id === id),
    findRatingValues: async (ids) => ratings.filter((row) => ids.includes(row.productId)),
  };
}
