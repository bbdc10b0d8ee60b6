import { describe, expect, it } from "vitest";
import { InvalidSortError } from "../../../errors";
import {
  aggregateRatingSort,
  inMemoryRatingSort,
  pageWindow,
  parseSortDirection,
  planSort,
  ratingSortStrategy,
} from "../sortPlanner";
import { productRow, stubStorage } from "./stubStorage";

describe("parseSortDirection", () => {
  it("accepts asc and desc in any case", () => {
    expect(parseSortDirection("ASC")).toBe("asc");
    expect(parseSortDirection(" Desc ")).toBe("desc");
  });

  it("rejects anything else", () => {
    expect(() => parseSortDirection("up")).toThrow(InvalidSortError);
  });
});

describe("planSort", () => {
  it("pushes stored columns down to the store", () => {
    expect(planSort("price", "desc")).toEqual({ kind: "pushdown", key: "price", direction: "desc" });
    expect(planSort("category", "asc")).toEqual({ kind: "pushdown", key: "category", direction: "asc" });
  });

  it("routes every rating alias to the rating plan", () => {
    expect(planSort("rating", "desc")).toEqual({ kind: "rating", direction: "desc" });
    expect(planSort("Ratings", "asc")).toEqual({ kind: "rating", direction: "asc" });
    expect(planSort("averageRating", "asc")).toEqual({ kind: "rating", direction: "asc" });
  });

  it("rejects unknown keys, including inherited object properties", () => {
    for (const key of ["weight", "__proto__", "toString"]) {
      try {
        planSort(key, "asc");
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidSortError);
        expect(error).toMatchObject({ parameter: "sortBy", message: `Invalid property: ${key}` });
      }
    }
  });

  it("reports a bad direction against sortDir", () => {
    expect(() => planSort("price", "sideways")).toThrow("Invalid sort direction: sideways");
  });
});

describe("pageWindow", () => {
  it("converts a zero-based page into limit and offset", () => {
    expect(pageWindow(0, 12)).toEqual({ limit: 12, offset: 0 });
    expect(pageWindow(2, 5)).toEqual({ limit: 5, offset: 10 });
  });
});

describe("inMemoryRatingSort", () => {
  const storage = stubStorage({
    rows: [productRow(1), productRow(2), productRow(3)],
    ratings: [
      { productId: 1, rating: 5 },
      { productId: 2, rating: 3 },
      { productId: 3, rating: 5 },
    ],
  });
  const everything = { limit: 10, offset: 0 };

  it("orders by average and keeps id order between ties", async () => {
    const desc = await inMemoryRatingSort.page(storage, undefined, "desc", everything);
    const asc = await inMemoryRatingSort.page(storage, undefined, "asc", everything);

    expect(desc.map((row) => row.product.id)).toEqual([1, 3, 2]);
    expect(asc.map((row) => row.product.id)).toEqual([2, 1, 3]);
  });

  it("slices the requested window after sorting", async () => {
    const page = await inMemoryRatingSort.page(storage, undefined, "desc", { limit: 1, offset: 1 });

    expect(page.map((row) => row.product.id)).toEqual([3]);
  });
});

describe("aggregateRatingSort", () => {
  it("returns rows in the order the store ranked their ids", async () => {
    const storage = stubStorage({ rows: [productRow(1), productRow(2), productRow(3)] });
    storage.findProductIdsByAverageRating = async () => [3, 1, 2];

    const page = await aggregateRatingSort.page(storage, undefined, "desc", { limit: 3, offset: 0 });

    expect(page.map((row) => row.product.id)).toEqual([3, 1, 2]);
  });
});

describe("ratingSortStrategy", () => {
  it("selects the strategy by configured name", () => {
    expect(ratingSortStrategy("aggregate")).toBe(aggregateRatingSort);
    expect(ratingSortStrategy("in-memory")).toBe(inMemoryRatingSort);
  });
});
