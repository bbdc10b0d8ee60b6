import { describe, expect, it } from "vitest";
import { averageRating, averageRatingsFor, groupRatingsByProduct } from "../rating";

describe("averageRating", () => {
  it("is 0 for an unrated product", () => {
    expect(averageRating([])).toBe(0);
  });

  it("is the arithmetic mean of the values", () => {
    expect(averageRating([4, 2])).toBe(3);
    expect(averageRating([5, 4, 4])).toBeCloseTo(13 / 3);
  });
});

describe("groupRatingsByProduct", () => {
  it("collects values per product in row order", () => {
    const grouped = groupRatingsByProduct([
      { productId: 2, rating: 4 },
      { productId: 1, rating: 5 },
      { productId: 2, rating: 1 },
    ]);

    expect(grouped.get(1)).toEqual([5]);
    expect(grouped.get(2)).toEqual([4, 1]);
  });
});

describe("averageRatingsFor", () => {
  it("maps every requested id, defaulting unrated ones to 0", () => {
    const averages = averageRatingsFor([1, 2, 3], [
      { productId: 1, rating: 5 },
      { productId: 1, rating: 3 },
      { productId: 3, rating: 2 },
    ]);

    expect(Array.from(averages.entries())).toEqual([
      [1, 4],
      [2, 0],
      [3, 2],
    ]);
  });

  it("ignores rows for products outside the requested ids", () => {
    const averages = averageRatingsFor([7], [{ productId: 8, rating: 5 }]);

    expect(averages.get(7)).toBe(0);
    expect(averages.has(8)).toBe(false);
  });
});
