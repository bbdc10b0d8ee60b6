export interface RatingValue {
  productId: number;
  rating: number;
}

/** Mean of the rating values, exactly 0 for an unrated product. */
export function averageRating(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sum = values.reduce((total, value) => total + value, 0);
  return sum / values.length;
}

export function groupRatingsByProduct(rows: readonly RatingValue[]): Map<number, number[]> {
  const grouped = new Map<number, number[]>();
  for (const row of rows) {
    const bucket = grouped.get(row.productId);
    if (bucket) {
      bucket.push(row.rating);
    } else {
      grouped.set(row.productId, [row.rating]);
    }
  }
  return grouped;
}

/** Average rating per product id; ids with no ratings map to 0. */
export function averageRatingsFor(
  productIds: readonly number[],
  rows: readonly RatingValue[],
): Map<number, number> {
  const grouped = groupRatingsByProduct(rows);
  return new Map(productIds.map((id) => [id, averageRating(grouped.get(id) ?? [])]));
}
