import { z } from "zod";
import {
  categories,
  insertCategorySchema,
  insertProductSchema,
  insertRatingSchema,
  insertUserSchema,
  products,
  ratings,
  users,
} from "@shared/schema";
import type { CatalogDatabase } from "./db";

export const catalogSeedSchema = z.object({
  categories: z.array(insertCategorySchema.shape.name),
  users: z.array(insertUserSchema.shape.username).default([]),
  products: z.array(
    insertProductSchema.omit({ categoryId: true }).extend({
      category: z.string().trim().min(1),
      ratings: z
        .array(z.object({ user: z.string(), rating: insertRatingSchema.shape.rating }))
        .default([]),
    }),
  ),
});

export type CatalogSeed = z.input<typeof catalogSeedSchema>;

export interface SeedSummary {
  categories: number;
  users: number;
  products: number;
  ratings: number;
}

/**
 * Inserts a catalog snapshot in one transaction. Products are inserted in the
 * order given, so a fresh database assigns ids 1..n in that order.
 */
export async function seedCatalog(db: CatalogDatabase, input: CatalogSeed): Promise<SeedSummary> {
  const seed = catalogSeedSchema.parse(input);

  return db.transaction(async (tx) => {
    const categoryRows =
      seed.categories.length > 0
        ? await tx
            .insert(categories)
            .values(seed.categories.map((name) => ({ name })))
            .returning()
        : [];
    const categoryIds = new Map(categoryRows.map((row) => [row.name.toLowerCase(), row.id]));

    const userRows =
      seed.users.length > 0
        ? await tx
            .insert(users)
            .values(seed.users.map((username) => ({ username })))
            .returning()
        : [];
    const userIds = new Map(userRows.map((row) => [row.username, row.id]));

    let ratingCount = 0;
    for (const { category, ratings: productRatings, ...attributes } of seed.products) {
      const categoryId = categoryIds.get(category.toLowerCase());
      if (categoryId === undefined) {
        throw new Error(`Product "${attributes.name}" references unknown category "${category}"`);
      }

      const [created] = await tx
        .insert(products)
        .values({ ...attributes, categoryId })
        .returning({ id: products.id });

      const values = productRatings.map(({ user, rating }) => {
        const userId = userIds.get(user);
        if (userId === undefined) {
          throw new Error(`Rating for "${attributes.name}" references unknown user "${user}"`);
        }
        return insertRatingSchema.parse({ rating, productId: created.id, userId });
      });
      if (values.length > 0) {
        await tx.insert(ratings).values(values);
        ratingCount += values.length;
      }
    }

    return {
      categories: categoryRows.length,
      users: userRows.length,
      products: seed.products.length,
      ratings: ratingCount,
    };
  });
}
