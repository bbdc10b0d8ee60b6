import { sql } from "drizzle-orm";
import {
  pgTable,
  text,
  serial,
  integer,
  decimal,
  timestamp,
  index,
  unique,
  uniqueIndex,
} from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

export const users = pgTable("users", {
  id: serial("id").primaryKey(),
  username: text("username").notNull().unique(),
});

export const categories = pgTable(
  "categories",
  {
    id: serial("id").primaryKey(),
    name: text("name").notNull(),
  },
  (table) => ({
    nameIdx: uniqueIndex("categories_name_lower_idx").on(sql`lower(${table.name})`),
  }),
);

export const products = pgTable(
  "products",
  {
    id: serial("id").primaryKey(),
    name: text("name").notNull(),
    brand: text("brand").notNull(),
    price: decimal("price", { precision: 10, scale: 2 }).notNull(),
    image: text("image"),
    description: text("description"),
    memory: text("memory"),
    screenSize: text("screen_size"),
    batteryCapacity: text("battery_capacity"),
    operatingSystem: text("operating_system"),
    color: text("color"),
    categoryId: integer("category_id")
      .notNull()
      .references(() => categories.id),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    brandIdx: index("idx_product_brand").on(table.brand),
    priceIdx: index("idx_product_price").on(table.price),
    colorIdx: index("idx_product_color").on(table.color),
    memoryIdx: index("idx_product_memory").on(table.memory),
    screenSizeIdx: index("idx_product_screen_size").on(table.screenSize),
    batteryCapacityIdx: index("idx_product_battery_capacity").on(table.batteryCapacity),
    operatingSystemIdx: index("idx_product_operating_system").on(table.operatingSystem),
  }),
);

export const ratings = pgTable(
  "ratings",
  {
    id: serial("id").primaryKey(),
    rating: integer("rating").notNull(),
    productId: integer("product_id")
      .notNull()
      .references(() => products.id, { onDelete: "cascade" }),
    userId: integer("user_id")
      .notNull()
      .references(() => users.id),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    onePerUser: unique("ratings_product_user_unique").on(table.productId, table.userId),
  }),
);

export const insertUserSchema = createInsertSchema(users).pick({
  username: true,
});

export const insertCategorySchema = createInsertSchema(categories)
  .pick({ name: true })
  .extend({ name: z.string().trim().min(1) });

export const insertProductSchema = createInsertSchema(products)
  .pick({
    name: true,
    brand: true,
    price: true,
    image: true,
    description: true,
    memory: true,
    screenSize: true,
    batteryCapacity: true,
    operatingSystem: true,
    color: true,
    categoryId: true,
  })
  .extend({
    price: z.string().regex(/^\d+(\.\d{1,2})?$/, "price must be a non-negative decimal"),
  });

export const insertRatingSchema = createInsertSchema(ratings)
  .pick({
    rating: true,
    productId: true,
    userId: true,
  })
  .extend({
    rating: z.number().int().min(1).max(5),
  });

// Query parameters arrive as strings, repeated keys as arrays.
const listParam = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform((value) => {
    if (value === undefined) return undefined;
    const tokens = (Array.isArray(value) ? value : [value]).flatMap((v) => v.split(","));
    return tokens;
  });

const optionalNumber = z.preprocess(
  (value) => (value === "" || value === undefined ? undefined : value),
  z.coerce.number().finite().optional(),
);

// Paging values must be digit strings; a blank value is an error, not the default.
const digits = z
  .string()
  .trim()
  .regex(/^\d+$/, "Expected a non-negative integer")
  .transform(Number);

export const productFilterSchema = z
  .object({
    name: z.string().optional(),
    brand: listParam,
    minPrice: optionalNumber,
    maxPrice: optionalNumber,
    color: listParam,
    memory: listParam,
    screenSize: listParam,
    batteryCapacity: listParam,
    operatingSystem: listParam,
    category: listParam,
  })
  .refine(
    (filters) =>
      filters.minPrice === undefined ||
      filters.maxPrice === undefined ||
      filters.minPrice <= filters.maxPrice,
    { message: "minPrice must not exceed maxPrice", path: ["minPrice"] },
  );

export const productQuerySchema = z.intersection(
  productFilterSchema,
  z.object({
    pageNumber: digits.default("0"),
    pageSize: digits.pipe(z.number().int().min(1)).optional(),
    sortDir: z
      .string()
      .default("asc")
      .transform((dir) => dir.trim().toLowerCase())
      .pipe(z.enum(["asc", "desc"])),
    sortBy: z.string().trim().min(1).default("id"),
  }),
);

export const productIdSchema = z.coerce.number().int().positive();

export const PRODUCT_FILTER_PARAMETERS = [
  "name",
  "brand",
  "minPrice",
  "maxPrice",
  "color",
  "memory",
  "screenSize",
  "batteryCapacity",
  "operatingSystem",
  "category",
] as const;

export const PRODUCT_QUERY_PARAMETERS = [
  ...PRODUCT_FILTER_PARAMETERS,
  "pageNumber",
  "pageSize",
  "sortDir",
  "sortBy",
] as const;

export type InsertUser = z.infer<typeof insertUserSchema>;
export type User = typeof users.$inferSelect;
export type Category = typeof categories.$inferSelect;
export type InsertCategory = z.infer<typeof insertCategorySchema>;
export type Product = typeof products.$inferSelect;
export type InsertProduct = z.infer<typeof insertProductSchema>;
export type Rating = typeof ratings.$inferSelect;
export type InsertRating = z.infer<typeof insertRatingSchema>;
export type ProductFilter = z.infer<typeof productFilterSchema>;
export type ProductQuery = z.infer<typeof productQuerySchema>;
export type SortDirection = ProductQuery["sortDir"];

export interface PriceRange {
  min: number;
  max: number;
}

export interface ProductResponse {
  id: number;
  name: string;
  brand: string;
  price: number;
  description: string | null;
  image: string | null;
  category: string;
  memory: string | null;
  screenSize: string | null;
  batteryCapacity: string | null;
  operatingSystem: string | null;
  color: string | null;
  averageRating: number;
  createdAt: string;
  updatedAt: string;
}

export interface ProductPage {
  totalProducts: number;
  pageNumber: number;
  pageSize: number;
  totalPages: number;
  isFirst: boolean;
  isLast: boolean;
  priceRange: PriceRange;
  products: ProductResponse[];
}

export interface ProductFilterOptions {
  brands: string[];
  priceRange: PriceRange;
  colors: string[];
  memories: string[];
  screenSizes: string[];
  batteryCapacities: string[];
  operatingSystems: string[];
  categories: string[];
}
