import type { CatalogSeed } from "../../catalogSeed";
import type { ProductCriteria } from "../../services/catalog/params";

/**
 * Five products; ids follow insertion order.
 *
 *  id | name         | brand     | price   | category | ratings | avg
 *   1 | Alpha Phone  | Apple     |  100.00 | Cellular | 5       | 5
 *   2 | Beta Phone   | Samsung   |  250.00 | Cellular | 3       | 3
 *   3 | Gamma Laptop | Apple     |  900.00 | Laptop   | 5       | 5
 *   4 | Delta TV     | LG        | 1500.00 | TV       | -       | 0
 *   5 | Zeta Phone   | "samsung "|  400.00 | Cellular | 4, 2    | 3
 */
export const testCatalog: CatalogSeed = {
  categories: ["Cellular", "Laptop", "TV"],
  users: ["user-one", "user-two", "user-three"],
  products: [
    {
      name: "Alpha Phone",
      brand: "Apple",
      price: "100.00",
      memory: "128GB",
      screenSize: "6.1\"",
      batteryCapacity: "3000mAh",
      operatingSystem: "iOS",
      color: "Black",
      category: "Cellular",
      ratings: [{ user: "user-one", rating: 5 }],
    },
    {
      name: "Beta Phone",
      brand: "Samsung",
      price: "250.00",
      memory: "256GB",
      screenSize: "6.4\"",
      batteryCapacity: "4500mAh",
      operatingSystem: "Android",
      color: "White",
      category: "Cellular",
      ratings: [{ user: "user-one", rating: 3 }],
    },
    {
      name: "Gamma Laptop",
      brand: "Apple",
      price: "900.00",
      memory: "16GB",
      screenSize: "14\"",
      batteryCapacity: "60Wh",
      operatingSystem: "macOS",
      color: "Silver",
      category: "Laptop",
      ratings: [{ user: "user-two", rating: 5 }],
    },
    {
      name: "Delta TV",
      brand: "LG",
      price: "1500.00",
      screenSize: "55\"",
      operatingSystem: "webOS",
      color: "Black",
      category: "TV",
    },
    {
      name: "Zeta Phone",
      brand: "samsung ",
      price: "400.00",
      memory: "128GB",
      screenSize: "6.1\"",
      batteryCapacity: "4000mAh",
      operatingSystem: "Android",
      color: "black",
      category: "Cellular",
      ratings: [
        { user: "user-one", rating: 4 },
        { user: "user-two", rating: 2 },
      ],
    },
  ],
};

/** Three products priced 100, 250 and 900; the first two are phones. */
export const threePriceCatalog: CatalogSeed = {
  categories: ["Cellular", "Laptop"],
  products: [
    { name: "Budget Phone", brand: "Orbit", price: "100.00", category: "Cellular" },
    { name: "Mid Phone", brand: "Orbit", price: "250.00", category: "Cellular" },
    { name: "Work Laptop", brand: "Lumen", price: "900.00", category: "Laptop" },
  ],
};

export function criteria(overrides: Partial<ProductCriteria> = {}): ProductCriteria {
  return { pageNumber: 0, pageSize: 12, sortDir: "asc", sortBy: "id", ...overrides };
}
