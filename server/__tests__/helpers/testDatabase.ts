import { readFile } from "node:fs/promises";
import { PGlite } from "@electric-sql/pglite";
import { drizzle } from "drizzle-orm/pglite";
import * as schema from "@shared/schema";
import type { CatalogDatabase } from "../../db";
import { seedCatalog, type CatalogSeed } from "../../catalogSeed";

export interface TestDatabase {
  db: CatalogDatabase;
  close: () => Promise<void>;
}

const migration = new URL("../../../migrations/0000_catalog.sql", import.meta.url);

/** A throwaway in-process Postgres with the catalog schema applied. */
export async function createTestDatabase(seed?: CatalogSeed): Promise<TestDatabase> {
  const client = new PGlite();
  await client.exec(await readFile(migration, "utf8"));
  const db = drizzle(client, { schema });
  if (seed) {
    await seedCatalog(db, seed);
  }
  return { db, close: () => client.close() };
}
