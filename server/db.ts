import pg from "pg";
import { drizzle } from "drizzle-orm/node-postgres";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import * as schema from "@shared/schema";

/** Any drizzle Postgres database over the catalog schema, whatever the driver. */
export type CatalogDatabase = PgDatabase<PgQueryResultHKT, typeof schema>;

export function createDatabase(databaseUrl: string | undefined) {
  if (!databaseUrl) {
    throw new Error("DATABASE_URL must be set. Did you forget to provision a database?");
  }
  const pool = new pg.Pool({ connectionString: databaseUrl });
  const db = drizzle(pool, { schema });
  return { pool, db };
}
