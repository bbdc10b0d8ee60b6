import { readFile } from "node:fs/promises";
import { loadConfig } from "./config";
import { createDatabase } from "./db";
import { catalogSeedSchema, seedCatalog } from "./catalogSeed";
import { componentLogger, logger, setLogLevel } from "./logger";

async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  const log = componentLogger("seed");
  const file = process.argv[2] ?? new URL("../data/catalog-seed.json", import.meta.url);
  const seed = catalogSeedSchema.parse(JSON.parse(await readFile(file, "utf8")));

  const { pool, db } = createDatabase(config.databaseUrl);
  try {
    const summary = await seedCatalog(db, seed);
    log.info(summary, "catalog seeded");
  } finally {
    await pool.end();
  }
}

main().catch((error: unknown) => {
  logger.error({ err: error, component: "seed" }, "catalog seeding failed");
  process.exitCode = 1;
});
