import { createServer } from "node:http";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { createDatabase } from "./db";
import { logger, setLogLevel } from "./logger";
import { ProductService } from "./services/productService";
import { ratingSortStrategy } from "./services/catalog/sortPlanner";
import { DatabaseStorage } from "./storage";

const config = loadConfig();
setLogLevel(config.logLevel);
const { pool, db } = createDatabase(config.databaseUrl);

const productService = new ProductService(new DatabaseStorage(db), {
  ratingSort: ratingSortStrategy(config.ratingSortStrategy),
});

const app = createApp({ productService, pagination: config.pagination });
const server = createServer(app);

server.listen(config.port, "0.0.0.0", () => {
  logger.info(
    { port: config.port, env: config.env, ratingSort: config.ratingSortStrategy },
    "catalog service listening",
  );
});

function shutdown(signal: NodeJS.Signals) {
  logger.info({ signal }, "shutting down");
  server.close(() => {
    pool
      .end()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ err: error }, "failed to close database pool");
        process.exit(1);
      });
  });
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
