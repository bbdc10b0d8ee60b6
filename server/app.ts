import express, { type Express } from "express";
import type { Logger } from "pino";
import { logger as rootLogger } from "./logger";
import { errorHandler } from "./middleware/errorHandler";
import { requestLogger } from "./middleware/requestLogger";
import { registerRoutes } from "./routes";
import type { PaginationLimits } from "./services/catalog/params";
import type { ProductService } from "./services/productService";

export interface AppOptions {
  productService: ProductService;
  pagination: PaginationLimits;
  logger?: Logger;
}

export function createApp({ productService, pagination, logger = rootLogger }: AppOptions): Express {
  const app = express();
  app.disable("x-powered-by");
  app.use(requestLogger(logger));
  app.use(express.json());

  registerRoutes(app, productService, pagination);

  app.use((req, res) => {
    res.status(404).json({
      status: 404,
      code: "NOT_FOUND",
      message: `No route for ${req.method} ${req.path}`,
      method: req.method,
      path: req.path,
      timestamp: new Date().toISOString(),
    });
  });
  app.use(errorHandler);

  return app;
}
