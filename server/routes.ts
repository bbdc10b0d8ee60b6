import type { Express } from "express";
import { PRODUCT_FILTER_PARAMETERS, PRODUCT_QUERY_PARAMETERS } from "@shared/schema";
import type { ProductService } from "./services/productService";
import { allowParameters } from "./middleware/allowedParameters";
import {
  parseFilterQuery,
  parseProductId,
  parseProductQuery,
  type PaginationLimits,
} from "./services/catalog/params";

export function registerRoutes(app: Express, productService: ProductService, limits: PaginationLimits): void {
  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  // Filtered, sorted, paginated product listing
  app.get("/api/products", allowParameters(PRODUCT_QUERY_PARAMETERS), async (req, res, next) => {
    res.locals.operation = "findProducts";
    try {
      const criteria = parseProductQuery(req.query, limits);
      const page = await productService.getProducts(criteria);
      res.json(page);
    } catch (error) {
      next(error);
    }
  });

  // Distinct attribute values and price bounds for the current filter set
  app.get("/api/filters/products", allowParameters(PRODUCT_FILTER_PARAMETERS), async (req, res, next) => {
    res.locals.operation = "getFilterOptions";
    try {
      const filter = parseFilterQuery(req.query);
      const options = await productService.getFilterOptions(filter);
      res.json(options);
    } catch (error) {
      next(error);
    }
  });

  app.get("/api/products/:id", allowParameters([]), async (req, res, next) => {
    res.locals.operation = "getProductById";
    try {
      const product = await productService.getProduct(parseProductId(req.params.id));
      res.json(product);
    } catch (error) {
      next(error);
    }
  });
}
