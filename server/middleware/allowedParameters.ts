import type { RequestHandler } from "express";
import { assertAllowedParameters } from "../services/catalog/params";

/** Per-endpoint allow-list for query parameter names, checked before the handler runs. */
export function allowParameters(names: readonly string[]): RequestHandler {
  const allowed = new Set(names);
  return (req, _res, next) => {
    try {
      assertAllowedParameters(Object.keys(req.query), allowed);
      next();
    } catch (error) {
      next(error);
    }
  };
}
