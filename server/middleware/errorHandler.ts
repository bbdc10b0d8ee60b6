import type { ErrorRequestHandler } from "express";
import { CatalogError } from "../errors";

export const errorHandler: ErrorRequestHandler = (err, req, res, _next) => {
  const timestamp = new Date().toISOString();

  if (err instanceof CatalogError) {
    res.status(err.status).json({
      status: err.status,
      code: err.code,
      message: err.message,
      parameter: err.parameter,
      method: req.method,
      path: req.path,
      timestamp,
    });
    return;
  }

  const operation: unknown = res.locals.operation;
  req.log.error(
    {
      err,
      operation: typeof operation === "string" ? operation : `${req.method} ${req.path}`,
      params: req.query,
    },
    "unhandled catalog failure",
  );

  res.status(500).json({
    status: 500,
    code: "INTERNAL",
    message: "Internal server error",
    exception: err instanceof Error ? err.name : "UnknownError",
    method: req.method,
    path: req.path,
    timestamp,
  });
};
