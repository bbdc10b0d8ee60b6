/**
 * Caller-facing error kinds raised by the catalog query engine.
 *
 * Every subclass carries the HTTP status it maps to, a stable machine code and,
 * where one parameter is at fault, that parameter's name. Anything that is not a
 * CatalogError is treated as an internal failure by the error middleware.
 */
export abstract class CatalogError extends Error {
  abstract readonly status: number;
  abstract readonly code: string;

  constructor(
    message: string,
    readonly parameter?: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidPaginationError extends CatalogError {
  readonly status = 400;
  readonly code = "INVALID_PAGINATION";
}

export class InvalidSortError extends CatalogError {
  readonly status = 400;
  readonly code = "INVALID_SORT";
}

export class InvalidFilterPropertyError extends CatalogError {
  readonly status = 400;
  readonly code = "INVALID_FILTER_PROPERTY";
}

export class NoMatchingRecordsError extends CatalogError {
  readonly status = 404;
  readonly code = "NO_MATCHING_RECORDS";

  constructor(message = "No products match the requested filters") {
    super(message);
  }
}

export class ResourceNotFoundError extends CatalogError {
  readonly status = 404;
  readonly code = "RESOURCE_NOT_FOUND";

  constructor(entity: string, field: string, value: string | number) {
    super(`Entity ${entity} with ${field} = ${value} not found`, field);
  }
}

const UNDEFINED_COLUMN = "42703";

function sqlState(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return undefined;
  }
  return typeof error.code === "string" ? error.code : undefined;
}

/**
 * Maps a store failure that names an unknown property onto the same error a
 * rejected filter parameter produces. Other failures pass through untouched.
 */
export function translateStoreError(error: unknown): unknown {
  if (sqlState(error) !== UNDEFINED_COLUMN) {
    return error;
  }
  const message = error instanceof Error ? error.message : "unknown column";
  const column = /column "?([^"\s]+)"? does not exist/.exec(message)?.[1];
  return new InvalidFilterPropertyError(`Invalid property: ${column ?? "unknown"}`, column);
}
