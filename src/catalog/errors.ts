/**
 * Catalog error taxonomy
 *
 * Construction errors are fatal at startup. Selection errors (EmptyCatalogError,
 * RandomSourceError) are thrown per call and can be inspected via `code`.
 */

import type { DeviceCategory } from "@/types/catalog";

export type CatalogErrorCode =
  | "CONSTRUCTION"
  | "SOURCE_NOT_FOUND"
  | "PARSE"
  | "VALIDATION"
  | "EMPTY_CATALOG"
  | "RANDOM_SOURCE";

/**
 * Base class for every failure that aborts manager construction.
 */
export class CatalogConstructionError extends Error {
  readonly code: CatalogErrorCode = "CONSTRUCTION";

  constructor(
    message: string,
    readonly catalog?: DeviceCategory,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "CatalogConstructionError";
  }
}

/**
 * Catalog source path is empty, missing or unreadable.
 *
 * Kept distinct from validation failures: a caller may retry this one
 * (e.g. a volume not mounted yet) but never a bad data file.
 */
export class CatalogSourceNotFoundError extends CatalogConstructionError {
  override readonly code = "SOURCE_NOT_FOUND";

  constructor(
    readonly source: string,
    catalog?: DeviceCategory,
    options?: { cause?: unknown },
  ) {
    super(
      `Catalog source not found${catalog ? ` for ${catalog}` : ""}: ${source || "(empty path)"}`,
      catalog,
      options,
    );
    this.name = "CatalogSourceNotFoundError";
  }
}

/**
 * Catalog bytes are not a JSON array.
 */
export class CatalogParseError extends CatalogConstructionError {
  override readonly code = "PARSE";

  constructor(message: string, catalog?: DeviceCategory, options?: { cause?: unknown }) {
    super(`Catalog parse failed${catalog ? ` (${catalog})` : ""}: ${message}`, catalog, options);
    this.name = "CatalogParseError";
  }
}

/**
 * An entry violates an invariant. `index` and `field` locate it.
 */
export class CatalogValidationError extends CatalogConstructionError {
  override readonly code = "VALIDATION";

  constructor(
    message: string,
    catalog?: DeviceCategory,
    readonly index?: number,
    readonly field?: string,
  ) {
    super(`Catalog validation failed: ${message}`, catalog);
    this.name = "CatalogValidationError";
  }
}

/**
 * A random pick was requested from a catalog with zero entries.
 */
export class EmptyCatalogError extends Error {
  readonly code = "EMPTY_CATALOG";

  constructor(readonly catalog: DeviceCategory | "any") {
    super(`Catalog is empty: ${catalog}`);
    this.name = "EmptyCatalogError";
  }
}

/**
 * The secure entropy source failed. Never answered with a weaker generator.
 */
export class RandomSourceError extends Error {
  readonly code = "RANDOM_SOURCE";

  constructor(message: string, options?: { cause?: unknown }) {
    super(`Secure random source failed: ${message}`, options);
    this.name = "RandomSourceError";
  }
}
