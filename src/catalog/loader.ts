/**
 * Catalog source loading
 *
 * Reads a catalog source (file or in-memory bytes), parses the JSON and
 * validates every record. Fail-fast: the first problem throws, nothing is
 * partially returned.
 */

import * as fs from "fs";
import * as path from "path";
import type {
  CatalogSource,
  DeviceCategory,
  UserAgentEntry,
} from "@/types/catalog";
import { validateCatalogRecords } from "@/utils/catalogValidation";
import { CatalogParseError, CatalogSourceNotFoundError } from "./errors";

/**
 * Human-readable label for a source, used in error messages and logs.
 */
export function describeSource(source: CatalogSource): string {
  return source.type === "file" ? source.path : (source.name ?? "<buffer>");
}

/**
 * Read the raw text of a source.
 *
 * @throws {CatalogSourceNotFoundError} For an empty path or any read failure
 */
function readSourceText(source: CatalogSource, catalog: DeviceCategory): string {
  if (source.type === "buffer") {
    return typeof source.data === "string"
      ? source.data
      : Buffer.from(source.data).toString("utf-8");
  }

  if (source.path.trim() === "") {
    throw new CatalogSourceNotFoundError("", catalog);
  }

  const resolved = path.resolve(process.cwd(), source.path);
  try {
    return fs.readFileSync(resolved, "utf-8");
  } catch (err) {
    throw new CatalogSourceNotFoundError(source.path, catalog, { cause: err });
  }
}

/**
 * Load and validate one catalog.
 *
 * Steps:
 * 1. Read source bytes
 * 2. Parse JSON
 * 3. Validate every record and map it to an entry
 *
 * @throws {CatalogSourceNotFoundError} If the source cannot be read
 * @throws {CatalogParseError} If the bytes are not a JSON array
 * @throws {CatalogValidationError} If a record violates an invariant
 */
export function loadCatalogSource(
  source: CatalogSource,
  catalog: DeviceCategory,
): UserAgentEntry[] {
  const text = readSourceText(source, catalog);

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new CatalogParseError(
      `${describeSource(source)} is not valid JSON`,
      catalog,
      { cause: err },
    );
  }

  return validateCatalogRecords(raw, catalog);
}
