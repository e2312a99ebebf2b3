/**
 * Catalog validation module
 *
 * Validates deserialized catalog records and enforces entry invariants:
 * - `ua` is a non-empty string of 10-1000 characters
 * - `pct` is a finite number in [0, 100]
 *
 * Validation is fail-fast: throws on the first violation, naming the catalog,
 * the record index and the field. Records are never dropped or clamped.
 */

import type {
  DeviceCategory,
  UserAgentEntry,
  UserAgentRecordRaw,
} from "@/types/catalog";
import { CatalogParseError, CatalogValidationError } from "@/catalog/errors";
import {
  ENTRY_TEXT_MAX_LENGTH,
  ENTRY_TEXT_MIN_LENGTH,
  ENTRY_WEIGHT_MAX,
  ENTRY_WEIGHT_MIN,
} from "@/constants/catalog";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validates a user-agent string.
 *
 * @param fieldPath - Field path for error messages (e.g., "desktop[3].ua")
 */
function validateText(
  value: unknown,
  catalog: DeviceCategory,
  index: number,
  fieldPath: string,
): asserts value is string {
  if (typeof value !== "string") {
    throw new CatalogValidationError(
      `${fieldPath} must be a string, got ${typeof value}`,
      catalog,
      index,
      "text",
    );
  }
  if (value.trim().length === 0) {
    throw new CatalogValidationError(
      `${fieldPath} cannot be empty or whitespace-only`,
      catalog,
      index,
      "text",
    );
  }
  if (value.length < ENTRY_TEXT_MIN_LENGTH || value.length > ENTRY_TEXT_MAX_LENGTH) {
    throw new CatalogValidationError(
      `${fieldPath} length must be between ${ENTRY_TEXT_MIN_LENGTH} and ${ENTRY_TEXT_MAX_LENGTH} characters, got ${value.length}`,
      catalog,
      index,
      "text",
    );
  }
}

function validateWeight(
  value: unknown,
  catalog: DeviceCategory,
  index: number,
  fieldPath: string,
): asserts value is number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new CatalogValidationError(
      `${fieldPath} must be a finite number, got ${typeof value === "number" ? value : typeof value}`,
      catalog,
      index,
      "weight",
    );
  }
  if (value < ENTRY_WEIGHT_MIN || value > ENTRY_WEIGHT_MAX) {
    throw new CatalogValidationError(
      `${fieldPath} must be between ${ENTRY_WEIGHT_MIN} and ${ENTRY_WEIGHT_MAX}, got ${value}`,
      catalog,
      index,
      "weight",
    );
  }
}

/**
 * Validates one runtime entry.
 *
 * @throws {CatalogValidationError} If the entry violates an invariant
 */
export function validateEntry(
  entry: UserAgentEntry,
  catalog: DeviceCategory,
  index: number,
): UserAgentEntry {
  const prefix = `${catalog}[${index}]`;
  validateText(entry.text, catalog, index, `${prefix}.text`);
  validateWeight(entry.weight, catalog, index, `${prefix}.weight`);
  return { text: entry.text, weight: entry.weight };
}

/**
 * Validates one raw JSON record and maps it to a runtime entry.
 */
function validateRecord(
  record: unknown,
  catalog: DeviceCategory,
  index: number,
): UserAgentEntry {
  const prefix = `${catalog}[${index}]`;
  if (!isRecord(record)) {
    throw new CatalogValidationError(`${prefix} must be an object`, catalog, index);
  }

  const { ua, pct } = record;
  validateText(ua, catalog, index, `${prefix}.ua`);
  validateWeight(pct, catalog, index, `${prefix}.pct`);

  const validated: UserAgentRecordRaw = { ua, pct };
  return { text: validated.ua, weight: validated.pct };
}

/**
 * Validates deserialized catalog data and returns runtime entries.
 *
 * @param raw - Value produced by JSON.parse
 * @param catalog - Catalog name for error messages
 * @throws {CatalogParseError} If the value is not an array
 * @throws {CatalogValidationError} With the failing index and field
 *
 * @example
 * const entries = validateCatalogRecords(JSON.parse(json), "desktop");
 */
export function validateCatalogRecords(
  raw: unknown,
  catalog: DeviceCategory,
): UserAgentEntry[] {
  if (!Array.isArray(raw)) {
    throw new CatalogParseError(
      `expected a JSON array of records, got ${raw === null ? "null" : typeof raw}`,
      catalog,
    );
  }

  return raw.map((record: unknown, index) => validateRecord(record, catalog, index));
}

/**
 * Validates that at least one catalog carries entries.
 */
export function validateCatalogPair(
  desktop: readonly UserAgentEntry[],
  mobile: readonly UserAgentEntry[],
): void {
  if (desktop.length === 0 && mobile.length === 0) {
    throw new CatalogValidationError("both desktop and mobile catalogs are empty");
  }
}
