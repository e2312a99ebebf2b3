/**
 * Catalog configuration constants
 */

import * as path from "path";

/**
 * Default catalog data files, relative to the package root.
 */
export const DESKTOP_CATALOG_PATH = "data/desktop_useragents.json";
export const MOBILE_CATALOG_PATH = "data/mobile_useragents.json";

/** Package root: this file lives in src/constants (or dist/constants) */
const PACKAGE_ROOT = path.resolve(__dirname, "..", "..");

/**
 * Absolute default catalog files, independent of the working directory.
 */
export const DEFAULT_DESKTOP_CATALOG_FILE = path.join(PACKAGE_ROOT, DESKTOP_CATALOG_PATH);
export const DEFAULT_MOBILE_CATALOG_FILE = path.join(PACKAGE_ROOT, MOBILE_CATALOG_PATH);

/**
 * Entry invariants (inclusive bounds)
 */
export const ENTRY_TEXT_MIN_LENGTH = 10;
export const ENTRY_TEXT_MAX_LENGTH = 1000;
export const ENTRY_WEIGHT_MIN = 0;
export const ENTRY_WEIGHT_MAX = 100;
