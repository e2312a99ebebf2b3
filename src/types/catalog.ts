/**
 * Catalog type definitions
 *
 * A catalog is an ordered list of user-agent entries for one device class.
 *
 * Two forms exist:
 * - UserAgentRecordRaw: JSON shape (deserialized from a data file)
 * - UserAgentEntry: validated runtime form served by the manager
 */

/**
 * Device class a catalog belongs to.
 */
export type DeviceCategory = "desktop" | "mobile";

/**
 * Record shape as stored in the catalog JSON files.
 */
export type UserAgentRecordRaw = {
  /** User-agent string */
  ua: string;
  /** Declared prevalence in percent (0-100) */
  pct: number;
};

/**
 * Validated catalog entry.
 *
 * `weight` is advisory metadata: selection is uniform over catalog members.
 */
export type UserAgentEntry = {
  /** User-agent string, 10-1000 characters */
  text: string;
  /** Declared prevalence in percent (0-100) */
  weight: number;
};

/**
 * Where a catalog's bytes come from.
 *
 * - file: read from disk (relative paths resolve against process.cwd())
 * - buffer: already in memory (embedded blob, test fixture)
 */
export type CatalogSource =
  | { type: "file"; path: string }
  | { type: "buffer"; data: Uint8Array | string; name?: string };

/**
 * Catalog sizes, for diagnostics.
 */
export type CatalogCounts = Record<DeviceCategory, number>;

/**
 * Produces an integer in [0, max). Must be backed by a cryptographically secure source.
 */
export type RandomIndexSource = (max: number) => number;
