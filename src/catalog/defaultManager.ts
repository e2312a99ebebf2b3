/**
 * Process-wide default manager
 *
 * Optional convenience layer over UserAgentManager. The manager is built on
 * first use from the catalog files shipped in the package data/ directory; the outcome (manager or
 * construction error) is cached and returned unchanged on every later call.
 */

import type { DeviceCategory, UserAgentEntry } from "@/types/catalog";
import type { SelectionCategory } from "@/types/selection";
import { DEFAULT_DESKTOP_CATALOG_FILE, DEFAULT_MOBILE_CATALOG_FILE } from "@/constants/catalog";
import * as logger from "@/logger";
import { UserAgentManager } from "./manager";

export type DefaultManagerResult =
  | { ok: true; manager: UserAgentManager }
  | { ok: false; error: Error };

let cached: DefaultManagerResult | null = null;

function build(): DefaultManagerResult {
  try {
    const manager = UserAgentManager.load(
      { type: "file", path: DEFAULT_DESKTOP_CATALOG_FILE },
      { type: "file", path: DEFAULT_MOBILE_CATALOG_FILE },
    );
    return { ok: true, manager };
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    logger.error("Default user-agent manager failed to initialize", {
      error: error.message,
    });
    return { ok: false, error };
  }
}

/**
 * Get the default manager, constructing it on first call.
 */
export function getDefaultManager(): DefaultManagerResult {
  if (!cached) {
    cached = build();
  }
  return cached;
}

/**
 * Random user-agent string from the default manager.
 *
 * @throws {Error} "library not initialized" (cause: construction error)
 * @throws {EmptyCatalogError | RandomSourceError} From the selection itself
 */
export function randomUserAgent(category: SelectionCategory = "random"): string {
  const result = getDefaultManager();
  if (!result.ok) {
    throw new Error(`library not initialized: ${result.error.message}`, {
      cause: result.error,
    });
  }

  return category === "random"
    ? result.manager.randomAnyText()
    : result.manager.random(category).text;
}

/**
 * All entries of one catalog from the default manager.
 *
 * @throws {Error} "library not initialized" (cause: construction error)
 */
export function allUserAgents(category: DeviceCategory): UserAgentEntry[] {
  const result = getDefaultManager();
  if (!result.ok) {
    throw new Error(`library not initialized: ${result.error.message}`, {
      cause: result.error,
    });
  }
  return result.manager.all(category);
}

/**
 * Set the cached outcome for testing purposes only (null forces a rebuild).
 *
 * @internal Test use only - do not use in production code
 */
export function setDefaultManagerForTesting(result: DefaultManagerResult | null): void {
  cached = result;
}
