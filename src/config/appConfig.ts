/**
 * Application configuration from environment variables
 *
 * Values are parsed, not validated: a missing or unparsable number falls back
 * to its default. Range checks belong to the components that consume them
 * (e.g. RateLimiter rejects a non-positive window).
 */

import type { AppConfig } from "@/types/config";
import {
  DESKTOP_CATALOG_PATH_ENV,
  LOG_LEVEL_ENV,
  MAX_REQUESTS_ENV,
  MOBILE_CATALOG_PATH_ENV,
  RATE_LIMIT_WINDOW_MS_ENV,
} from "@/constants/config";
import { DEFAULT_DESKTOP_CATALOG_FILE, DEFAULT_MOBILE_CATALOG_FILE } from "@/constants/catalog";
import {
  DEFAULT_MAX_REQUESTS,
  DEFAULT_RATE_LIMIT_WINDOW_MS,
} from "@/constants/rateLimit";
import { resolveLogLevel } from "@/logger";

type Env = Record<string, string | undefined>;

function getEnvWithDefault(env: Env, key: string, defaultValue: string): string {
  const value = env[key]?.trim();
  return value ? value : defaultValue;
}

function getEnvAsIntWithDefault(env: Env, key: string, defaultValue: number): number {
  const raw = env[key]?.trim();
  if (!raw || !/^-?\d+$/.test(raw)) {
    return defaultValue;
  }
  return Number.parseInt(raw, 10);
}

/**
 * Read configuration from `env` (defaults to process.env).
 *
 * Environment variables:
 *   - LOG_LEVEL: debug | info | warn | error (default info)
 *   - MAX_REQUESTS_PER_MINUTE: accepted calls per client per window (default 100)
 *   - RATE_LIMIT_WINDOW_MS: window length (default 60000)
 *   - DESKTOP_CATALOG_PATH / MOBILE_CATALOG_PATH: catalog JSON files, relative to
 *     the working directory (default: the files shipped in the package data/)
 */
export function loadAppConfig(env: Env = process.env): AppConfig {
  return {
    logLevel: resolveLogLevel(env[LOG_LEVEL_ENV]),
    rateLimit: {
      maxRequests: getEnvAsIntWithDefault(env, MAX_REQUESTS_ENV, DEFAULT_MAX_REQUESTS),
      windowMs: getEnvAsIntWithDefault(env, RATE_LIMIT_WINDOW_MS_ENV, DEFAULT_RATE_LIMIT_WINDOW_MS),
    },
    catalogs: {
      desktopPath: getEnvWithDefault(env, DESKTOP_CATALOG_PATH_ENV, DEFAULT_DESKTOP_CATALOG_FILE),
      mobilePath: getEnvWithDefault(env, MOBILE_CATALOG_PATH_ENV, DEFAULT_MOBILE_CATALOG_FILE),
    },
  };
}
