/**
 * Environment variable names read by loadAppConfig
 */

export const LOG_LEVEL_ENV = "LOG_LEVEL";
export const MAX_REQUESTS_ENV = "MAX_REQUESTS_PER_MINUTE";
export const RATE_LIMIT_WINDOW_MS_ENV = "RATE_LIMIT_WINDOW_MS";
export const DESKTOP_CATALOG_PATH_ENV = "DESKTOP_CATALOG_PATH";
export const MOBILE_CATALOG_PATH_ENV = "MOBILE_CATALOG_PATH";
