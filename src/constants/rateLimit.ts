/**
 * Rate limiter defaults
 */

/** Accepted calls per client key per window */
export const DEFAULT_MAX_REQUESTS = 100;

/** Window length (1 minute) */
export const DEFAULT_RATE_LIMIT_WINDOW_MS = 60_000;
