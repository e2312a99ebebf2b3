/**
 * Rate limiter type definitions
 */

/**
 * Per-client counter inside the current window
 */
export type RateLimitRecord = {
  /** Accepted calls since windowStart */
  count: number;
  /** Epoch millis when the current window opened */
  windowStart: number;
};

/**
 * Outcome of the bookkeeping step for one call
 */
export type RateLimitDecision =
  | { allowed: true; count: number }
  | { allowed: false; reason: "RATE_LIMITED"; retryAfterMs: number };

/**
 * Outcome of a guarded call: downstream result, or the rejection signal
 */
export type GuardResult<T> =
  | { allowed: true; value: T }
  | { allowed: false; reason: "RATE_LIMITED"; retryAfterMs: number };

/**
 * Guarded invocation of a downstream handler for one client key.
 * The handler is never invoked for rejected calls.
 */
export type RateLimitMiddleware = <T>(
  clientKey: string,
  handler: () => T | Promise<T>,
) => Promise<GuardResult<T>>;

export type RateLimiterOptions = {
  /** Clock in epoch millis (defaults to Date.now) */
  now?: () => number;
  /**
   * Upper bound on tracked client keys. When exceeded, the least recently
   * accepted key is evicted. Unbounded when omitted.
   */
  maxTrackedKeys?: number;
};
