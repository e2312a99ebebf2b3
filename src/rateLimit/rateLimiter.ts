/**
 * Per-client fixed-window rate limiter
 *
 * Each client key gets a counter that opens a window on its first accepted
 * call. Within the window, calls are accepted until `maxRequests` is reached
 * and rejected afterwards. Once `now - windowStart > windowMs`, the next call
 * opens a fresh window with count 1.
 *
 * The check-and-increment runs inside the exclusive side of a lock. The
 * downstream handler runs only after the lock is released.
 *
 * Tracked keys are never pruned unless `maxTrackedKeys` is set, in which case
 * the least recently accepted key is evicted when the bound is exceeded.
 */

import type {
  GuardResult,
  RateLimitDecision,
  RateLimitMiddleware,
  RateLimitRecord,
  RateLimiterOptions,
} from "@/types/rateLimit";
import { ReadWriteLock } from "@/utils/readWriteLock";
import * as logger from "@/logger";

function assertPositiveInteger(value: number, name: string): void {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}

export class RateLimiter {
  private readonly records = new Map<string, RateLimitRecord>();
  private readonly lock = new ReadWriteLock("rate-limiter");
  private readonly now: () => number;
  private readonly maxTrackedKeys: number | undefined;

  constructor(
    readonly maxRequests: number,
    readonly windowMs: number,
    options: RateLimiterOptions = {},
  ) {
    assertPositiveInteger(maxRequests, "maxRequests");
    if (!Number.isFinite(windowMs) || windowMs <= 0) {
      throw new RangeError(`windowMs must be greater than 0, got ${windowMs}`);
    }
    if (options.maxTrackedKeys !== undefined) {
      assertPositiveInteger(options.maxTrackedKeys, "maxTrackedKeys");
    }

    this.now = options.now ?? (() => Date.now());
    this.maxTrackedKeys = options.maxTrackedKeys;
  }

  /**
   * Record one call for `clientKey` and decide whether it may proceed.
   * Rejected calls leave the key's record unchanged.
   */
  check(clientKey: string): RateLimitDecision {
    return this.lock.write(() => {
      const now = this.now();
      const record = this.records.get(clientKey);

      if (!record || now - record.windowStart > this.windowMs) {
        this.touch(clientKey, { count: 1, windowStart: now });
        return { allowed: true, count: 1 };
      }

      if (record.count < this.maxRequests) {
        const updated = { count: record.count + 1, windowStart: record.windowStart };
        this.touch(clientKey, updated);
        return { allowed: true, count: updated.count };
      }

      const retryAfterMs = record.windowStart + this.windowMs - now + 1;
      logger.debug("Rate limit exceeded", {
        clientKey,
        count: record.count,
        retryAfterMs,
      });
      return { allowed: false, reason: "RATE_LIMITED", retryAfterMs };
    });
  }

  /**
   * Run `handler` if `clientKey` is within its limit.
   */
  async run<T>(clientKey: string, handler: () => T | Promise<T>): Promise<GuardResult<T>> {
    const decision = this.check(clientKey);
    if (!decision.allowed) {
      return decision;
    }
    return { allowed: true, value: await handler() };
  }

  /** Current record for a key (copy), if tracked */
  peek(clientKey: string): RateLimitRecord | undefined {
    return this.lock.read(() => {
      const record = this.records.get(clientKey);
      return record ? { ...record } : undefined;
    });
  }

  get trackedKeys(): number {
    return this.lock.read(() => this.records.size);
  }

  reset(): void {
    this.lock.write(() => this.records.clear());
  }

  /**
   * Store a record and move the key to the most-recent end of the map
   * (Map iteration follows insertion order).
   */
  private touch(clientKey: string, record: RateLimitRecord): void {
    this.records.delete(clientKey);
    this.records.set(clientKey, record);

    if (this.maxTrackedKeys === undefined) {
      return;
    }

    while (this.records.size > this.maxTrackedKeys) {
      const oldest = this.records.keys().next();
      if (oldest.done) {
        break;
      }
      this.records.delete(oldest.value);
      logger.debug("Rate limiter evicted client key", { clientKey: oldest.value });
    }
  }
}

/**
 * Create a rate-limiting middleware.
 *
 * @param maxRequests - Accepted calls per key per window (> 0)
 * @param windowMs - Window length in milliseconds (> 0)
 * @throws {RangeError} If either bound is invalid
 *
 * @example
 * const limit = guard(100, 60_000);
 * const result = await limit(clientIp, () => manager.randomAnyText());
 * if (!result.allowed) {
 *   // map to HTTP 429
 * }
 */
export function guard(
  maxRequests: number,
  windowMs: number,
  options: RateLimiterOptions = {},
): RateLimitMiddleware {
  const limiter = new RateLimiter(maxRequests, windowMs, options);
  return (clientKey, handler) => limiter.run(clientKey, handler);
}
