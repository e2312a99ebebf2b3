/**
 * Unit tests for the per-client rate limiter
 *
 * Time is driven by an injected clock or vitest fake timers
 */

import { describe, it, expect, afterEach, vi } from "vitest";
import { RateLimiter, guard } from "@/rateLimit/rateLimiter";

function fixedClock(start: number) {
  let now = start;
  return {
    now: () => now,
    set: (value: number) => {
      now = value;
    },
  };
}

describe("RateLimiter.check", () => {
  it("should allow up to maxRequests in a window, then reject", () => {
    const clock = fixedClock(1000);
    const limiter = new RateLimiter(3, 1000, { now: clock.now });

    expect(limiter.check("203.0.113.7")).toEqual({ allowed: true, count: 1 });
    expect(limiter.check("203.0.113.7")).toEqual({ allowed: true, count: 2 });
    expect(limiter.check("203.0.113.7")).toEqual({ allowed: true, count: 3 });
    expect(limiter.check("203.0.113.7")).toEqual({
      allowed: false,
      reason: "RATE_LIMITED",
      retryAfterMs: 1001,
    });
  });

  it("should leave the record unchanged on rejection", () => {
    const clock = fixedClock(1000);
    const limiter = new RateLimiter(1, 1000, { now: clock.now });

    limiter.check("k");
    clock.set(1500);
    limiter.check("k");
    limiter.check("k");

    expect(limiter.peek("k")).toEqual({ count: 1, windowStart: 1000 });
  });

  it("should only reset once elapsed time exceeds the window", () => {
    const clock = fixedClock(1000);
    const limiter = new RateLimiter(3, 1000, { now: clock.now });
    limiter.check("k");
    limiter.check("k");
    limiter.check("k");

    clock.set(2000);
    expect(limiter.check("k")).toEqual({ allowed: false, reason: "RATE_LIMITED", retryAfterMs: 1 });

    clock.set(2001);
    expect(limiter.check("k")).toEqual({ allowed: true, count: 1 });
    expect(limiter.peek("k")).toEqual({ count: 1, windowStart: 2001 });
  });

  it("should track keys independently", () => {
    const limiter = new RateLimiter(1, 60_000, { now: () => 0 });

    expect(limiter.check("a").allowed).toBe(true);
    expect(limiter.check("a").allowed).toBe(false);
    expect(limiter.check("b").allowed).toBe(true);
    expect(limiter.trackedKeys).toBe(2);
  });

  it("should keep every distinct key when no bound is set", () => {
    const limiter = new RateLimiter(5, 60_000, { now: () => 0 });

    for (let i = 0; i < 1000; i++) {
      limiter.check(`client-${i}`);
    }

    expect(limiter.trackedKeys).toBe(1000);
  });

  it("should evict the least recently accepted key past maxTrackedKeys", () => {
    const limiter = new RateLimiter(5, 60_000, { now: () => 0, maxTrackedKeys: 2 });

    limiter.check("a");
    limiter.check("b");
    limiter.check("a");
    limiter.check("c");

    expect(limiter.trackedKeys).toBe(2);
    expect(limiter.peek("b")).toBeUndefined();
    expect(limiter.peek("a")).toEqual({ count: 2, windowStart: 0 });
    expect(limiter.peek("c")).toEqual({ count: 1, windowStart: 0 });
  });

  it("should forget every key on reset()", () => {
    const limiter = new RateLimiter(1, 60_000, { now: () => 0 });
    limiter.check("a");

    limiter.reset();

    expect(limiter.trackedKeys).toBe(0);
    expect(limiter.check("a")).toEqual({ allowed: true, count: 1 });
  });

  it("should reject invalid bounds", () => {
    expect(() => new RateLimiter(0, 1000)).toThrow("maxRequests must be a positive integer, got 0");
    expect(() => new RateLimiter(1.5, 1000)).toThrow(RangeError);
    expect(() => new RateLimiter(1, 0)).toThrow("windowMs must be greater than 0, got 0");
    expect(() => new RateLimiter(1, Number.NaN)).toThrow(RangeError);
    expect(() => new RateLimiter(1, 1000, { maxTrackedKeys: 0 })).toThrow(RangeError);
  });
});

describe("guard", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("should pass calls 1-3, reject call 4, and reset after the window", async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-01-01T00:00:00.000Z"));
    const limit = guard(3, 1000);
    const handler = vi.fn(() => "served");

    for (let i = 0; i < 3; i++) {
      expect(await limit("198.51.100.4", handler)).toEqual({ allowed: true, value: "served" });
    }
    expect(await limit("198.51.100.4", handler)).toEqual({
      allowed: false,
      reason: "RATE_LIMITED",
      retryAfterMs: 1001,
    });
    expect(handler).toHaveBeenCalledTimes(3);

    vi.advanceTimersByTime(1001);

    // Fresh window: count restarts at 1, so three more calls fit
    expect((await limit("198.51.100.4", handler)).allowed).toBe(true);
    expect((await limit("198.51.100.4", handler)).allowed).toBe(true);
    expect((await limit("198.51.100.4", handler)).allowed).toBe(true);
    expect((await limit("198.51.100.4", handler)).allowed).toBe(false);
    expect(handler).toHaveBeenCalledTimes(6);
  });

  it("should await async handlers and return their value", async () => {
    const limit = guard(1, 1000);

    const result = await limit("k", async () => ({ userAgent: "Mozilla/5.0 test" }));

    expect(result).toEqual({ allowed: true, value: { userAgent: "Mozilla/5.0 test" } });
  });

  it("should propagate handler errors after counting the call", async () => {
    const limiter = new RateLimiter(2, 60_000, { now: () => 0 });

    await expect(
      limiter.run("k", () => {
        throw new Error("downstream failed");
      }),
    ).rejects.toThrow("downstream failed");
    expect(limiter.peek("k")).toEqual({ count: 1, windowStart: 0 });
  });

  it("should release the lock before invoking the handler", async () => {
    const limiter = new RateLimiter(5, 60_000, { now: () => 0 });

    const result = await limiter.run("outer", () => limiter.check("inner"));

    expect(result).toEqual({ allowed: true, value: { allowed: true, count: 1 } });
  });

  it("should admit exactly maxRequests of many concurrent calls for one key", async () => {
    const limiter = new RateLimiter(50, 60_000, { now: () => 0 });

    const results = await Promise.all(
      Array.from({ length: 100 }, (_, i) =>
        limiter.run("shared", async () => {
          await Promise.resolve();
          return i;
        }),
      ),
    );

    expect(results.filter((r) => r.allowed)).toHaveLength(50);
    expect(limiter.peek("shared")).toEqual({ count: 50, windowStart: 0 });
  });
});
