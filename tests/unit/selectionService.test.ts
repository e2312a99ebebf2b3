/**
 * Unit tests for the selection service (rate limit -> pick -> record)
 *
 * Recorder is an in-memory fake; no DB
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from "vitest";
import { createSelectionService } from "@/selection/selectionService";
import { UserAgentManager } from "@/catalog/manager";
import { RateLimiter } from "@/rateLimit/rateLimiter";
import type { SelectionRecord, SelectionRecorder } from "@/types/selection";
import { entries } from "../helpers/catalogFixtures";

function memoryRecorder(): SelectionRecorder & { records: SelectionRecord[] } {
  const records: SelectionRecord[] = [];
  return {
    records,
    record: (record) => {
      records.push(record);
    },
  };
}

describe("createSelectionService", () => {
  const desktop = entries(3, "D");
  const mobile = entries(2, "M");
  const desktopTexts = new Set(desktop.map((e) => e.text));

  let warnSpy: MockInstance<typeof console.warn>;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should return a desktop user agent and record the selection", async () => {
    const recorder = memoryRecorder();
    const service = createSelectionService({
      manager: UserAgentManager.fromEntries(desktop, mobile),
      limiter: new RateLimiter(5, 60_000, { now: () => 0 }),
      recorder,
      now: () => 5000,
    });

    const outcome = await service.select({
      category: "desktop",
      clientKey: "203.0.113.7",
      endpoint: "/api/desktop",
    });

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(desktopTexts.has(outcome.userAgent)).toBe(true);
    expect(outcome.category).toBe("desktop");
    expect(recorder.records).toEqual([
      {
        text: outcome.userAgent,
        category: "desktop",
        timestamp: "1970-01-01T00:00:05.000Z",
        clientKey: "203.0.113.7",
        endpoint: "/api/desktop",
      },
    ]);
  });

  it("should draw random requests from either catalog", async () => {
    const union = new Set([...desktop, ...mobile].map((e) => e.text));
    const service = createSelectionService({
      manager: UserAgentManager.fromEntries(desktop, mobile),
      limiter: new RateLimiter(100, 60_000),
    });

    for (let i = 0; i < 20; i++) {
      const outcome = await service.select({ category: "random", clientKey: "k", endpoint: "/api/random" });
      expect(outcome.ok && union.has(outcome.userAgent)).toBe(true);
    }
  });

  it("should reject over-limit calls without touching the catalogs", async () => {
    const manager = UserAgentManager.fromEntries(desktop, mobile);
    const pickSpy = vi.spyOn(manager, "random");
    const recorder = memoryRecorder();
    const service = createSelectionService({
      manager,
      limiter: new RateLimiter(2, 60_000, { now: () => 0 }),
      recorder,
    });
    const request = { category: "mobile" as const, clientKey: "198.51.100.4", endpoint: "/api/mobile" };

    await service.select(request);
    await service.select(request);
    const third = await service.select(request);

    expect(third).toEqual({ ok: false, reason: "RATE_LIMITED", retryAfterMs: 60_001 });
    expect(pickSpy).toHaveBeenCalledTimes(2);
    expect(recorder.records).toHaveLength(2);
  });

  it("should hide selection failures behind a generic message", async () => {
    const recorder = memoryRecorder();
    const service = createSelectionService({
      manager: UserAgentManager.fromEntries(desktop, mobile, {
        random: () => {
          throw new Error("entropy source unavailable at /dev/urandom");
        },
      }),
      limiter: new RateLimiter(5, 60_000),
      recorder,
    });

    const outcome = await service.select({ category: "desktop", clientKey: "k", endpoint: "/api/desktop" });

    expect(outcome).toEqual({
      ok: false,
      reason: "UNAVAILABLE",
      message: "unable to provide a result",
    });
    expect(recorder.records).toEqual([]);
  });

  it("should report an empty catalog as unavailable", async () => {
    const service = createSelectionService({
      manager: UserAgentManager.fromEntries(desktop, []),
      limiter: new RateLimiter(5, 60_000),
    });

    const outcome = await service.select({ category: "mobile", clientKey: "k", endpoint: "/api/mobile" });

    expect(outcome).toEqual({
      ok: false,
      reason: "UNAVAILABLE",
      message: "unable to provide a result",
    });
  });

  it("should still succeed when the recorder fails", async () => {
    const service = createSelectionService({
      manager: UserAgentManager.fromEntries(desktop, mobile),
      limiter: new RateLimiter(5, 60_000),
      recorder: {
        record: async () => {
          throw new Error("disk full");
        },
      },
    });

    const outcome = await service.select({ category: "desktop", clientKey: "k", endpoint: "/api/desktop" });

    expect(outcome.ok).toBe(true);
    expect(warnSpy.mock.calls.some(([line]) => String(line).includes("Selection recorder failed"))).toBe(
      true,
    );
  });

  it("should list a catalog copy under the same limit", async () => {
    const limiter = new RateLimiter(1, 60_000, { now: () => 0 });
    const service = createSelectionService({
      manager: UserAgentManager.fromEntries(desktop, mobile),
      limiter,
    });

    const first = await service.list({ category: "mobile", clientKey: "k" });
    const second = await service.list({ category: "mobile", clientKey: "k" });

    expect(first).toEqual({ ok: true, category: "mobile", entries: mobile });
    expect(second).toEqual({ ok: false, reason: "RATE_LIMITED", retryAfterMs: 60_001 });
  });
});
