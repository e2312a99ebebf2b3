/**
 * Selection service: request flow around the catalog manager
 *
 * 1. Rate limit by client key (rejected calls never touch the catalogs)
 * 2. Pick from the requested catalog
 * 3. Hand an audit record to the optional recorder
 *
 * Recorder failures are logged and never change the outcome. Selection
 * failures surface as a generic message; details go to the log only.
 */

import type {
  ListOutcome,
  ListRequest,
  SelectOutcome,
  SelectRequest,
  SelectionCategory,
  SelectionRecord,
  SelectionRecorder,
} from "@/types/selection";
import type { UserAgentManager } from "@/catalog/manager";
import type { RateLimiter } from "@/rateLimit/rateLimiter";
import { PUBLIC_SELECTION_ERROR } from "@/constants/errorMessage";
import * as logger from "@/logger";

export type SelectionServiceDeps = {
  manager: UserAgentManager;
  limiter: RateLimiter;
  recorder?: SelectionRecorder;
  /** Clock for audit timestamps (defaults to Date.now) */
  now?: () => number;
};

export interface SelectionService {
  select(request: SelectRequest): Promise<SelectOutcome>;
  list(request: ListRequest): Promise<ListOutcome>;
}

const log = logger.withContext({ component: "selection" });

function pickText(manager: UserAgentManager, category: SelectionCategory): string {
  return category === "random" ? manager.randomAnyText() : manager.random(category).text;
}

export function createSelectionService(deps: SelectionServiceDeps): SelectionService {
  const { manager, limiter, recorder } = deps;
  const now = deps.now ?? (() => Date.now());

  async function recordSelection(record: SelectionRecord): Promise<void> {
    if (!recorder) {
      return;
    }
    try {
      await recorder.record(record);
    } catch (err) {
      log.warn("Selection recorder failed", {
        endpoint: record.endpoint,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  async function select(request: SelectRequest): Promise<SelectOutcome> {
    const { category, clientKey, endpoint } = request;

    const guarded = await limiter.run(clientKey, () => {
      try {
        return { ok: true as const, text: pickText(manager, category) };
      } catch (err) {
        log.error("User-agent selection failed", {
          category,
          error: err instanceof Error ? err.message : String(err),
        });
        return { ok: false as const };
      }
    });

    if (!guarded.allowed) {
      return { ok: false, reason: "RATE_LIMITED", retryAfterMs: guarded.retryAfterMs };
    }
    const picked = guarded.value;
    if (!picked.ok) {
      return { ok: false, reason: "UNAVAILABLE", message: PUBLIC_SELECTION_ERROR };
    }

    const text = picked.text;
    await recordSelection({
      text,
      category,
      timestamp: new Date(now()).toISOString(),
      clientKey,
      endpoint,
    });

    return { ok: true, userAgent: text, category };
  }

  async function list(request: ListRequest): Promise<ListOutcome> {
    const { category, clientKey } = request;

    const guarded = await limiter.run(clientKey, () => manager.all(category));
    if (!guarded.allowed) {
      return { ok: false, reason: "RATE_LIMITED", retryAfterMs: guarded.retryAfterMs };
    }

    return { ok: true, category, entries: guarded.value };
  }

  return { select, list };
}
