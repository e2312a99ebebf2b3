/**
 * Selection service type definitions
 */

import type { DeviceCategory, UserAgentEntry } from "./catalog";

/**
 * Category of a selection request; "random" draws from both catalogs.
 */
export type SelectionCategory = DeviceCategory | "random";

/**
 * Audit record handed to an external recorder after each accepted selection.
 */
export type SelectionRecord = {
  text: string;
  category: SelectionCategory;
  /** ISO 8601 timestamp */
  timestamp: string;
  clientKey: string;
  endpoint: string;
};

/**
 * External audit sink (e.g. a request log table). Not implemented here.
 */
export interface SelectionRecorder {
  record(record: SelectionRecord): void | Promise<void>;
}

export type SelectRequest = {
  category: SelectionCategory;
  clientKey: string;
  endpoint: string;
};

export type ListRequest = {
  category: DeviceCategory;
  clientKey: string;
};

type RateLimitedOutcome = {
  ok: false;
  reason: "RATE_LIMITED";
  retryAfterMs: number;
};

type UnavailableOutcome = {
  ok: false;
  reason: "UNAVAILABLE";
  message: string;
};

export type SelectOutcome =
  | { ok: true; userAgent: string; category: SelectionCategory }
  | RateLimitedOutcome
  | UnavailableOutcome;

export type ListOutcome =
  | { ok: true; category: DeviceCategory; entries: UserAgentEntry[] }
  | RateLimitedOutcome;
