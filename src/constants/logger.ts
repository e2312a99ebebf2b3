/**
 * Logger constants
 */

import type { LogLevel } from "@/types";

/** Threshold used when LOG_LEVEL is unset or unknown */
export const DEFAULT_LOG_LEVEL: LogLevel = "info";

/** Priority per level; messages below the active threshold are dropped */
export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};
