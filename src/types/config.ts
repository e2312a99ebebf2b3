/**
 * Application configuration type definitions
 */

import type { LogLevel } from "./logger";

export type AppConfig = {
  logLevel: LogLevel;
  rateLimit: {
    /** Accepted calls per client key per window */
    maxRequests: number;
    windowMs: number;
  };
  catalogs: {
    desktopPath: string;
    mobilePath: string;
  };
};
