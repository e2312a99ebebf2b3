/**
 * Logger type definitions
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Structured fields appended to a log line as JSON */
export type LogMeta = Record<string, unknown>;

/**
 * Logger interface, implemented by the module-level functions in @/logger
 * and by the scoped loggers returned from withContext().
 */
export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}
