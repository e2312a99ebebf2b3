/**
 * Library entry point
 */

export * from "./types";
export * from "./catalog";
export * from "./rateLimit";
export * from "./selection";
export * from "./config";
export { ReadWriteLock, LockContentionError } from "./utils/readWriteLock";
export { resolveClientKey, getClientIp, sanitizeIp, sanitizeErrorMessage, escapeHtml } from "./utils/http";
export type { ClientKeySource, HeaderBag } from "./utils/http";
export { PUBLIC_SELECTION_ERROR } from "./constants/errorMessage";
