/**
 * Utils barrel exports
 */

export * from "./catalogValidation";
export * from "./readWriteLock";
export * from "./http";
