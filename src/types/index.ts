export * from "./logger";
export * from "./catalog";
export * from "./rateLimit";
export * from "./selection";
export * from "./config";
