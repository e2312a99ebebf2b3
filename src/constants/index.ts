export * from "./logger";
export * from "./catalog";
export * from "./rateLimit";
export * from "./config";
export * from "./errorMessage";
