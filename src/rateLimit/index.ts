export * from "./rateLimiter";
