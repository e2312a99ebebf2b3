export * from "./errors";
export * from "./loader";
export * from "./secureRandom";
export * from "./manager";
export * from "./defaultManager";
