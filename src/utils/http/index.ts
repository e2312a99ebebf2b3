export * from "./clientKey";
export * from "./errorMessage";
