export * from "./appConfig";
