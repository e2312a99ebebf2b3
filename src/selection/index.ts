export * from "./selectionService";
