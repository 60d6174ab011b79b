export * from "./DuplicateIndex";
export * from "./DuplicateIndexMemory";
