export * from "./logger";
export * from "./affiliate";
export * from "./messages";
export * from "./ledger";
export * from "./runLock";
export * from "./runner";
export * from "./config";
