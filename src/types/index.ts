export * from "./logger";
export * from "./retry";
export * from "./affiliate";
export * from "./messages";
export * from "./ledger";
export * from "./config";
export * from "./pipeline";
export * from "./db";
export * from "./runLock";
export * from "./runner";
export * from "./clients/http";
export * from "./clients/aliexpress";
export * from "./clients/telegram";
// OpenAI wire types are intentionally NOT exported from the global barrel.
// Import directly from "@/types/clients/openai" within src/clients/openai/ only.
