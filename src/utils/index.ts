/**
 * Utils barrel exports
 */

export * from "./retry";
export * from "./errors";
