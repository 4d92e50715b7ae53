/**
 * Database module barrel exports
 */

export * from "./connection";
export * from "./migrate";
export * from "./repos/postedProductsRepo";
export * from "./repos/runsRepo";
export * from "./repos/runLockRepo";
export * from "./repos/sourceCursorRepo";
export * from "./repos/channelPostsRepo";
