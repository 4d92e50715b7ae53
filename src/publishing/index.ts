export * from "./messageAssembler";
export * from "./factHints";
export * from "./captionFallback";
