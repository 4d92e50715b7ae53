/**
 * Affiliate pipeline barrel exports
 */

export * from "./urlNormalizer";
export * from "./redirectResolver";
export * from "./identifierExtractor";
export * from "./linkValidator";
export * from "./candidateLinks";
export * from "./affiliateLinkBuilder";
export * from "./strategies";
