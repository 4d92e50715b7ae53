/**
 * Affiliate pipeline type definitions
 *
 * Shapes shared by the normalizer, resolver, identifier extractor and
 * link builder.
 */

/**
 * How a product identifier was derived
 *
 * - item: numeric id from the canonical /item/<digits> path
 * - short: token of a marketplace short link
 * - digits: loose 10+ digit run anywhere in the URL
 */
export type ProductIdKind = "item" | "short" | "digits";

export type ProductIdentifier = {
  value: string;
  kind: ProductIdKind;
};

export type LinkOrigin = "api" | "template" | "prefix" | "fallback";

/** Configurable strategies (the terminal fallback is always present) */
export type StrategyName = Exclude<LinkOrigin, "fallback">;

export type AffiliateLink = {
  url: string;
  origin: LinkOrigin;
};

export type RedirectResolveOptions = {
  enabled: boolean;
  timeoutMs: number;
  /** Substrings that mark a URL as worth resolving */
  redirectDomains: readonly string[];
};
