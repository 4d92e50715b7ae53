/**
 * Affiliate pipeline constants
 *
 * Domains and extraction patterns
 */

import type { StrategyName } from "@/types";

export const CANONICAL_MARKETPLACE_HOST = "www.aliexpress.com";

/**
 * Hosts rewritten to the canonical desktop host
 * Language subdomains (he., fr., ...) and mobile hosts serve the same items
 */
export const MARKETPLACE_HOST_ALIASES: readonly string[] = [
  "aliexpress.com",
  "m.aliexpress.com",
  "m.aliexpress.us",
  "aliexpress.us",
  "www.aliexpress.us",
  "he.aliexpress.com",
  "ar.aliexpress.com",
  "fr.aliexpress.com",
  "de.aliexpress.com",
  "es.aliexpress.com",
  "it.aliexpress.com",
  "pt.aliexpress.com",
  "ru.aliexpress.com",
  "nl.aliexpress.com",
  "pl.aliexpress.com",
  "ko.aliexpress.com",
  "ja.aliexpress.com",
];

/**
 * Substrings of URLs that should be resolved through HTTP redirects
 */
export const DEFAULT_REDIRECT_DOMAINS: readonly string[] = [
  "s.click.aliexpress.com",
  "a.aliexpress.com",
  "click.aliexpress.com",
  "bit.ly",
  "tinyurl.com",
  "t.me",
  "/share/",
];

export const DEFAULT_REDIRECT_TIMEOUT_MS = 10_000;

/**
 * Substrings that make a URL in source text a candidate link
 */
export const CANDIDATE_LINK_MARKERS: readonly string[] = [
  "aliexpress",
  "s.click",
  "bit.ly",
  "tinyurl",
];

/**
 * Characters trimmed from both ends of a raw URL (message formatting)
 */
export const URL_LEADING_TRIM = /^[\s([{<"'`*_]+/;
export const URL_TRAILING_TRIM = /[\s)\]}>"'`*_.,;:!?]+$/;

/**
 * Identifier extraction rules, applied in order
 */
export const ITEM_ID_PATTERN = /\/item\/(\d+)(?:\.html)?/i;
export const SHORT_LINK_TOKEN_PATTERN =
  /(?:s\.click\.aliexpress\.com\/e\/|a\.aliexpress\.com\/)_?([A-Za-z0-9]+)/i;
export const LOOSE_DIGITS_PATTERN = /(\d{10,})/;

/**
 * Path markers of a product-specific (or share) link
 */
export const PRODUCT_LINK_PATH_PATTERNS: readonly RegExp[] = [
  /\/item\/\d+/i,
  /^\/e\/_?[A-Za-z0-9]+/,
  /^\/_[A-Za-z0-9]+/,
  /\/share\//i,
  /\/deep_link/i,
];

export const DEFAULT_STRATEGY_ORDER: readonly StrategyName[] = ["api", "template", "prefix"];

/**
 * Placeholders accepted by the portal template strategy
 */
export const TEMPLATE_URL_PLACEHOLDER = "{url}";
export const TEMPLATE_RAW_URL_PLACEHOLDER = "{rawUrl}";
