/**
 * Product-specific link validator
 *
 * Every strategy's output passes through this check before acceptance.
 * Generic and home-page links (returned by the provider on partial
 * failure) are rejected.
 */

import { PRODUCT_LINK_PATH_PATTERNS } from "@/constants";
import { parseHttpUrl } from "./urlNormalizer";

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

function pathHasProductMarker(pathname: string): boolean {
  const decoded = safeDecode(pathname);
  return PRODUCT_LINK_PATH_PATTERNS.some(
    (pattern) => pattern.test(pathname) || pattern.test(decoded),
  );
}

/**
 * True when a query parameter value carries a product URL
 * (portal and prefix links wrap the encoded product URL)
 */
function queryCarriesProductUrl(url: URL): boolean {
  for (const value of url.searchParams.values()) {
    const inner = parseHttpUrl(value);
    if (inner && pathHasProductMarker(inner.pathname)) {
      return true;
    }
  }
  return false;
}

/**
 * Check that a link points at one product (or a product share link)
 *
 * Requires a parseable http(s) URL with a non-empty host whose path
 * carries a product/share marker (also when percent-encoded inside the
 * path), or whose query wraps such a URL.
 */
export function isProductSpecificLink(link: string | null | undefined): boolean {
  if (!link) {
    return false;
  }

  const url = parseHttpUrl(link.trim());
  if (!url || !url.hostname) {
    return false;
  }

  if (pathHasProductMarker(url.pathname)) {
    return true;
  }

  return queryCarriesProductUrl(url);
}
