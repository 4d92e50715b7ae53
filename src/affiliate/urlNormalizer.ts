/**
 * URL normalizer — strips message formatting, tracking parameters and
 * marketplace host variants
 *
 * Pure and idempotent: normalizeUrl(normalizeUrl(x)) === normalizeUrl(x).
 */

import {
  CANONICAL_MARKETPLACE_HOST,
  MARKETPLACE_HOST_ALIASES,
  URL_LEADING_TRIM,
  URL_TRAILING_TRIM,
} from "@/constants";

/**
 * Remove punctuation, brackets, quotes and whitespace wrapped around a URL
 * by message formatting
 */
export function trimUrlDecorations(raw: string): string {
  return raw.replace(URL_LEADING_TRIM, "").replace(URL_TRAILING_TRIM, "");
}

/**
 * Map mobile and language subdomains of the marketplace to the canonical host
 */
export function canonicalizeHost(host: string): string {
  const lower = host.toLowerCase();
  return MARKETPLACE_HOST_ALIASES.includes(lower) ? CANONICAL_MARKETPLACE_HOST : lower;
}

/**
 * Parse an http(s) URL, or null
 */
export function parseHttpUrl(value: string): URL | null {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    return null;
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    return null;
  }
  return url;
}

/**
 * Normalize a raw URL found in message text
 *
 * Keeps scheme, host and path only: every query parameter (often a
 * competing affiliate's tracking tag) and the fragment are dropped.
 * Strings that are not http(s) URLs come back trimmed but otherwise as-is.
 */
export function normalizeUrl(raw: string): string {
  const trimmed = trimUrlDecorations(raw.trim());
  const url = parseHttpUrl(trimmed);
  if (!url) {
    return trimmed;
  }

  const host = canonicalizeHost(url.host);
  // Trailing punctuation may sit right before the stripped query string
  const path = url.pathname.replace(URL_TRAILING_TRIM, "");
  return `${url.protocol}//${host}${path}`;
}
