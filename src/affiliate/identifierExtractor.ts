/**
 * Identifier extractor — derives a stable product identifier from a URL
 *
 * Rules are applied in order and the first match wins:
 * 1. canonical /item/<digits> path
 * 2. short-link token of the marketplace redirect service
 * 3. any run of 10+ digits (loose fallback for atypical link shapes)
 */

import type { ProductIdentifier, ProductIdKind } from "@/types";
import {
  ITEM_ID_PATTERN,
  SHORT_LINK_TOKEN_PATTERN,
  LOOSE_DIGITS_PATTERN,
} from "@/constants";

type ExtractionRule = {
  kind: ProductIdKind;
  pattern: RegExp;
};

const EXTRACTION_RULES: readonly ExtractionRule[] = [
  { kind: "item", pattern: ITEM_ID_PATTERN },
  { kind: "short", pattern: SHORT_LINK_TOKEN_PATTERN },
  { kind: "digits", pattern: LOOSE_DIGITS_PATTERN },
];

/**
 * Rank of identifier kinds, most authoritative first
 */
const KIND_RANK: Record<ProductIdKind, number> = {
  item: 0,
  digits: 1,
  short: 2,
};

/**
 * Extract the product identifier from a URL
 *
 * @returns The first rule match, or null when no rule matches
 *
 * @example
 * extractProductId("https://www.aliexpress.com/item/1005001234567890.html")
 * // => { value: "1005001234567890", kind: "item" }
 * extractProductId("https://s.click.aliexpress.com/e/_abCD12")
 * // => { value: "abCD12", kind: "short" }
 */
export function extractProductId(url: string): ProductIdentifier | null {
  for (const rule of EXTRACTION_RULES) {
    const match = rule.pattern.exec(url);
    if (match?.[1]) {
      return { value: match[1], kind: rule.kind };
    }
  }
  return null;
}

/**
 * Pick the most authoritative identifier (item > digits > short)
 * Ties keep the earlier candidate.
 */
export function pickAuthoritativeId(
  ...candidates: Array<ProductIdentifier | null>
): ProductIdentifier | null {
  let best: ProductIdentifier | null = null;
  for (const candidate of candidates) {
    if (candidate && (!best || KIND_RANK[candidate.kind] < KIND_RANK[best.kind])) {
      best = candidate;
    }
  }
  return best;
}

export function sameIdentifier(a: ProductIdentifier, b: ProductIdentifier): boolean {
  return a.value === b.value && a.kind === b.kind;
}
