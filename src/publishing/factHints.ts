/**
 * Fact hints
 *
 * Price and title pulled from source text for the caption writer
 */

import type { FactHints, ProductDetails } from "@/types";
import { PRICE_HINT_PATTERN, TITLE_HINT_MAX_LENGTH } from "@/constants";
import { stripUrls, tidyWhitespace } from "./messageAssembler";

/**
 * First line of the text that is not empty once URLs are removed
 */
export function firstMeaningfulLine(text: string): string | null {
  for (const line of text.split(/\r?\n/)) {
    const cleaned = tidyWhitespace(stripUrls(line));
    if (cleaned) {
      return cleaned;
    }
  }
  return null;
}

export function extractFactHints(text: string): FactHints {
  const price = PRICE_HINT_PATTERN.exec(text);
  const line = firstMeaningfulLine(text);
  return {
    title: line ? line.substring(0, TITLE_HINT_MAX_LENGTH).trim() : null,
    price: price ? price[0].trim() : null,
  };
}

/**
 * Product lookup data takes precedence over hints scraped from text
 */
export function mergeProductDetails(hints: FactHints, details: ProductDetails | null): FactHints {
  if (!details) {
    return hints;
  }
  const price =
    details.salePrice !== null
      ? [details.salePrice, details.currency].filter(Boolean).join(" ")
      : hints.price;
  return {
    title: details.title ?? hints.title,
    price,
  };
}
