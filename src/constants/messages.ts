/**
 * Message assembly and caption constants
 */

export const DEFAULT_BUY_HERE_LABEL = "👇 Buy here:";

export const DEFAULT_HEADLINE = "New deal found! 👇";

/**
 * Absolute-URL-looking substrings: http(s)://, www. and percent-encoded
 * http%3A%2F%2F forms
 */
export const ABSOLUTE_URL_PATTERN =
  /(?:https?:\/\/|https?%3A%2F%2F|www\.)[^\s<>"'`]+/gi;

/**
 * Price hints in source text: currency symbol before or after the amount
 */
export const PRICE_HINT_PATTERN =
  /(?:[₪$€£]\s?\d+(?:[.,]\d+)?)|(?:\d+(?:[.,]\d+)?\s?[₪$€£])/;

/**
 * Maximum length of the title hint taken from the first line of source text
 */
export const TITLE_HINT_MAX_LENGTH = 120;
