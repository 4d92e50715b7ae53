/**
 * Message assembler — enforces the single-link invariant on outgoing text
 *
 * The assembled message contains the affiliate link exactly once and no
 * other absolute URL, whatever the caption writer produced.
 */

import type { AssembleOptions } from "@/types";
import { ABSOLUTE_URL_PATTERN, DEFAULT_BUY_HERE_LABEL, URL_TRAILING_TRIM } from "@/constants";

/**
 * Tidy whitespace left behind by removed URLs: no doubled spaces, no
 * trailing blanks, at most one blank line, no empty bracket pairs
 */
export function tidyWhitespace(text: string): string {
  return text
    .replace(/\(\s*\)|\[\s*\]|<\s*>/g, "")
    .replace(/[ \t]{2,}/g, " ")
    .replace(/[ \t]+\n/g, "\n")
    .replace(/\n[ \t]+/g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

/**
 * Remove every absolute-URL-looking substring (punctuation after a URL
 * stays with the sentence)
 */
export function stripUrls(text: string): string {
  return text.replace(ABSOLUTE_URL_PATTERN, (match) => {
    const core = match.replace(URL_TRAILING_TRIM, "");
    return match.substring(core.length);
  });
}

/**
 * Assemble the outgoing message text
 *
 * - every URL other than the affiliate link is removed
 * - repeated affiliate link occurrences collapse to the first one
 * - when the caption lacks the link, a "buy here" block is appended
 */
export function assembleMessage(
  caption: string,
  affiliateLink: string,
  options: AssembleOptions = {},
): string {
  const label = options.buyHereLabel ?? DEFAULT_BUY_HERE_LABEL;

  // Tidying can join fragments into a new URL ("ht()tps://..."), so strip
  // and tidy until the text no longer changes. Each round only shortens it.
  let body = caption;
  let kept = false;
  for (;;) {
    kept = false;
    const next = tidyWhitespace(
      body.replace(ABSOLUTE_URL_PATTERN, (match) => {
        const core = match.replace(URL_TRAILING_TRIM, "");
        if (core === affiliateLink && !kept) {
          kept = true;
          return match;
        }
        return match.substring(core.length);
      }),
    );
    if (next === body) {
      break;
    }
    body = next;
  }

  if (kept) {
    return body;
  }

  const block = `${label}\n${affiliateLink}`;
  return body ? `${body}\n\n${block}` : block;
}
