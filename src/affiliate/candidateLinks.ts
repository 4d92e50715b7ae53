/**
 * Candidate link extraction from message text
 */

import { CANDIDATE_LINK_MARKERS } from "@/constants";
import { trimUrlDecorations } from "./urlNormalizer";

const HTTP_URL_PATTERN = /https?:\/\/[^\s<>"'`]+/gi;

/**
 * http(s) URLs in the text that mention the marketplace or a known
 * short-link host, in order of appearance, without repeats
 */
export function extractCandidateLinks(text: string): string[] {
  const links: string[] = [];
  for (const match of text.matchAll(HTTP_URL_PATTERN)) {
    const url = trimUrlDecorations(match[0]);
    const lower = url.toLowerCase();
    if (!CANDIDATE_LINK_MARKERS.some((marker) => lower.includes(marker))) {
      continue;
    }
    if (!links.includes(url)) {
      links.push(url);
    }
  }
  return links;
}
