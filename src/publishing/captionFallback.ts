/**
 * Caption production with a deterministic fallback
 *
 * The caption writer is an external collaborator; when it is absent,
 * throws or returns empty text, the caption becomes the first meaningful
 * line of the source text (or the default headline).
 */

import type { CaptionWriter } from "@/interfaces";
import type { FactHints, Logger } from "@/types";
import { DEFAULT_HEADLINE } from "@/constants";
import { firstMeaningfulLine } from "./factHints";
import * as logger from "@/logger";

export type CaptionSource = "writer" | "fallback";

export type CaptionResult = {
  caption: string;
  source: CaptionSource;
};

export function buildFallbackCaption(text: string, defaultHeadline = DEFAULT_HEADLINE): string {
  return firstMeaningfulLine(text) ?? defaultHeadline;
}

export type WriteCaptionInput = {
  rawText: string;
  affiliateLink: string;
  hints: FactHints;
  defaultHeadline?: string;
};

export async function writeCaption(
  writer: CaptionWriter | null,
  input: WriteCaptionInput,
  log: Logger = logger.withContext({ component: "captions" }),
): Promise<CaptionResult> {
  const fallback = (): CaptionResult => ({
    caption: buildFallbackCaption(input.rawText, input.defaultHeadline),
    source: "fallback",
  });

  if (!writer) {
    return fallback();
  }

  try {
    const caption = (await writer.rewrite(input.rawText, input.affiliateLink, input.hints)).trim();
    if (!caption) {
      log.warn("Caption writer returned empty text, using fallback caption");
      return fallback();
    }
    return { caption, source: "writer" };
  } catch (err) {
    log.warn("Caption writer failed, using fallback caption", logger.errorMeta(err));
    return fallback();
  }
}
