/**
 * CaptionWriter interface
 *
 * Rewrites source text into a caption
 *
 * Output may contain stray links; the Message Assembler removes them.
 */

import type { FactHints } from "@/types";

export interface CaptionWriter {
  rewrite(rawText: string, affiliateLink: string, hints: FactHints): Promise<string>;
}
