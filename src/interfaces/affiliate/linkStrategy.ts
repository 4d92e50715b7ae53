/**
 * LinkStrategy interface
 *
 * One way of producing a commercial link
 *
 * The Affiliate Link Builder walks an ordered list of strategies and stops
 * at the first output that passes the product-specific link check, so
 * adding, reordering or disabling a strategy is a list change.
 */

import type { StrategyName } from "@/types";

export interface LinkStrategy {
  readonly name: StrategyName;

  /**
   * Produce a candidate link for a cleaned product URL
   *
   * @param cleanUrl - Normalized (and resolved) product URL
   * @returns Candidate link, or null when the strategy has nothing to offer
   */
  attempt(cleanUrl: string): Promise<string | null>;
}
