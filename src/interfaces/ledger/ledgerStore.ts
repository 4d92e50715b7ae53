/**
 * LedgerStore interface
 *
 * Persistent side of the deduplication ledger
 *
 * Lookups are synchronous: both backends read local state.
 */

import type { PostRecord } from "@/types";

export interface LedgerStore {
  /**
   * Latest record of an identifier, or null when never posted
   */
  get(productId: string): PostRecord | null;

  /**
   * Insert or refresh the record of an identifier
   */
  put(record: PostRecord): void;
}
