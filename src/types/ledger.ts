/**
 * Deduplication ledger type definitions
 */

import type { ProductIdKind } from "./affiliate";

/**
 * A product identifier that reached the target feed
 */
export type PostRecord = {
  productId: string;
  idKind: ProductIdKind;
  channel: string | null;
  affiliateUrl: string | null;
  /** ISO 8601; null for legacy entries without a timestamp */
  postedAt: string | null;
};

export type LedgerBackend = "sqlite" | "file";

/**
 * Metadata stored with each recorded identifier
 */
export type RecordMeta = {
  channel: string;
  affiliateUrl: string;
};

export type DedupLedgerOptions = {
  /** null = permanent deduplication */
  cooldownMs: number | null;
  now?: () => Date;
};
