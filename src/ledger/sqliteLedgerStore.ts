/**
 * LedgerStore over the posted_products table
 */

import type { PostRecord, PostedProductRow } from "@/types";
import type { LedgerStore } from "@/interfaces";
import { getPostedProduct, upsertPostedProduct } from "@/db";

function toIdKind(value: string): PostRecord["idKind"] {
  return value === "short" || value === "digits" ? value : "item";
}

function toPostRecord(row: PostedProductRow): PostRecord {
  return {
    productId: row.product_id,
    idKind: toIdKind(row.id_kind),
    channel: row.channel,
    affiliateUrl: row.affiliate_url,
    postedAt: row.posted_at,
  };
}

export class SqliteLedgerStore implements LedgerStore {
  get(productId: string): PostRecord | null {
    const row = getPostedProduct(productId);
    return row ? toPostRecord(row) : null;
  }

  put(record: PostRecord): void {
    upsertPostedProduct({
      product_id: record.productId,
      id_kind: record.idKind,
      channel: record.channel,
      affiliate_url: record.affiliateUrl,
      posted_at: record.postedAt ?? new Date().toISOString(),
    });
  }
}
