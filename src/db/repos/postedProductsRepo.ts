/**
 * Posted products repository
 *
 * Persistent half of the deduplication ledger (posted_products table).
 */

import type { PostedProductRow } from "@/types";
import { getDb } from "../connection";

export type PostedProductInput = {
  product_id: string;
  id_kind: string;
  channel: string | null;
  affiliate_url: string | null;
  posted_at: string;
};

export function getPostedProduct(productId: string): PostedProductRow | null {
  const row = getDb()
    .prepare("SELECT * FROM posted_products WHERE product_id = ?")
    .get(productId) as PostedProductRow | undefined;
  return row ?? null;
}

/**
 * Insert a posted product, or refresh the existing row
 * (a re-post after a cooldown window moves posted_at forward)
 */
export function upsertPostedProduct(input: PostedProductInput): void {
  getDb()
    .prepare(
      `
    INSERT INTO posted_products (product_id, id_kind, channel, affiliate_url, posted_at)
    VALUES (@product_id, @id_kind, @channel, @affiliate_url, @posted_at)
    ON CONFLICT(product_id) DO UPDATE SET
      id_kind = excluded.id_kind,
      channel = excluded.channel,
      affiliate_url = excluded.affiliate_url,
      posted_at = excluded.posted_at
  `,
    )
    .run(input);
}

export function countPostedProducts(): number {
  const row = getDb().prepare("SELECT COUNT(*) AS total FROM posted_products").get() as {
    total: number;
  };
  return row.total;
}
