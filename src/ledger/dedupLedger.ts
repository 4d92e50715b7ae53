/**
 * DedupLedger — answers "was this product already posted?"
 *
 * Two layers:
 * - run memory: every identifier seen or reserved during this process
 * - a LedgerStore for persistable identifiers across runs
 *
 * Deduplication is permanent unless a cooldown is configured, in which
 * case a stored record only blocks until its window has elapsed.
 */

import type { DedupLedgerOptions, PostRecord, ProductIdentifier, RecordMeta } from "@/types";
import type { LedgerStore } from "@/interfaces";

function memoryKey(id: ProductIdentifier): string {
  return `${id.kind}:${id.value}`;
}

export class DedupLedger {
  private readonly published = new Set<string>();
  private readonly inFlight = new Set<string>();
  private readonly cooldownMs: number | null;
  private readonly now: () => Date;

  /**
   * @param store - Persistent backend; null keeps the ledger in memory only
   */
  constructor(
    private readonly store: LedgerStore | null,
    options: DedupLedgerOptions = { cooldownMs: null },
  ) {
    this.cooldownMs =
      options.cooldownMs !== null && options.cooldownMs > 0 ? options.cooldownMs : null;
    this.now = options.now ?? (() => new Date());
  }

  get mode(): "permanent" | "cooldown" {
    return this.cooldownMs === null ? "permanent" : "cooldown";
  }

  private blocksRepost(record: PostRecord): boolean {
    if (this.cooldownMs === null || record.postedAt === null) {
      return true;
    }
    const postedAtMs = Date.parse(record.postedAt);
    if (Number.isNaN(postedAtMs)) {
      return true;
    }
    return this.now().getTime() - postedAtMs < this.cooldownMs;
  }

  /**
   * True when the identifier was posted (within the cooldown window, if
   * any), or is already posted or reserved during this run
   */
  seen(id: ProductIdentifier): boolean {
    const key = memoryKey(id);
    if (this.published.has(key) || this.inFlight.has(key)) {
      return true;
    }
    if (!this.store) {
      return false;
    }
    const record = this.store.get(id.value);
    return record !== null && this.blocksRepost(record);
  }

  /**
   * Check-and-reserve for the current run
   *
   * @returns false when the identifier is seen or already reserved
   */
  claim(id: ProductIdentifier): boolean {
    if (this.seen(id)) {
      return false;
    }
    this.inFlight.add(memoryKey(id));
    return true;
  }

  /**
   * Drop a reservation (publish failed; a later candidate may retry)
   */
  release(id: ProductIdentifier): void {
    this.inFlight.delete(memoryKey(id));
  }

  /**
   * Record a confirmed publish
   *
   * Only call once delivery succeeded.
   */
  record(id: ProductIdentifier, meta: RecordMeta): void {
    const key = memoryKey(id);
    this.inFlight.delete(key);
    this.published.add(key);

    if (!this.store) {
      return;
    }
    this.store.put({
      productId: id.value,
      idKind: id.kind,
      channel: meta.channel,
      affiliateUrl: meta.affiliateUrl,
      postedAt: this.now().toISOString(),
    });
  }
}
