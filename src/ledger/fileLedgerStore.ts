/**
 * LedgerStore over a newline-delimited file
 *
 * Line format: `<productId>\t<postedAt ISO>\t<channel>`. Older files hold
 * one bare id per line; those entries have no timestamp and block
 * reposting permanently. The file is read once and appended on record.
 */

import { appendFileSync, existsSync, mkdirSync, readFileSync } from "fs";
import { dirname } from "path";
import type { PostRecord } from "@/types";
import type { LedgerStore } from "@/interfaces";
import { LEDGER_FILE_SEPARATOR } from "@/constants";

/**
 * The file keeps no kind column; numeric ids are item ids
 */
function inferIdKind(productId: string): PostRecord["idKind"] {
  return /^\d+$/.test(productId) ? "item" : "short";
}

function emptyToNull(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export function parseLedgerLine(line: string): PostRecord | null {
  const [rawId, rawPostedAt, rawChannel] = line.split(LEDGER_FILE_SEPARATOR);
  const productId = rawId.trim();
  if (!productId) {
    return null;
  }

  const postedAt = emptyToNull(rawPostedAt);
  return {
    productId,
    idKind: inferIdKind(productId),
    channel: emptyToNull(rawChannel),
    affiliateUrl: null,
    postedAt: postedAt !== null && !Number.isNaN(Date.parse(postedAt)) ? postedAt : null,
  };
}

export function formatLedgerLine(record: PostRecord): string {
  return [record.productId, record.postedAt ?? "", record.channel ?? ""].join(
    LEDGER_FILE_SEPARATOR,
  );
}

export class FileLedgerStore implements LedgerStore {
  private readonly records = new Map<string, PostRecord>();

  constructor(private readonly filePath: string) {
    this.load();
  }

  get size(): number {
    return this.records.size;
  }

  private load(): void {
    if (!existsSync(this.filePath)) {
      return;
    }
    for (const line of readFileSync(this.filePath, "utf-8").split(/\r?\n/)) {
      const record = parseLedgerLine(line);
      if (record) {
        // Later lines win: a re-post after cooldown appends a newer entry
        this.records.set(record.productId, record);
      }
    }
  }

  get(productId: string): PostRecord | null {
    return this.records.get(productId) ?? null;
  }

  put(record: PostRecord): void {
    mkdirSync(dirname(this.filePath), { recursive: true });
    appendFileSync(this.filePath, `${formatLedgerLine(record)}\n`, "utf-8");
    this.records.set(record.productId, record);
  }
}
