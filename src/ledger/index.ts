/**
 * Deduplication ledger barrel exports and backend selection
 */

import type { LedgerSettings } from "@/types";
import type { LedgerStore } from "@/interfaces";
import { MS_PER_HOUR } from "@/constants";
import { DedupLedger } from "./dedupLedger";
import { FileLedgerStore } from "./fileLedgerStore";
import { SqliteLedgerStore } from "./sqliteLedgerStore";

export { DedupLedger } from "./dedupLedger";
export { FileLedgerStore, parseLedgerLine, formatLedgerLine } from "./fileLedgerStore";
export { SqliteLedgerStore } from "./sqliteLedgerStore";

export function createLedgerStore(settings: Pick<LedgerSettings, "backend" | "filePath">): LedgerStore {
  return settings.backend === "file"
    ? new FileLedgerStore(settings.filePath)
    : new SqliteLedgerStore();
}

/**
 * Ledger for one process (SQLite backend requires an open database)
 */
export function createLedger(settings: LedgerSettings, now?: () => Date): DedupLedger {
  return new DedupLedger(createLedgerStore(settings), {
    cooldownMs: settings.cooldownHours > 0 ? settings.cooldownHours * MS_PER_HOUR : null,
    now,
  });
}
