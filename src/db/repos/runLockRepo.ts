/**
 * Run lock repository
 *
 * One row in run_lock marks the process currently allowed to write the
 * ledger. Rows carry an expiry so a crashed process cannot hold the lock
 * forever.
 */

import type { RunLockRow, RunLockAcquireResult } from "@/types";
import { getDb } from "../connection";
import { RUN_LOCK_NAME, RUN_LOCK_TTL_SECONDS } from "@/constants";

/**
 * Acquire the lock, or take over an expired one
 *
 * Atomic across processes: the ON CONFLICT update only fires when the
 * existing row has expired, so changes === 0 means someone else holds it.
 */
export function acquireRunLock(
  ownerId: string,
  ttlSeconds: number = RUN_LOCK_TTL_SECONDS,
): RunLockAcquireResult {
  let changes: number;
  try {
    changes = getDb()
      .prepare(
        `
      INSERT INTO run_lock (lock_name, owner_id, acquired_at, expires_at)
      VALUES (?, ?, datetime('now'), datetime('now', '+' || ? || ' seconds'))
      ON CONFLICT(lock_name) DO UPDATE SET
        owner_id = excluded.owner_id,
        acquired_at = excluded.acquired_at,
        expires_at = excluded.expires_at,
        updated_at = datetime('now')
      WHERE datetime('now') >= run_lock.expires_at
    `,
      )
      .run(RUN_LOCK_NAME, ownerId, ttlSeconds).changes;
  } catch (err) {
    if (err instanceof Error && err.message.includes("not opened")) {
      return { ok: false, reason: "DB_NOT_OPEN" };
    }
    return { ok: false, reason: "UNKNOWN" };
  }

  return changes > 0 ? { ok: true } : { ok: false, reason: "LOCKED" };
}

/**
 * Push the expiry forward while a long pass is running
 *
 * @returns false when the lock is not held by ownerId
 */
export function refreshRunLock(
  ownerId: string,
  ttlSeconds: number = RUN_LOCK_TTL_SECONDS,
): boolean {
  const result = getDb()
    .prepare(
      `
    UPDATE run_lock
    SET expires_at = datetime('now', '+' || ? || ' seconds'),
        updated_at = datetime('now')
    WHERE lock_name = ? AND owner_id = ?
  `,
    )
    .run(ttlSeconds, RUN_LOCK_NAME, ownerId);
  return result.changes > 0;
}

/**
 * @returns false when the lock is not held by ownerId
 */
export function releaseRunLock(ownerId: string): boolean {
  const result = getDb()
    .prepare("DELETE FROM run_lock WHERE lock_name = ? AND owner_id = ?")
    .run(RUN_LOCK_NAME, ownerId);
  return result.changes > 0;
}

export function getRunLock(): RunLockRow | null {
  const row = getDb()
    .prepare("SELECT * FROM run_lock WHERE lock_name = ?")
    .get(RUN_LOCK_NAME) as RunLockRow | undefined;
  return row ?? null;
}
