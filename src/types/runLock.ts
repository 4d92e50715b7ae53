/**
 * Run lock type definitions
 */

/**
 * run_lock row
 */
export type RunLockRow = {
  lock_name: string;
  /** Process identifier (UUID) */
  owner_id: string;
  acquired_at: string;
  expires_at: string;
  updated_at: string;
};

export type RunLockAcquireResult =
  | { ok: true }
  | { ok: false; reason: "LOCKED" | "DB_NOT_OPEN" | "UNKNOWN" };
