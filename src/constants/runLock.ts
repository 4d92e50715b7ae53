/**
 * Run lock constants
 */

/**
 * Single lock guarding the publish ledger
 */
export const RUN_LOCK_NAME = "publish";

/**
 * Lock TTL in seconds; an expired lock can be taken over
 */
export const RUN_LOCK_TTL_SECONDS = 1800;
