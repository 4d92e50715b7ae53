/**
 * Runner/orchestration constants
 */

export const DEFAULT_MAX_MESSAGES = 50;

/**
 * Maximum posts per pass (prevents flooding the target feed)
 */
export const DEFAULT_MAX_POSTS_PER_RUN = 10;

export const DEFAULT_MAX_LINKS_PER_MESSAGE = 1;

/**
 * Pause after each successful publish (milliseconds)
 */
export const DEFAULT_POST_DELAY_MS = 2_000;

/**
 * Minimum sleep between runner cycles (milliseconds)
 * Used in forever mode between runOnce() executions
 */
export const CYCLE_SLEEP_MIN_MS = 300_000; // 5 minutes

/**
 * Maximum sleep between runner cycles (milliseconds)
 */
export const CYCLE_SLEEP_MAX_MS = 900_000; // 15 minutes

/**
 * Sleep before the next cycle after a failed one (milliseconds)
 */
export const CYCLE_ERROR_SLEEP_MS = 120_000; // 2 minutes

/**
 * Maximum length of error messages kept in run notes and logs
 */
export const ERROR_MESSAGE_MAX_LENGTH = 500;
