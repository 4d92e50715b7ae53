/**
 * Configuration constants
 *
 * Defaults not owned by a single client
 */

export const DEFAULT_DB_PATH = "data/app.db";

export const DEFAULT_CAPTION_TIMEOUT_MS = 20_000;
