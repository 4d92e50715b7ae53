/**
 * Telegram Bot API constants
 */

export const TELEGRAM_API_BASE_URL = "https://api.telegram.org";

export const TELEGRAM_DEFAULT_TIMEOUT_MS = 20_000;

/**
 * Maximum updates returned by one getUpdates call (Bot API cap)
 */
export const TELEGRAM_UPDATES_LIMIT = 100;

export const TELEGRAM_ALLOWED_UPDATES: readonly string[] = [
  "channel_post",
  "edited_channel_post",
];

/**
 * Photo captions longer than this are rejected by the Bot API
 */
export const TELEGRAM_CAPTION_MAX_LENGTH = 1024;

/**
 * Cursor key used for the getUpdates offset
 */
export const TELEGRAM_CURSOR_SOURCE = "telegram:getUpdates";

/**
 * Posts kept per source channel for re-scanning
 */
export const CHANNEL_POST_RETENTION = 500;
