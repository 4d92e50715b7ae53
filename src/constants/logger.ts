/**
 * Logger constants
 *
 * Log level priority mapping and redaction
 */

import type { LogLevel } from "@/types";

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Meta keys whose values never reach the log output
 * Matched case-insensitively against every key of the meta object
 */
export const REDACTED_META_KEYS: readonly string[] = [
  "app_secret",
  "appsecret",
  "sign",
  "bottoken",
  "token",
  "apikey",
  "api_key",
  "authorization",
];

export const REDACTED_PLACEHOLDER = "[redacted]";
