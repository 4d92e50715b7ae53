/**
 * Micro-logger wrapper — minimal logging with level filtering
 * No external dependencies, wraps console.*
 */

import type { LogLevel, LogMeta, Logger } from "@/types";
import { LOG_LEVELS, REDACTED_META_KEYS, REDACTED_PLACEHOLDER } from "@/constants";

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

let configuredLevel: LogLevel | null = null;

/**
 * Set the level from the loaded configuration (null falls back to env)
 */
export function setLogLevel(level: LogLevel | null): void {
  configuredLevel = level;
}

/**
 * Configured level, else LOG_LEVEL from environment, default to 'info'
 * Env is read on every call so tests take effect
 */
function currentLevelValue(): number {
  if (configuredLevel) {
    return LOG_LEVELS[configuredLevel];
  }
  const raw = (process.env.LOG_LEVEL || "info").toLowerCase();
  return LOG_LEVELS[isLogLevel(raw) ? raw : "info"];
}

/**
 * Replace secret-bearing values (shallow, by key name)
 */
export function redactMeta(meta: LogMeta): LogMeta {
  const out: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    out[key] = REDACTED_META_KEYS.includes(key.toLowerCase())
      ? REDACTED_PLACEHOLDER
      : value;
  }
  return out;
}

/**
 * Format meta object as JSON string
 */
function formatMeta(meta?: LogMeta): string {
  if (!meta || Object.keys(meta).length === 0) {
    return "";
  }
  return " " + JSON.stringify(redactMeta(meta));
}

/**
 * Log message if level is enabled
 */
function log(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LOG_LEVELS[level] < currentLevelValue()) {
    return;
  }

  const timestamp = new Date().toISOString();
  const logMessage = `[${timestamp}] [${level.toUpperCase()}] ${message}${formatMeta(meta)}`;

  switch (level) {
    case "debug":
    case "info":
      console.log(logMessage);
      break;
    case "warn":
      console.warn(logMessage);
      break;
    case "error":
      console.error(logMessage);
      break;
  }
}

export function debug(message: string, meta?: LogMeta): void {
  log("debug", message, meta);
}

export function info(message: string, meta?: LogMeta): void {
  log("info", message, meta);
}

export function warn(message: string, meta?: LogMeta): void {
  log("warn", message, meta);
}

export function error(message: string, meta?: LogMeta): void {
  log("error", message, meta);
}

/**
 * Create a logger with bound context (meta merged into all calls)
 */
export function withContext(context: LogMeta): Logger {
  return {
    debug: (message: string, meta?: LogMeta) =>
      debug(message, { ...context, ...meta }),
    info: (message: string, meta?: LogMeta) =>
      info(message, { ...context, ...meta }),
    warn: (message: string, meta?: LogMeta) =>
      warn(message, { ...context, ...meta }),
    error: (message: string, meta?: LogMeta) =>
      error(message, { ...context, ...meta }),
  };
}

/**
 * Normalize an unknown thrown value into log meta fields
 */
export function errorMeta(err: unknown): LogMeta {
  if (err instanceof Error) {
    return { error: err.message, errorName: err.name };
  }
  return { error: String(err) };
}
