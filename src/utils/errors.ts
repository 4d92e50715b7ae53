/**
 * Error helpers shared by the runner and pipeline
 */

import { ERROR_MESSAGE_MAX_LENGTH } from "@/constants";

/**
 * Extract a short error message for logs and run notes
 */
export function getErrorMessage(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return message.length > ERROR_MESSAGE_MAX_LENGTH
    ? message.substring(0, ERROR_MESSAGE_MAX_LENGTH - 3) + "..."
    : message;
}

/**
 * Truncate a raw payload for diagnostics
 */
export function snippet(value: unknown, maxLength: number): string {
  let text: string;
  try {
    text = typeof value === "string" ? value : JSON.stringify(value);
  } catch {
    text = String(value);
  }
  if (text === undefined) {
    return "undefined";
  }
  return text.length > maxLength ? text.substring(0, maxLength) + "..." : text;
}

/**
 * Narrow an unknown value to a plain object
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
