/**
 * HttpError class — structured error for HTTP failures
 *
 * Separated from types (which should be shapes only).
 */

import type { HttpErrorDetails } from "@/types";

/**
 * Hide credentials carried in the URL path (bot tokens) before the URL
 * reaches a message or log line
 */
export function maskUrlCredentials(url: string): string {
  return url.replace(/\/bot[^/]+\//, "/bot[redacted]/");
}

/**
 * Structured error class for HTTP failures
 * Contains status, URL, and optional response body snippet for debugging
 */
export class HttpError extends Error {
  public readonly status: number;
  public readonly statusText: string;
  public readonly url: string;
  public readonly bodySnippet?: string;
  public readonly headers?: Headers;

  constructor(details: HttpErrorDetails) {
    super(
      `HTTP ${details.status} ${details.statusText} - ${maskUrlCredentials(details.url)}${
        details.bodySnippet ? ` - ${details.bodySnippet}` : ""
      }`,
    );
    this.name = "HttpError";
    this.status = details.status;
    this.statusText = details.statusText;
    this.url = details.url;
    this.bodySnippet = details.bodySnippet;
    this.headers = details.headers;

    // Maintain proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, HttpError);
    }
  }
}

/**
 * Network failure or timeout (no HTTP response received)
 */
export function isTransportError(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === "AbortError" ||
      error.name === "TimeoutError" ||
      error.name === "TypeError")
  );
}
