/**
 * HTTP client wrapper — general-purpose JSON/form client using native fetch
 * Supports timeouts, query params, form bodies, retries with exponential
 * backoff, and structured error handling
 */

import type { FinalUrlRequest, FinalUrlResponse, HttpRequest } from "@/types";
import { HttpError, isTransportError, maskUrlCredentials } from "./httpError";
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_JSON_HEADERS,
  DEFAULT_FORM_HEADERS,
  ERROR_BODY_SNIPPET_MAX_LENGTH,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_MAX_DELAY_MS,
  DEFAULT_MAX_RETRY_AFTER_MS,
  RETRYABLE_HTTP_METHODS,
  RETRYABLE_STATUS_CODES,
  REDIRECT_USER_AGENT,
} from "@/constants/clients/http";
import { retryWithBackoff } from "@/utils/retry";
import * as logger from "@/logger";

/**
 * Build URL with query parameters (supports arrays for repeated params)
 */
function buildUrl(
  baseUrl: string,
  query?: Record<string, string | number | boolean | Array<string | number | boolean>>,
): string {
  if (!query || Object.keys(query).length === 0) {
    return baseUrl;
  }

  const url = new URL(baseUrl);
  Object.entries(query).forEach(([key, value]) => {
    if (Array.isArray(value)) {
      value.forEach((item) => url.searchParams.append(key, String(item)));
    } else {
      url.searchParams.append(key, String(value));
    }
  });

  return url.toString();
}

/**
 * Extract a snippet of the error response body for debugging
 */
async function extractBodySnippet(response: Response): Promise<string | undefined> {
  try {
    const text = await response.text();
    if (!text) {
      return undefined;
    }
    return text.length > ERROR_BODY_SNIPPET_MAX_LENGTH
      ? text.substring(0, ERROR_BODY_SNIPPET_MAX_LENGTH) + "..."
      : text;
  } catch {
    return undefined;
  }
}

/**
 * Check if an error is retryable
 * Returns true for network errors, timeouts, and retryable HTTP status codes
 * on idempotent methods
 */
function isErrorRetryable(error: unknown, method: string): boolean {
  if (!RETRYABLE_HTTP_METHODS.includes(method)) {
    return false;
  }

  if (error instanceof HttpError) {
    return RETRYABLE_STATUS_CODES.includes(error.status);
  }

  return isTransportError(error);
}

/**
 * Parse Retry-After header value
 * Supports both delay-seconds (number) and HTTP-date formats
 * Returns delay in milliseconds, or null if invalid/missing
 */
function parseRetryAfter(retryAfterHeader: string | null): number | null {
  if (!retryAfterHeader) {
    return null;
  }

  const seconds = parseInt(retryAfterHeader, 10);
  if (!isNaN(seconds) && seconds > 0) {
    return seconds * 1000;
  }

  const date = new Date(retryAfterHeader);
  if (!isNaN(date.getTime())) {
    const delayMs = date.getTime() - Date.now();
    return delayMs > 0 ? delayMs : null;
  }

  return null;
}

/**
 * Retry-After delay for 429/503 responses, clamped to maxRetryAfterMs
 */
function retryAfterDelay(error: unknown, maxRetryAfterMs: number): number | null {
  if (!(error instanceof HttpError) || !error.headers) {
    return null;
  }
  if (error.status !== 429 && error.status !== 503) {
    return null;
  }
  const retryAfterMs = parseRetryAfter(error.headers.get("retry-after"));
  return retryAfterMs === null ? null : Math.min(retryAfterMs, maxRetryAfterMs);
}

/**
 * Build headers and body for a request - defaults first, caller headers override
 */
function buildInit(req: HttpRequest, signal: AbortSignal): RequestInit {
  const headers: Record<string, string> = {};
  let body: string | undefined;

  if (req.form) {
    Object.assign(headers, DEFAULT_FORM_HEADERS);
    body = new URLSearchParams(req.form).toString();
  } else if (req.json !== undefined) {
    Object.assign(headers, DEFAULT_JSON_HEADERS);
    body = JSON.stringify(req.json);
  }
  Object.assign(headers, req.headers);

  return { method: req.method, headers, body, signal };
}

/**
 * Perform a single HTTP request attempt (no retries)
 */
async function performRequest<T>(
  req: HttpRequest,
  url: string,
  timeoutMs: number,
): Promise<T> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, buildInit(req, controller.signal));

    if (!response.ok) {
      const bodySnippet = await extractBodySnippet(response);
      throw new HttpError({
        status: response.status,
        statusText: response.statusText,
        url,
        bodySnippet,
        headers: response.headers,
      });
    }

    // Caller parses the body itself (e.g. to classify non-JSON payloads)
    if (req.responseType === "text") {
      return (await response.text()) as unknown as T;
    }

    if (response.status === 204) {
      return undefined as T;
    }

    const contentType = response.headers.get("content-type");
    const isJson =
      contentType && (contentType.includes("application/json") || contentType.includes("+json"));

    if (!isJson) {
      logger.warn("Non-JSON response received", {
        method: req.method,
        url: maskUrlCredentials(url),
        status: response.status,
        contentType: contentType || "none",
      });
      const text = await response.text();
      return text as unknown as T;
    }

    try {
      const data = await response.json();
      return data as T;
    } catch (parseError) {
      logger.warn("JSON parse failed", {
        method: req.method,
        url: maskUrlCredentials(url),
        status: response.status,
        error: parseError instanceof Error ? parseError.message : String(parseError),
      });
      return undefined as T;
    }
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Perform an HTTP request with timeout, retries, and error handling
 *
 * Retries are only performed for idempotent methods (GET, HEAD) on:
 * - Network errors (no response received)
 * - Timeout errors
 * - HTTP 408 (Request Timeout)
 * - HTTP 429 (Too Many Requests) - respects Retry-After header
 * - HTTP 5xx (Server errors)
 *
 * @template T - Expected response type
 * @throws {HttpError} On non-2xx status codes (after all retries exhausted)
 * @throws {Error} On network errors or timeouts (after all retries exhausted)
 */
export async function httpRequest<T>(req: HttpRequest): Promise<T> {
  const timeoutMs = req.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  const url = buildUrl(req.url, req.query);
  const maxRetryAfterMs = req.retry?.maxRetryAfterMs ?? DEFAULT_MAX_RETRY_AFTER_MS;

  return retryWithBackoff(() => performRequest<T>(req, url, timeoutMs), {
    policy: {
      maxAttempts: req.retry?.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
      baseDelayMs: req.retry?.baseDelayMs ?? DEFAULT_BASE_DELAY_MS,
      maxDelayMs: req.retry?.maxDelayMs ?? DEFAULT_MAX_DELAY_MS,
    },
    isRetryable: (error) => isErrorRetryable(error, req.method),
    delayOverride: (error) => retryAfterDelay(error, maxRetryAfterMs),
    onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
      logger.debug("Retrying HTTP request", {
        method: req.method,
        url: maskUrlCredentials(req.url),
        attempt,
        maxAttempts,
        delayMs,
        reason: error instanceof HttpError ? `status ${error.status}` : String(error),
      });
    },
  });
}

/**
 * Follow redirects and report the landed URL (single attempt, no retries)
 *
 * The body is never read. Non-2xx statuses are reported, not thrown;
 * transport errors and timeouts are thrown.
 */
export async function fetchFinalUrl(req: FinalUrlRequest): Promise<FinalUrlResponse> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), req.timeoutMs);

  try {
    const response = await fetch(req.url, {
      method: req.method,
      redirect: "follow",
      headers: { "User-Agent": REDIRECT_USER_AGENT },
      signal: controller.signal,
    });
    // Release the connection without downloading the page
    await response.body?.cancel();
    return { url: response.url || req.url, status: response.status };
  } finally {
    clearTimeout(timeoutId);
  }
}
