/**
 * HTTP client type definitions
 */

import type { RetryPolicy } from "@/types/retry";

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "HEAD";

/**
 * Retry configuration for HTTP requests
 *
 * Every field falls back to the defaults in @/constants/clients/http.
 */
export interface HttpRetryConfig extends Partial<RetryPolicy> {
  /** Maximum time in ms to wait for Retry-After header. Default from constants. */
  maxRetryAfterMs?: number;
}

export type HttpResponseType = "json" | "text";

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean | Array<string | number | boolean>>;
  /** JSON body (serialized with JSON.stringify) */
  json?: unknown;
  /** Form body (sent as application/x-www-form-urlencoded) */
  form?: Record<string, string>;
  /** How to read a successful body. Default: "json" */
  responseType?: HttpResponseType;
  timeoutMs?: number;
  retry?: HttpRetryConfig;
}

/**
 * HTTP request function type for dependency injection
 */
export type HttpRequestFn = <T>(req: HttpRequest) => Promise<T>;

export interface HttpErrorDetails {
  status: number;
  statusText: string;
  url: string;
  bodySnippet?: string;
  headers?: Headers;
}

/**
 * Request for following redirects to the landed URL
 */
export interface FinalUrlRequest {
  url: string;
  method: "HEAD" | "GET";
  timeoutMs: number;
}

export interface FinalUrlResponse {
  /** URL after all redirects were followed */
  url: string;
  status: number;
}

export type FetchFinalUrlFn = (req: FinalUrlRequest) => Promise<FinalUrlResponse>;
