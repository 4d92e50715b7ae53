/**
 * AliExpress affiliate API constants
 *
 * Gateway, methods, system parameters
 */

import type { RetryPolicy } from "@/types";

export const ALIEXPRESS_DEFAULT_ENDPOINT = "https://api-sg.aliexpress.com/sync";

export const ALIEXPRESS_METHOD_LINK_GENERATE = "aliexpress.affiliate.link.generate";

export const ALIEXPRESS_METHOD_PRODUCT_DETAIL = "aliexpress.affiliate.productdetail.get";

/**
 * Fixed system parameter values
 */
export const ALIEXPRESS_FORMAT = "json";
export const ALIEXPRESS_SIGN_METHOD = "md5";
export const ALIEXPRESS_API_VERSION = "2.0";

export const ALIEXPRESS_DEFAULT_TIMEOUT_MS = 15_000;

export const ALIEXPRESS_DEFAULT_TRACKING_ID = "default";

export const ALIEXPRESS_DEFAULT_PROMOTION_LINK_TYPE = "0";

export const ALIEXPRESS_DEFAULT_TARGET_CURRENCY = "USD";
export const ALIEXPRESS_DEFAULT_TARGET_LANGUAGE = "EN";

/**
 * Provider time for "datetime" timestamps (GMT+8)
 */
export const ALIEXPRESS_DEFAULT_UTC_OFFSET_MINUTES = 480;

/**
 * Retry policy for transient failures of a signed call
 * Business and auth errors are never retried
 */
export const ALIEXPRESS_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 8_000,
};

/**
 * resp_result.resp_code meaning success
 */
export const ALIEXPRESS_RESP_CODE_OK = 200;

/**
 * Markers of signature / credential errors (matched case-insensitively
 * against code, sub_code and message)
 */
export const ALIEXPRESS_AUTH_ERROR_MARKERS: readonly string[] = [
  "incompletesignature",
  "invalidsignature",
  "invalid signature",
  "invalidappkey",
  "invalid app",
  "appkey",
  "app key",
  "isv.appkey",
  "invalidsession",
  "missingsignature",
];

/**
 * Maximum length of raw payload snippets kept in logs
 */
export const ALIEXPRESS_RAW_SNIPPET_MAX_LENGTH = 500;
