/**
 * AliExpressClient — signed request client for the affiliate gateway
 *
 * Builds the full parameter set (system + call-specific), signs it,
 * POSTs it form-encoded and classifies the outcome:
 * - transient (transport, timeout, 408/429/5xx, non-JSON body): retried
 *   by the shared retry policy
 * - auth / business: returned at once (retrying burns quota)
 * - malformed: returned with the raw payload snippet
 */

import type {
  AliExpressSettings,
  ApiParams,
  ApiResponse,
  HttpRequestFn,
  Logger,
  PromotionLink,
  ProductDetails,
  RetryPolicy,
} from "@/types";
import { httpRequest as defaultHttpRequest, HttpError } from "@/clients/http";
import { RETRYABLE_STATUS_CODES } from "@/constants/clients/http";
import {
  ALIEXPRESS_API_VERSION,
  ALIEXPRESS_FORMAT,
  ALIEXPRESS_METHOD_LINK_GENERATE,
  ALIEXPRESS_METHOD_PRODUCT_DETAIL,
  ALIEXPRESS_RETRY_POLICY,
  ALIEXPRESS_SIGN_METHOD,
} from "@/constants/clients/aliexpress";
import { retryWithBackoff } from "@/utils/retry";
import { getErrorMessage } from "@/utils";
import { AliExpressApiError } from "./apiError";
import { decodeEnvelope, toApiResponse } from "./responseEnvelope";
import { formatTimestamp, signParams } from "./signing";
import { mapProductDetails, mapPromotionLinks } from "./mappers";
import * as logger from "@/logger";

export type ApiResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: AliExpressApiError };

export interface AliExpressClientConfig {
  settings: AliExpressSettings;

  /**
   * Optional HTTP request function (for testing/mocking)
   * Defaults to production httpRequest implementation
   */
  httpRequest?: HttpRequestFn;

  /** Override of the transient-failure retry policy */
  retryPolicy?: RetryPolicy;

  /** Optional sleep (tests pass a no-op to skip backoff waits) */
  sleep?: (ms: number) => Promise<void>;

  /** Clock for the timestamp parameter */
  now?: () => Date;

  logger?: Logger;
}

/**
 * Parse a response body; anything that is not JSON is a transient failure
 * (gateways answer with HTML error pages under load)
 */
function parseBody(method: string, raw: unknown): unknown {
  if (typeof raw !== "string") {
    return raw;
  }
  try {
    return JSON.parse(raw);
  } catch {
    throw new AliExpressApiError({
      kind: "transient",
      message: "Non-JSON response body",
      method,
      raw: raw.substring(0, 200),
    });
  }
}

/**
 * Classify a failure of the HTTP layer
 */
function classifyHttpFailure(method: string, error: unknown): AliExpressApiError {
  if (error instanceof HttpError) {
    return new AliExpressApiError({
      kind: RETRYABLE_STATUS_CODES.includes(error.status) ? "transient" : "business",
      message: `HTTP ${error.status} ${error.statusText}`,
      method,
      code: String(error.status),
      raw: error.bodySnippet,
    });
  }
  return new AliExpressApiError({
    kind: "transient",
    message: getErrorMessage(error),
    method,
  });
}

export class AliExpressClient {
  private readonly settings: AliExpressSettings;
  private readonly httpRequest: HttpRequestFn;
  private readonly retryPolicy: RetryPolicy;
  private readonly sleep?: (ms: number) => Promise<void>;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(config: AliExpressClientConfig) {
    const { settings } = config;

    if (!settings.appKey || !settings.appSecret) {
      const missing: string[] = [];
      if (!settings.appKey) missing.push("ALIEXPRESS_APP_KEY");
      if (!settings.appSecret) missing.push("ALIEXPRESS_APP_SECRET");
      throw new Error(
        `AliExpress authentication configuration missing: ${missing.join(", ")}`,
      );
    }

    this.settings = settings;
    this.httpRequest = config.httpRequest ?? defaultHttpRequest;
    this.retryPolicy = config.retryPolicy ?? ALIEXPRESS_RETRY_POLICY;
    this.sleep = config.sleep;
    this.now = config.now ?? (() => new Date());
    this.log = config.logger ?? logger.withContext({ component: "aliexpressClient" });
  }

  /**
   * Full signed parameter set for one request
   * System parameters win over call-specific ones with the same key.
   */
  buildSignedParams(method: string, params: ApiParams): ApiParams {
    const unsigned: ApiParams = {
      ...params,
      app_key: this.settings.appKey,
      timestamp: formatTimestamp(
        this.now(),
        this.settings.timestampFormat,
        this.settings.timestampUtcOffsetMinutes,
      ),
      format: ALIEXPRESS_FORMAT,
      sign_method: ALIEXPRESS_SIGN_METHOD,
      v: ALIEXPRESS_API_VERSION,
      method,
    };
    return { ...unsigned, sign: signParams(this.settings.appSecret, unsigned) };
  }

  /**
   * One request attempt. Throws a classified AliExpressApiError on failure.
   * Parameters are re-signed per attempt so the timestamp stays fresh.
   */
  private async attempt(method: string, params: ApiParams): Promise<ApiResponse> {
    const form = this.buildSignedParams(method, params);

    let raw: unknown;
    try {
      raw = await this.httpRequest<unknown>({
        method: "POST",
        url: this.settings.endpoint,
        form,
        responseType: "text",
        timeoutMs: this.settings.timeoutMs,
        retry: { maxAttempts: 1 },
      });
    } catch (error) {
      throw classifyHttpFailure(method, error);
    }

    return toApiResponse(method, decodeEnvelope(method, parseBody(method, raw)));
  }

  /**
   * Call a gateway method
   *
   * Never throws: failures come back as { ok: false, error } with the
   * error kind set (transient failures only after retries ran out).
   */
  async call(method: string, params: ApiParams): Promise<ApiResult<ApiResponse>> {
    try {
      const response = await retryWithBackoff(() => this.attempt(method, params), {
        policy: this.retryPolicy,
        isRetryable: (error) => error instanceof AliExpressApiError && error.retryable,
        sleep: this.sleep,
        onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
          this.log.debug("Retrying signed call after transient failure", {
            method,
            attempt,
            maxAttempts,
            delayMs,
            error: getErrorMessage(error),
          });
        },
      });
      return { ok: true, value: response };
    } catch (err) {
      const error =
        err instanceof AliExpressApiError ? err : classifyHttpFailure(method, err);
      this.logFailure(error);
      return { ok: false, error };
    }
  }

  private logFailure(error: AliExpressApiError): void {
    const meta = {
      method: error.method,
      kind: error.kind,
      code: error.code,
      subCode: error.subCode,
      requestId: error.requestId,
      error: error.message,
    };
    switch (error.kind) {
      case "malformed":
        this.log.warn("Unrecognized response shape", { ...meta, raw: error.raw });
        break;
      case "auth":
        this.log.error("Signed call rejected (credentials/signature)", meta);
        break;
      default:
        this.log.warn("Signed call failed", meta);
    }
  }

  /**
   * Convert product URLs into promotion links
   *
   * An empty list is "not found" (the caller falls back), not an error.
   */
  async generateAffiliateLinks(sourceUrls: string[]): Promise<ApiResult<PromotionLink[]>> {
    const result = await this.call(ALIEXPRESS_METHOD_LINK_GENERATE, {
      promotion_link_type: this.settings.promotionLinkType,
      source_values: sourceUrls.join(","),
      tracking_id: this.settings.trackingId,
    });
    if (!result.ok) {
      return result;
    }
    return { ok: true, value: mapPromotionLinks(result.value.result) };
  }

  /**
   * Product lookup used to enrich caption hints
   */
  async getProductDetails(productId: string): Promise<ApiResult<ProductDetails | null>> {
    const result = await this.call(ALIEXPRESS_METHOD_PRODUCT_DETAIL, {
      product_ids: productId,
      target_currency: this.settings.targetCurrency,
      target_language: this.settings.targetLanguage,
      tracking_id: this.settings.trackingId,
    });
    if (!result.ok) {
      return result;
    }
    return { ok: true, value: mapProductDetails(result.value.result) };
  }
}
