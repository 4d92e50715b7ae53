/**
 * AliExpressApiError — classified failure of a signed call
 */

import type { ApiErrorKind } from "@/types";

export type AliExpressApiErrorDetails = {
  kind: ApiErrorKind;
  message: string;
  method: string;
  code?: string | null;
  subCode?: string | null;
  requestId?: string | null;
  /** Raw payload snippet (malformed responses) */
  raw?: string;
};

export class AliExpressApiError extends Error {
  public readonly kind: ApiErrorKind;
  public readonly method: string;
  public readonly code: string | null;
  public readonly subCode: string | null;
  public readonly requestId: string | null;
  public readonly raw?: string;

  constructor(details: AliExpressApiErrorDetails) {
    super(`${details.method}: ${details.message}`);
    this.name = "AliExpressApiError";
    this.kind = details.kind;
    this.method = details.method;
    this.code = details.code ?? null;
    this.subCode = details.subCode ?? null;
    this.requestId = details.requestId ?? null;
    this.raw = details.raw;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AliExpressApiError);
    }
  }

  /**
   * Only transport-level failures are worth another attempt
   */
  get retryable(): boolean {
    return this.kind === "transient";
  }
}
