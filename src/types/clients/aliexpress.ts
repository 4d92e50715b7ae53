/**
 * AliExpress affiliate API type definitions
 *
 * Raw wire shapes are typed loosely (every field optional) since the
 * gateway has shipped several envelope variants over time.
 */

export type TimestampFormat = "millis" | "datetime";

/** String parameters of a signed request (system + call-specific) */
export type ApiParams = Record<string, string>;

export type ApiErrorKind = "transient" | "auth" | "business" | "malformed";

/**
 * Known response envelope shapes, tried in this order
 */
export type ResponseEnvelope =
  | {
      shape: "nested";
      result: unknown;
      respCode: number | null;
      respMsg: string | null;
    }
  | {
      shape: "flat";
      result: unknown;
      respCode: number | null;
      respMsg: string | null;
    }
  | {
      shape: "error";
      source: "error_response" | "gateway";
      code: string | null;
      message: string;
      subCode: string | null;
      requestId: string | null;
    }
  | { shape: "unrecognized"; raw: unknown };

export type SuccessEnvelope = Extract<ResponseEnvelope, { shape: "nested" | "flat" }>;

export type ApiResponse = {
  method: string;
  shape: SuccessEnvelope["shape"];
  result: unknown;
};

export type AliExpressSettings = {
  appKey: string;
  appSecret: string;
  endpoint: string;
  trackingId: string;
  timestampFormat: TimestampFormat;
  /** Offset applied to "datetime" timestamps, in minutes east of UTC */
  timestampUtcOffsetMinutes: number;
  promotionLinkType: string;
  targetCurrency: string;
  targetLanguage: string;
  timeoutMs: number;
};

export type PromotionLink = {
  sourceValue: string;
  promotionLink: string;
};

export type ProductDetails = {
  productId: string;
  title: string | null;
  salePrice: string | null;
  currency: string | null;
  imageUrl: string | null;
  promotionLink: string | null;
};
