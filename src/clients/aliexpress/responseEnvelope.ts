/**
 * Response envelope decoding
 *
 * The gateway has shipped several envelope variants. Each body is decoded
 * into one tagged ResponseEnvelope, trying known shapes in priority order:
 *
 *   nested       { <method>_response: { resp_result: { resp_code, result } } }
 *                { <method>_response: { result } }
 *   flat         { resp_result: { result } } | { result }
 *   error        { error_response: { code, msg, sub_code, sub_msg, request_id } }
 *                { code, message, request_id }            (gateway level)
 *   unrecognized anything else (raw payload kept for diagnostics)
 */

import type { ApiResponse, ResponseEnvelope } from "@/types";
import {
  ALIEXPRESS_AUTH_ERROR_MARKERS,
  ALIEXPRESS_RESP_CODE_OK,
  ALIEXPRESS_RAW_SNIPPET_MAX_LENGTH,
} from "@/constants/clients/aliexpress";
import { isRecord, snippet } from "@/utils";
import { AliExpressApiError } from "./apiError";

/**
 * "aliexpress.affiliate.link.generate" -> "aliexpress_affiliate_link_generate_response"
 */
export function responseKeyFor(method: string): string {
  return `${method.replace(/\./g, "_")}_response`;
}

function readText(value: unknown): string | null {
  if (typeof value === "string" && value.length > 0) {
    return value;
  }
  if (typeof value === "number") {
    return String(value);
  }
  return null;
}

function readNumber(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && value.trim() !== "" && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return null;
}

/**
 * Unwrap { resp_result: { resp_code, resp_msg, result } } or { result }
 */
function unwrapResult(
  container: Record<string, unknown>,
): { result: unknown; respCode: number | null; respMsg: string | null } | null {
  const respResult = container.resp_result;
  if (isRecord(respResult)) {
    return {
      result: respResult.result,
      respCode: readNumber(respResult.resp_code),
      respMsg: readText(respResult.resp_msg),
    };
  }
  if ("result" in container) {
    return { result: container.result, respCode: null, respMsg: null };
  }
  return null;
}

/**
 * Method response container: exact key first, then any other *_response key
 */
function findMethodContainer(
  body: Record<string, unknown>,
  method: string,
): Record<string, unknown> | null {
  const exact = body[responseKeyFor(method)];
  if (isRecord(exact)) {
    return exact;
  }
  for (const [key, value] of Object.entries(body)) {
    if (key !== "error_response" && key.endsWith("_response") && isRecord(value)) {
      return value;
    }
  }
  return null;
}

/**
 * Decode a parsed JSON body into a ResponseEnvelope
 */
export function decodeEnvelope(method: string, body: unknown): ResponseEnvelope {
  if (!isRecord(body)) {
    return { shape: "unrecognized", raw: body };
  }

  const container = findMethodContainer(body, method);
  if (container) {
    const unwrapped = unwrapResult(container);
    if (unwrapped) {
      return { shape: "nested", ...unwrapped };
    }
  }

  const flat = unwrapResult(body);
  if (flat) {
    return { shape: "flat", ...flat };
  }

  const errorResponse = body.error_response;
  if (isRecord(errorResponse)) {
    return {
      shape: "error",
      source: "error_response",
      code: readText(errorResponse.code),
      message:
        readText(errorResponse.msg) ??
        readText(errorResponse.sub_msg) ??
        readText(errorResponse.message) ??
        "Unknown error",
      subCode: readText(errorResponse.sub_code),
      requestId: readText(errorResponse.request_id),
    };
  }

  const gatewayCode = readText(body.code);
  const gatewayMessage = readText(body.message) ?? readText(body.msg);
  if (gatewayCode !== null && gatewayCode !== "0" && gatewayMessage !== null) {
    return {
      shape: "error",
      source: "gateway",
      code: gatewayCode,
      message: gatewayMessage,
      subCode: null,
      requestId: readText(body.request_id),
    };
  }

  return { shape: "unrecognized", raw: body };
}

/**
 * Signature / credential failures are reported like any other business
 * error; tell them apart by their codes and messages
 */
export function isAuthError(...fields: Array<string | null>): boolean {
  const haystack = fields
    .filter((f): f is string => f !== null)
    .join(" ")
    .toLowerCase();
  return ALIEXPRESS_AUTH_ERROR_MARKERS.some((marker) => haystack.includes(marker));
}

/**
 * Turn a decoded envelope into a successful response, or throw the
 * classified AliExpressApiError
 */
export function toApiResponse(method: string, envelope: ResponseEnvelope): ApiResponse {
  switch (envelope.shape) {
    case "nested":
    case "flat": {
      if (envelope.respCode !== null && envelope.respCode !== ALIEXPRESS_RESP_CODE_OK) {
        const message = envelope.respMsg ?? `resp_code ${envelope.respCode}`;
        throw new AliExpressApiError({
          kind: isAuthError(message) ? "auth" : "business",
          message,
          method,
          code: String(envelope.respCode),
        });
      }
      return { method, shape: envelope.shape, result: envelope.result };
    }
    case "error":
      throw new AliExpressApiError({
        kind: isAuthError(envelope.code, envelope.subCode, envelope.message)
          ? "auth"
          : "business",
        message: envelope.message,
        method,
        code: envelope.code,
        subCode: envelope.subCode,
        requestId: envelope.requestId,
      });
    case "unrecognized":
      throw new AliExpressApiError({
        kind: "malformed",
        message: "Unrecognized response envelope",
        method,
        raw: snippet(envelope.raw, ALIEXPRESS_RAW_SNIPPET_MAX_LENGTH),
      });
  }
}
