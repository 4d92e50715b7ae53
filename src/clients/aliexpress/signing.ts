/**
 * Request signing for the AliExpress affiliate gateway
 *
 * sign = UPPER(HEX(MD5(secret + k1v1k2v2... + secret))) over every
 * transmitted parameter except `sign` itself, keys sorted lexicographically.
 * The signed set and the transmitted set must be identical.
 */

import { createHash } from "crypto";
import type { ApiParams, TimestampFormat } from "@/types";

const SIGN_PARAM = "sign";

/**
 * Build the string that gets digested
 */
export function buildSignBase(secret: string, params: ApiParams): string {
  const concatenated = Object.keys(params)
    .filter((key) => key !== SIGN_PARAM)
    .sort()
    .map((key) => `${key}${params[key]}`)
    .join("");
  return `${secret}${concatenated}${secret}`;
}

/**
 * Compute the request signature
 */
export function signParams(secret: string, params: ApiParams): string {
  return createHash("md5")
    .update(buildSignBase(secret, params), "utf8")
    .digest("hex")
    .toUpperCase();
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/**
 * Format the `timestamp` system parameter
 *
 * - millis: epoch milliseconds ("1700000000000")
 * - datetime: "YYYY-MM-DD HH:MM:SS" in the given UTC offset
 */
export function formatTimestamp(
  date: Date,
  format: TimestampFormat,
  utcOffsetMinutes: number,
): string {
  if (format === "millis") {
    return String(date.getTime());
  }

  const shifted = new Date(date.getTime() + utcOffsetMinutes * 60_000);
  return (
    `${shifted.getUTCFullYear()}-${pad2(shifted.getUTCMonth() + 1)}-${pad2(shifted.getUTCDate())} ` +
    `${pad2(shifted.getUTCHours())}:${pad2(shifted.getUTCMinutes())}:${pad2(shifted.getUTCSeconds())}`
  );
}
