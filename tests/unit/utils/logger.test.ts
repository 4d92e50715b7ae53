/**
 * Unit tests for the micro-logger
 */

import { describe, it, expect, afterEach, vi } from "vitest";
import * as logger from "@/logger";

describe("logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    logger.setLogLevel(null);
  });

  it("redacts secret-bearing meta keys", () => {
    expect(
      logger.redactMeta({ sign: "ABC", appSecret: "test-secret", Authorization: "Bearer x", url: "u" }),
    ).toEqual({ sign: "[redacted]", appSecret: "[redacted]", Authorization: "[redacted]", url: "u" });
  });

  it("filters messages below LOG_LEVEL", () => {
    vi.stubEnv("LOG_LEVEL", "warn");
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    logger.info("hidden");
    logger.warn("shown", { channel: "@deals_source" });

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0]?.[0])).toMatch(
      /^\[.+\] \[WARN\] shown \{"channel":"@deals_source"\}$/,
    );
  });

  it("prefers the configured level over LOG_LEVEL", () => {
    vi.stubEnv("LOG_LEVEL", "debug");
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    logger.setLogLevel("error");
    logger.info("hidden");
    logger.error("shown");
    logger.setLogLevel(null);
    logger.debug("env level again");

    expect(error).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledTimes(1);
    expect(String(log.mock.calls[0]?.[0])).toMatch(/\[DEBUG\] env level again$/);
  });

  it("merges bound context into every call", () => {
    vi.stubEnv("LOG_LEVEL", "debug");
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    logger.withContext({ component: "test" }).debug("hello", { n: 1 });

    expect(String(log.mock.calls[0]?.[0])).toMatch(/\[DEBUG\] hello \{"component":"test","n":1\}$/);
  });

  it("normalizes thrown values into meta", () => {
    expect(logger.errorMeta(new TypeError("bad"))).toEqual({ error: "bad", errorName: "TypeError" });
    expect(logger.errorMeta("plain")).toEqual({ error: "plain" });
  });
});
