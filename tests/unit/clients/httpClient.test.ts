/**
 * Unit tests for the fetch-based HTTP client
 *
 * fetch is stubbed per test; nothing leaves the process.
 */

import { describe, it, expect, afterEach, vi } from "vitest";
import { HttpError, fetchFinalUrl, httpRequest, maskUrlCredentials } from "@/clients/http";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

const NO_WAIT = { maxAttempts: 2, baseDelayMs: 0, maxDelayMs: 0 };

describe("httpRequest", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should append query parameters and parse JSON", async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => jsonResponse({ value: 1 }));
    vi.stubGlobal("fetch", fetchMock);

    const result = await httpRequest<{ value: number }>({
      method: "GET",
      url: "https://api.example.com/items",
      query: { page: 2, tag: ["a", "b"] },
    });

    expect(result).toEqual({ value: 1 });
    expect(fetchMock.mock.calls[0]?.[0]).toBe("https://api.example.com/items?page=2&tag=a&tag=b");
  });

  it("should send form bodies url-encoded", async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => new Response("ok", { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);

    const text = await httpRequest<string>({
      method: "POST",
      url: "https://api.example.com/form",
      form: { a: "1", b: "two words" },
      responseType: "text",
    });

    expect(text).toBe("ok");
    const init = fetchMock.mock.calls[0]?.[1];
    expect(init?.body).toBe("a=1&b=two+words");
    expect(init?.headers).toEqual({
      "Content-Type": "application/x-www-form-urlencoded;charset=utf-8",
      Accept: "application/json",
    });
  });

  it("should retry idempotent requests on 5xx and then throw HttpError", async () => {
    const fetchMock = vi.fn(async () => new Response("down", { status: 503, statusText: "Service Unavailable" }));
    vi.stubGlobal("fetch", fetchMock);

    const error = await httpRequest({ method: "GET", url: "https://api.example.com/x", retry: NO_WAIT }).catch(
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(HttpError);
    if (error instanceof HttpError) {
      expect(error.status).toBe(503);
      expect(error.bodySnippet).toBe("down");
    }
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("should not retry POST requests", async () => {
    const fetchMock = vi.fn(async () => new Response("down", { status: 503 }));
    vi.stubGlobal("fetch", fetchMock);

    await expect(
      httpRequest({ method: "POST", url: "https://api.example.com/x", json: {}, retry: NO_WAIT }),
    ).rejects.toBeInstanceOf(HttpError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("should not retry 4xx responses", async () => {
    const fetchMock = vi.fn(async () => new Response("missing", { status: 404 }));
    vi.stubGlobal("fetch", fetchMock);

    await expect(
      httpRequest({ method: "GET", url: "https://api.example.com/x", retry: NO_WAIT }),
    ).rejects.toBeInstanceOf(HttpError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});

describe("fetchFinalUrl", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should report the landed URL and status without reading the body", async () => {
    const fetchMock = vi.fn(async () => ({
      url: "https://www.aliexpress.com/item/1005001234567890.html?spm=x",
      status: 200,
      body: null,
    }));
    vi.stubGlobal("fetch", fetchMock);

    const landed = await fetchFinalUrl({
      url: "https://s.click.aliexpress.com/e/_abCD12",
      method: "HEAD",
      timeoutMs: 1_000,
    });

    expect(landed).toEqual({
      url: "https://www.aliexpress.com/item/1005001234567890.html?spm=x",
      status: 200,
    });
  });
});

describe("maskUrlCredentials", () => {
  it("should hide the bot token in Bot API URLs", () => {
    expect(maskUrlCredentials("https://api.telegram.org/bottest-token/getUpdates")).toBe(
      "https://api.telegram.org/bot[redacted]/getUpdates",
    );
  });

  it("should keep the token out of HttpError messages", () => {
    const error = new HttpError({
      status: 401,
      statusText: "Unauthorized",
      url: "https://api.telegram.org/bottest-token/sendMessage",
    });
    expect(error.message).toBe("HTTP 401 Unauthorized - https://api.telegram.org/bot[redacted]/sendMessage");
  });
});
