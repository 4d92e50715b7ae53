/**
 * Unit tests for OpenAiCaptionWriter
 */

import { describe, it, expect, beforeEach } from "vitest";
import { OpenAiCaptionWriter, buildCaptionPrompt } from "@/clients/openai";
import { createMockHttp, type MockHttp } from "../../helpers/mockHttp";

const BASE_URL = "https://llm.example.com/v1";
const COMPLETIONS_URL = `${BASE_URL}/chat/completions`;

describe("buildCaptionPrompt", () => {
  it("should include the hints when present", () => {
    const prompt = buildCaptionPrompt("Lamp deal", { title: "Desk Lamp", price: "12.99 USD" });
    expect(prompt.split("\n").slice(-3)).toEqual([
      "Source text: Lamp deal",
      "Product: Desk Lamp",
      "Approximate price: 12.99 USD",
    ]);
  });

  it("should truncate the source text", () => {
    const prompt = buildCaptionPrompt("a".repeat(500), { title: null, price: null });
    const lastLine = prompt.split("\n").pop();
    expect(lastLine).toBe(`Source text: ${"a".repeat(300)}`);
  });
});

describe("OpenAiCaptionWriter", () => {
  let mock: MockHttp;
  let writer: OpenAiCaptionWriter;

  beforeEach(() => {
    mock = createMockHttp();
    writer = new OpenAiCaptionWriter({
      apiKey: "test-key",
      baseUrl: BASE_URL,
      model: "test-model",
      timeoutMs: 1_000,
      httpRequest: mock.request,
    });
  });

  it("should refuse to start without an API key", () => {
    expect(
      () => new OpenAiCaptionWriter({ apiKey: "", baseUrl: BASE_URL, model: "m", timeoutMs: 1 }),
    ).toThrow("OpenAI API key missing: OPENAI_API_KEY");
  });

  it("should return the trimmed completion", async () => {
    mock.on("POST", COMPLETIONS_URL, {
      choices: [{ index: 0, message: { role: "assistant", content: "  Bright lamp, tiny price 💡  " } }],
    });

    const caption = await writer.rewrite("Lamp deal", "https://s.click.aliexpress.com/e/_x", {
      title: null,
      price: null,
    });

    expect(caption).toBe("Bright lamp, tiny price 💡");
    const [request] = mock.getRecordedRequests();
    expect(request.headers).toEqual({ Authorization: "Bearer test-key" });
    expect(request.json).toEqual({
      model: "test-model",
      messages: [{ role: "user", content: buildCaptionPrompt("Lamp deal", { title: null, price: null }) }],
      max_tokens: 200,
    });
  });

  it("should reject an empty completion", async () => {
    mock.on("POST", COMPLETIONS_URL, { choices: [{ message: { content: "   " } }] });

    await expect(
      writer.rewrite("Lamp deal", "https://s.click.aliexpress.com/e/_x", { title: null, price: null }),
    ).rejects.toThrow("Caption completion returned no content");
  });

  it("should propagate HTTP failures", async () => {
    mock.onResponse("POST", COMPLETIONS_URL, { status: 500, body: "boom" });

    await expect(
      writer.rewrite("Lamp deal", "https://s.click.aliexpress.com/e/_x", { title: null, price: null }),
    ).rejects.toThrow("HTTP 500");
  });
});
