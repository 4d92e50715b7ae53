/**
 * Unit tests for TelegramBotClient
 *
 * Bot API calls go through the mock HTTP harness; the getUpdates offset
 * and the channel posts live in in-memory stores.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { TelegramBotClient, TelegramApiError, chatMatches } from "@/clients/telegram";
import type { ChannelPostStore, CursorStore, SourceMessage, StoredChannelPost } from "@/types";
import { createMockHttp, loadFixtureJson, type MockHttp } from "../../helpers/mockHttp";

const API = "https://api.telegram.org/bottest-token";
const EMPTY_UPDATES = { ok: true, result: [] };

class MemoryCursorStore implements CursorStore {
  readonly cursors = new Map<string, string>();

  getCursor(source: string): string | null {
    return this.cursors.get(source) ?? null;
  }

  setCursor(source: string, cursor: string): void {
    this.cursors.set(source, cursor);
  }
}

class MemoryChannelPostStore implements ChannelPostStore {
  readonly posts = new Map<string, StoredChannelPost>();

  savePosts(posts: StoredChannelPost[]): void {
    for (const post of posts) {
      this.posts.set(`${post.channel}:${post.messageId}`, post);
    }
  }

  recentPosts(channel: string, limit: number): SourceMessage[] {
    return [...this.posts.values()]
      .filter((post) => post.channel === channel)
      .sort((a, b) => b.date - a.date || b.messageId - a.messageId)
      .slice(0, limit)
      .map((post) => post.message);
  }
}

describe("TelegramBotClient", () => {
  let mock: MockHttp;
  let cursors: MemoryCursorStore;
  let posts: MemoryChannelPostStore;
  let client: TelegramBotClient;

  beforeEach(() => {
    mock = createMockHttp();
    cursors = new MemoryCursorStore();
    posts = new MemoryChannelPostStore();
    client = new TelegramBotClient({
      settings: {
        botToken: "test-token",
        sourceChannels: ["@deals_source", "-100200"],
        targetChannel: "@deals_target",
        timeoutMs: 1_000,
      },
      cursorStore: cursors,
      postStore: posts,
      httpRequest: mock.request,
    });
  });

  it("should refuse to start without a bot token", () => {
    expect(
      () =>
        new TelegramBotClient({
          settings: { botToken: "", sourceChannels: [], targetChannel: "@t", timeoutMs: 1_000 },
          cursorStore: cursors,
          postStore: posts,
        }),
    ).toThrow("Telegram bot token missing: TELEGRAM_BOT_TOKEN");
  });

  describe("fetchMessages", () => {
    it("should return the channel's posts newest first, mapped", async () => {
      mock.onSequence("GET", `${API}/getUpdates`, [
        { status: 200, body: loadFixtureJson("telegram/get_updates.json") },
        { status: 200, body: EMPTY_UPDATES },
      ]);

      const messages = await client.fetchMessages("@deals_source", 10);

      expect(messages).toEqual([
        {
          id: "-100111:2",
          text: "Lamp deal https://www.aliexpress.com/item/1005001234567890.html",
          media: { kind: "photo", ref: "photo-large" },
          viewCount: null,
          timestamp: "2023-11-14T22:14:20.000Z",
        },
        {
          id: "-100111:1",
          text: "Earbuds deal https://s.click.aliexpress.com/e/_abCD12",
          media: null,
          viewCount: null,
          timestamp: "2023-11-14T22:13:20.000Z",
        },
      ]);
    });

    it("should commit the offset and resume after it", async () => {
      mock.onSequence("GET", `${API}/getUpdates`, [
        { status: 200, body: loadFixtureJson("telegram/get_updates.json") },
        { status: 200, body: EMPTY_UPDATES },
      ]);

      await client.fetchMessages("@deals_source", 10);
      await client.fetchMessages("@deals_source", 10);

      expect(cursors.getCursor("telegram:getUpdates")).toBe("13");
      const [first, second] = mock.getRecordedRequests();
      expect(first.query).toEqual({
        limit: 100,
        timeout: 0,
        allowed_updates: '["channel_post","edited_channel_post"]',
      });
      expect(second.query?.offset).toBe(14);
    });

    it("should keep posts of other source channels for their own fetch", async () => {
      mock.onSequence("GET", `${API}/getUpdates`, [
        { status: 200, body: loadFixtureJson("telegram/get_updates.json") },
        { status: 200, body: EMPTY_UPDATES },
      ]);

      await client.fetchMessages("@deals_source", 10);
      const numeric = await client.fetchMessages("-100200", 10);

      expect(numeric.map((m) => m.id)).toEqual(["-100200:3"]);
      expect(numeric[0].text).toBe("edited post");
    });

    it("should return stored posts again on the next fetch", async () => {
      mock.onSequence("GET", `${API}/getUpdates`, [
        { status: 200, body: loadFixtureJson("telegram/get_updates.json") },
        { status: 200, body: EMPTY_UPDATES },
      ]);

      await client.fetchMessages("@deals_source", 1);
      const again = await client.fetchMessages("@deals_source", 10);

      expect(again.map((m) => m.id)).toEqual(["-100111:2", "-100111:1"]);
    });

    it("should store posts before committing the offset", async () => {
      mock.on("GET", `${API}/getUpdates`, loadFixtureJson("telegram/get_updates.json"));
      const failing = new TelegramBotClient({
        settings: {
          botToken: "test-token",
          sourceChannels: ["@deals_source"],
          targetChannel: "@deals_target",
          timeoutMs: 1_000,
        },
        cursorStore: cursors,
        postStore: {
          savePosts: () => {
            throw new Error("disk full");
          },
          recentPosts: () => [],
        },
        httpRequest: mock.request,
      });

      await expect(failing.fetchMessages("@deals_source", 10)).rejects.toThrow("disk full");
      expect(cursors.getCursor("telegram:getUpdates")).toBeNull();
    });

    it("should skip posts of channels that are not sources", async () => {
      mock.on("GET", `${API}/getUpdates`, loadFixtureJson("telegram/get_updates.json"));

      await client.fetchMessages("@deals_source", 10);

      expect([...posts.posts.keys()].sort()).toEqual(["-100200:3", "@deals_source:1", "@deals_source:2"]);
    });

    it("should cap the result at the limit, keeping the newest", async () => {
      mock.on("GET", `${API}/getUpdates`, loadFixtureJson("telegram/get_updates.json"));

      const messages = await client.fetchMessages("@deals_source", 1);

      expect(messages.map((m) => m.id)).toEqual(["-100111:2"]);
    });

    it("should raise a TelegramApiError for { ok: false } envelopes", async () => {
      mock.on("GET", `${API}/getUpdates`, { ok: false, error_code: 401, description: "Unauthorized" });

      await expect(client.fetchMessages("@deals_source", 10)).rejects.toThrow(
        "Telegram getUpdates failed (401): Unauthorized",
      );
    });

    it("should carry the HTTP status and Bot API description of failed requests", async () => {
      mock.onResponse("GET", `${API}/getUpdates`, {
        status: 429,
        body: { ok: false, error_code: 429, description: "Too Many Requests: retry after 5" },
      });

      const error = await client.fetchMessages("@deals_source", 10).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(TelegramApiError);
      if (error instanceof TelegramApiError) {
        expect(error.status).toBe(429);
        expect(error.description).toBe("Too Many Requests: retry after 5");
      }
    });
  });

  describe("publish", () => {
    it("should send a photo with the text as caption when media fits", async () => {
      mock.on("POST", `${API}/sendPhoto`, { ok: true, result: {} });

      await client.publish("Great lamp", { kind: "photo", ref: "photo-large" });

      const [request] = mock.getRecordedRequests();
      expect(request.json).toEqual({
        chat_id: "@deals_target",
        photo: "photo-large",
        caption: "Great lamp",
      });
    });

    it("should send a text message when the text is too long for a caption", async () => {
      mock.on("POST", `${API}/sendMessage`, { ok: true, result: {} });
      const text = "x".repeat(1025);

      await client.publish(text, { kind: "photo", ref: "photo-large" });

      const [request] = mock.getRecordedRequests();
      expect(request.url).toBe(`${API}/sendMessage`);
      expect(request.json).toEqual({
        chat_id: "@deals_target",
        text,
        link_preview_options: { is_disabled: false },
      });
    });

    it("should send a text message when there is no media", async () => {
      mock.on("POST", `${API}/sendMessage`, { ok: true, result: {} });

      await client.publish("Great lamp", null);

      expect(mock.getRecordedRequests().map((r) => r.url)).toEqual([`${API}/sendMessage`]);
    });

    it("should reject when the Bot API refuses the message", async () => {
      mock.on("POST", `${API}/sendMessage`, {
        ok: false,
        error_code: 400,
        description: "Bad Request: chat not found",
      });

      await expect(client.publish("Great lamp", null)).rejects.toThrow(
        "Telegram sendMessage failed (400): Bad Request: chat not found",
      );
    });
  });
});

describe("chatMatches", () => {
  const chat = { id: -100111, type: "channel", username: "Deals_Source" };

  it("should match by username ignoring case and the @ prefix", () => {
    expect(chatMatches(chat, "@deals_source")).toBe(true);
    expect(chatMatches(chat, "deals_source")).toBe(true);
  });

  it("should match by numeric id", () => {
    expect(chatMatches(chat, "-100111")).toBe(true);
    expect(chatMatches(chat, "-100112")).toBe(false);
  });
});
