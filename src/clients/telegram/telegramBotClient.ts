/**
 * TelegramBotClient — Bot API adapter for both ends of the relay
 *
 * Read side: getUpdates is global per bot, so every fetch drains pending
 * updates, saves the posts of configured source channels to the
 * ChannelPostStore and only then commits the offset through the
 * CursorStore. fetchMessages returns the newest stored posts of one
 * channel, so posts a capped pass never reached are seen again on the
 * next one (the ledger drops those already published).
 *
 * Write side: sendPhoto when the source had a photo and the text fits a
 * caption, sendMessage otherwise.
 */

import type {
  ChannelPostStore,
  CursorStore,
  HttpRequestFn,
  Logger,
  SourceMedia,
  SourceMessage,
  TelegramMessage,
  TelegramResponse,
  StoredChannelPost,
  TelegramSettings,
  TelegramUpdate,
} from "@/types";
import type { DeliveryClient, MessageSource } from "@/interfaces";
import { httpRequest as defaultHttpRequest, HttpError } from "@/clients/http";
import {
  TELEGRAM_ALLOWED_UPDATES,
  TELEGRAM_API_BASE_URL,
  TELEGRAM_CAPTION_MAX_LENGTH,
  TELEGRAM_CURSOR_SOURCE,
  TELEGRAM_UPDATES_LIMIT,
} from "@/constants/clients/telegram";
import { getErrorMessage, isRecord } from "@/utils";
import { TelegramApiError } from "./telegramApiError";
import { chatMatches, mapTelegramMessage, postOf } from "./mappers";
import * as logger from "@/logger";

export interface TelegramBotClientConfig {
  settings: Pick<TelegramSettings, "botToken" | "sourceChannels" | "targetChannel" | "timeoutMs">;

  /** Where the getUpdates offset survives restarts */
  cursorStore: CursorStore;

  /** Recent posts per source channel, re-read on every fetch */
  postStore: ChannelPostStore;

  /**
   * Optional HTTP request function (for testing/mocking)
   * Defaults to production httpRequest implementation
   */
  httpRequest?: HttpRequestFn;

  logger?: Logger;
}

/**
 * Read the Bot API description out of an error body
 */
function describeHttpError(error: HttpError): string {
  if (error.bodySnippet) {
    try {
      const body: unknown = JSON.parse(error.bodySnippet);
      if (isRecord(body) && typeof body.description === "string") {
        return body.description;
      }
    } catch {
      return error.bodySnippet;
    }
  }
  return error.statusText;
}

export class TelegramBotClient implements MessageSource, DeliveryClient {
  private readonly settings: TelegramBotClientConfig["settings"];
  private readonly cursorStore: CursorStore;
  private readonly httpRequest: HttpRequestFn;
  private readonly postStore: ChannelPostStore;
  private readonly log: Logger;

  constructor(config: TelegramBotClientConfig) {
    if (!config.settings.botToken) {
      throw new Error("Telegram bot token missing: TELEGRAM_BOT_TOKEN");
    }
    this.settings = config.settings;
    this.cursorStore = config.cursorStore;
    this.postStore = config.postStore;
    this.httpRequest = config.httpRequest ?? defaultHttpRequest;
    this.log = config.logger ?? logger.withContext({ component: "telegramBotClient" });
  }

  private methodUrl(method: string): string {
    return `${TELEGRAM_API_BASE_URL}/bot${this.settings.botToken}/${method}`;
  }

  /**
   * Call a Bot API method and unwrap its envelope
   *
   * @throws {TelegramApiError} On { ok: false } envelopes and HTTP errors
   */
  private async call<T>(
    method: string,
    request: { httpMethod: "GET"; query: Record<string, string | number> } | { httpMethod: "POST"; body: unknown },
  ): Promise<T> {
    let response: TelegramResponse<T>;
    try {
      response =
        request.httpMethod === "GET"
          ? await this.httpRequest<TelegramResponse<T>>({
              method: "GET",
              url: this.methodUrl(method),
              query: request.query,
              timeoutMs: this.settings.timeoutMs,
            })
          : await this.httpRequest<TelegramResponse<T>>({
              method: "POST",
              url: this.methodUrl(method),
              json: request.body,
              timeoutMs: this.settings.timeoutMs,
            });
    } catch (err) {
      if (err instanceof HttpError) {
        throw new TelegramApiError(method, err.status, describeHttpError(err));
      }
      throw new TelegramApiError(method, null, getErrorMessage(err));
    }

    if (!isRecord(response)) {
      throw new TelegramApiError(method, null, "Unexpected response body");
    }
    if (!response.ok) {
      throw new TelegramApiError(
        method,
        response.error_code ?? null,
        response.description ?? "Unknown error",
      );
    }
    return response.result;
  }

  private sourceChannelOf(message: TelegramMessage): string | null {
    return this.settings.sourceChannels.find((channel) => chatMatches(message.chat, channel)) ?? null;
  }

  /**
   * Drain pending updates into the post store and commit the offset
   */
  private async pollUpdates(): Promise<void> {
    for (;;) {
      const cursor = this.cursorStore.getCursor(TELEGRAM_CURSOR_SOURCE);
      const query: Record<string, string | number> = {
        limit: TELEGRAM_UPDATES_LIMIT,
        timeout: 0,
        allowed_updates: JSON.stringify(TELEGRAM_ALLOWED_UPDATES),
      };
      if (cursor !== null) {
        query.offset = Number(cursor) + 1;
      }

      const updates = await this.call<TelegramUpdate[]>("getUpdates", {
        httpMethod: "GET",
        query,
      });
      if (updates.length === 0) {
        return;
      }

      let lastUpdateId = cursor !== null ? Number(cursor) : -1;
      const posts: StoredChannelPost[] = [];
      for (const update of updates) {
        lastUpdateId = Math.max(lastUpdateId, update.update_id);
        const post = postOf(update);
        const channel = post ? this.sourceChannelOf(post) : null;
        if (post && channel) {
          posts.push({
            channel,
            messageId: post.message_id,
            date: post.date,
            message: mapTelegramMessage(post),
          });
        }
      }
      // Saved before the offset moves: a crash in between replays the batch
      this.postStore.savePosts(posts);
      this.cursorStore.setCursor(TELEGRAM_CURSOR_SOURCE, String(lastUpdateId));

      this.log.debug("Telegram updates received", {
        count: updates.length,
        stored: posts.length,
        lastUpdateId,
      });

      if (updates.length < TELEGRAM_UPDATES_LIMIT) {
        return;
      }
    }
  }

  async fetchMessages(channel: string, limit: number): Promise<SourceMessage[]> {
    await this.pollUpdates();
    return this.postStore.recentPosts(channel, limit);
  }

  async publish(text: string, media: SourceMedia | null): Promise<void> {
    const chatId = this.settings.targetChannel;

    if (media && text.length <= TELEGRAM_CAPTION_MAX_LENGTH) {
      await this.call<TelegramMessage>("sendPhoto", {
        httpMethod: "POST",
        body: { chat_id: chatId, photo: media.ref, caption: text },
      });
      return;
    }

    await this.call<TelegramMessage>("sendMessage", {
      httpMethod: "POST",
      body: {
        chat_id: chatId,
        text,
        link_preview_options: { is_disabled: false },
      },
    });
  }
}
