/**
 * OpenAiCaptionWriter — caption writer over the chat completions endpoint
 */

import type { FactHints, HttpRequestFn, Logger } from "@/types";
import type { CaptionWriter } from "@/interfaces";
import type {
  ChatCompletionRequest,
  ChatCompletionResponse,
} from "@/types/clients/openai";
import { httpRequest as defaultHttpRequest } from "@/clients/http";
import {
  OPENAI_CHAT_COMPLETIONS_PATH,
  OPENAI_MAX_TOKENS,
  OPENAI_SOURCE_TEXT_MAX_LENGTH,
} from "@/constants/clients/openai";
import * as logger from "@/logger";

export interface OpenAiCaptionWriterConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
  timeoutMs: number;

  /**
   * Optional HTTP request function (for testing/mocking)
   * Defaults to production httpRequest implementation
   */
  httpRequest?: HttpRequestFn;

  logger?: Logger;
}

/**
 * Prompt for one caption. The affiliate link is appended later by the
 * assembler, so the model is told to leave links out.
 */
export function buildCaptionPrompt(rawText: string, hints: FactHints): string {
  const lines = [
    "You write short promotional posts for a Telegram deals channel.",
    "Write 2-3 catchy sentences about the product below. Use emoji.",
    "No hashtags, no links, no 'click here'.",
    `Source text: ${rawText.substring(0, OPENAI_SOURCE_TEXT_MAX_LENGTH)}`,
  ];
  if (hints.title) {
    lines.push(`Product: ${hints.title}`);
  }
  if (hints.price) {
    lines.push(`Approximate price: ${hints.price}`);
  }
  return lines.join("\n");
}

export class OpenAiCaptionWriter implements CaptionWriter {
  private readonly config: OpenAiCaptionWriterConfig;
  private readonly httpRequest: HttpRequestFn;
  private readonly log: Logger;

  constructor(config: OpenAiCaptionWriterConfig) {
    if (!config.apiKey) {
      throw new Error("OpenAI API key missing: OPENAI_API_KEY");
    }
    this.config = config;
    this.httpRequest = config.httpRequest ?? defaultHttpRequest;
    this.log = config.logger ?? logger.withContext({ component: "openAiCaptionWriter" });
  }

  /**
   * @throws When the request fails or the completion is empty
   */
  async rewrite(rawText: string, _affiliateLink: string, hints: FactHints): Promise<string> {
    const body: ChatCompletionRequest = {
      model: this.config.model,
      messages: [{ role: "user", content: buildCaptionPrompt(rawText, hints) }],
      max_tokens: OPENAI_MAX_TOKENS,
    };

    const response = await this.httpRequest<ChatCompletionResponse>({
      method: "POST",
      url: `${this.config.baseUrl}${OPENAI_CHAT_COMPLETIONS_PATH}`,
      headers: { Authorization: `Bearer ${this.config.apiKey}` },
      json: body,
      timeoutMs: this.config.timeoutMs,
    });

    const content = response?.choices?.[0]?.message?.content?.trim();
    if (!content) {
      throw new Error("Caption completion returned no content");
    }

    this.log.debug("Caption written", { model: this.config.model, length: content.length });
    return content;
  }
}
