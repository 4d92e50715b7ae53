/**
 * In-process stand-ins for the pipeline collaborators
 */

import type {
  AppConfig,
  EnvSource,
  FactHints,
  FinalUrlRequest,
  FinalUrlResponse,
  PostRecord,
  SourceMedia,
  SourceMessage,
} from "@/types";
import type { CaptionWriter, DeliveryClient, LedgerStore, MessageSource } from "@/interfaces";
import { loadConfig } from "@/config";

export const TEST_ENV: EnvSource = {
  TELEGRAM_BOT_TOKEN: "test-token",
  TG_SOURCE_CHANNELS: "@deals_source",
  TG_TARGET_CHANNEL: "@deals_target",
  AFFILIATE_STRATEGIES: "template,prefix",
  AFFILIATE_TEMPLATE: "https://portal.example.com/track?url={url}",
  POST_DELAY_MS: "0",
};

/**
 * AppConfig from the test environment plus overrides
 */
export function testConfig(env: EnvSource = {}): AppConfig {
  return loadConfig({ ...TEST_ENV, ...env });
}

let messageCounter = 0;

export function makeMessage(
  text: string,
  overrides: Partial<SourceMessage> = {},
): SourceMessage {
  messageCounter++;
  return {
    id: `msg-${messageCounter}`,
    text,
    media: null,
    viewCount: null,
    timestamp: "2024-01-01T00:00:00.000Z",
    ...overrides,
  };
}

export class FakeMessageSource implements MessageSource {
  readonly calls: Array<{ channel: string; limit: number }> = [];
  private readonly failures = new Map<string, Error>();

  constructor(private readonly messages: Record<string, SourceMessage[]>) {}

  failChannel(channel: string, error: Error): void {
    this.failures.set(channel, error);
  }

  async fetchMessages(channel: string, limit: number): Promise<SourceMessage[]> {
    this.calls.push({ channel, limit });
    const failure = this.failures.get(channel);
    if (failure) {
      throw failure;
    }
    return (this.messages[channel] ?? []).slice(0, limit);
  }
}

export class FakeDelivery implements DeliveryClient {
  readonly published: Array<{ text: string; media: SourceMedia | null }> = [];
  private pendingFailures: Error[] = [];

  failNext(error: Error): void {
    this.pendingFailures.push(error);
  }

  async publish(text: string, media: SourceMedia | null): Promise<void> {
    const failure = this.pendingFailures.shift();
    if (failure) {
      throw failure;
    }
    this.published.push({ text, media });
  }
}

export class FakeCaptionWriter implements CaptionWriter {
  readonly calls: Array<{ rawText: string; affiliateLink: string; hints: FactHints }> = [];

  constructor(private readonly reply: string | Error) {}

  async rewrite(rawText: string, affiliateLink: string, hints: FactHints): Promise<string> {
    this.calls.push({ rawText, affiliateLink, hints });
    if (this.reply instanceof Error) {
      throw this.reply;
    }
    return this.reply;
  }
}

export class MemoryLedgerStore implements LedgerStore {
  readonly records = new Map<string, PostRecord>();

  get(productId: string): PostRecord | null {
    return this.records.get(productId) ?? null;
  }

  put(record: PostRecord): void {
    this.records.set(record.productId, record);
  }
}

/**
 * fetchFinalUrl stand-in: known URLs land on their mapped target,
 * everything else lands on itself
 */
export function createFakeRedirects(landings: Record<string, string> = {}) {
  const calls: FinalUrlRequest[] = [];
  const fetchFinalUrl = async (req: FinalUrlRequest): Promise<FinalUrlResponse> => {
    calls.push(req);
    return { url: landings[req.url] ?? req.url, status: 200 };
  };
  return { fetchFinalUrl, calls };
}

export const noSleep = async (_ms: number): Promise<void> => {};
