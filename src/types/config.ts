/**
 * Application configuration type definitions
 *
 * One AppConfig value is built at startup (see @/config) and handed to
 * every component constructor.
 */

import type { StrategyName, RedirectResolveOptions } from "./affiliate";
import type { AliExpressSettings } from "./clients/aliexpress";
import type { LedgerBackend } from "./ledger";
import type { LogLevel } from "./logger";

export type RunMode = "once" | "forever";

export type AffiliateSettings = {
  /** Strategy order; a strategy missing here is disabled */
  strategies: readonly StrategyName[];
  template: string | null;
  prefix: string | null;
  enrichWithProductDetails: boolean;
};

export type TelegramSettings = {
  botToken: string;
  sourceChannels: readonly string[];
  targetChannel: string;
  timeoutMs: number;
};

export type CaptionSettings = {
  /** null disables the caption writer (fallback caption only) */
  openAiApiKey: string | null;
  openAiBaseUrl: string;
  model: string;
  timeoutMs: number;
  buyHereLabel: string;
  defaultHeadline: string;
};

export type RunSettings = {
  mode: RunMode;
  maxMessages: number;
  maxPostsPerRun: number;
  /** Wall-clock budget for one pass; null = unbounded */
  runBudgetMs: number | null;
  maxLinksPerMessage: number;
  postDelayMs: number;
  postDelayJitterMs: number;
};

export type LedgerSettings = {
  backend: LedgerBackend;
  filePath: string;
  /** 0 = permanent deduplication */
  cooldownHours: number;
};

export type AppConfig = Readonly<{
  aliexpress: Readonly<AliExpressSettings>;
  affiliate: Readonly<AffiliateSettings>;
  redirects: Readonly<RedirectResolveOptions>;
  telegram: Readonly<TelegramSettings>;
  captions: Readonly<CaptionSettings>;
  run: Readonly<RunSettings>;
  ledger: Readonly<LedgerSettings>;
  dbPath: string;
  logLevel: LogLevel;
}>;

/**
 * Environment snapshot accepted by loadConfig (process.env shape)
 */
export type EnvSource = Record<string, string | undefined>;
