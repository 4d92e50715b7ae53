/**
 * Configuration loader
 *
 * Reads the environment once, validates every field and returns one
 * frozen AppConfig. All problems are collected and reported together.
 */

import type {
  AppConfig,
  EnvSource,
  LedgerBackend,
  LogLevel,
  RunMode,
  StrategyName,
  TimestampFormat,
} from "@/types";
import {
  DEFAULT_BUY_HERE_LABEL,
  DEFAULT_CAPTION_TIMEOUT_MS,
  DEFAULT_DB_PATH,
  DEFAULT_HEADLINE,
  DEFAULT_LEDGER_FILE,
  DEFAULT_MAX_LINKS_PER_MESSAGE,
  DEFAULT_MAX_MESSAGES,
  DEFAULT_MAX_POSTS_PER_RUN,
  DEFAULT_POST_DELAY_MS,
  DEFAULT_REDIRECT_DOMAINS,
  DEFAULT_REDIRECT_TIMEOUT_MS,
  DEFAULT_STRATEGY_ORDER,
  LOG_LEVELS,
} from "@/constants";
import {
  ALIEXPRESS_DEFAULT_ENDPOINT,
  ALIEXPRESS_DEFAULT_PROMOTION_LINK_TYPE,
  ALIEXPRESS_DEFAULT_TARGET_CURRENCY,
  ALIEXPRESS_DEFAULT_TARGET_LANGUAGE,
  ALIEXPRESS_DEFAULT_TIMEOUT_MS,
  ALIEXPRESS_DEFAULT_TRACKING_ID,
  ALIEXPRESS_DEFAULT_UTC_OFFSET_MINUTES,
} from "@/constants/clients/aliexpress";
import { TELEGRAM_DEFAULT_TIMEOUT_MS } from "@/constants/clients/telegram";
import { OPENAI_DEFAULT_BASE_URL, OPENAI_DEFAULT_MODEL } from "@/constants/clients/openai";
import { ConfigError } from "./configError";

const STRATEGY_NAMES: readonly StrategyName[] = ["api", "template", "prefix"];
const TIMESTAMP_FORMATS: readonly TimestampFormat[] = ["millis", "datetime"];
const LEDGER_BACKENDS: readonly LedgerBackend[] = ["sqlite", "file"];
const RUN_MODES: readonly RunMode[] = ["once", "forever"];

function isOneOf<T extends string>(allowed: readonly T[], value: string): value is T {
  return allowed.some((candidate) => candidate === value);
}

/**
 * Typed accessors over the environment that record problems instead of
 * throwing, so one run reports everything wrong at once
 */
class EnvReader {
  readonly problems: string[] = [];

  constructor(private readonly env: EnvSource) {}

  string(name: string): string | null {
    const value = this.env[name]?.trim();
    return value ? value : null;
  }

  required(name: string): string {
    const value = this.string(name);
    if (value === null) {
      this.problems.push(`${name} is required`);
      return "";
    }
    return value;
  }

  int(name: string, fallback: number, min = 0): number {
    const raw = this.string(name);
    if (raw === null) {
      return fallback;
    }
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
      this.problems.push(`${name} must be an integer >= ${min} (got "${raw}")`);
      return fallback;
    }
    return value;
  }

  number(name: string, fallback: number, min = 0): number {
    const raw = this.string(name);
    if (raw === null) {
      return fallback;
    }
    const value = Number(raw);
    if (!Number.isFinite(value) || value < min) {
      this.problems.push(`${name} must be a number >= ${min} (got "${raw}")`);
      return fallback;
    }
    return value;
  }

  bool(name: string, fallback: boolean): boolean {
    const raw = this.string(name);
    if (raw === null) {
      return fallback;
    }
    const lower = raw.toLowerCase();
    if (["1", "true", "yes", "on"].includes(lower)) return true;
    if (["0", "false", "no", "off"].includes(lower)) return false;
    this.problems.push(`${name} must be a boolean (got "${raw}")`);
    return fallback;
  }

  list(name: string): string[] | null {
    const raw = this.string(name);
    if (raw === null) {
      return null;
    }
    return raw
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
  }

  oneOf<T extends string>(name: string, allowed: readonly T[], fallback: T): T {
    const raw = this.string(name);
    if (raw === null) {
      return fallback;
    }
    const lower = raw.toLowerCase();
    if (isOneOf(allowed, lower)) {
      return lower;
    }
    this.problems.push(`${name} must be one of ${allowed.join("|")} (got "${raw}")`);
    return fallback;
  }
}

function readStrategies(reader: EnvReader): StrategyName[] {
  const names = reader.list("AFFILIATE_STRATEGIES");
  if (names === null) {
    return [...DEFAULT_STRATEGY_ORDER];
  }

  const strategies: StrategyName[] = [];
  for (const raw of names) {
    const name = raw.toLowerCase();
    if (!isOneOf(STRATEGY_NAMES, name)) {
      reader.problems.push(
        `AFFILIATE_STRATEGIES contains unknown strategy "${raw}" (allowed: ${STRATEGY_NAMES.join(",")})`,
      );
    } else if (!strategies.includes(name)) {
      strategies.push(name);
    }
  }
  return strategies;
}

/**
 * Build the application configuration
 *
 * @throws {ConfigError} Listing every missing or invalid variable
 */
export function loadConfig(env: EnvSource = process.env): AppConfig {
  const reader = new EnvReader(env);

  const strategies = readStrategies(reader);
  const apiEnabled = strategies.includes("api");

  const aliexpress = Object.freeze({
    appKey: apiEnabled ? reader.required("ALIEXPRESS_APP_KEY") : reader.string("ALIEXPRESS_APP_KEY") ?? "",
    appSecret: apiEnabled
      ? reader.required("ALIEXPRESS_APP_SECRET")
      : reader.string("ALIEXPRESS_APP_SECRET") ?? "",
    endpoint: reader.string("ALIEXPRESS_API_ENDPOINT") ?? ALIEXPRESS_DEFAULT_ENDPOINT,
    trackingId: reader.string("ALIEXPRESS_TRACKING_ID") ?? ALIEXPRESS_DEFAULT_TRACKING_ID,
    timestampFormat: reader.oneOf("ALIEXPRESS_TIMESTAMP_FORMAT", TIMESTAMP_FORMATS, "millis"),
    timestampUtcOffsetMinutes: reader.int(
      "ALIEXPRESS_TIMESTAMP_UTC_OFFSET_MINUTES",
      ALIEXPRESS_DEFAULT_UTC_OFFSET_MINUTES,
      -720,
    ),
    promotionLinkType:
      reader.string("ALIEXPRESS_PROMOTION_LINK_TYPE") ?? ALIEXPRESS_DEFAULT_PROMOTION_LINK_TYPE,
    targetCurrency:
      reader.string("ALIEXPRESS_TARGET_CURRENCY") ?? ALIEXPRESS_DEFAULT_TARGET_CURRENCY,
    targetLanguage:
      reader.string("ALIEXPRESS_TARGET_LANGUAGE") ?? ALIEXPRESS_DEFAULT_TARGET_LANGUAGE,
    timeoutMs: reader.int("API_TIMEOUT_MS", ALIEXPRESS_DEFAULT_TIMEOUT_MS, 1),
  });

  const affiliate = Object.freeze({
    strategies: Object.freeze(strategies),
    template: reader.string("AFFILIATE_TEMPLATE"),
    prefix: reader.string("AFFILIATE_PREFIX"),
    enrichWithProductDetails: reader.bool("ENRICH_WITH_PRODUCT_DETAILS", false),
  });

  const redirects = Object.freeze({
    enabled: reader.bool("RESOLVE_REDIRECTS", true),
    timeoutMs: reader.int("REDIRECT_TIMEOUT_MS", DEFAULT_REDIRECT_TIMEOUT_MS, 1),
    redirectDomains: Object.freeze(reader.list("REDIRECT_DOMAINS") ?? [...DEFAULT_REDIRECT_DOMAINS]),
  });

  const sourceChannels = reader.list("TG_SOURCE_CHANNELS") ?? [];
  if (sourceChannels.length === 0) {
    reader.problems.push("TG_SOURCE_CHANNELS must list at least one channel");
  }
  const telegram = Object.freeze({
    botToken: reader.required("TELEGRAM_BOT_TOKEN"),
    sourceChannels: Object.freeze(sourceChannels),
    targetChannel: reader.required("TG_TARGET_CHANNEL"),
    timeoutMs: reader.int("TELEGRAM_TIMEOUT_MS", TELEGRAM_DEFAULT_TIMEOUT_MS, 1),
  });

  const captions = Object.freeze({
    openAiApiKey: reader.string("OPENAI_API_KEY"),
    openAiBaseUrl: reader.string("OPENAI_BASE_URL") ?? OPENAI_DEFAULT_BASE_URL,
    model: reader.string("OPENAI_MODEL") ?? OPENAI_DEFAULT_MODEL,
    timeoutMs: reader.int("CAPTION_TIMEOUT_MS", DEFAULT_CAPTION_TIMEOUT_MS, 1),
    buyHereLabel: reader.string("BUY_HERE_LABEL") ?? DEFAULT_BUY_HERE_LABEL,
    defaultHeadline: reader.string("DEFAULT_HEADLINE") ?? DEFAULT_HEADLINE,
  });

  const runBudgetMs = reader.int("RUN_BUDGET_MS", 0);
  const run = Object.freeze({
    mode: reader.oneOf("RUN_MODE", RUN_MODES, "once"),
    maxMessages: reader.int("MAX_MESSAGES", DEFAULT_MAX_MESSAGES, 1),
    maxPostsPerRun: reader.int("MAX_POSTS_PER_RUN", DEFAULT_MAX_POSTS_PER_RUN, 1),
    runBudgetMs: runBudgetMs > 0 ? runBudgetMs : null,
    maxLinksPerMessage: reader.int("MAX_LINKS_PER_MESSAGE", DEFAULT_MAX_LINKS_PER_MESSAGE, 1),
    postDelayMs: reader.int("POST_DELAY_MS", DEFAULT_POST_DELAY_MS),
    postDelayJitterMs: reader.int("POST_DELAY_JITTER_MS", 0),
  });

  const ledger = Object.freeze({
    backend: reader.oneOf("LEDGER_BACKEND", LEDGER_BACKENDS, "sqlite"),
    filePath: reader.string("LEDGER_FILE") ?? DEFAULT_LEDGER_FILE,
    cooldownHours: reader.number("DEDUP_COOLDOWN_HOURS", 0),
  });

  const logLevels: readonly LogLevel[] = Object.keys(LOG_LEVELS).filter(
    (level): level is LogLevel => level in LOG_LEVELS,
  );

  const config: AppConfig = Object.freeze({
    aliexpress,
    affiliate,
    redirects,
    telegram,
    captions,
    run,
    ledger,
    dbPath: reader.string("DB_PATH") ?? DEFAULT_DB_PATH,
    logLevel: reader.oneOf("LOG_LEVEL", logLevels, "info"),
  });

  if (reader.problems.length > 0) {
    throw new ConfigError(reader.problems);
  }
  return config;
}
