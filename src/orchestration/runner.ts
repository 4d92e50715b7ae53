/**
 * Runner core — one publish pass over every configured source channel
 *
 * Key responsibilities:
 * - Open the database, apply migrations, take the global run lock
 * - Wire the pipeline collaborators from the AppConfig
 * - Scan channels in configured order within the run budget
 * - Classify channel failures: RATE_LIMIT stops the pass, TRANSIENT moves
 *   on to the next channel, FATAL aborts
 * - Record the pass in publish_runs
 */

import { randomUUID } from "crypto";
import type {
  AppConfig,
  ChannelRunResult,
  ErrorClassification,
  FetchFinalUrlFn,
  RunnerResult,
  StopReason,
} from "@/types";
import type { CaptionWriter, DeliveryClient, MessageSource } from "@/interfaces";
import { openDb, runMigrations, sqliteChannelPostStore, sqliteCursorStore } from "@/db";
import { acquireRunLock, refreshRunLock, releaseRunLock } from "@/db/repos/runLockRepo";
import { AliExpressClient } from "@/clients/aliexpress";
import { HttpError } from "@/clients/http";
import { TelegramApiError, TelegramBotClient } from "@/clients/telegram";
import { OpenAiCaptionWriter } from "@/clients/openai";
import { AffiliateLinkBuilder, RedirectResolver, createLinkStrategies } from "@/affiliate";
import { DedupLedger, createLedger } from "@/ledger";
import { ConfigError } from "@/config";
import { createRunBudget, scanChannel, withRun } from "@/ingestion";
import type { ChannelScanDeps } from "@/ingestion";
import {
  CYCLE_ERROR_SLEEP_MS,
  CYCLE_SLEEP_MAX_MS,
  CYCLE_SLEEP_MIN_MS,
} from "@/constants";
import { getErrorMessage, sleep as defaultSleep } from "@/utils";
import * as logger from "@/logger";

/**
 * Collaborators of a pass; anything omitted is built from the config
 */
export type RunnerDeps = {
  source: MessageSource;
  delivery: DeliveryClient;
  captionWriter: CaptionWriter | null;
  /** Signed API client; null when the api strategy is disabled */
  apiClient: AliExpressClient | null;
  ledger: DedupLedger;
  /** Redirect lookups; undefined = real HTTP */
  fetchFinalUrl?: FetchFinalUrlFn;
  sleep: (ms: number) => Promise<void>;
  now: () => number;
};

/**
 * Classify error for the channel loop
 *
 * - RATE_LIMIT: HTTP 429 from a collaborator
 * - FATAL: invalid config, rejected credentials
 * - TRANSIENT: everything else (timeouts, 5xx, network failures)
 */
export function classifyError(error: unknown): ErrorClassification {
  if (error instanceof ConfigError) {
    return "FATAL";
  }
  if (error instanceof TelegramApiError || error instanceof HttpError) {
    if (error.status === 429) {
      return "RATE_LIMIT";
    }
    if (error.status === 401 || error.status === 403) {
      return "FATAL";
    }
  }
  if (!(error instanceof Error)) {
    return "TRANSIENT";
  }

  const message = error.message.toLowerCase();
  if (message.includes("429") || message.includes("too many requests") || message.includes("rate limit")) {
    return "RATE_LIMIT";
  }
  if (message.includes("unauthorized") || message.includes("missing") || message.includes("credentials")) {
    return "FATAL";
  }
  return "TRANSIENT";
}

function buildApiClient(config: AppConfig): AliExpressClient | null {
  return config.affiliate.strategies.includes("api")
    ? new AliExpressClient({ settings: config.aliexpress })
    : null;
}

function buildCaptionWriter(config: AppConfig): CaptionWriter | null {
  const { captions } = config;
  if (!captions.openAiApiKey) {
    return null;
  }
  return new OpenAiCaptionWriter({
    apiKey: captions.openAiApiKey,
    baseUrl: captions.openAiBaseUrl,
    model: captions.model,
    timeoutMs: captions.timeoutMs,
  });
}

/**
 * Fill in every collaborator the caller did not inject
 * (the database must be open: the cursor and post stores and the ledger use it)
 */
function resolveDeps(config: AppConfig, overrides: Partial<RunnerDeps>): RunnerDeps {
  let telegram: TelegramBotClient | null = null;
  const telegramClient = (): TelegramBotClient => {
    if (!telegram) {
      telegram = new TelegramBotClient({
        settings: config.telegram,
        cursorStore: sqliteCursorStore,
        postStore: sqliteChannelPostStore,
      });
    }
    return telegram;
  };

  return {
    source: overrides.source ?? telegramClient(),
    delivery: overrides.delivery ?? telegramClient(),
    captionWriter:
      overrides.captionWriter !== undefined ? overrides.captionWriter : buildCaptionWriter(config),
    apiClient: overrides.apiClient !== undefined ? overrides.apiClient : buildApiClient(config),
    ledger: overrides.ledger ?? createLedger(config.ledger),
    fetchFinalUrl: overrides.fetchFinalUrl,
    sleep: overrides.sleep ?? defaultSleep,
    now: overrides.now ?? Date.now,
  };
}

function buildScanDeps(config: AppConfig, deps: RunnerDeps): ChannelScanDeps {
  const resolver = new RedirectResolver({
    ...config.redirects,
    fetchFinalUrl: deps.fetchFinalUrl,
  });
  const builder = new AffiliateLinkBuilder({
    strategies: createLinkStrategies(config.affiliate, deps.apiClient),
    resolver,
  });

  return {
    source: deps.source,
    delivery: deps.delivery,
    captionWriter: deps.captionWriter,
    resolver,
    builder,
    ledger: deps.ledger,
    productLookup: deps.apiClient,
    options: {
      buyHereLabel: config.captions.buyHereLabel,
      defaultHeadline: config.captions.defaultHeadline,
      enrichWithProductDetails: config.affiliate.enrichWithProductDetails,
    },
    sleep: deps.sleep,
    now: deps.now,
  };
}

/**
 * Run one publish pass over all configured channels
 *
 * Returns without scanning (skippedReason "LOCKED") when another process
 * holds the run lock.
 *
 * @throws On FATAL channel errors (after the run and lock are finalized)
 */
export async function runOnce(
  config: AppConfig,
  overrides: Partial<RunnerDeps> = {},
): Promise<RunnerResult> {
  const startMs = Date.now();

  openDb(config.dbPath);
  runMigrations(config.dbPath);

  const ownerId = randomUUID();
  const lockResult = acquireRunLock(ownerId);
  if (!lockResult.ok) {
    logger.warn("Failed to acquire run lock - another pass may be in progress", {
      reason: lockResult.reason,
    });
    return {
      runId: null,
      published: 0,
      duplicates: 0,
      failed: 0,
      stopped: null,
      channels: [],
      skippedReason: "LOCKED",
    };
  }
  logger.debug("Global run lock acquired", { ownerId });

  try {
    const deps = resolveDeps(config, overrides);
    const scanDeps = buildScanDeps(config, deps);
    const budget = createRunBudget(config.run.maxPostsPerRun, config.run.runBudgetMs, deps.now());

    const result = await withRun(async (runId, acc) => {
      const channels: ChannelRunResult[] = [];
      let stopped: StopReason | null = null;

      for (const channel of config.telegram.sourceChannels) {
        if (stopped) {
          channels.push({ channel, status: "STOPPED", published: 0, note: stopped });
          continue;
        }

        const postedBefore = budget.posted;
        try {
          const scan = await scanChannel(channel, scanDeps, config.run, budget, acc);
          stopped = scan.stopped;
          channels.push({
            channel,
            status: "DONE",
            published: budget.posted - postedBefore,
          });
        } catch (error) {
          const classification = classifyError(error);
          acc.counters.errors_count++;
          logger.warn("Channel scan failed", {
            channel,
            errorClassification: classification,
            error: getErrorMessage(error),
          });
          channels.push({
            channel,
            status: "ERROR",
            published: budget.posted - postedBefore,
            note: `${classification}: ${getErrorMessage(error)}`,
          });

          if (classification === "FATAL") {
            throw error;
          }
          if (classification === "RATE_LIMIT") {
            break;
          }
        }

        if (!refreshRunLock(ownerId)) {
          logger.warn("Run lock no longer held, stopping pass", { ownerId });
          break;
        }
      }

      return {
        runId,
        published: acc.counters.posts_published,
        duplicates: acc.counters.duplicates_skipped,
        failed: acc.counters.errors_count,
        stopped,
        channels,
      };
    });

    logger.info("Publish pass completed", {
      runId: result.runId,
      published: result.published,
      duplicates: result.duplicates,
      failed: result.failed,
      stopped: result.stopped,
      elapsedMs: Date.now() - startMs,
    });
    return result;
  } finally {
    if (!releaseRunLock(ownerId)) {
      logger.warn("Failed to release run lock (may not be owned)", { ownerId });
    }
  }
}

/**
 * Random duration in [minMs, maxMs]
 */
function cycleSleepMs(minMs: number, maxMs: number): number {
  return Math.floor(Math.random() * (maxMs - minMs + 1)) + minMs;
}

/**
 * Run passes continuously until SIGINT/SIGTERM
 *
 * A failed pass is logged and followed by a shorter sleep; a FATAL error
 * (invalid config, rejected credentials) ends the loop.
 */
export async function runForever(
  config: AppConfig,
  overrides: Partial<RunnerDeps> = {},
): Promise<void> {
  let shutdownRequested = false;

  const handleShutdown = (signal: string) => {
    if (shutdownRequested) {
      logger.warn("Forced shutdown - exiting immediately");
      process.exit(1);
    }
    logger.info("Shutdown signal received, will stop after current cycle", { signal });
    shutdownRequested = true;
  };

  process.on("SIGINT", () => handleShutdown("SIGINT"));
  process.on("SIGTERM", () => handleShutdown("SIGTERM"));

  const wait = overrides.sleep ?? defaultSleep;
  let cycleCount = 0;

  while (!shutdownRequested) {
    cycleCount++;
    let sleepMs = cycleSleepMs(CYCLE_SLEEP_MIN_MS, CYCLE_SLEEP_MAX_MS);

    try {
      const result = await runOnce(config, overrides);
      logger.info("Runner cycle completed", {
        cycleCount,
        published: result.published,
        skippedReason: result.skippedReason,
      });
    } catch (error) {
      if (classifyError(error) === "FATAL") {
        logger.error("Runner cycle failed with fatal error, stopping", {
          cycleCount,
          error: getErrorMessage(error),
        });
        throw error;
      }
      logger.error("Runner cycle failed with error", {
        cycleCount,
        error: getErrorMessage(error),
      });
      sleepMs = CYCLE_ERROR_SLEEP_MS;
    }

    if (shutdownRequested) {
      break;
    }
    logger.info("Sleeping before next cycle", { sleepMs });
    await wait(sleepMs);
  }

  logger.info("Continuous runner stopped", { cycleCount });
}
