/**
 * Runner entrypoint — relays deals from the source channels to the target
 *
 * Supports two modes:
 * - once: one publish pass, then exit
 * - forever: passes in a loop until the process is terminated
 *
 * Usage:
 *   npm start                      # RUN_MODE from .env, default once
 *   RUN_MODE=forever npm start
 *
 * Configuration is read from the environment (.env supported); see
 * .env.example for the variables.
 */

import "dotenv/config";
import type { AppConfig } from "./types";
import { loadConfig, ConfigError } from "./config";
import { runOnce, runForever } from "./orchestration/runner";
import { closeDb } from "./db";
import * as logger from "./logger";

async function main(): Promise<number> {
  let config: AppConfig;
  try {
    config = loadConfig(process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error("Invalid configuration", { problems: error.problems });
      return 1;
    }
    throw error;
  }
  logger.setLogLevel(config.logLevel);

  if (config.run.mode === "forever") {
    logger.info("Starting runner (continuous mode)");
    await runForever(config);
    return 0;
  }

  logger.info("Starting runner (single pass mode)");
  const result = await runOnce(config);
  if (result.skippedReason) {
    logger.warn("Pass skipped", { reason: result.skippedReason });
    return 0;
  }

  logger.info("Runner finished", {
    published: result.published,
    duplicates: result.duplicates,
    failed: result.failed,
    stopped: result.stopped,
  });
  return result.channels.some((c) => c.status === "ERROR") ? 1 : 0;
}

main()
  .then((code) => {
    closeDb();
    process.exit(code);
  })
  .catch((error: unknown) => {
    logger.error("Runner failed with fatal error", {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    closeDb();
    process.exit(1);
  });
