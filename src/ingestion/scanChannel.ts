/**
 * Channel scan — feeds one channel's recent messages through the
 * candidate pipeline, newest first, one candidate at a time
 */

import type {
  CandidateOutcome,
  ChannelScanResult,
  RunBudget,
  ScanAccumulator,
  StopReason,
} from "@/types";
import type { MessageSource } from "@/interfaces";
import { extractCandidateLinks } from "@/affiliate";
import { sleep as defaultSleep } from "@/utils";
import { processCandidate } from "./processCandidate";
import type { CandidatePipelineDeps } from "./processCandidate";
import { budgetExhausted } from "./runBudget";
import * as logger from "@/logger";

export type ScanSettings = {
  maxMessages: number;
  maxLinksPerMessage: number;
  postDelayMs: number;
  postDelayJitterMs: number;
};

export type ChannelScanDeps = CandidatePipelineDeps & {
  source: MessageSource;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  random?: () => number;
};

function countOutcome(acc: ScanAccumulator, outcome: CandidateOutcome): void {
  switch (outcome.status) {
    case "published":
      acc.counters.posts_published++;
      break;
    case "skipped":
      if (outcome.reason !== "no_identifier") {
        acc.counters.duplicates_skipped++;
      }
      break;
    case "failed":
      acc.counters.errors_count++;
      break;
  }
}

export async function scanChannel(
  channel: string,
  deps: ChannelScanDeps,
  settings: ScanSettings,
  budget: RunBudget,
  acc: ScanAccumulator,
): Promise<ChannelScanResult> {
  const log = logger.withContext({ component: "scanChannel", channel });
  const now = deps.now ?? Date.now;
  const wait = deps.sleep ?? defaultSleep;
  const random = deps.random ?? Math.random;

  const messages = await deps.source.fetchMessages(channel, settings.maxMessages);
  log.info("Channel messages fetched", { count: messages.length });

  const outcomes: CandidateOutcome[] = [];
  let stopped: StopReason | null = null;

  for (const message of messages) {
    stopped = budgetExhausted(budget, now());
    if (stopped) {
      break;
    }
    acc.counters.messages_scanned++;

    const candidates = extractCandidateLinks(message.text).slice(0, settings.maxLinksPerMessage);
    for (const candidate of candidates) {
      stopped = budgetExhausted(budget, now());
      if (stopped) {
        break;
      }
      acc.counters.candidates_seen++;

      let outcome: CandidateOutcome;
      try {
        outcome = await processCandidate(candidate, message, channel, deps);
      } catch (err) {
        acc.counters.errors_count++;
        log.error("Candidate failed unexpectedly", {
          messageId: message.id,
          url: candidate,
          ...logger.errorMeta(err),
        });
        continue;
      }

      outcomes.push(outcome);
      countOutcome(acc, outcome);

      if (outcome.status === "published") {
        budget.posted++;
        const delayMs =
          settings.postDelayMs + Math.floor(random() * (settings.postDelayJitterMs + 1));
        if (delayMs > 0) {
          await wait(delayMs);
        }
      }
    }
    if (stopped) {
      break;
    }
  }

  if (stopped) {
    log.info("Channel scan stopped by run budget", { reason: stopped });
  }
  return { channel, outcomes, stopped };
}
