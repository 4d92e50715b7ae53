/**
 * Run lifecycle helpers — track publish passes in the database
 *
 * One run = one pass over every configured channel. Every run is
 * finalized (success or failure) with the counters gathered so far.
 */

import type { RunStatus, ScanAccumulator, ScanCounters } from "@/types";
import { createPublishRun, finishPublishRun } from "@/db";

export function startRun(): number {
  return createPublishRun();
}

export function finishRun(
  runId: number,
  status: RunStatus,
  counters?: Partial<ScanCounters>,
  notes?: string | null,
): void {
  finishPublishRun(runId, {
    finished_at: new Date().toISOString(),
    status,
    ...counters,
    ...(notes !== undefined && { notes }),
  });
}

/**
 * Fresh accumulator with zeroed counters
 */
export function createScanAccumulator(): ScanAccumulator {
  return {
    counters: {
      messages_scanned: 0,
      candidates_seen: 0,
      posts_published: 0,
      duplicates_skipped: 0,
      errors_count: 0,
    },
  };
}

/**
 * Execute a function within a run lifecycle
 *
 * Counters on the accumulator are persisted in `finally`, so a pass that
 * throws still leaves its partial numbers behind (status "failure").
 *
 * Counter semantics:
 * - messages_scanned: source messages looked at
 * - candidates_seen: candidate links handed to the pipeline
 * - posts_published: confirmed publishes
 * - duplicates_skipped: candidates skipped by the ledger
 * - errors_count: failed publishes and candidate/channel errors
 */
export async function withRun<T>(fn: (runId: number, acc: ScanAccumulator) => Promise<T>): Promise<T> {
  const runId = startRun();
  const acc = createScanAccumulator();
  let succeeded = false;

  try {
    const result = await fn(runId, acc);
    succeeded = true;
    return result;
  } finally {
    finishRun(runId, succeeded ? "success" : "failure", acc.counters);
  }
}
