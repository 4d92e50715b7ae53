/**
 * Runner/orchestration type definitions
 */

import type { StopReason } from "./pipeline";

/**
 * Error classification for channel-level failures
 *
 * - RATE_LIMIT: HTTP 429 from a collaborator; stop the pass, next cycle retries
 * - TRANSIENT: timeouts, 5xx, network failures; move on to the next channel
 * - FATAL: missing credentials or invalid config; abort the pass
 */
export type ErrorClassification = "RATE_LIMIT" | "TRANSIENT" | "FATAL";

export type ChannelStatus = "DONE" | "ERROR" | "STOPPED";

export type ChannelRunResult = {
  channel: string;
  status: ChannelStatus;
  published: number;
  note?: string;
};

/**
 * Result of one runner pass over all configured channels
 */
export type RunnerResult = {
  runId: number | null;
  published: number;
  duplicates: number;
  failed: number;
  stopped: StopReason | null;
  channels: ChannelRunResult[];
  /** Set when the pass did not start (lock held, etc.) */
  skippedReason?: "LOCKED";
};
