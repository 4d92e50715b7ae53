/**
 * Candidate pipeline type definitions
 */

import type { AffiliateLink, ProductIdentifier } from "./affiliate";

export type CandidateSkipReason =
  | "no_identifier"
  | "duplicate_early"
  | "duplicate_final"
  | "in_flight";

/**
 * Outcome of processing one candidate link
 */
export type CandidateOutcome =
  | {
      status: "published";
      productId: ProductIdentifier;
      affiliateLink: AffiliateLink;
    }
  | {
      status: "skipped";
      reason: CandidateSkipReason;
      productId: ProductIdentifier | null;
    }
  | {
      status: "failed";
      reason: "publish_error";
      productId: ProductIdentifier;
      error: string;
    };

/**
 * Counters accumulated over one pass (persisted on publish_runs)
 */
export type ScanCounters = {
  messages_scanned: number;
  candidates_seen: number;
  posts_published: number;
  duplicates_skipped: number;
  errors_count: number;
};

export type ScanAccumulator = {
  counters: ScanCounters;
};

export type StopReason = "max_posts" | "run_budget";

/**
 * Run-scoped limits checked at the top of each iteration
 */
export type RunBudget = {
  maxPosts: number;
  /** Epoch ms after which no new candidate is started; null = none */
  deadlineMs: number | null;
  posted: number;
};

export type ChannelScanResult = {
  channel: string;
  outcomes: CandidateOutcome[];
  stopped: StopReason | null;
};
