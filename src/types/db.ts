/**
 * Database type definitions
 *
 * Row shapes aligned with migrations/*.sql
 */

import type { ScanCounters } from "./pipeline";

/**
 * posted_products row
 */
export type PostedProductRow = {
  product_id: string;
  id_kind: string;
  channel: string | null;
  affiliate_url: string | null;
  posted_at: string;
};

export type RunStatus = "success" | "failure";

/**
 * publish_runs row
 */
export type PublishRun = ScanCounters & {
  id: number;
  started_at: string;
  finished_at: string | null;
  status: RunStatus | null;
  notes: string | null;
};

export type PublishRunUpdate = Partial<ScanCounters> & {
  finished_at?: string;
  status?: RunStatus;
  notes?: string | null;
};

/**
 * source_cursor row
 */
export type SourceCursorRow = {
  source: string;
  cursor: string;
  updated_at: string;
};

/**
 * channel_posts row
 */
export type ChannelPostRow = {
  channel: string;
  message_id: number;
  posted_date: number;
  source_id: string;
  text: string;
  media_ref: string | null;
  view_count: number | null;
  posted_at: string;
};
