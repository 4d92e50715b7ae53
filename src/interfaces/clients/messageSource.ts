/**
 * MessageSource interface
 *
 * Read side of a message stream
 *
 * Implementations (Telegram channels, fixtures in tests) hand the pipeline
 * plain SourceMessage records; the pipeline never sees provider shapes.
 */

import type { SourceMessage } from "@/types";

export interface MessageSource {
  /**
   * Fetch recent messages of one channel, newest first
   *
   * @param channel - Channel identifier as configured
   * @param limit - Upper bound on returned messages
   */
  fetchMessages(channel: string, limit: number): Promise<SourceMessage[]>;
}
