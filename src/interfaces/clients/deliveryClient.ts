/**
 * DeliveryClient interface
 *
 * Write side, publishes to the target feed
 */

import type { SourceMedia } from "@/types";

export interface DeliveryClient {
  /**
   * Publish one assembled message
   *
   * Resolves only once the provider confirmed the post; throws otherwise.
   * Failures are not retried within the pass.
   */
  publish(text: string, media: SourceMedia | null): Promise<void>;
}
