/**
 * Prefix strategy
 *
 * Configured prefix + percent-encoded cleaned URL
 */

import type { LinkStrategy } from "@/interfaces";

export class PrefixLinkStrategy implements LinkStrategy {
  readonly name = "prefix" as const;

  constructor(private readonly prefix: string) {}

  async attempt(cleanUrl: string): Promise<string | null> {
    if (!this.prefix) {
      return null;
    }
    return `${this.prefix}${encodeURIComponent(cleanUrl)}`;
  }
}
