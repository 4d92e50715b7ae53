/**
 * AffiliateLinkBuilder — walks the strategy chain until one output passes
 * the product-specific link check
 *
 * The terminal fallback (the cleaned URL itself) means build() always
 * yields a link; a strategy that throws is logged and skipped.
 */

import type { AffiliateLink, Logger } from "@/types";
import type { LinkStrategy } from "@/interfaces";
import { isProductSpecificLink } from "./linkValidator";
import { normalizeUrl } from "./urlNormalizer";
import * as logger from "@/logger";

type UrlResolver = {
  resolve(url: string): Promise<string>;
};

export type AffiliateLinkBuilderConfig = {
  strategies: readonly LinkStrategy[];
  /** Redirect resolver applied before the chain; omitted = no resolution */
  resolver?: UrlResolver;
  logger?: Logger;
};

export type BuildOptions = {
  /** Caller already resolved and normalized the URL */
  resolved?: boolean;
};

export class AffiliateLinkBuilder {
  private readonly strategies: readonly LinkStrategy[];
  private readonly resolver: UrlResolver | null;
  private readonly log: Logger;

  constructor(config: AffiliateLinkBuilderConfig) {
    this.strategies = config.strategies;
    this.resolver = config.resolver ?? null;
    this.log = config.logger ?? logger.withContext({ component: "affiliateLinkBuilder" });
  }

  get strategyNames(): string[] {
    return this.strategies.map((s) => s.name);
  }

  /**
   * Clean the URL the way every strategy receives it
   */
  private async clean(originalUrl: string, options: BuildOptions): Promise<string> {
    const normalized = normalizeUrl(originalUrl);
    if (options.resolved || !this.resolver) {
      return normalized;
    }
    return normalizeUrl(await this.resolver.resolve(normalized));
  }

  /**
   * Build the commercial link for a product URL
   *
   * Never throws. The fallback origin means no strategy produced a
   * product-specific link.
   */
  async build(originalUrl: string, options: BuildOptions = {}): Promise<AffiliateLink> {
    let cleaned: string;
    try {
      cleaned = await this.clean(originalUrl, options);
    } catch (err) {
      this.log.warn("URL cleaning failed, using input as-is", {
        url: originalUrl,
        ...logger.errorMeta(err),
      });
      cleaned = originalUrl.trim();
    }

    for (const strategy of this.strategies) {
      let candidate: string | null;
      try {
        candidate = await strategy.attempt(cleaned);
      } catch (err) {
        this.log.warn("Link strategy threw, trying next", {
          strategy: strategy.name,
          url: cleaned,
          ...logger.errorMeta(err),
        });
        continue;
      }

      if (candidate === null) {
        this.log.debug("Link strategy produced nothing", { strategy: strategy.name, url: cleaned });
        continue;
      }

      const link = candidate.trim();
      if (!isProductSpecificLink(link)) {
        this.log.warn("Link strategy output is not product-specific, rejected", {
          strategy: strategy.name,
          url: cleaned,
          output: link,
        });
        continue;
      }

      this.log.debug("Affiliate link built", { strategy: strategy.name, url: cleaned });
      return { url: link, origin: strategy.name };
    }

    this.log.info("No strategy produced a product link, using cleaned URL", { url: cleaned });
    return { url: cleaned || originalUrl, origin: "fallback" };
  }
}
