/**
 * Redirect resolver — follows short-link redirects to the landed URL
 *
 * Best-effort: any transport error, timeout or unexpected status returns
 * the original URL instead of failing the pipeline.
 */

import type { FetchFinalUrlFn, Logger, RedirectResolveOptions } from "@/types";
import { fetchFinalUrl as defaultFetchFinalUrl } from "@/clients/http";
import { normalizeUrl } from "./urlNormalizer";
import * as logger from "@/logger";

/**
 * HEAD is answered with one of these by services that only serve GET
 */
const HEAD_UNSUPPORTED_STATUSES: readonly number[] = [403, 405, 501];

export type RedirectResolverConfig = RedirectResolveOptions & {
  /** Optional fetch function (for testing/mocking) */
  fetchFinalUrl?: FetchFinalUrlFn;
  logger?: Logger;
};

/**
 * True when the URL contains one of the redirect-indicating substrings
 */
export function needsResolution(url: string, redirectDomains: readonly string[]): boolean {
  const lower = url.toLowerCase();
  return redirectDomains.some((marker) => lower.includes(marker.toLowerCase()));
}

function isLandedStatus(status: number): boolean {
  return status >= 200 && status < 400;
}

export class RedirectResolver {
  private readonly options: RedirectResolveOptions;
  private readonly fetchFinalUrl: FetchFinalUrlFn;
  private readonly log: Logger;

  constructor(config: RedirectResolverConfig) {
    this.options = {
      enabled: config.enabled,
      timeoutMs: config.timeoutMs,
      redirectDomains: config.redirectDomains,
    };
    this.fetchFinalUrl = config.fetchFinalUrl ?? defaultFetchFinalUrl;
    this.log = config.logger ?? logger.withContext({ component: "redirectResolver" });
  }

  /**
   * Resolve a URL through its redirects
   *
   * Returns the input unchanged (no network call) when resolution is
   * disabled or the URL is not on a redirect domain. The landed URL is
   * normalized so mobile hosts come back in canonical form.
   */
  async resolve(url: string): Promise<string> {
    if (!this.options.enabled || !needsResolution(url, this.options.redirectDomains)) {
      return url;
    }

    try {
      let landed = await this.fetchFinalUrl({
        url,
        method: "HEAD",
        timeoutMs: this.options.timeoutMs,
      });

      if (HEAD_UNSUPPORTED_STATUSES.includes(landed.status)) {
        landed = await this.fetchFinalUrl({
          url,
          method: "GET",
          timeoutMs: this.options.timeoutMs,
        });
      }

      if (!isLandedStatus(landed.status)) {
        this.log.warn("Redirect resolution returned non-success status, keeping original", {
          url,
          status: landed.status,
        });
        return url;
      }

      const resolved = normalizeUrl(landed.url);
      this.log.debug("Redirect resolved", { url, resolved });
      return resolved;
    } catch (err) {
      this.log.warn("Redirect resolution failed, keeping original", {
        url,
        ...logger.errorMeta(err),
      });
      return url;
    }
  }
}
