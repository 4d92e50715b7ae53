/**
 * Signed API strategy — promotion link from the affiliate gateway
 */

import type { LinkStrategy } from "@/interfaces";
import type { AliExpressClient } from "@/clients/aliexpress";
import type { Logger } from "@/types";
import * as logger from "@/logger";

type LinkGenerator = Pick<AliExpressClient, "generateAffiliateLinks">;

export class ApiLinkStrategy implements LinkStrategy {
  readonly name = "api" as const;
  private readonly log: Logger;

  constructor(
    private readonly client: LinkGenerator,
    log?: Logger,
  ) {
    this.log = log ?? logger.withContext({ component: "apiStrategy" });
  }

  async attempt(cleanUrl: string): Promise<string | null> {
    const result = await this.client.generateAffiliateLinks([cleanUrl]);
    if (!result.ok) {
      // Already logged by the client with the provider diagnostics
      return null;
    }

    if (result.value.length === 0) {
      this.log.info("Link generation returned no links (not found)", { url: cleanUrl });
      return null;
    }

    const match =
      result.value.find((link) => link.sourceValue === cleanUrl) ?? result.value[0];
    return match.promotionLink;
  }
}
