/**
 * Link strategies and the factory that orders them from configuration
 */

import type { LinkStrategy } from "@/interfaces";
import type { AffiliateSettings } from "@/types";
import type { AliExpressClient } from "@/clients/aliexpress";
import { ApiLinkStrategy } from "./apiStrategy";
import { TemplateLinkStrategy } from "./templateStrategy";
import { PrefixLinkStrategy } from "./prefixStrategy";
import * as logger from "@/logger";

export { ApiLinkStrategy } from "./apiStrategy";
export { TemplateLinkStrategy, hasTemplatePlaceholder } from "./templateStrategy";
export { PrefixLinkStrategy } from "./prefixStrategy";

/**
 * Build the strategy list in configured order
 *
 * Strategies without their prerequisite (API client, template, prefix)
 * are left out of the list.
 */
export function createLinkStrategies(
  settings: Pick<AffiliateSettings, "strategies" | "template" | "prefix">,
  client: Pick<AliExpressClient, "generateAffiliateLinks"> | null,
): LinkStrategy[] {
  const strategies: LinkStrategy[] = [];

  for (const name of settings.strategies) {
    switch (name) {
      case "api":
        if (client) {
          strategies.push(new ApiLinkStrategy(client));
        }
        break;
      case "template":
        if (settings.template) {
          strategies.push(new TemplateLinkStrategy(settings.template));
        }
        break;
      case "prefix":
        if (settings.prefix) {
          strategies.push(new PrefixLinkStrategy(settings.prefix));
        }
        break;
    }
  }

  logger.debug("Link strategies configured", {
    strategies: strategies.map((s) => s.name),
  });
  return strategies;
}
