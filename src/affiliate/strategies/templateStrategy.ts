/**
 * Portal template strategy
 *
 * Substitutes the cleaned URL into a template
 *
 * {url} receives the percent-encoded URL, {rawUrl} the URL as-is.
 * A template without a placeholder is unusable and yields nothing.
 */

import type { LinkStrategy } from "@/interfaces";
import type { Logger } from "@/types";
import { TEMPLATE_RAW_URL_PLACEHOLDER, TEMPLATE_URL_PLACEHOLDER } from "@/constants";
import * as logger from "@/logger";

export function hasTemplatePlaceholder(template: string): boolean {
  return (
    template.includes(TEMPLATE_URL_PLACEHOLDER) || template.includes(TEMPLATE_RAW_URL_PLACEHOLDER)
  );
}

export class TemplateLinkStrategy implements LinkStrategy {
  readonly name = "template" as const;
  private readonly log: Logger;
  private warned = false;

  constructor(
    private readonly template: string,
    log?: Logger,
  ) {
    this.log = log ?? logger.withContext({ component: "templateStrategy" });
  }

  async attempt(cleanUrl: string): Promise<string | null> {
    if (!hasTemplatePlaceholder(this.template)) {
      if (!this.warned) {
        this.log.warn("Affiliate template has no placeholder, strategy unusable", {
          template: this.template,
        });
        this.warned = true;
      }
      return null;
    }

    return this.template
      .split(TEMPLATE_URL_PLACEHOLDER)
      .join(encodeURIComponent(cleanUrl))
      .split(TEMPLATE_RAW_URL_PLACEHOLDER)
      .join(cleanUrl);
  }
}
