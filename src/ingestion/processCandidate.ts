/**
 * Candidate pipeline — one link from a source message to a published post
 *
 * normalize -> early ledger check -> resolve -> identify -> claim
 * -> build affiliate link -> final ledger check -> caption -> assemble
 * -> publish -> record
 *
 * The ledger is only written after the delivery client confirmed the
 * publish. The early check runs before any network call.
 */

import type {
  AffiliateLink,
  CandidateOutcome,
  FactHints,
  Logger,
  ProductIdentifier,
  SourceMessage,
} from "@/types";
import type { CaptionWriter, DeliveryClient } from "@/interfaces";
import type { AliExpressClient } from "@/clients/aliexpress";
import type { DedupLedger } from "@/ledger";
import type { BuildOptions } from "@/affiliate";
import {
  extractProductId,
  normalizeUrl,
  pickAuthoritativeId,
  sameIdentifier,
} from "@/affiliate";
import {
  assembleMessage,
  extractFactHints,
  mergeProductDetails,
  writeCaption,
} from "@/publishing";
import { getErrorMessage } from "@/utils";
import * as logger from "@/logger";

export type CandidatePipelineOptions = {
  buyHereLabel: string;
  defaultHeadline: string;
  enrichWithProductDetails: boolean;
};

export type CandidatePipelineDeps = {
  resolver: { resolve(url: string): Promise<string> };
  builder: { build(url: string, options?: BuildOptions): Promise<AffiliateLink> };
  ledger: DedupLedger;
  delivery: DeliveryClient;
  /** null = fallback captions only */
  captionWriter: CaptionWriter | null;
  /** Product lookup for caption hints; null disables enrichment */
  productLookup: Pick<AliExpressClient, "getProductDetails"> | null;
  options: CandidatePipelineOptions;
  logger?: Logger;
};

function idMeta(id: ProductIdentifier | null): Record<string, string | null> {
  return { productId: id?.value ?? null, idKind: id?.kind ?? null };
}

async function collectHints(
  text: string,
  productId: ProductIdentifier,
  deps: CandidatePipelineDeps,
  log: Logger,
): Promise<FactHints> {
  const hints = extractFactHints(text);
  if (!deps.options.enrichWithProductDetails || !deps.productLookup || productId.kind !== "item") {
    return hints;
  }

  const details = await deps.productLookup.getProductDetails(productId.value);
  if (!details.ok) {
    log.info("Product lookup failed, using text hints", {
      ...idMeta(productId),
      kind: details.error.kind,
      error: details.error.message,
    });
    return hints;
  }
  return mergeProductDetails(hints, details.value);
}

/**
 * Identifiers to record after a publish: the authoritative id plus every
 * alias the same product was seen under, so later early checks hit
 */
function aliasesOf(
  finalId: ProductIdentifier,
  ...others: Array<ProductIdentifier | null>
): ProductIdentifier[] {
  const ids: ProductIdentifier[] = [finalId];
  for (const id of others) {
    if (id && !ids.some((known) => sameIdentifier(known, id))) {
      ids.push(id);
    }
  }
  return ids;
}

/**
 * Run one candidate link through the pipeline
 *
 * Never throws for expected failures: skips and publish errors come back
 * as outcomes. Unexpected errors propagate to the channel scan.
 */
export async function processCandidate(
  rawUrl: string,
  message: SourceMessage,
  channel: string,
  deps: CandidatePipelineDeps,
): Promise<CandidateOutcome> {
  const log = deps.logger ?? logger.withContext({ component: "candidatePipeline", channel });
  const { ledger } = deps;

  const normalized = normalizeUrl(rawUrl);
  const earlyId = extractProductId(normalized);

  if (earlyId && ledger.seen(earlyId)) {
    log.info("Candidate skipped (already posted)", { url: normalized, ...idMeta(earlyId) });
    return { status: "skipped", reason: "duplicate_early", productId: earlyId };
  }

  const resolved = normalizeUrl(await deps.resolver.resolve(normalized));
  const resolvedId = pickAuthoritativeId(extractProductId(resolved), earlyId);

  if (!resolvedId) {
    log.info("Candidate skipped (no product identifier)", { url: resolved });
    return { status: "skipped", reason: "no_identifier", productId: null };
  }

  if (!ledger.claim(resolvedId)) {
    const reason = earlyId && sameIdentifier(earlyId, resolvedId) ? "in_flight" : "duplicate_early";
    log.info("Candidate skipped after resolution", { url: resolved, reason, ...idMeta(resolvedId) });
    return { status: "skipped", reason, productId: resolvedId };
  }

  const affiliateLink = await deps.builder.build(resolved, { resolved: true });
  const finalId =
    pickAuthoritativeId(resolvedId, extractProductId(affiliateLink.url)) ?? resolvedId;

  if (!sameIdentifier(finalId, resolvedId) && ledger.seen(finalId)) {
    ledger.release(resolvedId);
    log.info("Candidate skipped (final identifier already posted)", {
      url: resolved,
      strategy: affiliateLink.origin,
      ...idMeta(finalId),
    });
    return { status: "skipped", reason: "duplicate_final", productId: finalId };
  }

  const hints = await collectHints(message.text, finalId, deps, log);
  const { caption, source } = await writeCaption(
    deps.captionWriter,
    {
      rawText: message.text,
      affiliateLink: affiliateLink.url,
      hints,
      defaultHeadline: deps.options.defaultHeadline,
    },
    log,
  );
  const text = assembleMessage(caption, affiliateLink.url, {
    buyHereLabel: deps.options.buyHereLabel,
  });

  try {
    await deps.delivery.publish(text, message.media);
  } catch (err) {
    ledger.release(resolvedId);
    log.warn("Publish failed, product left unrecorded", {
      ...idMeta(finalId),
      strategy: affiliateLink.origin,
      ...logger.errorMeta(err),
    });
    return {
      status: "failed",
      reason: "publish_error",
      productId: finalId,
      error: getErrorMessage(err),
    };
  }

  for (const id of aliasesOf(finalId, resolvedId, earlyId)) {
    ledger.record(id, { channel, affiliateUrl: affiliateLink.url });
  }

  log.info("Candidate published", {
    ...idMeta(finalId),
    strategy: affiliateLink.origin,
    caption: source,
    messageId: message.id,
  });
  return { status: "published", productId: finalId, affiliateLink };
}
