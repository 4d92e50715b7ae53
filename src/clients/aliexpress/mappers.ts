/**
 * AliExpress payload mappers
 *
 * Result wrapper -> domain shapes
 *
 * List wrappers hold either an array or a single object depending on the
 * gateway version; both are accepted.
 */

import type { PromotionLink, ProductDetails } from "@/types";
import { isRecord } from "@/utils";

function asList(value: unknown): Record<string, unknown>[] {
  if (Array.isArray(value)) {
    return value.filter(isRecord);
  }
  return isRecord(value) ? [value] : [];
}

function readString(record: Record<string, unknown>, key: string): string | null {
  const value = record[key];
  if (typeof value === "string" && value.trim() !== "") {
    return value.trim();
  }
  if (typeof value === "number") {
    return String(value);
  }
  return null;
}

/**
 * Navigate result.<listKey>.<itemKey>
 */
function listAt(result: unknown, listKey: string, itemKey: string): Record<string, unknown>[] {
  if (!isRecord(result)) {
    return [];
  }
  const wrapper = result[listKey];
  if (Array.isArray(wrapper)) {
    return asList(wrapper);
  }
  return isRecord(wrapper) ? asList(wrapper[itemKey]) : [];
}

/**
 * Map link.generate result to promotion links
 * Entries without a promotion_link are dropped; an empty list means
 * "not found", not an error.
 */
export function mapPromotionLinks(result: unknown): PromotionLink[] {
  const links: PromotionLink[] = [];
  for (const entry of listAt(result, "promotion_links", "promotion_link")) {
    const promotionLink = readString(entry, "promotion_link");
    if (promotionLink) {
      links.push({
        sourceValue: readString(entry, "source_value") ?? "",
        promotionLink,
      });
    }
  }
  return links;
}

/**
 * Map productdetail.get result to the first product, or null when the
 * product list is empty
 */
export function mapProductDetails(result: unknown): ProductDetails | null {
  const [product] = listAt(result, "products", "product");
  if (!product) {
    return null;
  }

  const productId = readString(product, "product_id");
  if (!productId) {
    return null;
  }

  return {
    productId,
    title: readString(product, "product_title"),
    salePrice: readString(product, "target_sale_price") ?? readString(product, "sale_price"),
    currency:
      readString(product, "target_sale_price_currency") ??
      readString(product, "sale_price_currency"),
    imageUrl: readString(product, "product_main_image_url"),
    promotionLink: readString(product, "promotion_link"),
  };
}
