/**
 * Unit tests for the product-specific link check
 */

import { describe, it, expect } from "vitest";
import { isProductSpecificLink } from "@/affiliate";

const ITEM_URL = "https://www.aliexpress.com/item/1005001234567890.html";

describe("isProductSpecificLink", () => {
  it("accepts product pages and short links", () => {
    expect(isProductSpecificLink(ITEM_URL)).toBe(true);
    expect(isProductSpecificLink("https://s.click.aliexpress.com/e/_abCD12")).toBe(true);
    expect(isProductSpecificLink("https://a.aliexpress.com/_mK9zQ")).toBe(true);
  });

  it("accepts a portal link wrapping the encoded product URL in its query", () => {
    const link = `https://portal.example.com/track?url=${encodeURIComponent(ITEM_URL)}`;
    expect(isProductSpecificLink(link)).toBe(true);
  });

  it("accepts a prefix link carrying the encoded product URL in its path", () => {
    const link = `https://go.example.com/r/${encodeURIComponent(ITEM_URL)}`;
    expect(isProductSpecificLink(link)).toBe(true);
  });

  it("rejects generic and home-page links", () => {
    expect(isProductSpecificLink("https://www.aliexpress.com/")).toBe(false);
    expect(isProductSpecificLink("https://s.click.aliexpress.com/")).toBe(false);
    expect(isProductSpecificLink("https://portal.example.com/track?url=https%3A%2F%2Fexample.com")).toBe(
      false,
    );
  });

  it("rejects empty, unparseable and non-http values", () => {
    expect(isProductSpecificLink(null)).toBe(false);
    expect(isProductSpecificLink(undefined)).toBe(false);
    expect(isProductSpecificLink("")).toBe(false);
    expect(isProductSpecificLink("not a url")).toBe(false);
    expect(isProductSpecificLink("ftp://files.example.com/item/1005001234567890")).toBe(false);
  });
});
