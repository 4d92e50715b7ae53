/**
 * Unit tests for the message assembler
 *
 * Invariant under test: the affiliate link appears exactly once and no
 * other absolute URL survives.
 */

import { describe, it, expect } from "vitest";
import { assembleMessage, stripUrls, tidyWhitespace } from "@/publishing";
import { ABSOLUTE_URL_PATTERN } from "@/constants";

const LINK = "https://s.click.aliexpress.com/e/_abc";

function occurrences(text: string, needle: string): number {
  return text.split(needle).length - 1;
}

function otherUrls(text: string): string[] {
  return text.replace(LINK, "").match(ABSOLUTE_URL_PATTERN) ?? [];
}

describe("assembleMessage", () => {
  it("removes foreign URLs and appends the buy-here block", () => {
    expect(assembleMessage("Hot deal https://www.aliexpress.com/item/1.html?aff=x now!", LINK)).toBe(
      `Hot deal now!\n\n👇 Buy here:\n${LINK}`,
    );
  });

  it("keeps the first occurrence of the link and drops repeats", () => {
    const caption = `Grab it: ${LINK}. Also ${LINK} and www.example.com/x!`;
    expect(assembleMessage(caption, LINK)).toBe(`Grab it: ${LINK}. Also and !`);
  });

  it("removes percent-encoded URLs", () => {
    expect(assembleMessage("See https%3A%2F%2Fother.example.com%2Fx for more", LINK)).toBe(
      `See for more\n\n👇 Buy here:\n${LINK}`,
    );
  });

  it("returns the bare block for an empty caption", () => {
    expect(assembleMessage("", LINK)).toBe(`👇 Buy here:\n${LINK}`);
    expect(assembleMessage("(https://bit.ly/x)", LINK)).toBe(`👇 Buy here:\n${LINK}`);
  });

  it("uses the configured label", () => {
    expect(assembleMessage("Lamp", LINK, { buyHereLabel: "Order:" })).toBe(`Lamp\n\nOrder:\n${LINK}`);
  });

  it("collapses blank lines left behind", () => {
    expect(assembleMessage("Line one\n\n\n\nLine two https://x.example.com", LINK)).toBe(
      `Line one\n\nLine two\n\n👇 Buy here:\n${LINK}`,
    );
  });

  it("removes URLs that only form once empty brackets are dropped", () => {
    expect(assembleMessage("Deal ht()tps://evil.example.com/x", LINK)).toBe(
      `Deal\n\n👇 Buy here:\n${LINK}`,
    );
  });

  it("holds the single-link invariant for arbitrary captions", () => {
    const captions = [
      "",
      "No links at all",
      `${LINK}`,
      `${LINK} ${LINK} ${LINK}`,
      "https://a.example.com https://b.example.com www.c.example.com",
      `Buy ${LINK}?ref=other now`,
      "Encoded http%3A%2F%2Fx.example.com and https://s.click.aliexpress.com/e/_competitor",
      `Multi\nline\n\n\n${LINK}\n\nhttps://t.me/channel`,
      "Deal ht()tps://evil.example.com/x",
      "ht[ ]tp://a.example.com and w<>ww.b.example.com",
      "h( ( ) )ttps://nested.example.com",
      `Twice ht()tps://s.click.aliexpress.com/e/_abc ${LINK}`,
    ];
    for (const caption of captions) {
      const message = assembleMessage(caption, LINK);
      expect(occurrences(message, LINK)).toBe(1);
      expect(otherUrls(message)).toEqual([]);
    }
  });
});

describe("stripUrls", () => {
  it("keeps punctuation that followed a URL", () => {
    expect(stripUrls("see https://x.example.com/a, then")).toBe("see , then");
  });
});

describe("tidyWhitespace", () => {
  it("drops empty brackets, doubled spaces and trailing blanks", () => {
    expect(tidyWhitespace("  Lamp ( )  deal  \n\n\n\n  today  ")).toBe("Lamp deal\n\ntoday");
  });
});
