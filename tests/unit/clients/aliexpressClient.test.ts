/**
 * Unit tests for AliExpressClient
 *
 * Every request goes through the mock HTTP harness; backoff waits are
 * skipped with a no-op sleep.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { AliExpressClient, signParams } from "@/clients/aliexpress";
import type { AliExpressSettings } from "@/types";
import { createMockHttp, loadFixtureText, type MockHttp } from "../../helpers/mockHttp";
import { noSleep } from "../../helpers/fakes";

const ENDPOINT = "https://api-sg.aliexpress.com/sync";
const ITEM_URL = "https://www.aliexpress.com/item/1005001234567890.html";
const LINK_METHOD = "aliexpress.affiliate.link.generate";

const SETTINGS: AliExpressSettings = {
  appKey: "12345",
  appSecret: "test-secret",
  endpoint: ENDPOINT,
  trackingId: "test-tracking",
  timestampFormat: "millis",
  timestampUtcOffsetMinutes: 480,
  promotionLinkType: "0",
  targetCurrency: "USD",
  targetLanguage: "EN",
  timeoutMs: 1_000,
};

describe("AliExpressClient", () => {
  let mock: MockHttp;
  let client: AliExpressClient;

  beforeEach(() => {
    mock = createMockHttp();
    client = new AliExpressClient({
      settings: SETTINGS,
      httpRequest: mock.request,
      sleep: noSleep,
      now: () => new Date(1_700_000_000_000),
    });
  });

  describe("constructor", () => {
    it("should throw when the app secret is missing", () => {
      expect(() => new AliExpressClient({ settings: { ...SETTINGS, appSecret: "" } })).toThrow(
        "AliExpress authentication configuration missing: ALIEXPRESS_APP_SECRET",
      );
    });
  });

  describe("buildSignedParams", () => {
    it("should add the system parameters and a matching signature", () => {
      const params = client.buildSignedParams(LINK_METHOD, {});
      expect(params).toEqual({
        app_key: "12345",
        timestamp: "1700000000000",
        format: "json",
        sign_method: "md5",
        v: "2.0",
        method: LINK_METHOD,
        sign: "5EA5C12D526A8E48F646E677EB6F5646",
      });
    });

    it("should let system parameters win over call parameters", () => {
      const params = client.buildSignedParams(LINK_METHOD, { app_key: "other", tracking_id: "t" });
      expect(params.app_key).toBe("12345");
      expect(params.tracking_id).toBe("t");
    });
  });

  describe("generateAffiliateLinks", () => {
    it("should POST the signed form and map the promotion links", async () => {
      mock.on("POST", ENDPOINT, loadFixtureText("aliexpress/link_generate_success.json"));

      const result = await client.generateAffiliateLinks([ITEM_URL]);

      expect(result).toEqual({
        ok: true,
        value: [{ sourceValue: ITEM_URL, promotionLink: "https://s.click.aliexpress.com/e/_promo1" }],
      });

      const [request] = mock.getRecordedRequests();
      expect(request.method).toBe("POST");
      expect(request.responseType).toBe("text");
      const form = request.form ?? {};
      expect(form.method).toBe(LINK_METHOD);
      expect(form.source_values).toBe(ITEM_URL);
      expect(form.tracking_id).toBe("test-tracking");
      expect(form.promotion_link_type).toBe("0");

      const { sign, ...unsigned } = form;
      expect(sign).toBe(signParams("test-secret", unsigned));
    });

    it("should return an empty list (not an error) when nothing was found", async () => {
      mock.on("POST", ENDPOINT, loadFixtureText("aliexpress/link_generate_empty.json"));
      expect(await client.generateAffiliateLinks([ITEM_URL])).toEqual({ ok: true, value: [] });
    });

    it("should return a business error after exactly one request", async () => {
      mock.on("POST", ENDPOINT, loadFixtureText("aliexpress/error_invalid_tracking.json"));

      const result = await client.generateAffiliateLinks([ITEM_URL]);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("business");
        expect(result.error.message).toBe(`${LINK_METHOD}: Invalid Tracking Id`);
        expect(result.error.code).toBe("InvalidParameter");
      }
      expect(mock.getRecordedRequests()).toHaveLength(1);
    });

    it("should return an auth error without retrying", async () => {
      mock.on("POST", ENDPOINT, loadFixtureText("aliexpress/error_signature.json"));

      const result = await client.generateAffiliateLinks([ITEM_URL]);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("auth");
      }
      expect(mock.getRecordedRequests()).toHaveLength(1);
    });

    it("should retry 5xx responses up to the attempt bound", async () => {
      mock.onSequence("POST", ENDPOINT, [{ status: 503, body: "Service Unavailable" }]);

      const result = await client.generateAffiliateLinks([ITEM_URL]);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("transient");
        expect(result.error.message).toBe(`${LINK_METHOD}: HTTP 503 Mock Response`);
      }
      expect(mock.getRecordedRequests()).toHaveLength(3);
    });

    it("should succeed when a retry succeeds", async () => {
      mock.onSequence("POST", ENDPOINT, [
        { status: 502, body: "Bad Gateway" },
        { status: 200, body: loadFixtureText("aliexpress/link_generate_success.json") },
      ]);

      const result = await client.generateAffiliateLinks([ITEM_URL]);

      expect(result.ok).toBe(true);
      expect(mock.getRecordedRequests()).toHaveLength(2);
    });

    it("should treat a non-JSON body as transient", async () => {
      mock.on("POST", ENDPOINT, "<html><body>Bad gateway</body></html>");

      const result = await client.generateAffiliateLinks([ITEM_URL]);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("transient");
        expect(result.error.raw).toBe("<html><body>Bad gateway</body></html>");
      }
      expect(mock.getRecordedRequests()).toHaveLength(3);
    });

    it("should treat transport errors as transient", async () => {
      mock.onCustom("POST", ENDPOINT, async () => {
        throw new Error("read ECONNRESET");
      });

      const result = await client.generateAffiliateLinks([ITEM_URL]);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("transient");
        expect(result.error.message).toBe(`${LINK_METHOD}: read ECONNRESET`);
      }
      expect(mock.getRecordedRequests()).toHaveLength(3);
    });

    it("should not retry a 4xx response", async () => {
      mock.onResponse("POST", ENDPOINT, { status: 400, body: "Bad Request" });

      const result = await client.generateAffiliateLinks([ITEM_URL]);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("business");
        expect(result.error.code).toBe("400");
      }
      expect(mock.getRecordedRequests()).toHaveLength(1);
    });

    it("should report an unrecognized envelope as malformed", async () => {
      mock.on("POST", ENDPOINT, '{"unexpected":true}');

      const result = await client.generateAffiliateLinks([ITEM_URL]);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("malformed");
        expect(result.error.raw).toBe('{"unexpected":true}');
      }
      expect(mock.getRecordedRequests()).toHaveLength(1);
    });
  });

  describe("getProductDetails", () => {
    it("should send the product id and target currency", async () => {
      mock.on("POST", ENDPOINT, loadFixtureText("aliexpress/productdetail_success.json"));

      const result = await client.getProductDetails("1005001234567890");

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value?.title).toBe("Wireless Earbuds with Charging Case");
        expect(result.value?.salePrice).toBe("12.99");
      }
      const form = mock.getRecordedRequests()[0].form ?? {};
      expect(form.method).toBe("aliexpress.affiliate.productdetail.get");
      expect(form.product_ids).toBe("1005001234567890");
      expect(form.target_currency).toBe("USD");
      expect(form.target_language).toBe("EN");
    });
  });
});
