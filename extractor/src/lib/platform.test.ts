import assert from "node:assert/strict";
import test from "node:test";
import { TargetURL } from "../types";
import { PlatformClassifier, acceptLanguage, requestProfile } from "./platform";

function target(host: string): TargetURL {
  return { url: `https://${host}/`, host, addresses: ["93.184.216.34"], allowlisted: false };
}

const classifier = new PlatformClassifier({
  shopifyDomains: ["brand.example"],
  renderFirstStrategies: ["aliexpress"]
});

test("classify recognises marketplace hosts", () => {
  assert.equal(classifier.classify(target("www.aliexpress.com")), "aliexpress");
  assert.equal(classifier.classify(target("ar.aliexpress.com")), "aliexpress");
  assert.equal(classifier.classify(target("aliexpress.us")), "aliexpress");
  assert.equal(classifier.classify(target("www.amazon.co.uk")), "amazon");
  assert.equal(classifier.classify(target("amazon.sa")), "amazon");
  assert.equal(classifier.classify(target("www.amazon.co.jp")), "amazon");
});

test("classify recognises Shopify storefronts by suffix or configuration", () => {
  assert.equal(classifier.classify(target("cool-store.myshopify.com")), "shopify");
  assert.equal(classifier.classify(target("shop.brand.example")), "shopify");
});

test("classify falls back to generic for look-alike hosts", () => {
  assert.equal(classifier.classify(target("amazon.example.com")), "generic");
  assert.equal(classifier.classify(target("notaliexpress.com")), "generic");
  assert.equal(classifier.classify(target("example-shop.test")), "generic");
});

test("requiresRendering follows the configured render-first list", () => {
  assert.equal(classifier.requiresRendering("aliexpress"), true);
  assert.equal(classifier.requiresRendering("generic"), false);
});

test("requestProfile sets language and the AliExpress locale cookie", () => {
  assert.deepEqual(requestProfile("aliexpress", "en"), {
    accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
    "accept-language": "en-US,en;q=0.9",
    cookie: "aep_usuc_f=site=glo&b_locale=en_US&c_tp=USD&region=US"
  });
  assert.equal(requestProfile("generic", "ar_SA")["accept-language"], "ar-SA,ar;q=0.9,en;q=0.8");
  assert.equal(requestProfile("amazon", "de").cookie, undefined);
});

test("acceptLanguage keeps a bare non-English tag with an English fallback", () => {
  assert.equal(acceptLanguage("fr"), "fr,en;q=0.8");
});

test("acceptLanguage falls back to English for values that are not language tags", () => {
  assert.equal(acceptLanguage("العربية"), "en-US,en;q=0.9");
  assert.equal(acceptLanguage("en;q=1, x"), "en-US,en;q=0.9");
  assert.equal(acceptLanguage("zh_Hant"), "zh-Hant,zh;q=0.9,en;q=0.8");
});
