import assert from "node:assert/strict";
import test from "node:test";
import { canonicalizeUrl, queryParam, resolveUrl, shopifyProductPath } from "./url";

test("canonicalizeUrl collapses malformed Shopify locale product paths", () => {
  const canonical = canonicalizeUrl("https://Shop.Example.com/undefined-undefined/products/freesip?utm_source=ads#reviews");
  assert.equal(canonical, "https://shop.example.com/products/freesip");
});

test("canonicalizeUrl keeps variant selectors while removing tracking params", () => {
  const canonical = canonicalizeUrl(
    "https://www.aliexpress.com/item/1005001.html?spm=a2g0o.home&sku_id=12000&aff_fcid=abc&gatewayAdapt=glo2usa"
  );
  assert.equal(canonical, "https://www.aliexpress.com/item/1005001.html?sku_id=12000");
});

test("canonicalizeUrl sorts query params and drops default ports", () => {
  const canonical = canonicalizeUrl("https://example.com:443/search/?q=bottle&a=1&fbclid=x");
  assert.equal(canonical, "https://example.com/search?a=1&q=bottle");
});

test("canonicalizeUrl rejects non-http schemes", () => {
  assert.equal(canonicalizeUrl("ftp://example.com/file"), null);
  assert.equal(canonicalizeUrl("not a url"), null);
});

test("resolveUrl resolves relative and protocol-relative image paths", () => {
  assert.equal(resolveUrl("//ae01.alicdn.com/kf/a.jpg", "https://www.aliexpress.com/item/1.html"), "https://ae01.alicdn.com/kf/a.jpg");
  assert.equal(resolveUrl("/img/b.png", "https://shop.example.com/products/x"), "https://shop.example.com/img/b.png");
  assert.equal(resolveUrl("data:image/png;base64,AAAA", "https://shop.example.com/"), null);
  assert.equal(resolveUrl("  ", "https://shop.example.com/"), null);
});

test("shopifyProductPath extracts handle and locale prefix", () => {
  assert.deepEqual(shopifyProductPath("https://store.myshopify.com/en-ca/products/replacement-lids?variant=42"), {
    prefix: "/en-ca",
    handle: "replacement-lids"
  });
  assert.deepEqual(shopifyProductPath("https://store.myshopify.com/collections/summer/products/tee"), {
    prefix: "",
    handle: "tee"
  });
  assert.equal(shopifyProductPath("https://store.myshopify.com/pages/about"), null);
});

test("shopifyProductPath gives up on a handle with a malformed escape", () => {
  assert.equal(shopifyProductPath("https://store.myshopify.com/products/100%-cotton-tee"), null);
  assert.deepEqual(shopifyProductPath("https://store.myshopify.com/products/caf%C3%A9-mug"), { prefix: "", handle: "café-mug" });
});

test("queryParam returns the first non-empty named parameter", () => {
  assert.equal(queryParam("https://x.example/p?skuId=77", "sku_id", "skuId"), "77");
  assert.equal(queryParam("https://x.example/p?sku_id=", "sku_id"), undefined);
});
