import assert from "node:assert/strict";
import test from "node:test";
import { isErrorKind } from "../errors";
import { FetchResult } from "../types";
import {
  cleanTitle,
  domImages,
  findAssignedObjects,
  jsonLdProduct,
  loadPage,
  parseLooseJson,
  readBalancedBlock
} from "./html";

const PAGE_URL = "https://shop.example.test/p/trail-shoe";

function pageOf(html: string, contentType = "text/html; charset=utf-8"): FetchResult {
  return {
    requestedUrl: PAGE_URL,
    finalUrl: PAGE_URL,
    transport: "lightweight",
    status: 200,
    contentType,
    body: Buffer.from(html, "utf8"),
    elapsedMs: 5,
    redirects: []
  };
}

test("cleanTitle drops marketplace prefixes and suffixes", () => {
  assert.equal(cleanTitle("Amazon.com: Wireless Mouse M185"), "Wireless Mouse M185");
  assert.equal(cleanTitle("Phone Case | Buy Online at Best Price"), "Phone Case");
  assert.equal(cleanTitle("USB Hub – Anker Official Store"), "USB Hub");
  assert.equal(cleanTitle("Desk Lamp - AliExpress 44"), "Desk Lamp");
  assert.equal(cleanTitle("   "), undefined);
});

test("readBalancedBlock ignores brackets inside strings", () => {
  const text = 'x = {"a": "}{", "b": [1, {"c": 2}]}; y';
  assert.equal(readBalancedBlock(text, 4), '{"a": "}{", "b": [1, {"c": 2}]}');
  assert.equal(readBalancedBlock(text, 0), null);
});

test("parseLooseJson tolerates trailing commas", () => {
  assert.deepEqual(parseLooseJson('{"a": [1, 2,], }'), { a: [1, 2] });
  assert.equal(parseLooseJson("not json"), undefined);
});

test("findAssignedObjects reads objects assigned in inline scripts", () => {
  const page = loadPage(
    pageOf('<script>window.runParams = { "data": {"a": 1,}, };</script><script src="/bundle.js"></script>')
  );
  assert.deepEqual(findAssignedObjects(page, [/window\.runParams\s*=\s*/]), [{ data: { a: 1 } }]);
});

test("jsonLdProduct walks @graph, aggregate offers and breadcrumb lists", () => {
  const html = `<html><head>
<script type="application/ld+json">{"@context":"https://schema.org","@graph":[{"@type":"WebPage","name":"Shop"},{"@type":"Product","name":"Trail Shoe","image":["/img/shoe.jpg","//cdn.example.test/shoe-2.jpg"],"category":"Footwear > Running","offers":{"@type":"AggregateOffer","lowPrice":"59.00","priceCurrency":"EUR","offers":[{"@type":"Offer","price":"64.50","priceCurrency":"EUR"}]}}]}</script>
<script type="application/ld+json">{"@type":"BreadcrumbList","itemListElement":[{"@type":"ListItem","position":2,"name":"Running"},{"@type":"ListItem","position":1,"name":"Shoes"}]}</script>
</head><body></body></html>`;

  assert.deepEqual(jsonLdProduct(loadPage(pageOf(html))), {
    title: "Trail Shoe",
    priceText: "64.50",
    currencyHint: "EUR",
    images: ["https://shop.example.test/img/shoe.jpg", "https://cdn.example.test/shoe-2.jpg"],
    category: "Running",
    breadcrumbs: ["Shoes", "Running"],
    variants: {},
    specifications: {}
  });
});

test("jsonLdProduct reads ProductGroup variants and the first member's offer", () => {
  const html = `<script type="application/ld+json">{"@type":"ProductGroup","name":"Linen Shirt","variesBy":["https://schema.org/color","https://schema.org/size"],"hasVariant":[{"@type":"Product","name":"Linen Shirt Blue M","color":"Blue","size":"M","offers":{"@type":"Offer","price":29,"priceCurrency":"USD"}},{"@type":"Product","color":"White","size":"M"},{"@type":"Product","color":"Blue","size":"L"}]}</script>`;

  const product = jsonLdProduct(loadPage(pageOf(html)));
  assert.equal(product.title, "Linen Shirt");
  assert.equal(product.priceText, "29");
  assert.equal(product.currencyHint, "USD");
  assert.deepEqual(product.variants, { color: ["Blue", "White"], size: ["M", "L"] });
});

test("jsonLdProduct reads additionalProperty pairs as specifications", () => {
  const html = `<script type="application/ld+json">{"@type":"Product","name":"Travel Mug","additionalProperty":[{"@type":"PropertyValue","name":"Material","value":"Stoneware"},{"@type":"PropertyValue","propertyID":"capacity","value":350},{"@type":"PropertyValue","name":"Finish","value":""},{"@type":"PropertyValue","name":"Material","value":"Porcelain"}]}</script>`;

  const product = jsonLdProduct(loadPage(pageOf(html)));
  assert.deepEqual(product.specifications, { Material: "Porcelain", capacity: "350" });
});

test("domImages prefers large declared images and skips noise", () => {
  const html = `<body>
<img src="/sprite.png">
<img src="/a.jpg" width="200" height="200">
<img src="/b.jpg" width="800" height="600">
<img src="/tiny.jpg" width="20" height="20">
<img data-src="/lazy.jpg">
</body>`;

  assert.deepEqual(domImages(loadPage(pageOf(html))), [
    "https://shop.example.test/b.jpg",
    "https://shop.example.test/a.jpg",
    "https://shop.example.test/lazy.jpg"
  ]);
});

test("loadPage refuses non-HTML bodies", () => {
  assert.throws(
    () => loadPage(pageOf("{}", "application/json")),
    (error: unknown) => isErrorKind(error, "NoData")
  );
});
