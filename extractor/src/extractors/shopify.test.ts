import assert from "node:assert/strict";
import test from "node:test";
import { ExtractionError } from "../errors";
import { Logger } from "../lib/logger";
import { FetchResult } from "../types";
import { ExtractorContext } from "./index";
import { extractShopify, productJsonUrl } from "./shopify";

const PRODUCT_URL = "https://store.example.test/en-ca/products/wool-beanie?variant=222";

function pageOf(html: string, url = PRODUCT_URL): FetchResult {
  return {
    requestedUrl: url,
    finalUrl: url,
    transport: "lightweight",
    status: 200,
    contentType: "text/html",
    body: Buffer.from(html, "utf8"),
    elapsedMs: 8,
    redirects: []
  };
}

function contextWith(fetchJson: (url: string) => Promise<unknown>, url = PRODUCT_URL): ExtractorContext {
  return { requestedUrl: url, fetchJson, logger: new Logger("test", "error") };
}

const PAYLOAD = {
  product: {
    title: "Wool Beanie",
    product_type: "Hats",
    options: [
      { name: "Color", values: ["Grey", "Navy"] },
      { name: "Size", values: ["S/M", "L/XL"] }
    ],
    variants: [
      { id: 111, price: "25.00", option1: "Grey", option2: "S/M", option3: null },
      { id: 222, price: "27.50", option1: "Navy", option2: "L/XL", option3: null }
    ],
    images: [{ src: "https://cdn.shopify.test/beanie-1.jpg" }, { src: "//cdn.shopify.test/beanie-2.jpg" }],
    image: { src: "https://cdn.shopify.test/beanie-1.jpg" }
  }
};

const STOREFRONT_PAGE = `<html><head><title>Wool Beanie – Example Store</title>
<meta property="og:price:currency" content="CAD"></head><body></body></html>`;

test("productJsonUrl keeps locale prefixes and drops collection paths", () => {
  assert.equal(
    productJsonUrl("https://store.example.test/en-ca/products/wool-beanie?variant=222"),
    "https://store.example.test/en-ca/products/wool-beanie.json"
  );
  assert.equal(
    productJsonUrl("https://store.example.test/collections/summer/products/sun-hat"),
    "https://store.example.test/products/sun-hat.json"
  );
  assert.equal(productJsonUrl("https://store.example.test/pages/about"), null);
});

test("uses the product JSON and the requested variant", async () => {
  const requested: string[] = [];
  const product = await extractShopify(
    pageOf(STOREFRONT_PAGE),
    contextWith(async (url) => {
      requested.push(url);
      return PAYLOAD;
    })
  );

  assert.deepEqual(requested, ["https://store.example.test/en-ca/products/wool-beanie.json"]);
  assert.deepEqual(product, {
    title: "Wool Beanie",
    priceText: "27.50",
    currencyHint: "CAD",
    images: ["https://cdn.shopify.test/beanie-1.jpg", "https://cdn.shopify.test/beanie-2.jpg"],
    category: "Hats",
    breadcrumbs: [],
    variants: { Color: ["Grey", "Navy"], Size: ["S/M", "L/XL"] },
    selectedVariant: { Color: "Navy", Size: "L/XL" },
    specifications: {}
  });
});

test("without a variant query the first variant is priced", async () => {
  const url = "https://store.example.test/en-ca/products/wool-beanie";
  const product = await extractShopify(pageOf(STOREFRONT_PAGE, url), contextWith(async () => PAYLOAD, url));
  assert.equal(product.priceText, "25.00");
  assert.deepEqual(product.selectedVariant, { Color: "Grey", Size: "S/M" });
});

test("falls back to the page when the JSON endpoint fails or is malformed", async () => {
  const html = `<html><body><h1>Canvas Tote</h1><span class="price">$18.00</span></body></html>`;

  const failed = await extractShopify(
    pageOf(html),
    contextWith(async () => {
      throw new ExtractionError("NoData", "json endpoint answered 404");
    })
  );
  assert.equal(failed.title, "Canvas Tote");
  assert.equal(failed.priceText, "$18.00");

  const malformed = await extractShopify(pageOf(html), contextWith(async () => ({ nope: true })));
  assert.equal(malformed.title, "Canvas Tote");
  assert.equal(malformed.priceText, "$18.00");
});
