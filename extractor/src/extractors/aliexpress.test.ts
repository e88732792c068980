import assert from "node:assert/strict";
import test from "node:test";
import { Logger } from "../lib/logger";
import { FetchResult } from "../types";
import { extractAliExpress } from "./aliexpress";
import { ExtractorContext } from "./index";

const ITEM_URL = "https://www.aliexpress.com/item/100500.html";

function pageOf(html: string, url = ITEM_URL): FetchResult {
  return {
    requestedUrl: url,
    finalUrl: url,
    transport: "lightweight",
    status: 200,
    contentType: "text/html; charset=utf-8",
    body: Buffer.from(html, "utf8"),
    elapsedMs: 12,
    redirects: []
  };
}

function contextFor(url: string): ExtractorContext {
  return {
    requestedUrl: url,
    fetchJson: async () => {
      throw new Error("no json endpoints in this test");
    },
    logger: new Logger("test", "error")
  };
}

const STATE = {
  titleModule: { subject: "Mini Projector 1080P - AliExpress 44" },
  priceModule: {
    formatedActivityPrice: "US $45.99",
    formatedPrice: "US $69.99",
    minAmount: { value: 45.99, currency: "USD" }
  },
  imageModule: {
    imagePathList: ["//ae01.alicdn.com/kf/p1.jpg", "https://ae01.alicdn.com/kf/p2.jpg", "//ae01.alicdn.com/kf/p1.jpg"]
  },
  specsModule: {
    props: [
      { attrName: "Brand Name", attrValue: " Lumio " },
      { attrName: "Native Resolution", attrValue: "1920x1080" },
      { attrName: "Origin", attrValue: "" }
    ]
  },
  crossLinkModule: {
    breadCrumbPathList: [{ name: "Home" }, { name: "Consumer Electronics" }, { name: "Projectors" }]
  },
  skuModule: {
    productSKUPropertyList: [
      {
        skuPropertyName: "Color",
        skuPropertyValues: [
          { propertyValueId: 201, propertyValueDisplayName: "White" },
          { propertyValueId: 202, propertyValueDisplayName: "Black" }
        ]
      },
      {
        skuPropertyName: "Plug",
        skuPropertyValues: [
          { propertyValueId: 301, propertyValueName: "EU" },
          { propertyValueId: 302, propertyValueName: "US" }
        ]
      }
    ],
    skuPriceList: [
      {
        skuId: "1001",
        skuPropIds: "201,301",
        skuVal: { skuActivityAmount: { value: 45.99, currency: "USD", formatedAmount: "US $45.99" } }
      },
      {
        skuId: "1002",
        skuPropIds: "202,302",
        skuVal: {
          skuActivityAmount: { value: 49.5, currency: "USD", formatedAmount: "US $49.50" },
          skuAmount: { value: 70, currency: "USD", formatedAmount: "US $70.00" }
        }
      }
    ]
  }
};

// The outer object uses bare keys, so only the `data:` block parses as JSON.
const RUN_PARAMS_PAGE = `<html><head><title>Fallback title</title></head><body>
<script>
window.runParams = {
  layout: [],
  data: ${JSON.stringify(STATE)},
  csrfToken: 'placeholder',
};
</script>
</body></html>`;

test("reads title, price, images, breadcrumbs, specifications and SKU options from runParams", async () => {
  const product = await extractAliExpress(pageOf(RUN_PARAMS_PAGE), contextFor(ITEM_URL));

  assert.deepEqual(product, {
    title: "Mini Projector 1080P",
    priceText: "US $45.99",
    currencyHint: "USD",
    images: ["https://ae01.alicdn.com/kf/p1.jpg", "https://ae01.alicdn.com/kf/p2.jpg"],
    breadcrumbs: ["Home", "Consumer Electronics", "Projectors"],
    category: "Projectors",
    variants: { Color: ["White", "Black"], Plug: ["EU", "US"] },
    selectedVariant: { Color: "White", Plug: "EU" },
    specifications: { "Brand Name": "Lumio", "Native Resolution": "1920x1080" }
  });
});

test("a requested SKU takes its price from the ladder", async () => {
  const url = `${ITEM_URL}?sku_id=1002`;
  const product = await extractAliExpress(pageOf(RUN_PARAMS_PAGE, url), contextFor(url));

  assert.equal(product.priceText, "US $49.50");
  assert.equal(product.currencyHint, "USD");
  assert.deepEqual(product.selectedVariant, { Color: "Black", Plug: "US" });
});

test("falls back to meta tags when no embedded state exists", async () => {
  const html = `<html><head>
<meta property="og:title" content="Bamboo Cutting Board | AliExpress">
<meta property="og:image" content="//ae01.alicdn.com/kf/board.jpg">
<meta property="product:price:amount" content="12.80">
<meta property="product:price:currency" content="USD">
</head><body></body></html>`;

  const product = await extractAliExpress(pageOf(html), contextFor(ITEM_URL));
  assert.equal(product.title, "Bamboo Cutting Board");
  assert.equal(product.priceText, "12.80");
  assert.equal(product.currencyHint, "USD");
  assert.deepEqual(product.images, ["https://ae01.alicdn.com/kf/board.jpg"]);
});

test("DCData images fill in when the modules carry none", async () => {
  const html = `<html><head><meta property="og:title" content="Travel Mug"></head><body>
<script>window._d_c_ = window._d_c_ || {}; _d_c_.DCData = {"imagePathList":["https://ae01.alicdn.com/kf/dc1.jpg"]};</script>
</body></html>`;

  const product = await extractAliExpress(pageOf(html), contextFor(ITEM_URL));
  assert.equal(product.title, "Travel Mug");
  assert.deepEqual(product.images, ["https://ae01.alicdn.com/kf/dc1.jpg"]);
});
