import assert from "node:assert/strict";
import test from "node:test";
import { Logger } from "../lib/logger";
import { FetchResult } from "../types";
import { extractAmazon, largestDynamicImage } from "./amazon";
import { ExtractorContext } from "./index";

const ITEM_URL = "https://www.amazon.com/dp/B000TEST01";

function pageOf(html: string): FetchResult {
  return {
    requestedUrl: ITEM_URL,
    finalUrl: ITEM_URL,
    transport: "rendered",
    status: 200,
    contentType: "text/html",
    body: Buffer.from(html, "utf8"),
    elapsedMs: 40,
    redirects: []
  };
}

const ctx: ExtractorContext = {
  requestedUrl: ITEM_URL,
  fetchJson: async () => {
    throw new Error("no json endpoints in this test");
  },
  logger: new Logger("test", "error")
};

test("reads the DOM layout when no structured data is present", async () => {
  const html = `<html><head><title>Amazon.com: Noise Cancelling Headphones : Electronics</title></head><body>
<div id="wayfinding-breadcrumbs_feature_div"><ul><li><a href="/electronics">Electronics</a></li><li>›</li><li><a href="/headphones">Headphones</a></li></ul></div>
<span id="productTitle">  Noise Cancelling Headphones  </span>
<div id="corePrice_feature_div"><span class="a-price"><span class="a-offscreen">$129.00</span><span aria-hidden="true">$129</span></span></div>
<img id="landingImage" src="https://m.media-amazon.test/images/I/small.jpg" data-a-dynamic-image='{"https://m.media-amazon.test/images/I/500.jpg":[500,500],"https://m.media-amazon.test/images/I/1500.jpg":[1500,1500]}'>
<div id="twister">
  <div id="variation_color_name"><label class="a-form-label">Color: </label><span class="selection">Black</span>
    <ul><li title="Click to select Black"></li><li title="Click to select Silver"></li></ul></div>
  <div id="variation_size_name"><select><option value="-1">Select</option><option value="0">Standard</option><option value="1">Travel</option></select></div>
</div>
</body></html>`;

  assert.deepEqual(await extractAmazon(pageOf(html), ctx), {
    title: "Noise Cancelling Headphones",
    priceText: "$129.00",
    images: ["https://m.media-amazon.test/images/I/1500.jpg", "https://m.media-amazon.test/images/I/small.jpg"],
    breadcrumbs: ["Electronics", "Headphones"],
    category: "Headphones",
    variants: { Color: ["Black", "Silver"], size: ["Standard", "Travel"] },
    selectedVariant: { Color: "Black" },
    specifications: {}
  });
});

test("structured data wins over the DOM", async () => {
  const html = `<html><head>
<script type="application/ld+json">{"@type":"Product","name":"Smart Plug","offers":{"@type":"Offer","price":"24.99","priceCurrency":"USD"}}</script>
</head><body><span id="productTitle">Other Title</span></body></html>`;

  const product = await extractAmazon(pageOf(html), ctx);
  assert.equal(product.title, "Smart Plug");
  assert.equal(product.priceText, "24.99");
  assert.equal(product.currencyHint, "USD");
});

test("largestDynamicImage picks the widest entry", () => {
  assert.equal(largestDynamicImage('{"a.jpg":[100,100],"b.jpg":[300,200]}'), "b.jpg");
  assert.equal(largestDynamicImage(undefined), undefined);
  assert.equal(largestDynamicImage("oops"), undefined);
});
