import { FetchResult, ScrapedProduct } from "../types";
import { categoryFromBreadcrumbs, scrapeGeneric } from "./generic";
import {
  HtmlPage,
  asText,
  cleanTitle,
  emptyProduct,
  fillMissing,
  firstText,
  isRecord,
  jsonLdNodes,
  jsonLdProduct,
  loadPage,
  microdataProduct,
  parseLooseJson,
  requireUsefulData,
  resolveImages,
  selectorPriceText,
  uniqueStrings
} from "./html";
import type { ExtractorContext } from "./index";

const PRICE_SELECTORS = [
  "#corePrice_feature_div .a-price .a-offscreen",
  "#corePriceDisplay_desktop_feature_div .a-price .a-offscreen",
  ".priceToPay .a-offscreen",
  "#priceblock_dealprice",
  "#priceblock_saleprice",
  "#priceblock_ourprice",
  "#price_inside_buybox",
  ".a-price .a-offscreen"
];

/** `data-a-dynamic-image` maps URLs to `[width, height]`; the widest one wins. */
export function largestDynamicImage(attribute: string | undefined): string | undefined {
  if (!attribute) {
    return undefined;
  }
  const parsed = parseLooseJson(attribute);
  if (!isRecord(parsed)) {
    return undefined;
  }
  let best: { url: string; width: number } | undefined;
  for (const [url, size] of Object.entries(parsed)) {
    const width = Array.isArray(size) && typeof size[0] === "number" ? size[0] : 0;
    if (!best || width > best.width) {
      best = { url, width };
    }
  }
  return best?.url;
}

function landingImages(page: HtmlPage): string[] {
  const { $ } = page;
  const image = $("#landingImage, #imgBlkFront, #main-image").first();
  return resolveImages(
    [image.attr("data-old-hires"), largestDynamicImage(image.attr("data-a-dynamic-image")), image.attr("src")],
    page.baseUrl
  );
}

function wayfinding(page: HtmlPage): string[] {
  const { $ } = page;
  return $("#wayfinding-breadcrumbs_feature_div li a")
    .toArray()
    .map((element) => asText($(element).text()))
    .filter((crumb): crumb is string => crumb !== undefined);
}

function optionGroupName(id: string, label: string | undefined): string {
  const fromLabel = label?.replace(/:\s*$/, "").trim();
  if (fromLabel) {
    return fromLabel;
  }
  return id
    .replace(/^variation_/, "")
    .replace(/_name$/, "")
    .replace(/_/g, " ");
}

function twisterVariants(page: HtmlPage): { variants: Record<string, string[]>; selected: Record<string, string> } {
  const { $ } = page;
  const variants: Record<string, string[]> = {};
  const selected: Record<string, string> = {};

  $("#twister [id^='variation_']").each((_, element) => {
    const group = $(element);
    const id = group.attr("id");
    if (!id) {
      return;
    }
    const name = optionGroupName(id, asText(group.find("label.a-form-label").first().text()));
    const swatches = group
      .find("li")
      .toArray()
      .map((item) => {
        const swatch = $(item);
        return firstText(
          swatch.attr("title")?.replace(/^Click to select\s*/i, ""),
          swatch.find("img").attr("alt"),
          swatch.text()
        );
      });
    const options = group
      .find("select option")
      .toArray()
      .filter((option) => $(option).attr("value") !== "-1")
      .map((option) => asText($(option).text()));
    const values = uniqueStrings([...swatches, ...options].filter((value): value is string => value !== undefined));
    if (values.length === 0) {
      return;
    }
    variants[name] = values;
    const current = asText(group.find(".selection").first().text());
    if (current) {
      selected[name] = current;
    }
  });

  return { variants, selected };
}

function domProduct(page: HtmlPage): ScrapedProduct {
  const { $ } = page;
  const product = emptyProduct();
  const title = cleanTitle(firstText($("#productTitle").text(), $("#title").text()));
  if (title) {
    product.title = title;
  }
  const priceText = selectorPriceText(page, PRICE_SELECTORS);
  if (priceText) {
    product.priceText = priceText;
  }
  product.images = landingImages(page);
  product.breadcrumbs = wayfinding(page);
  const category = categoryFromBreadcrumbs(product.breadcrumbs, product.title);
  if (category) {
    product.category = category;
  }
  const { variants, selected } = twisterVariants(page);
  product.variants = variants;
  if (Object.keys(selected).length > 0) {
    product.selectedVariant = selected;
  }
  return product;
}

export async function extractAmazon(page: FetchResult, _ctx: ExtractorContext): Promise<ScrapedProduct> {
  const html = loadPage(page);
  const structured = fillMissing(jsonLdProduct(html, jsonLdNodes(html)), microdataProduct(html));
  const product = fillMissing(fillMissing(structured, domProduct(html)), scrapeGeneric(html));
  return requireUsefulData(product, "amazon extractor");
}
