import { FetchResult, ScrapedProduct } from "../types";
import {
  HtmlPage,
  cleanTitle,
  domBreadcrumbs,
  domImages,
  emptyProduct,
  fillMissing,
  firstText,
  jsonLdNodes,
  jsonLdProduct,
  loadPage,
  metaProduct,
  microdataProduct,
  requireUsefulData,
  scanPriceText,
  selectorPriceText
} from "./html";
import type { ExtractorContext } from "./index";

const GENERIC_CRUMBS = new Set(["home", "homepage", "all categories", "الرئيسية"]);

/** Last breadcrumb that is neither a home link nor the product itself. */
export function categoryFromBreadcrumbs(breadcrumbs: readonly string[], title?: string): string | undefined {
  const lowerTitle = title?.toLowerCase();
  return [...breadcrumbs]
    .reverse()
    .find((crumb) => !GENERIC_CRUMBS.has(crumb.toLowerCase()) && crumb.toLowerCase() !== lowerTitle);
}

function domProduct(page: HtmlPage): ScrapedProduct {
  const { $ } = page;
  const product = emptyProduct();
  const title = cleanTitle(firstText($("h1").first().text(), $("title").first().text()));
  if (title) {
    product.title = title;
  }
  const priceText = selectorPriceText(page) ?? scanPriceText(page);
  if (priceText) {
    product.priceText = priceText;
  }
  product.images = domImages(page);
  product.breadcrumbs = domBreadcrumbs(page);
  return product;
}

/**
 * JSON-LD, then microdata, then Open Graph / product meta, then DOM heuristics;
 * each layer only fills what the previous ones left empty.
 */
export function scrapeGeneric(page: HtmlPage): ScrapedProduct {
  const layers = [jsonLdProduct(page, jsonLdNodes(page)), microdataProduct(page), metaProduct(page), domProduct(page)];
  const product = layers.reduce((merged, layer) => fillMissing(merged, layer));
  if (!product.category) {
    const category = categoryFromBreadcrumbs(product.breadcrumbs, product.title);
    if (category) {
      product.category = category;
    }
  }
  return product;
}

export async function extractGeneric(page: FetchResult, _ctx: ExtractorContext): Promise<ScrapedProduct> {
  return requireUsefulData(scrapeGeneric(loadPage(page)), "generic extractor");
}
