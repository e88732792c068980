import { CheerioAPI, load } from "cheerio";
import { ExtractionError } from "../errors";
import { findPriceText } from "../lib/currency";
import { resolveUrl } from "../lib/url";
import { FetchResult, ScrapedProduct } from "../types";

export type JsonObject = Record<string, unknown>;

export interface HtmlPage {
  $: CheerioAPI;
  html: string;
  /** URL that relative links resolve against: the final URL after redirects. */
  baseUrl: string;
}

const HTML_CONTENT_TYPE = /(?:text\/html|application\/xhtml\+xml|text\/plain|^$)/i;
const IMAGE_NOISE = /(?:sprite|icon|logo|placeholder|spinner|pixel|blank|1x1|\.svg(?:$|\?)|\.gif(?:$|\?))/i;

export function loadPage(page: FetchResult): HtmlPage {
  if (!HTML_CONTENT_TYPE.test(page.contentType.split(";")[0].trim())) {
    throw new ExtractionError("NoData", `unsupported content type ${page.contentType}`);
  }
  const html = page.body.toString("utf8");
  return { $: load(html), html, baseUrl: page.finalUrl };
}

export function isRecord(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

export function asText(value: unknown): string | undefined {
  if (typeof value === "string") {
    const trimmed = value.replace(/\s+/g, " ").trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }

  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }

  return undefined;
}

export function pathValue(root: unknown, path: readonly string[]): unknown {
  let current = root;
  for (const key of path) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

export function firstText(...values: Array<string | undefined>): string | undefined {
  for (const value of values) {
    const text = asText(value);
    if (text) {
      return text;
    }
  }
  return undefined;
}

/** Strips marketplace prefixes and store suffixes that sites add to product titles. */
export function cleanTitle(raw: string | undefined): string | undefined {
  if (!raw) {
    return undefined;
  }
  const title = raw
    .replace(/\s+/g, " ")
    .replace(/Amazon\.[a-z.]+\s*:\s*/gi, "")
    .replace(/\s*\|\s*Buy.*$/i, "")
    .replace(/\s*–\s*[\w\s]+?Store.*$/i, "")
    .replace(/\s*[|\-–]\s*(?:eBay|AliExpress|Noon|Daraz|Amazon)\b.*$/i, "")
    .trim();
  return title.length > 0 ? title : undefined;
}

export function uniqueStrings(values: Iterable<string>): string[] {
  return [...new Set(values)];
}

export function resolveImages(candidates: Iterable<string | undefined>, baseUrl: string): string[] {
  const images: string[] = [];
  for (const candidate of candidates) {
    const resolved = candidate ? resolveUrl(candidate, baseUrl) : null;
    if (resolved && !images.includes(resolved)) {
      images.push(resolved);
    }
  }
  return images;
}

export function emptyProduct(): ScrapedProduct {
  return { images: [], breadcrumbs: [], variants: {}, specifications: {} };
}

/** Fills the fields `primary` lacks from `fallback`; lists are only taken when empty. */
export function fillMissing(primary: ScrapedProduct, fallback: ScrapedProduct): ScrapedProduct {
  const merged: ScrapedProduct = {
    images: primary.images.length > 0 ? primary.images : fallback.images,
    breadcrumbs: primary.breadcrumbs.length > 0 ? primary.breadcrumbs : fallback.breadcrumbs,
    variants: Object.keys(primary.variants).length > 0 ? primary.variants : fallback.variants,
    specifications:
      Object.keys(primary.specifications).length > 0 ? primary.specifications : fallback.specifications
  };

  const title = primary.title ?? fallback.title;
  if (title) {
    merged.title = title;
  }
  const priced = primary.priceText ? primary : fallback;
  if (priced.priceText) {
    merged.priceText = priced.priceText;
    if (priced.currencyHint) {
      merged.currencyHint = priced.currencyHint;
    }
  }
  const category = primary.category ?? fallback.category;
  if (category) {
    merged.category = category;
  }
  const selectedVariant = primary.selectedVariant ?? fallback.selectedVariant;
  if (selectedVariant) {
    merged.selectedVariant = selectedVariant;
  }
  return merged;
}

export function requireUsefulData(product: ScrapedProduct, source: string): ScrapedProduct {
  if (!product.title && !product.priceText) {
    throw new ExtractionError("NoData", `${source} found neither a title nor a price`);
  }
  return product;
}

// Embedded JSON

/** Parses JSON, retrying once with trailing commas removed. */
export function parseLooseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    try {
      return JSON.parse(text.replace(/,(\s*[}\]])/g, "$1"));
    } catch {
      return undefined;
    }
  }
}

/**
 * Returns the balanced `{...}` or `[...]` block starting at `start`, skipping
 * brackets inside string literals.
 */
export function readBalancedBlock(text: string, start: number): string | null {
  const open = text[start];
  if (open !== "{" && open !== "[") {
    return null;
  }
  let depth = 0;
  let quote: string | null = null;
  for (let index = start; index < text.length; index += 1) {
    const char = text[index];
    if (quote) {
      if (char === "\\") {
        index += 1;
      } else if (char === quote) {
        quote = null;
      }
      continue;
    }
    if (char === "\"" || char === "'") {
      quote = char;
    } else if (char === "{" || char === "[") {
      depth += 1;
    } else if (char === "}" || char === "]") {
      depth -= 1;
      if (depth === 0) {
        return text.slice(start, index + 1);
      }
    }
  }
  return null;
}

/** Objects assigned after any of `markers` in the page's inline scripts, in document order. */
export function findAssignedObjects(page: HtmlPage, markers: readonly RegExp[]): JsonObject[] {
  const found: JsonObject[] = [];
  page.$("script:not([src])").each((_, element) => {
    const script = page.$(element).contents().text();
    for (const marker of markers) {
      const pattern = new RegExp(marker.source, marker.flags.includes("g") ? marker.flags : `${marker.flags}g`);
      for (const match of script.matchAll(pattern)) {
        const end = (match.index ?? 0) + match[0].length;
        const start = script.indexOf("{", end);
        if (start < 0 || script.slice(end, start).trim() !== "") {
          continue;
        }
        const block = readBalancedBlock(script, start);
        const parsed = block ? parseLooseJson(block) : undefined;
        if (isRecord(parsed)) {
          found.push(parsed);
        }
      }
    }
  });
  return found;
}

// JSON-LD

function typeMatches(node: JsonObject, ...expected: string[]): boolean {
  return asArray(node["@type"]).some((value) => {
    const text = asText(value)?.toLowerCase().replace(/^https?:\/\/schema\.org\//, "");
    return text !== undefined && expected.includes(text);
  });
}

function collectJsonLdNodes(value: unknown, collector: JsonObject[]): void {
  if (Array.isArray(value)) {
    for (const entry of value) {
      collectJsonLdNodes(entry, collector);
    }
    return;
  }

  if (!isRecord(value)) {
    return;
  }

  if (Array.isArray(value["@graph"])) {
    collectJsonLdNodes(value["@graph"], collector);
  }

  collector.push(value);

  if (typeMatches(value, "itemlist")) {
    for (const item of asArray(value.itemListElement)) {
      if (isRecord(item) && isRecord(item.item)) {
        collectJsonLdNodes(item.item, collector);
      }
    }
  }
}

export function jsonLdNodes(page: HtmlPage): JsonObject[] {
  const nodes: JsonObject[] = [];
  page.$("script[type='application/ld+json']").each((_, element) => {
    const rawJson = page.$(element).contents().text().trim();
    if (rawJson) {
      collectJsonLdNodes(parseLooseJson(rawJson), nodes);
    }
  });
  return nodes;
}

export interface OfferPrice {
  priceText: string;
  currency?: string;
}

/** Flattens Offer / AggregateOffer trees into prices in document order. */
export function offerPrices(offers: unknown): OfferPrice[] {
  const prices: OfferPrice[] = [];

  const flattenOfferNode = (offerNode: unknown): void => {
    if (!isRecord(offerNode)) {
      return;
    }

    if (typeMatches(offerNode, "aggregateoffer") && offerNode.offers !== undefined) {
      for (const nested of asArray(offerNode.offers)) {
        flattenOfferNode(nested);
      }
      if (prices.length > 0) {
        return;
      }
    }

    const priceSpec = asArray(offerNode.priceSpecification).find(isRecord);
    const priceText =
      asText(offerNode.price) ?? asText(offerNode.lowPrice) ?? asText(priceSpec?.price) ?? asText(offerNode.highPrice);
    if (!priceText) {
      return;
    }
    const currency = asText(offerNode.priceCurrency) ?? asText(priceSpec?.priceCurrency);
    prices.push(currency ? { priceText, currency } : { priceText });
  };

  for (const offerNode of asArray(offers)) {
    flattenOfferNode(offerNode);
  }

  return prices;
}

function imageUrls(value: unknown): string[] {
  return asArray(value)
    .map((entry) => (isRecord(entry) ? asText(entry.url) ?? asText(entry.contentUrl) : asText(entry)))
    .filter((entry): entry is string => entry !== undefined);
}

function categoryText(value: unknown): string | undefined {
  const first = asArray(value)[0];
  const text = isRecord(first) ? asText(first.name) : asText(first);
  return text?.split(/\s*(?:>|\/)\s*/).filter(Boolean).at(-1);
}

function variesByName(property: unknown): string | undefined {
  return asText(property)?.replace(/^https?:\/\/schema\.org\//, "").split("/").at(-1);
}

function productGroupVariants(group: JsonObject): Record<string, string[]> {
  const variants: Record<string, string[]> = {};
  const members = asArray(group.hasVariant).filter(isRecord);
  for (const property of asArray(group.variesBy)) {
    const name = variesByName(property);
    if (!name) {
      continue;
    }
    const values = uniqueStrings(
      members.map((member) => asText(member[name])).filter((value): value is string => value !== undefined)
    );
    if (values.length > 0) {
      variants[name] = values;
    }
  }
  return variants;
}

/** Name/value pairs as a record; later duplicates win, blank names or values are dropped. */
export function namedValues(
  entries: JsonObject[],
  nameOf: (entry: JsonObject) => string | undefined,
  valueOf: (entry: JsonObject) => string | undefined
): Record<string, string> {
  const pairs: Array<[string, string]> = [];
  for (const entry of entries) {
    const name = nameOf(entry);
    const value = valueOf(entry);
    if (name && value) {
      pairs.push([name, value]);
    }
  }
  return Object.fromEntries(pairs);
}

/** First Product (or ProductGroup) described in JSON-LD, as a scraped product. */
export function jsonLdProduct(page: HtmlPage, nodes: JsonObject[] = jsonLdNodes(page)): ScrapedProduct {
  const product = emptyProduct();
  const node = nodes.find((entry) => typeMatches(entry, "product", "productgroup"));
  if (!node) {
    return product;
  }

  const firstMember = asArray(node.hasVariant).find(isRecord);
  const title = cleanTitle(asText(node.name) ?? asText(firstMember?.name));
  if (title) {
    product.title = title;
  }
  const price = offerPrices(node.offers)[0] ?? offerPrices(firstMember?.offers)[0];
  if (price) {
    product.priceText = price.priceText;
    if (price.currency) {
      product.currencyHint = price.currency;
    }
  }
  product.images = resolveImages([...imageUrls(node.image), ...imageUrls(firstMember?.image)], page.baseUrl);
  const category = categoryText(node.category);
  if (category) {
    product.category = category;
  }
  if (typeMatches(node, "productgroup")) {
    product.variants = productGroupVariants(node);
  }
  product.specifications = namedValues(
    asArray(node.additionalProperty ?? node.additionalProperties).filter(isRecord),
    (entry) => asText(entry.name) ?? asText(entry.propertyID),
    (entry) => asText(entry.value)
  );
  product.breadcrumbs = jsonLdBreadcrumbs(nodes);
  return product;
}

export function jsonLdBreadcrumbs(nodes: JsonObject[]): string[] {
  const list = nodes.find((entry) => typeMatches(entry, "breadcrumblist"));
  if (!list) {
    return [];
  }
  const items = asArray(list.itemListElement)
    .filter(isRecord)
    .map((item, index) => ({
      position: typeof item.position === "number" ? item.position : Number(asText(item.position) ?? index + 1),
      name: asText(item.name) ?? (isRecord(item.item) ? asText(item.item.name) : undefined)
    }))
    .filter((item): item is { position: number; name: string } => item.name !== undefined);
  items.sort((a, b) => a.position - b.position);
  return items.map((item) => item.name);
}

// Meta tags, microdata and DOM heuristics

export function metaContent(page: HtmlPage, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const content = page
      .$(`meta[property='${key}'], meta[name='${key}'], meta[itemprop='${key}']`)
      .first()
      .attr("content");
    const text = asText(content);
    if (text) {
      return text;
    }
  }
  return undefined;
}

export function metaProduct(page: HtmlPage): ScrapedProduct {
  const product = emptyProduct();
  const title = cleanTitle(metaContent(page, "og:title", "twitter:title"));
  if (title) {
    product.title = title;
  }
  const priceText = metaContent(page, "product:price:amount", "og:price:amount");
  if (priceText) {
    product.priceText = priceText;
    const currency = metaContent(page, "product:price:currency", "og:price:currency");
    if (currency) {
      product.currencyHint = currency;
    }
  }
  product.images = resolveImages(
    [metaContent(page, "og:image:secure_url"), metaContent(page, "og:image"), metaContent(page, "twitter:image")],
    page.baseUrl
  );
  const category = metaContent(page, "product:category");
  if (category) {
    product.category = category;
  }
  return product;
}

export function microdataProduct(page: HtmlPage): ScrapedProduct {
  const product = emptyProduct();
  const { $ } = page;
  const scope = $("[itemtype*='schema.org/Product']").first();
  if (scope.length === 0) {
    return product;
  }

  const title = cleanTitle(firstText(scope.find("[itemprop='name']").first().attr("content"), scope.find("[itemprop='name']").first().text()));
  if (title) {
    product.title = title;
  }
  const priceNode = scope.find("[itemprop='price']").first();
  const priceText = firstText(priceNode.attr("content"), priceNode.text());
  if (priceText) {
    product.priceText = priceText;
    const currencyNode = scope.find("[itemprop='priceCurrency']").first();
    const currency = firstText(currencyNode.attr("content"), currencyNode.text());
    if (currency) {
      product.currencyHint = currency;
    }
  }
  product.images = resolveImages(
    scope
      .find("[itemprop='image']")
      .toArray()
      .map((element) => {
        const node = $(element);
        return node.attr("src") ?? node.attr("content") ?? node.attr("href");
      }),
    page.baseUrl
  );
  return product;
}

export function domBreadcrumbs(page: HtmlPage): string[] {
  const { $ } = page;
  const selectors = [
    "[itemtype*='schema.org/BreadcrumbList'] [itemprop='name']",
    "nav[aria-label='breadcrumb'] li",
    "nav[aria-label='Breadcrumb'] li",
    "nav[aria-label='breadcrumbs'] li",
    ".breadcrumb li",
    ".breadcrumbs li",
    ".breadcrumbs a"
  ];
  for (const selector of selectors) {
    const crumbs = $(selector)
      .toArray()
      .map((element) => asText($(element).text()))
      .filter((crumb): crumb is string => crumb !== undefined && !/^[›>/|»]$/.test(crumb));
    if (crumbs.length > 0) {
      return uniqueStrings(crumbs);
    }
  }
  return [];
}

const PRICE_SELECTORS = [
  "[itemprop='price']",
  "[data-price]",
  ".price-current",
  ".price__current",
  ".product-price",
  ".product__price",
  ".price-amount",
  ".price .amount",
  ".price"
];

export function selectorPriceText(page: HtmlPage, selectors: readonly string[] = PRICE_SELECTORS): string | undefined {
  const { $ } = page;
  for (const selector of selectors) {
    const node = $(selector).first();
    if (node.length === 0) {
      continue;
    }
    const text = firstText(node.attr("content"), node.text(), node.attr("data-price"));
    if (text && /\d/.test(text)) {
      return text;
    }
  }
  return undefined;
}

export function visibleText(page: HtmlPage): string {
  const body = load(page.html);
  body("script, style, noscript, template, svg, head").remove();
  return body.root().text().replace(/\s+/g, " ").trim();
}

/** Price-pattern scan over the page's visible text. */
export function scanPriceText(page: HtmlPage): string | undefined {
  return findPriceText(visibleText(page));
}

function pixelSize(value: string | undefined): number {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : 0;
}

/** Plausible product images from `<img>` tags, larger declared sizes first. */
export function domImages(page: HtmlPage, scope = "body"): string[] {
  const { $ } = page;
  const candidates = $(`${scope} img`)
    .toArray()
    .map((element, index) => {
      const node = $(element);
      const src = node.attr("data-src") ?? node.attr("data-original") ?? node.attr("src");
      return { src, index, area: pixelSize(node.attr("width")) * pixelSize(node.attr("height")) };
    })
    .filter((candidate) => candidate.src !== undefined && !IMAGE_NOISE.test(candidate.src))
    .filter((candidate) => candidate.area === 0 || candidate.area >= 100 * 100);
  candidates.sort((a, b) => b.area - a.area || a.index - b.index);
  return resolveImages(
    candidates.map((candidate) => candidate.src),
    page.baseUrl
  );
}
