import { queryParam } from "../lib/url";
import { FetchResult, ScrapedProduct } from "../types";
import { categoryFromBreadcrumbs, scrapeGeneric } from "./generic";
import {
  HtmlPage,
  JsonObject,
  asArray,
  asText,
  cleanTitle,
  emptyProduct,
  fillMissing,
  findAssignedObjects,
  isRecord,
  loadPage,
  namedValues,
  pathValue,
  requireUsefulData,
  resolveImages,
  uniqueStrings
} from "./html";
import type { ExtractorContext } from "./index";

// Assignments the storefront uses to hand its product state to the client bundle.
const STATE_MARKERS = [
  /window\.runParams\s*=\s*/,
  /\bdata\s*:\s*/,
  /__AER_DATA__\s*=\s*/,
  /window\.__INIT_DATA__\s*=\s*/,
  /_d_c_\.DCData\s*=\s*/
];

const MODULE_KEYS = ["titleModule", "priceModule", "imageModule", "skuModule", "specsModule", "crossLinkModule"];

function hasModules(node: JsonObject): boolean {
  return MODULE_KEYS.some((key) => isRecord(node[key]));
}

/** Depth-limited search for the object that holds the `*Module` entries. */
function findModuleRoot(value: unknown, depth = 5): JsonObject | undefined {
  if (!isRecord(value) || depth < 0) {
    return undefined;
  }
  if (hasModules(value)) {
    return value;
  }
  for (const nested of Object.values(value)) {
    const found = findModuleRoot(nested, depth - 1);
    if (found) {
      return found;
    }
  }
  return undefined;
}

export interface AliExpressState {
  modules: JsonObject;
  /** `_d_c_.DCData` carries the image list on pages where `imageModule` is empty. */
  imagePathList: string[];
}

export function readState(page: HtmlPage): AliExpressState | null {
  const objects = findAssignedObjects(page, STATE_MARKERS);
  const modules = objects.map((object) => findModuleRoot(object)).find((root): root is JsonObject => root !== undefined);
  const imagePathList = objects
    .flatMap((object) => asArray(object.imagePathList))
    .map(asText)
    .filter((entry): entry is string => entry !== undefined);
  if (!modules && imagePathList.length === 0) {
    return null;
  }
  return { modules: modules ?? {}, imagePathList };
}

function amountText(value: unknown): { text: string; currency?: string } | undefined {
  if (isRecord(value)) {
    const text = asText(value.formatedAmount) ?? asText(value.value);
    const currency = asText(value.currency);
    if (!text) {
      return undefined;
    }
    return currency ? { text, currency } : { text };
  }
  const text = asText(value);
  return text ? { text } : undefined;
}

interface SkuProperty {
  name: string;
  values: Map<string, string>;
}

function skuProperties(modules: JsonObject): SkuProperty[] {
  return asArray(pathValue(modules, ["skuModule", "productSKUPropertyList"]))
    .filter(isRecord)
    .map((property) => {
      const values = new Map<string, string>();
      for (const value of asArray(property.skuPropertyValues).filter(isRecord)) {
        const label = asText(value.propertyValueDisplayName) ?? asText(value.propertyValueName);
        const id = asText(value.propertyValueId) ?? asText(value.propertyValueIdLong);
        if (label) {
          values.set(id ?? label, label);
        }
      }
      return { name: asText(property.skuPropertyName) ?? "Option", values };
    })
    .filter((property) => property.values.size > 0);
}

function skuVariants(properties: SkuProperty[]): Record<string, string[]> {
  const variants: Record<string, string[]> = {};
  for (const property of properties) {
    variants[property.name] = uniqueStrings([...(variants[property.name] ?? []), ...property.values.values()]);
  }
  return variants;
}

function selectedOptions(sku: JsonObject, properties: SkuProperty[]): Record<string, string> | undefined {
  const ids = asText(sku.skuPropIds)?.split(",") ?? [];
  const selected: Record<string, string> = {};
  ids.forEach((id, index) => {
    const property = properties[index];
    const label = property?.values.get(id.trim());
    if (property && label) {
      selected[property.name] = label;
    }
  });
  return Object.keys(selected).length > 0 ? selected : undefined;
}

function skuPrice(sku: JsonObject): { text: string; currency?: string } | undefined {
  const value = isRecord(sku.skuVal) ? sku.skuVal : {};
  return (
    amountText(value.skuActivityAmount) ??
    amountText(value.skuAmount) ??
    amountText(value.actSkuCalPrice) ??
    amountText(value.skuCalPrice)
  );
}

function moduleProduct(state: AliExpressState, page: HtmlPage, requestedSku: string | undefined): ScrapedProduct {
  const { modules } = state;
  const product = emptyProduct();

  const title = cleanTitle(
    asText(pathValue(modules, ["titleModule", "subject"])) ??
      asText(pathValue(modules, ["productInfoComponent", "subject"])) ??
      asText(pathValue(modules, ["pageModule", "title"]))
  );
  if (title) {
    product.title = title;
  }

  const properties = skuProperties(modules);
  product.variants = skuVariants(properties);

  const ladder = asArray(pathValue(modules, ["skuModule", "skuPriceList"])).filter(isRecord);
  const requested = requestedSku
    ? ladder.find((sku) => asText(sku.skuId) === requestedSku || asText(sku.skuIdStr) === requestedSku)
    : undefined;
  const priceModule = pathValue(modules, ["priceModule"]);
  const price =
    (requested ? skuPrice(requested) : undefined) ??
    amountText(pathValue(priceModule, ["formatedActivityPrice"])) ??
    amountText(pathValue(priceModule, ["formatedPrice"])) ??
    amountText(pathValue(priceModule, ["minActivityAmount"])) ??
    amountText(pathValue(priceModule, ["minAmount"])) ??
    (ladder[0] ? skuPrice(ladder[0]) : undefined);
  if (price) {
    product.priceText = price.text;
    const currency = price.currency ?? asText(pathValue(priceModule, ["minAmount", "currency"]));
    if (currency) {
      product.currencyHint = currency;
    }
  }

  const selectedSku = requested ?? ladder[0];
  const selected = selectedSku ? selectedOptions(selectedSku, properties) : undefined;
  if (selected) {
    product.selectedVariant = selected;
  }

  const imagePaths = [
    ...asArray(pathValue(modules, ["imageModule", "imagePathList"])),
    ...asArray(pathValue(modules, ["imageModule", "imagePaths"])),
    ...state.imagePathList
  ].map(asText);
  product.images = resolveImages(imagePaths, page.baseUrl);

  product.specifications = namedValues(
    asArray(pathValue(modules, ["specsModule", "props"])).filter(isRecord),
    (prop) => asText(prop.attrName),
    (prop) => asText(prop.attrValue)
  );

  product.breadcrumbs = asArray(pathValue(modules, ["crossLinkModule", "breadCrumbPathList"]))
    .filter(isRecord)
    .map((crumb) => asText(crumb.name))
    .filter((name): name is string => name !== undefined);
  const category = categoryFromBreadcrumbs(product.breadcrumbs, product.title);
  if (category) {
    product.category = category;
  }

  return product;
}

export async function extractAliExpress(page: FetchResult, ctx: ExtractorContext): Promise<ScrapedProduct> {
  const html = loadPage(page);
  const requestedSku = queryParam(page.finalUrl, "sku_id", "skuId") ?? queryParam(ctx.requestedUrl, "sku_id", "skuId");
  const state = readState(html);
  if (!state) {
    ctx.logger.debug("aliexpress_state_missing", { url: page.finalUrl });
  }
  const fromState = state ? moduleProduct(state, html, requestedSku) : emptyProduct();
  return requireUsefulData(fillMissing(fromState, scrapeGeneric(html)), "aliexpress extractor");
}
