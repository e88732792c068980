import { z } from "zod";
import { queryParam, shopifyProductPath } from "../lib/url";
import { FetchResult, ScrapedProduct } from "../types";
import { scrapeGeneric } from "./generic";
import {
  HtmlPage,
  cleanTitle,
  emptyProduct,
  fillMissing,
  loadPage,
  metaContent,
  requireUsefulData,
  resolveImages,
  uniqueStrings
} from "./html";
import type { ExtractorContext } from "./index";

const idSchema = z.union([z.number(), z.string()]).transform((value) => String(value));
const priceSchema = z.union([z.string(), z.number()]).transform((value) => String(value));

const ShopifyVariantSchema = z.object({
  id: idSchema,
  title: z.string().nullish(),
  price: priceSchema,
  option1: z.string().nullish(),
  option2: z.string().nullish(),
  option3: z.string().nullish()
});

export const ShopifyProductSchema = z.object({
  product: z.object({
    title: z.string(),
    product_type: z.string().nullish(),
    options: z.array(z.object({ name: z.string(), values: z.array(z.string()).default([]) })).default([]),
    variants: z.array(ShopifyVariantSchema).default([]),
    images: z.array(z.object({ src: z.string() })).default([]),
    image: z.object({ src: z.string() }).nullish()
  })
});

type ShopifyVariant = z.infer<typeof ShopifyVariantSchema>;

const ACTIVE_CURRENCY_PATTERN = /Shopify\.currency\s*=\s*\{[^}]*"active"\s*:\s*"([A-Z]{3})"/;

export function productJsonUrl(pageUrl: string): string | null {
  const path = shopifyProductPath(pageUrl);
  if (!path) {
    return null;
  }
  const origin = new URL(pageUrl).origin;
  return `${origin}${path.prefix}/products/${encodeURIComponent(path.handle)}.json`;
}

function storefrontCurrency(page: HtmlPage): string | undefined {
  return (
    metaContent(page, "og:price:currency", "product:price:currency") ?? page.html.match(ACTIVE_CURRENCY_PATTERN)?.[1]
  );
}

function variantOptions(variant: ShopifyVariant, optionNames: string[]): Record<string, string> | undefined {
  const selected: Record<string, string> = {};
  [variant.option1, variant.option2, variant.option3].forEach((value, index) => {
    const name = optionNames[index];
    if (name && value && !(name === "Title" && value === "Default Title")) {
      selected[name] = value;
    }
  });
  return Object.keys(selected).length > 0 ? selected : undefined;
}

function productFromPayload(payload: z.infer<typeof ShopifyProductSchema>, page: HtmlPage, variantId?: string): ScrapedProduct {
  const { product: data } = payload;
  const product = emptyProduct();

  const title = cleanTitle(data.title);
  if (title) {
    product.title = title;
  }

  const variant = data.variants.find((entry) => entry.id === variantId) ?? data.variants[0];
  if (variant) {
    product.priceText = variant.price;
    const optionNames = data.options.map((option) => option.name);
    const selected = variantOptions(variant, optionNames);
    if (selected) {
      product.selectedVariant = selected;
    }
  }
  const currency = storefrontCurrency(page);
  if (product.priceText && currency) {
    product.currencyHint = currency;
  }

  product.images = resolveImages([...data.images.map((image) => image.src), data.image?.src], page.baseUrl);

  const category = data.product_type?.trim();
  if (category) {
    product.category = category;
  }

  for (const option of data.options) {
    // Single-variant products expose a placeholder "Title" option.
    if (option.name === "Title" && option.values.length === 1 && option.values[0] === "Default Title") {
      continue;
    }
    if (option.values.length > 0) {
      product.variants[option.name] = uniqueStrings(option.values);
    }
  }

  return product;
}

export async function extractShopify(page: FetchResult, ctx: ExtractorContext): Promise<ScrapedProduct> {
  const html = loadPage(page);
  const fallback = scrapeGeneric(html);
  const endpoint = productJsonUrl(page.finalUrl) ?? productJsonUrl(ctx.requestedUrl);
  if (!endpoint) {
    ctx.logger.debug("shopify_handle_missing", { url: page.finalUrl });
    return requireUsefulData(fallback, "shopify extractor");
  }

  let fromJson = emptyProduct();
  try {
    const payload = ShopifyProductSchema.safeParse(await ctx.fetchJson(endpoint));
    if (payload.success) {
      const variantId = queryParam(page.finalUrl, "variant") ?? queryParam(ctx.requestedUrl, "variant");
      fromJson = productFromPayload(payload.data, html, variantId);
    } else {
      ctx.logger.warn("shopify_payload_invalid", { endpoint, issues: payload.error.issues.length });
    }
  } catch (error) {
    ctx.logger.warn("shopify_json_unavailable", {
      endpoint,
      error: error instanceof Error ? error.message : "unknown error"
    });
  }

  return requireUsefulData(fillMissing(fromJson, fallback), "shopify extractor");
}
