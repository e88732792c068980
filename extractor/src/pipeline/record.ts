import { ExtractorConfig } from "../config";
import { isExtractionError } from "../errors";
import { convertMoney, normalizePrice } from "../lib/currency";
import { canonicalizeUrl } from "../lib/url";
import {
  AttemptSummary,
  ExtractionStrategy,
  FetchResult,
  Money,
  ProductRecord,
  RecognitionHint,
  RequiredField,
  ScrapedProduct,
  TransportKind
} from "../types";

export type RecordPolicy = Pick<ExtractorConfig, "money" | "requiredFields" | "maxImages">;

/** One attempt's scrape, normalized and scored against the required fields. */
export interface EvaluatedProduct {
  product: ScrapedProduct;
  price: Money | null;
  priceRaw: string | null;
  images: string[];
  missingFields: RequiredField[];
  warnings: string[];
  finalUrl: string;
  transport: TransportKind;
}

export interface RecordRequest {
  url: string;
  language: string;
  hint: RecognitionHint | null;
  strategy: ExtractionStrategy;
}

function readPrice(product: ScrapedProduct, policy: RecordPolicy, warnings: string[]): Money | null {
  if (!product.priceText) {
    return null;
  }
  try {
    return normalizePrice(product.priceText, {
      defaultCurrency: policy.money.defaultCurrency,
      currencyHint: product.currencyHint
    }).toJSON();
  } catch (error) {
    if (isExtractionError(error) && error.kind === "UnparseablePrice") {
      warnings.push(`UnparseablePrice: ${error.message}`);
      return null;
    }
    throw error;
  }
}

export function evaluateProduct(
  product: ScrapedProduct,
  page: Pick<FetchResult, "finalUrl" | "transport">,
  policy: RecordPolicy,
  extraWarnings: string[] = []
): EvaluatedProduct {
  const warnings = [...extraWarnings];
  const price = readPrice(product, policy, warnings);
  const images = [...new Set(product.images)].slice(0, policy.maxImages);
  const present: Record<RequiredField, boolean> = {
    title: Boolean(product.title),
    price: price !== null,
    images: images.length > 0
  };

  return {
    product,
    price,
    priceRaw: product.priceText ?? null,
    images,
    missingFields: policy.requiredFields.filter((field) => !present[field]),
    warnings,
    finalUrl: page.finalUrl,
    transport: page.transport
  };
}

export function isComplete(evaluated: EvaluatedProduct): boolean {
  return evaluated.missingFields.length === 0;
}

/** Complete beats incomplete, then fewer missing fields; ties go to the later attempt. */
export function pickBest(current: EvaluatedProduct | null, next: EvaluatedProduct): EvaluatedProduct {
  if (!current) {
    return next;
  }
  if (isComplete(current) !== isComplete(next)) {
    return isComplete(next) ? next : current;
  }
  return next.missingFields.length <= current.missingFields.length ? next : current;
}

export function buildRecord(
  evaluated: EvaluatedProduct,
  request: RecordRequest,
  attempts: AttemptSummary[],
  elapsedMs: number,
  policy: RecordPolicy
): ProductRecord {
  const { product, price } = evaluated;
  const warnings = [...evaluated.warnings];

  let convertedPrice: Money | null = null;
  let priceConverted = false;
  if (price) {
    const conversion = convertMoney(price, policy.money.reportingCurrency, policy.money.rates, policy.money.reportingCurrency);
    convertedPrice = conversion.converted;
    priceConverted = conversion.convertedFlag;
    if (!conversion.convertedFlag && price.currency !== policy.money.reportingCurrency) {
      warnings.push(`no conversion rate for ${price.currency}`);
    }
  }

  return {
    url: request.url,
    final_url: evaluated.finalUrl,
    canonical_url: canonicalizeUrl(evaluated.finalUrl) ?? evaluated.finalUrl,
    title: product.title ?? "",
    price,
    price_raw: evaluated.priceRaw,
    converted_price: convertedPrice,
    price_converted: priceConverted,
    images: evaluated.images,
    category: product.category ?? null,
    breadcrumbs: product.breadcrumbs,
    variants: product.variants,
    selected_variant: product.selectedVariant ?? null,
    specifications: product.specifications,
    source_platform: request.strategy,
    transport: evaluated.transport,
    complete: isComplete(evaluated),
    missing_fields: evaluated.missingFields,
    language: request.language,
    hint: request.hint,
    attempts,
    warnings,
    elapsed_ms: Math.max(0, Math.round(elapsedMs))
  };
}
