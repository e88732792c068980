import { isErrorKind } from "../errors";
import { Logger } from "../lib/logger";
import { ExtractionStrategy, FetchResult, ScrapedProduct } from "../types";
import { extractAliExpress } from "./aliexpress";
import { extractAmazon } from "./amazon";
import { extractGeneric } from "./generic";
import { extractShopify } from "./shopify";

export interface ExtractorContext {
  /** URL the caller asked for; variant and SKU query parameters are read from it. */
  requestedUrl: string;
  /** Reads a same-site JSON endpoint under the current attempt's deadline. */
  fetchJson(url: string): Promise<unknown>;
  logger: Logger;
}

export type Extractor = (page: FetchResult, ctx: ExtractorContext) => Promise<ScrapedProduct>;

const EXTRACTORS: Record<ExtractionStrategy, Extractor> = {
  aliexpress: extractAliExpress,
  amazon: extractAmazon,
  shopify: extractShopify,
  generic: extractGeneric
};

export interface ExtractionOutcome {
  product: ScrapedProduct;
  usedGenericFallback: boolean;
}

/** Runs the strategy's extractor; NoData from a specific extractor retries generic on the same page. */
export async function runExtractor(
  strategy: ExtractionStrategy,
  page: FetchResult,
  ctx: ExtractorContext
): Promise<ExtractionOutcome> {
  try {
    return { product: await EXTRACTORS[strategy](page, ctx), usedGenericFallback: false };
  } catch (error) {
    if (strategy === "generic" || !isErrorKind(error, "NoData")) {
      throw error;
    }
    ctx.logger.info("extractor_fell_back", {
      strategy,
      reason: error instanceof Error ? error.message : "no data"
    });
    return { product: await extractGeneric(page, ctx), usedGenericFallback: true };
  }
}
