import { ExtractionStrategy, LANGUAGE_TAG_PATTERN, TargetURL } from "../types";
import { hostMatches } from "./validator";

const ALIEXPRESS_HOST_PATTERN = /(?:^|\.)aliexpress\.(?:com|us|ru|[a-z]{2,3}(?:\.[a-z]{2})?)$/;
const AMAZON_HOST_PATTERN = /(?:^|\.)amazon\.(?:com|ae|sa|eg|in|de|fr|it|es|nl|se|pl|ca|com\.mx|com\.br|com\.au|com\.tr|com\.be|co\.uk|co\.jp|sg)$/;

// Cookie that makes AliExpress serve English pages priced in USD.
const ALIEXPRESS_LOCALE_COOKIE = "aep_usuc_f=site=glo&b_locale=en_US&c_tp=USD&region=US";

export interface ClassifierOptions {
  shopifyDomains: readonly string[];
  renderFirstStrategies: readonly ExtractionStrategy[];
}

export class PlatformClassifier {
  constructor(private readonly options: ClassifierOptions) {}

  classify(target: TargetURL): ExtractionStrategy {
    const host = target.host.toLowerCase();
    if (ALIEXPRESS_HOST_PATTERN.test(host)) {
      return "aliexpress";
    }
    if (AMAZON_HOST_PATTERN.test(host)) {
      return "amazon";
    }
    if (host.endsWith(".myshopify.com") || this.options.shopifyDomains.some((pattern) => hostMatches(host, pattern))) {
      return "shopify";
    }
    return "generic";
  }

  requiresRendering(strategy: ExtractionStrategy): boolean {
    return this.options.renderFirstStrategies.includes(strategy);
  }
}

/** `en`, `en-US` or `ar_SA` become an Accept-Language value with an English fallback. */
export function acceptLanguage(language: string): string {
  const primary = language.trim().replace(/_/g, "-");
  if (!LANGUAGE_TAG_PATTERN.test(primary) || primary.toLowerCase() === "en") {
    return "en-US,en;q=0.9";
  }
  const base = primary.split("-")[0].toLowerCase();
  const parts = [primary];
  if (base !== primary.toLowerCase()) {
    parts.push(`${base};q=0.9`);
  }
  if (base !== "en") {
    parts.push("en;q=0.8");
  }
  return parts.join(",");
}

export function requestProfile(strategy: ExtractionStrategy, language: string): Record<string, string> {
  const headers: Record<string, string> = {
    accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
    "accept-language": acceptLanguage(language)
  };
  if (strategy === "aliexpress") {
    headers.cookie = ALIEXPRESS_LOCALE_COOKIE;
  }
  return headers;
}
