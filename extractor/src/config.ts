import { z } from "zod";
import { ExtractionStrategy, ExtractionStrategySchema, RequiredField, RequiredFieldSchema } from "./types";

const DEFAULT_ALLOWED_DOMAINS = [
  "aliexpress.com",
  "aliexpress.us",
  "alicdn.com",
  "amazon.com",
  "amazon.ae",
  "amazon.sa",
  "amazon.co.uk",
  "amazon.de",
  "amazon.fr",
  "noon.com",
  "jumia.com",
  "daraz.com",
  "ebay.com",
  "etsy.com",
  "myshopify.com"
].join(",");

const DEFAULT_DENIED_DOMAINS = [
  "*.ngrok.io",
  "*.ngrok-free.app",
  "*.nip.io",
  "*.sslip.io",
  "*.xip.io",
  "localtest.me",
  "*.localtest.me",
  "*.burpcollaborator.net",
  "*.oast.fun"
].join(",");

const DEFAULT_CURRENCY_RATES =
  "SAR=3.75,AED=3.6725,EUR=0.92,GBP=0.79,YER=250,KWD=0.307,QAR=3.64,OMR=0.385,BHD=0.376,PKR=280,INR=83,CNY=7.2,JPY=150";

const optionalNonEmptyString = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z.string().min(1).optional()
);

// z.coerce.boolean() turns "false" into true.
const booleanish = (fallback: boolean) =>
  z.preprocess((value) => {
    if (typeof value !== "string") {
      return value;
    }
    const normalized = value.trim().toLowerCase();
    if (["true", "1", "yes", "on"].includes(normalized)) {
      return true;
    }
    if (["false", "0", "no", "off", ""].includes(normalized)) {
      return false;
    }
    return value;
  }, z.boolean().default(fallback));

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((entry) => entry.trim().toLowerCase())
    .filter((entry) => entry.length > 0);
}

const domainList = (fallback: string) => z.string().default(fallback).transform(splitList);

const strategyList = z
  .string()
  .default("")
  .transform(splitList)
  .pipe(z.array(ExtractionStrategySchema));

const requiredFieldList = z
  .string()
  .default("title,price")
  .transform(splitList)
  .pipe(z.array(RequiredFieldSchema).min(1));

const ratePattern = /^\d+(?:\.\d+)?$/;

const currencyRates = z
  .string()
  .default(DEFAULT_CURRENCY_RATES)
  .transform((value, context) => {
    const rates: Record<string, string> = {};
    for (const entry of value.split(",").map((item) => item.trim()).filter(Boolean)) {
      const [code, rate] = entry.split("=").map((part) => part.trim());
      if (!code || !rate || !/^[A-Za-z]{3}$/.test(code) || !ratePattern.test(rate) || /^0+(?:\.0+)?$/.test(rate)) {
        context.addIssue({ code: z.ZodIssueCode.custom, message: `invalid currency rate entry: ${entry}` });
        return z.NEVER;
      }
      rates[code.toUpperCase()] = rate;
    }
    return rates;
  });

const currencyCode = z
  .string()
  .regex(/^[A-Za-z]{3}$/)
  .transform((value) => value.toUpperCase());

export const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  LOG_LEVEL: z.string().min(1).default("info"),
  USER_AGENT: z
    .string()
    .min(1)
    .default("Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36"),
  DOMAIN_POLICY: z.enum(["open", "allowlist"]).default("open"),
  ALLOWED_DOMAINS: domainList(DEFAULT_ALLOWED_DOMAINS),
  DENIED_DOMAINS: domainList(DEFAULT_DENIED_DOMAINS),
  ALLOWED_IPS: domainList(""),
  MAX_URL_LENGTH: z.coerce.number().int().positive().default(2048),
  DNS_TIMEOUT_MS: z.coerce.number().int().positive().default(1500),
  OVERALL_TIMEOUT_MS: z.coerce.number().int().positive().default(12000),
  LIGHTWEIGHT_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  RENDERED_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  LIGHTWEIGHT_MIN_MS: z.coerce.number().int().nonnegative().default(300),
  RENDERED_MIN_MS: z.coerce.number().int().nonnegative().default(2500),
  RENDER_SETTLE_MS: z.coerce.number().int().nonnegative().default(1500),
  RENDER_IDLE_MS: z.coerce.number().int().nonnegative().default(500),
  MAX_RESPONSE_BYTES: z.coerce.number().int().positive().default(2 * 1024 * 1024),
  MAX_REDIRECTS: z.coerce.number().int().nonnegative().max(20).default(5),
  NETWORK_RETRIES: z.coerce.number().int().nonnegative().max(3).default(1),
  RENDER_ENABLED: booleanish(true),
  BROWSER_EXECUTABLE_PATH: optionalNonEmptyString,
  RENDER_POOL_SIZE: z.coerce.number().int().positive().max(16).default(2),
  RENDER_QUEUE_WAIT_MS: z.coerce.number().int().nonnegative().default(1000),
  RENDER_FIRST_STRATEGIES: strategyList,
  SHOPIFY_DOMAINS: domainList(""),
  REPORTING_CURRENCY: currencyCode.default("USD"),
  DEFAULT_CURRENCY: currencyCode.default("USD"),
  CURRENCY_RATES: currencyRates,
  REQUIRED_FIELDS: requiredFieldList,
  STRICT_PARTIAL_REQUIRED: booleanish(false),
  MAX_IMAGES: z.coerce.number().int().positive().max(50).default(8)
});

export type AppConfig = z.infer<typeof EnvSchema>;

export interface ExtractorConfig {
  userAgent: string;
  domainPolicy: {
    mode: "open" | "allowlist";
    allowedDomains: readonly string[];
    deniedDomains: readonly string[];
    allowedIps: readonly string[];
    maxUrlLength: number;
    dnsTimeoutMs: number;
  };
  budgets: {
    overallMs: number;
    lightweightMs: number;
    renderedMs: number;
    lightweightMinMs: number;
    renderedMinMs: number;
    renderSettleMs: number;
    renderIdleMs: number;
  };
  fetch: {
    maxResponseBytes: number;
    maxRedirects: number;
    networkRetries: number;
  };
  rendering: {
    enabled: boolean;
    executablePath?: string;
    poolSize: number;
    queueWaitMs: number;
    firstStrategies: readonly ExtractionStrategy[];
  };
  shopifyDomains: readonly string[];
  money: {
    reportingCurrency: string;
    defaultCurrency: string;
    rates: Readonly<Record<string, string>>;
  };
  requiredFields: readonly RequiredField[];
  strictPartialRequired: boolean;
  maxImages: number;
}

export function parseAppConfig(env: Record<string, string | undefined>): AppConfig {
  return EnvSchema.parse(env);
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object") {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

export function toExtractorConfig(app: AppConfig): ExtractorConfig {
  return deepFreeze({
    userAgent: app.USER_AGENT,
    domainPolicy: {
      mode: app.DOMAIN_POLICY,
      allowedDomains: app.ALLOWED_DOMAINS,
      deniedDomains: app.DENIED_DOMAINS,
      allowedIps: app.ALLOWED_IPS,
      maxUrlLength: app.MAX_URL_LENGTH,
      dnsTimeoutMs: app.DNS_TIMEOUT_MS
    },
    budgets: {
      overallMs: app.OVERALL_TIMEOUT_MS,
      lightweightMs: app.LIGHTWEIGHT_TIMEOUT_MS,
      renderedMs: app.RENDERED_TIMEOUT_MS,
      lightweightMinMs: app.LIGHTWEIGHT_MIN_MS,
      renderedMinMs: app.RENDERED_MIN_MS,
      renderSettleMs: app.RENDER_SETTLE_MS,
      renderIdleMs: app.RENDER_IDLE_MS
    },
    fetch: {
      maxResponseBytes: app.MAX_RESPONSE_BYTES,
      maxRedirects: app.MAX_REDIRECTS,
      networkRetries: app.NETWORK_RETRIES
    },
    rendering: {
      enabled: app.RENDER_ENABLED && app.BROWSER_EXECUTABLE_PATH !== undefined,
      ...(app.BROWSER_EXECUTABLE_PATH ? { executablePath: app.BROWSER_EXECUTABLE_PATH } : {}),
      poolSize: app.RENDER_POOL_SIZE,
      queueWaitMs: app.RENDER_QUEUE_WAIT_MS,
      firstStrategies: app.RENDER_FIRST_STRATEGIES
    },
    shopifyDomains: app.SHOPIFY_DOMAINS,
    money: {
      reportingCurrency: app.REPORTING_CURRENCY,
      defaultCurrency: app.DEFAULT_CURRENCY,
      rates: app.CURRENCY_RATES
    },
    requiredFields: app.REQUIRED_FIELDS,
    strictPartialRequired: app.STRICT_PARTIAL_REQUIRED,
    maxImages: app.MAX_IMAGES
  });
}

/** Defaults with optional overrides; used by tests and embedding callers. */
export function defaultExtractorConfig(env: Record<string, string | undefined> = {}): ExtractorConfig {
  return toExtractorConfig(parseAppConfig(env));
}
