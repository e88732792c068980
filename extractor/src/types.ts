import { z } from "zod";
import { ERROR_KINDS } from "./errors";

export const ExtractionStrategySchema = z.enum(["aliexpress", "amazon", "shopify", "generic"]);
export const TransportKindSchema = z.enum(["lightweight", "rendered"]);
export const ExtractModeSchema = z.enum(["partial", "full", "strict"]);
export const RequiredFieldSchema = z.enum(["title", "price", "images"]);

export const MoneySchema = z.object({
  amount: z.string().regex(/^\d+(?:\.\d+)?$/),
  currency: z.string().regex(/^[A-Z]{3}$/)
});

export const RecognitionHintSchema = z.object({
  label: z.string().min(1).optional(),
  category: z.string().min(1).optional()
});

/** BCP 47-shaped tag such as `en`, `ar-SA` or `zh_Hant_TW`; it ends up in a request header. */
export const LANGUAGE_TAG_PATTERN = /^[A-Za-z]{2,3}(?:[-_][A-Za-z0-9]{2,8})*$/;

export const ExtractRequestSchema = z.object({
  url: z.string().min(1),
  language: z.string().max(35).regex(LANGUAGE_TAG_PATTERN).optional(),
  mode: ExtractModeSchema.optional(),
  hint: RecognitionHintSchema.optional()
});

export const AttemptOutcomeSchema = z.union([z.enum(["ok", "incomplete", "skipped"]), z.enum(ERROR_KINDS)]);

export const AttemptSummarySchema = z.object({
  transport: TransportKindSchema,
  outcome: AttemptOutcomeSchema,
  elapsed_ms: z.number().int().nonnegative()
});

export const ProductRecordSchema = z.object({
  url: z.string().url(),
  final_url: z.string().url(),
  canonical_url: z.string().url(),
  title: z.string(),
  price: MoneySchema.nullable(),
  price_raw: z.string().nullable(),
  converted_price: MoneySchema.nullable(),
  price_converted: z.boolean(),
  images: z.array(z.string().url()),
  category: z.string().nullable(),
  breadcrumbs: z.array(z.string()),
  variants: z.record(z.array(z.string())),
  selected_variant: z.record(z.string()).nullable(),
  specifications: z.record(z.string()),
  source_platform: ExtractionStrategySchema,
  transport: TransportKindSchema,
  complete: z.boolean(),
  missing_fields: z.array(RequiredFieldSchema),
  language: z.string(),
  hint: RecognitionHintSchema.nullable(),
  attempts: z.array(AttemptSummarySchema),
  warnings: z.array(z.string()),
  elapsed_ms: z.number().int().nonnegative()
});

export type ExtractionStrategy = z.infer<typeof ExtractionStrategySchema>;
export type TransportKind = z.infer<typeof TransportKindSchema>;
export type ExtractMode = z.infer<typeof ExtractModeSchema>;
export type RequiredField = z.infer<typeof RequiredFieldSchema>;
export type Money = z.infer<typeof MoneySchema>;
export type RecognitionHint = z.infer<typeof RecognitionHintSchema>;
export type ExtractRequest = z.infer<typeof ExtractRequestSchema>;
export type AttemptOutcome = z.infer<typeof AttemptOutcomeSchema>;
export type AttemptSummary = z.infer<typeof AttemptSummarySchema>;
export type ProductRecord = z.infer<typeof ProductRecordSchema>;

export interface TargetURL {
  url: string;
  host: string;
  addresses: string[];
  allowlisted: boolean;
}

export interface FetchResult {
  requestedUrl: string;
  finalUrl: string;
  transport: TransportKind;
  status: number;
  contentType: string;
  body: Buffer;
  elapsedMs: number;
  redirects: string[];
}

export interface ScrapedProduct {
  title?: string;
  priceText?: string;
  currencyHint?: string;
  images: string[];
  category?: string;
  breadcrumbs: string[];
  variants: Record<string, string[]>;
  selectedVariant?: Record<string, string>;
  /** Attribute name to value, e.g. `{ Material: "Cotton" }`. */
  specifications: Record<string, string>;
}
