import { z } from "zod";
import currencyData from "../data/currencies.json";
import { ExtractionError } from "../errors";
import { Money } from "../types";
import { Decimal, FixedMoney, currencyExponent, isCurrencyCode, parseDecimal } from "./money";

const CurrencyTableSchema = z.object({
  codes: z.array(z.string().regex(/^[A-Z]{3}$/)),
  aliases: z.record(z.string().regex(/^[A-Z]{3}$/)),
  symbols: z.array(z.tuple([z.string().min(1), z.string().regex(/^[A-Z]{3}$/)])),
  words: z.array(z.tuple([z.string().min(1), z.string().regex(/^[A-Z]{3}$/)]))
});

const table = CurrencyTableSchema.parse(currencyData);
const CODE_PATTERN = new RegExp(`(?<![A-Za-z])(${[...table.codes, ...Object.keys(table.aliases)].join("|")})(?![A-Za-z])`);
const NUMBER_PATTERN = /\d+(?:[.,' \u00a0\u202f]\d+)*/;
const SPACE_SEPARATORS = /[' \u00a0\u202f]/;

const escapeRegExp = (text: string): string => text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
const MARKERS = [...table.symbols.map(([symbol]) => escapeRegExp(symbol)), ...table.codes, ...Object.keys(table.aliases)].join("|");
const AMOUNT = "\\d+(?:[.,]\\d+)*";
const PRICE_TEXT_PATTERN = new RegExp(
  `(?<![A-Za-z])(?:${MARKERS})[ \\u00a0]?${AMOUNT}|${AMOUNT}[ \\u00a0]?(?:${MARKERS})(?![A-Za-z\\d])`
);

export interface NormalizeOptions {
  defaultCurrency: string;
  /** Structured currency from the page (JSON-LD priceCurrency, meta tags); wins over symbols. */
  currencyHint?: string;
}

/** Arabic-Indic and Persian digits to ASCII, Arabic separators to `.` and `,`. */
export function toAsciiDigits(text: string): string {
  return text
    .replace(/[٠-٩]/g, (digit) => String(digit.charCodeAt(0) - 0x0660))
    .replace(/[۰-۹]/g, (digit) => String(digit.charCodeAt(0) - 0x06f0))
    .replace(/٫/g, ".")
    .replace(/٬/g, ",");
}

export function detectCurrency(text: string): string | undefined {
  const code = text.match(CODE_PATTERN)?.[1];
  if (code) {
    return table.aliases[code] ?? code;
  }
  for (const [symbol, currency] of table.symbols) {
    if (text.includes(symbol)) {
      return currency;
    }
  }
  for (const [word, currency] of table.words) {
    if (text.includes(word)) {
      return currency;
    }
  }
  return undefined;
}

/** First amount in free text that carries a currency marker, e.g. `$19.99` or `120 د.إ`. */
export function findPriceText(text: string): string | undefined {
  return toAsciiDigits(text).match(PRICE_TEXT_PATTERN)?.[0];
}

function firstNumberToken(text: string): string | null {
  const match = text.match(NUMBER_PATTERN);
  if (!match) {
    return null;
  }
  // A space-like separator only counts as a thousands mark before a 3-digit group.
  const parts = match[0].split(/([.,' \u00a0\u202f])/);
  let token = parts[0];
  for (let index = 1; index + 1 < parts.length; index += 2) {
    const separator = parts[index];
    const group = parts[index + 1];
    if (SPACE_SEPARATORS.test(separator) && group.length !== 3) {
      break;
    }
    token += separator + group;
  }
  return token;
}

function decimalSeparatorOf(token: string, exponent: number): "." | "," | null {
  const lastDot = token.lastIndexOf(".");
  const lastComma = token.lastIndexOf(",");
  if (lastDot >= 0 && lastComma >= 0) {
    return lastDot > lastComma ? "." : ",";
  }
  const separator = lastDot >= 0 ? "." : lastComma >= 0 ? "," : null;
  if (!separator) {
    return null;
  }
  const pieces = token.split(separator);
  if (pieces.length > 2) {
    return null;
  }
  const [integer, fraction] = pieces;
  const looksLikeThousands = fraction.length === 3 && integer !== "0" && integer.length <= 3;
  if (looksLikeThousands && !(separator === "." && exponent === 3)) {
    return null;
  }
  return separator;
}

export function parseAmount(token: string, exponent: number): Decimal | null {
  const compact = token.replace(/[' \u00a0\u202f]/g, "");
  const decimalSeparator = decimalSeparatorOf(compact, exponent);
  let integer = compact;
  let fraction = "";
  if (decimalSeparator) {
    const index = compact.lastIndexOf(decimalSeparator);
    integer = compact.slice(0, index);
    fraction = compact.slice(index + 1);
  }
  integer = integer.replace(/[.,]/g, "");
  if (!/^\d+$/.test(integer) || !/^\d*$/.test(fraction)) {
    return null;
  }
  return parseDecimal(fraction ? `${integer}.${fraction}` : integer);
}

/**
 * Parses visible or structured price text into fixed-point money. Ranges and lists
 * yield their first amount.
 */
export function normalizePrice(rawPriceText: string, options: NormalizeOptions): FixedMoney {
  const text = toAsciiDigits(rawPriceText).trim();
  const hint = options.currencyHint?.trim().toUpperCase();
  const currency = (isCurrencyCode(hint) ? hint : undefined) ?? detectCurrency(text) ?? options.defaultCurrency;

  const token = firstNumberToken(text);
  const exponent = currencyExponent(currency);
  const amount = token ? parseAmount(token, exponent) : null;
  if (!amount) {
    throw new ExtractionError("UnparseablePrice", `could not read an amount from "${rawPriceText.slice(0, 80)}"`, {
      raw: rawPriceText.slice(0, 200)
    });
  }
  return FixedMoney.fromDecimal(amount, currency);
}

export interface ConversionResult {
  converted: Money;
  convertedFlag: boolean;
}

function rateFor(code: string, rates: Readonly<Record<string, string>>, reportingCurrency: string): Decimal | null {
  if (code === reportingCurrency) {
    return { digits: 1n, scale: 0 };
  }
  const text = rates[code];
  return text ? parseDecimal(text) : null;
}

/**
 * Converts into `targetCurrency` using rates quoted per one reporting unit. A missing
 * rate keeps the original amount and reports `convertedFlag: false`.
 */
export function convertMoney(
  money: Money,
  targetCurrency: string,
  rates: Readonly<Record<string, string>>,
  reportingCurrency: string
): ConversionResult {
  if (money.currency === targetCurrency) {
    return { converted: { ...money }, convertedFlag: false };
  }
  const sourceRate = rateFor(money.currency, rates, reportingCurrency);
  const targetRate = rateFor(targetCurrency, rates, reportingCurrency);
  if (!sourceRate || !targetRate || sourceRate.digits === 0n) {
    return { converted: { ...money }, convertedFlag: false };
  }
  const converted = FixedMoney.fromMoney(money).convert(targetCurrency, sourceRate, targetRate);
  return { converted: converted.toJSON(), convertedFlag: true };
}
