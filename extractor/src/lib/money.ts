import { Money } from "../types";

const DECIMAL_PATTERN = /^(\d+)(?:\.(\d+))?$/;
const exponentCache = new Map<string, number>();

/** ISO 4217 minor-unit exponent as reported by Intl (USD 2, JPY 0, KWD 3). */
export function currencyExponent(code: string): number {
  const cached = exponentCache.get(code);
  if (cached !== undefined) {
    return cached;
  }
  let exponent = 2;
  try {
    exponent = new Intl.NumberFormat("en", { style: "currency", currency: code }).resolvedOptions().maximumFractionDigits ?? 2;
  } catch {
    exponent = 2;
  }
  exponentCache.set(code, exponent);
  return exponent;
}

export function isCurrencyCode(value: string | undefined): value is string {
  return value !== undefined && /^[A-Z]{3}$/.test(value);
}

const pow10 = (exponent: number): bigint => 10n ** BigInt(exponent);

/** Non-negative `numerator / denominator`, rounded half-up. */
export function divideHalfUp(numerator: bigint, denominator: bigint): bigint {
  return (numerator * 2n + denominator) / (denominator * 2n);
}

export interface Decimal {
  digits: bigint;
  scale: number;
}

/** Parses canonical decimal text such as `19.99` or `3.6725`. */
export function parseDecimal(text: string): Decimal | null {
  const match = text.trim().match(DECIMAL_PATTERN);
  if (!match) {
    return null;
  }
  const fraction = match[2] ?? "";
  return { digits: BigInt(`${match[1]}${fraction}`), scale: fraction.length };
}

/** Rescales a decimal to `exponent` fractional digits, rounding half-up. */
export function toMinorUnits(value: Decimal, exponent: number): bigint {
  if (value.scale <= exponent) {
    return value.digits * pow10(exponent - value.scale);
  }
  return divideHalfUp(value.digits, pow10(value.scale - exponent));
}

export function formatMinorUnits(minor: bigint, exponent: number): string {
  const text = minor.toString().padStart(exponent + 1, "0");
  if (exponent === 0) {
    return text;
  }
  return `${text.slice(0, -exponent)}.${text.slice(-exponent)}`;
}

/** Fixed-point money: integer minor units of a currency. */
export class FixedMoney {
  readonly exponent: number;

  constructor(readonly minor: bigint, readonly currency: string) {
    if (minor < 0n) {
      throw new RangeError("money amount cannot be negative");
    }
    this.exponent = currencyExponent(currency);
  }

  static fromDecimal(value: Decimal, currency: string): FixedMoney {
    return new FixedMoney(toMinorUnits(value, currencyExponent(currency)), currency);
  }

  static fromMoney(money: Money): FixedMoney {
    const decimal = parseDecimal(money.amount);
    if (!decimal) {
      throw new RangeError(`invalid amount ${money.amount}`);
    }
    return FixedMoney.fromDecimal(decimal, money.currency);
  }

  /**
   * Converts through the reporting currency. Rates are units of a currency per one
   * reporting unit, so `target = amount * rate(target) / rate(source)`.
   */
  convert(targetCurrency: string, sourceRate: Decimal, targetRate: Decimal): FixedMoney {
    if (sourceRate.digits === 0n) {
      throw new RangeError(`zero rate for ${this.currency}`);
    }
    const targetExponent = currencyExponent(targetCurrency);
    const numerator = this.minor * targetRate.digits * pow10(sourceRate.scale + targetExponent);
    const denominator = sourceRate.digits * pow10(this.exponent + targetRate.scale);
    return new FixedMoney(divideHalfUp(numerator, denominator), targetCurrency);
  }

  toJSON(): Money {
    return { amount: formatMinorUnits(this.minor, this.exponent), currency: this.currency };
  }
}
