/**
 * @tallybook/ledger — Fixed-point monetary arithmetic.
 *
 * Amounts travel as decimal strings and are computed as bigint minor
 * units scaled by the currency's decimals. No floating point is used
 * for anything that reaches the ledger.
 */

import type { Money } from "@tallybook/types";
import { ValidationError } from "./types.js";

const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

// ─── Scaling ─────────────────────────────────────────────────────────────

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=6 → 100000000n
 * "-50.25" with decimals=2 → -5025n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new ValidationError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    throw new ValidationError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const [intPart = "0", fracPart = ""] = (negative ? trimmed.slice(1) : trimmed).split(".");

  if (fracPart.length > decimals) {
    throw new ValidationError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but currency allows ${String(decimals)}`,
      { amount: trimmed, decimals },
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * -5025n with decimals=2 → "-50.25"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const str = (negative ? -scaled : scaled).toString().padStart(decimals + 1, "0");
  const result = `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;

  return negative ? `-${result}` : result;
}

/**
 * Split a decimal string into an integer numerator and a power-of-ten
 * denominator: "0.005" → { numerator: 5n, denominator: 1000n }.
 */
function parseRatio(value: string): { numerator: bigint; denominator: bigint } {
  const trimmed = value.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    throw new ValidationError("INVALID_AMOUNT", `Invalid decimal: "${value}"`);
  }
  const negative = trimmed.startsWith("-");
  const [intPart = "0", fracPart = ""] = (negative ? trimmed.slice(1) : trimmed).split(".");
  const numerator = BigInt(intPart + fracPart);
  return {
    numerator: negative ? -numerator : numerator,
    denominator: 10n ** BigInt(fracPart.length),
  };
}

/** Integer division rounding half away from zero. */
function divideHalfUp(numerator: bigint, denominator: bigint): bigint {
  const negative = (numerator < 0n) !== (denominator < 0n);
  const n = numerator < 0n ? -numerator : numerator;
  const d = denominator < 0n ? -denominator : denominator;
  const q = (n * 2n + d) / (d * 2n);
  return negative ? -q : q;
}

/**
 * Multiply a scaled amount by a decimal-string rate, rounding half-up
 * to the same scale.
 *
 * applyRate(10000n, "0.005") → 50n
 * applyRate(8750n, "1.5") → 13125n
 */
export function applyRate(scaled: bigint, rate: string): bigint {
  const { numerator, denominator } = parseRatio(rate);
  return divideHalfUp(scaled * numerator, denominator);
}

/**
 * Scale a decimal string to the given decimals, rounding half-up
 * when it carries more places than the currency allows.
 *
 * scaleDecimal("0.10", 0) → 0n
 * scaleDecimal("0.01", 2) → 1n
 */
export function scaleDecimal(value: string, decimals: number): bigint {
  const { numerator, denominator } = parseRatio(value);
  return divideHalfUp(numerator * 10n ** BigInt(decimals), denominator);
}

/** True when `value` is a well-formed decimal string greater than zero. */
export function isPositiveDecimal(value: string): boolean {
  if (typeof value !== "string" || !DECIMAL_PATTERN.test(value.trim())) {
    return false;
  }
  return parseRatio(value).numerator > 0n;
}

// ─── Money ───────────────────────────────────────────────────────────────

/**
 * Validate that a Money object is well-formed.
 * Throws ValidationError if invalid.
 */
export function validateMoney(money: Money): void {
  if (typeof money.currency !== "string" || money.currency.trim() === "") {
    throw new ValidationError("INVALID_MONEY", `Money currency must be a non-empty string, got: "${String(money.currency)}"`);
  }

  if (typeof money.decimals !== "number" || !Number.isInteger(money.decimals) || money.decimals < 0) {
    throw new ValidationError("INVALID_MONEY", `Money decimals must be a non-negative integer, got: ${String(money.decimals)}`);
  }

  parseAmount(money.amount, money.decimals);
}

/**
 * Assert two Money values have the same currency and decimals.
 */
export function assertSameCurrency(a: Money, b: Money): void {
  if (a.currency !== b.currency) {
    throw new ValidationError(
      "CURRENCY_MISMATCH",
      `Cannot operate on different currencies: "${a.currency}" vs "${b.currency}"`,
    );
  }
  if (a.decimals !== b.decimals) {
    throw new ValidationError(
      "CURRENCY_MISMATCH",
      `Decimal mismatch for currency "${a.currency}": ${String(a.decimals)} vs ${String(b.decimals)}`,
    );
  }
}

function withAmount(template: Money, scaled: bigint): Money {
  return {
    amount: formatAmount(scaled, template.decimals),
    currency: template.currency,
    decimals: template.decimals,
  };
}

export function addMoney(a: Money, b: Money): Money {
  assertSameCurrency(a, b);
  return withAmount(a, parseAmount(a.amount, a.decimals) + parseAmount(b.amount, b.decimals));
}

/**
 * Subtract b from a. They must have the same currency.
 */
export function subtractMoney(a: Money, b: Money): Money {
  assertSameCurrency(a, b);
  return withAmount(a, parseAmount(a.amount, a.decimals) - parseAmount(b.amount, b.decimals));
}

/**
 * Sum a list of Money values of one currency. An empty list sums to
 * zero in the given currency.
 */
export function sumMoney(values: readonly Money[], currency: string, decimals: number): Money {
  const zero = zeroMoney(currency, decimals);
  return values.reduce<Money>((acc, m) => addMoney(acc, m), zero);
}

export function isZero(money: Money): boolean {
  return parseAmount(money.amount, money.decimals) === 0n;
}

export function zeroMoney(currency: string, decimals: number): Money {
  return { amount: formatAmount(0n, decimals), currency, decimals };
}

/**
 * Compare two Money values. Returns -1, 0, or 1.
 */
export function compareMoney(a: Money, b: Money): -1 | 0 | 1 {
  assertSameCurrency(a, b);
  const va = parseAmount(a.amount, a.decimals);
  const vb = parseAmount(b.amount, b.decimals);
  if (va < vb) return -1;
  if (va > vb) return 1;
  return 0;
}

export function absMoney(money: Money): Money {
  const scaled = parseAmount(money.amount, money.decimals);
  return withAmount(money, scaled < 0n ? -scaled : scaled);
}

/**
 * Convert `money` into another currency at a decimal-string rate,
 * rounding half-up to the target decimals.
 */
export function convertMoney(money: Money, rate: string, currency: string, decimals: number): Money {
  const scaled = parseAmount(money.amount, money.decimals);
  const converted = applyRate(scaled * 10n ** BigInt(decimals), rate);
  return {
    amount: formatAmount(divideHalfUp(converted, 10n ** BigInt(money.decimals)), decimals),
    currency,
    decimals,
  };
}
