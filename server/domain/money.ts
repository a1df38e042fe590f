/**
 * Money utilities for exact, integer-safe amount handling
 * All amounts are minor units (cents, fils, yen) held as bigint
 */

import { Decimal } from 'decimal.js';

// 40 significant digits covers every signed 64-bit minor-unit value at scale 3
const Exact = Decimal.clone({ precision: 40, rounding: Decimal.ROUND_DOWN });

export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;

export const DEFAULT_CURRENCY_SCALE = 2;

/**
 * Currencies whose minor unit is not 1/100 (ISO 4217 exponent)
 */
const CURRENCY_SCALE_OVERRIDES: Readonly<Record<string, number>> = {
  BIF: 0,
  CLP: 0,
  DJF: 0,
  GNF: 0,
  ISK: 0,
  JPY: 0,
  KMF: 0,
  KRW: 0,
  PYG: 0,
  RWF: 0,
  UGX: 0,
  VND: 0,
  VUV: 0,
  XAF: 0,
  XOF: 0,
  XPF: 0,
  BHD: 3,
  IQD: 3,
  JOD: 3,
  KWD: 3,
  LYD: 3,
  OMR: 3,
  TND: 3,
};

const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

/**
 * Number of decimal places carried by a currency's minor unit
 */
export function currencyScale(currency: string): number {
  return CURRENCY_SCALE_OVERRIDES[currency] ?? DEFAULT_CURRENCY_SCALE;
}

export type ParseAmountResult =
  | { ok: true; minor: bigint }
  | { ok: false; reason: string };

/**
 * Convert decimal text ("-123.45") to minor units at the given scale.
 * Fewer decimal places than the scale are padded; more are rejected
 * since they cannot be represented without rounding.
 */
export function parseAmount(text: string, scale: number): ParseAmountResult {
  if (!DECIMAL_PATTERN.test(text)) {
    return { ok: false, reason: `"${text}" is not a decimal number` };
  }

  const value = new Exact(text);
  if (value.decimalPlaces() > scale) {
    return { ok: false, reason: `"${text}" has more than ${scale} decimal places` };
  }

  const minor = BigInt(value.times(new Exact(10).pow(scale)).toFixed(0));
  if (minor < INT64_MIN || minor > INT64_MAX) {
    return { ok: false, reason: `"${text}" is out of range for a 64-bit amount` };
  }
  return { ok: true, minor };
}

/**
 * Render minor units as decimal text with exactly `scale` decimal places
 * e.g. 12345n at scale 2 -> "123.45", -5n at scale 2 -> "-0.05"
 */
export function formatAmount(minor: bigint, scale: number): string {
  return new Exact(minor.toString()).dividedBy(new Exact(10).pow(scale)).toFixed(scale);
}

/**
 * Render an amount using its currency's scale
 */
export function formatMoney(minor: bigint, currency: string): string {
  return formatAmount(minor, currencyScale(currency));
}
