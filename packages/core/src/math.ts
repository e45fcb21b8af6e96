/**
 * Fixed-point helpers
 *
 * Amounts and prices are bigint (token units, WAD). Fractional bps math
 * goes through decimal.js so every rounding step is explicit.
 *
 * This module is pure (no I/O, no throw on valid inputs).
 */

import Decimal from "decimal.js";

import type { Amount, Bps, TokenConfig, Wad } from "./types";

export const WAD: Wad = 10n ** 18n;
export const BPS = 10_000n;
export const BPS_NUMBER = 10_000;

/** Wide enough for WAD-scaled products */
export const Dec = Decimal.clone({ precision: 60, rounding: Decimal.ROUND_DOWN });
export type Dec = Decimal;

export type Rounding = "down" | "up";

/**
 * a * b / d with explicit rounding. Operands must be non-negative and d > 0.
 */
export function mulDiv(a: bigint, b: bigint, d: bigint, rounding: Rounding = "down"): bigint {
  const product = a * b;
  const quotient = product / d;
  if (rounding === "up" && quotient * d !== product) {
    return quotient + 1n;
  }
  return quotient;
}

export function scaleOf(decimals: number): bigint {
  return 10n ** BigInt(decimals);
}

/**
 * Value of a base amount in quote units at `midWad`
 */
export function quoteValueOf(baseAmount: Amount, midWad: Wad, tokens: TokenConfig, rounding: Rounding = "down"): Amount {
  return mulDiv(baseAmount * midWad, scaleOf(tokens.quoteDecimals), WAD * scaleOf(tokens.baseDecimals), rounding);
}

/**
 * Base amount purchasable with `quoteAmount` at `midWad`
 */
export function baseAmountFor(quoteAmount: Amount, midWad: Wad, tokens: TokenConfig, rounding: Rounding = "down"): Amount {
  if (midWad === 0n) return 0n;
  return mulDiv(quoteAmount * WAD, scaleOf(tokens.baseDecimals), midWad * scaleOf(tokens.quoteDecimals), rounding);
}

/**
 * Parse a decimal price string ("1.1") into WAD. Truncates beyond 18 decimals.
 */
export function toWad(value: string | number): Wad {
  const scaled = new Dec(value).mul(WAD.toString()).toDecimalPlaces(0, Decimal.ROUND_DOWN);
  return BigInt(scaled.toFixed(0));
}

/**
 * Render a WAD as a plain decimal string
 */
export function fromWad(value: Wad): string {
  return new Dec(value.toString()).div(WAD.toString()).toString();
}

/**
 * Absolute relative move between two prices, in bps, rounded down
 */
export function relativeChangeBps(from: bigint, to: bigint): Bps {
  if (from === 0n) return 0;
  const diff = to > from ? to - from : from - to;
  return Number(mulDiv(diff, BPS, from));
}

/**
 * Round a fractional bps value toward zero
 */
export function truncBps(value: Dec): Bps {
  const truncated = value.toDecimalPlaces(0, Decimal.ROUND_DOWN).toNumber();
  // normalize -0
  return truncated === 0 ? 0 : truncated;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

export function minBigInt(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}
