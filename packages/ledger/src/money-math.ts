/**
 * @ballast/ledger — Deterministic share and fee arithmetic.
 *
 * Rules:
 * - bigint only, no floating-point operations
 * - Rounding direction is always explicit at the call site
 * - Basis points are integers in [0, 10000]
 */

import type { Rounding } from "./types.js";
import { LedgerError } from "./types.js";

export const BPS_DENOMINATOR = 10_000n;

export const SECONDS_PER_YEAR = 31_536_000n;

/**
 * `a * b / denominator`, rounded in the requested direction.
 */
export function mulDiv(
  a: bigint,
  b: bigint,
  denominator: bigint,
  rounding: Rounding = "down",
): bigint {
  if (denominator === 0n) {
    throw new LedgerError("INVALID_DATA", "Division by zero");
  }
  const product = a * b;
  const quotient = product / denominator;
  if (rounding === "down" || product % denominator === 0n) {
    return quotient;
  }
  return quotient + 1n;
}

export function assertBps(bps: number): number {
  if (!Number.isInteger(bps) || bps < 0 || bps > 10_000) {
    throw new LedgerError("INVALID_DATA", `Basis points must be an integer in [0, 10000], got ${String(bps)}`);
  }
  return bps;
}

/**
 * The `bps` share of `amount` (fee amounts, weight targets).
 */
export function bpsOf(amount: bigint, bps: number, rounding: Rounding = "down"): bigint {
  return mulDiv(amount, BigInt(assertBps(bps)), BPS_DENOMINATOR, rounding);
}

/**
 * `amount` reduced by `bps` (slippage floors).
 */
export function applyBps(amount: bigint, bps: number, rounding: Rounding = "down"): bigint {
  return mulDiv(amount, BPS_DENOMINATOR - BigInt(assertBps(bps)), BPS_DENOMINATOR, rounding);
}

export function pow10(exponent: number): bigint {
  if (!Number.isInteger(exponent) || exponent < 0) {
    throw new LedgerError("INVALID_DATA", `Decimals must be a non-negative integer, got ${String(exponent)}`);
  }
  return 10n ** BigInt(exponent);
}

export function minBigInt(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export function maxBigInt(a: bigint, b: bigint): bigint {
  return a > b ? a : b;
}

/**
 * Sum of a list of amounts.
 */
export function sumBigInt(values: readonly bigint[]): bigint {
  let total = 0n;
  for (const value of values) {
    total += value;
  }
  return total;
}
