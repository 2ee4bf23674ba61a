/**
 * @escrowpoint/escrow — Fixed-point arithmetic and safe casts.
 *
 * Bias and slope are WAD-scaled signed accumulators; public balances
 * are unsigned base units. Every conversion between the two goes
 * through a checked cast.
 *
 * Rules:
 * - No floating-point operations
 * - Division always truncates toward zero (never rounds up)
 * - A value that does not fit its target range throws, never wraps
 */

import { EscrowError } from "./types.js";

/** 18-decimal fixed-point unit. */
export const WAD = 10n ** 18n;

export const INT128_MIN = -(2n ** 127n);
export const INT128_MAX = 2n ** 127n - 1n;
export const UINT128_MAX = 2n ** 128n - 1n;
export const INT256_MIN = -(2n ** 255n);
export const INT256_MAX = 2n ** 255n - 1n;
export const UINT256_MAX = 2n ** 256n - 1n;

// ─── Safe Casts ──────────────────────────────────────────────────────────

function checkRange(value: bigint, min: bigint, max: bigint, target: string): bigint {
  if (value < min || value > max) {
    throw new EscrowError(
      "SAFE_CAST_OVERFLOW",
      `Value ${value.toString()} does not fit in ${target}`,
    );
  }
  return value;
}

export function toInt128(value: bigint): bigint {
  return checkRange(value, INT128_MIN, INT128_MAX, "int128");
}

export function toUint128(value: bigint): bigint {
  return checkRange(value, 0n, UINT128_MAX, "uint128");
}

export function toInt256(value: bigint): bigint {
  return checkRange(value, INT256_MIN, INT256_MAX, "int256");
}

export function toUint256(value: bigint): bigint {
  return checkRange(value, 0n, UINT256_MAX, "uint256");
}

// ─── WAD Arithmetic ──────────────────────────────────────────────────────

/**
 * (a * b) / denominator, truncating.
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new EscrowError("DIVISION_BY_ZERO", "mulDiv denominator is zero");
  }
  return (a * b) / denominator;
}

/**
 * Per-second decay rate of `amount` locked over `maxLockTime`.
 *
 * 1000e18 locked with maxLockTime = 31_536_000 → 31709791983764586504312531709791n
 */
export function toWadSlope(amount: bigint, maxLockTime: number): bigint {
  return toInt256(mulDiv(toInt256(amount), WAD, BigInt(maxLockTime)));
}

/**
 * Rescale a WAD-scaled accumulator to public base units.
 * Negative accumulators clamp to zero.
 */
export function fromWad(value: bigint): bigint {
  if (value <= 0n) {
    return 0n;
  }
  return toUint256(value / WAD);
}

/**
 * bias - slope * elapsed, floored at zero.
 */
export function decay(bias: bigint, slope: bigint, elapsed: number): bigint {
  const remaining = toInt256(bias - slope * BigInt(elapsed));
  return remaining < 0n ? 0n : remaining;
}

// ─── Display ─────────────────────────────────────────────────────────────

/**
 * Parse a decimal string into base units of an 18-decimal token.
 *
 * "1000" → 1000000000000000000000n
 * "0.5" → 500000000000000000n
 */
export function parseWad(amount: string, decimals = 18): bigint {
  const trimmed = amount.trim();

  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new EscrowError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const parts = trimmed.split(".");
  const intPart = parts[0] ?? "0";
  const fracPart = parts[1] ?? "";

  if (fracPart.length > decimals) {
    throw new EscrowError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but only ${String(decimals)} are allowed`,
    );
  }

  return toUint256(BigInt(intPart + fracPart.padEnd(decimals, "0")));
}

/**
 * Render base units as a decimal string.
 *
 * 1500000000000000000n → "1.500000000000000000"
 */
export function formatWad(scaled: bigint, decimals = 18): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const result = `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;

  return negative ? `-${result}` : result;
}
