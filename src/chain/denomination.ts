// src/chain/denomination.ts — USDT decimal ↔ base-unit conversion
//
// All amount comparisons happen on bigint base units (18 decimals).
// Decimal strings are only the storage / wire representation.

import { formatUnits, parseUnits } from "viem"
import { USDT_DECIMALS } from "./types.js"

const DECIMAL_PATTERN = /^\d+(\.\d+)?$/

/** Parse a decimal USDT string ("10.5") into 18-decimal base units. */
export function parseUsdt(amount: string): bigint {
  const trimmed = amount.trim()
  if (!DECIMAL_PATTERN.test(trimmed)) {
    throw new Error(`invalid USDT amount: "${amount}"`)
  }
  return parseUnits(trimmed, USDT_DECIMALS)
}

/** Format base units as a decimal USDT string without trailing zeros. */
export function formatUsdt(value: bigint): string {
  return formatUnits(value, USDT_DECIMALS)
}

/**
 * Fraction of a base-unit amount, e.g. fractionOf(x, 0.01) = 1 % of x.
 * The fraction is fixed to 6 decimal places before the integer multiply.
 */
export function fractionOf(value: bigint, fraction: number): bigint {
  if (!Number.isFinite(fraction) || fraction < 0) {
    throw new Error(`invalid fraction: ${fraction}`)
  }
  const ppm = BigInt(Math.round(fraction * 1_000_000))
  return (value * ppm) / 1_000_000n
}

/** Absolute difference of two base-unit amounts. */
export function absDiff(a: bigint, b: bigint): bigint {
  return a > b ? a - b : b - a
}

/**
 * Convert a VND price into a USDT amount rounded half-up to 2 decimals,
 * using the rate snapshot (VND per USDT).
 */
export function vndToUsdt(amountVnd: number, usdtRate: number): string {
  if (!Number.isInteger(amountVnd) || amountVnd < 0) {
    throw new Error(`invalid VND amount: ${amountVnd}`)
  }
  if (!Number.isFinite(usdtRate) || usdtRate <= 0) {
    throw new Error(`invalid USDT rate: ${usdtRate}`)
  }
  const rateMicro = BigInt(Math.round(usdtRate * 1_000_000))
  const scaled = BigInt(amountVnd) * 100n * 1_000_000n
  const cents = (scaled * 2n + rateMicro) / (2n * rateMicro)
  const whole = cents / 100n
  const frac = (cents % 100n).toString().padStart(2, "0")
  return `${whole}.${frac}`
}
