/**
 * @custody/ledger — Deterministic fixed-point arithmetic.
 *
 * All arithmetic uses bigint. Every stored quantity is an unsigned
 * 256-bit integer; results outside [0, 2^256 − 1] are invariant
 * violations and throw instead of wrapping.
 *
 * Rules:
 * - No floating-point operations
 * - Multiply before divide; division floors
 * - Decimal strings are only for configuration and display
 */

import { MAX_UINT256 } from "@custody/types";
import { LedgerError } from "./types.js";

// ─── Decimal strings ─────────────────────────────────────────────────────

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=6 → 100000000n
 * "-50.25" with decimals=2 → -5025n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();

  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const parts = abs.split(".");
  const intPart = parts[0] ?? "0";
  const fracPart = parts[1] ?? "";

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but only ${String(decimals)} are allowed`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * 800000000n with decimals=6 → "800.000000"
 * -5025n with decimals=2 → "-50.25"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

// ─── Checked uint256 arithmetic ──────────────────────────────────────────

function assertUint256(value: bigint, operation: string): bigint {
  if (value < 0n) {
    throw new LedgerError("INVARIANT_VIOLATION", `${operation} underflows below zero`);
  }
  if (value > MAX_UINT256) {
    throw new LedgerError("INVARIANT_VIOLATION", `${operation} overflows uint256`);
  }
  return value;
}

export function checkedAdd(a: bigint, b: bigint): bigint {
  return assertUint256(a + b, `${a.toString()} + ${b.toString()}`);
}

export function checkedSub(a: bigint, b: bigint): bigint {
  return assertUint256(a - b, `${a.toString()} - ${b.toString()}`);
}

export function checkedMul(a: bigint, b: bigint): bigint {
  return assertUint256(a * b, `${a.toString()} * ${b.toString()}`);
}

/**
 * 10^exponent. The exponent must fit a uint256 result (0..77).
 */
export function pow10(exponent: number): bigint {
  if (!Number.isInteger(exponent) || exponent < 0 || exponent > 77) {
    throw new LedgerError(
      "INVALID_ARGUMENT",
      `Power-of-ten exponent must be an integer in [0, 77], got ${String(exponent)}`,
    );
  }
  return 10n ** BigInt(exponent);
}

/**
 * floor(a * b / denominator), with the product checked against uint256.
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  if (denominator <= 0n) {
    throw new LedgerError("INVALID_ARGUMENT", "mulDiv denominator must be positive");
  }
  return checkedMul(a, b) / denominator;
}

/**
 * Move an amount between fixed-point precisions.
 *
 * rescale(1_500000000000000000n, 18, 6) → 1_500000n
 * rescale(1_500000n, 6, 18) → 1_500000000000000000n
 *
 * Scaling down floors; scaling up is checked.
 */
export function rescale(amount: bigint, fromDecimals: number, toDecimals: number): bigint {
  if (fromDecimals === toDecimals) {
    return amount;
  }
  if (fromDecimals > toDecimals) {
    return amount / pow10(fromDecimals - toDecimals);
  }
  return checkedMul(amount, pow10(toDecimals - fromDecimals));
}
