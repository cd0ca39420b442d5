/**
 * @tallystake/ledger: Deterministic integer arithmetic.
 *
 * All arithmetic uses bigint base units. Division always floors.
 * String amounts are converted to/from bigint via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - No negative amounts
 * - Zero runtime dependencies
 */

import { LedgerError } from "./types.js";

/** 100% expressed in basis points. */
export const BPS_DENOMINATOR = 10_000n;

/** 100% expressed as a plain percentage. */
export const PERCENT_DENOMINATOR = 100n;

/** Fixed-point scale of per-second reward rates (1e18). */
export const RATE_PRECISION = 10n ** 18n;

/**
 * floor(a * b / denominator) for non-negative operands.
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  if (denominator <= 0n) {
    throw new LedgerError("INVALID_AMOUNT", `Denominator must be positive, got ${denominator.toString()}`);
  }
  if (a < 0n || b < 0n) {
    throw new LedgerError("INVALID_AMOUNT", `Operands must be non-negative, got ${a.toString()} and ${b.toString()}`);
  }
  return (a * b) / denominator;
}

/**
 * floor(amount * bps / 10000).
 */
export function applyBps(amount: bigint, bps: number): bigint {
  return mulDiv(amount, BigInt(bps), BPS_DENOMINATOR);
}

/**
 * Assert an amount is a bigint ≥ 0.
 */
export function assertNonNegativeAmount(amount: bigint, label: string): void {
  if (typeof amount !== "bigint" || amount < 0n) {
    throw new LedgerError("INVALID_AMOUNT", `${label} must be a non-negative integer amount, got ${String(amount)}`);
  }
}

/**
 * Assert an amount is a bigint > 0.
 */
export function assertPositiveAmount(amount: bigint, label: string): void {
  if (typeof amount !== "bigint" || amount <= 0n) {
    throw new LedgerError("INVALID_AMOUNT", `${label} must be greater than zero, got ${String(amount)}`);
  }
}

/**
 * Parse a decimal token string into base units.
 *
 * "1.5" with decimals=18 → 1500000000000000000n
 * "100" with decimals=0 → 100n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();

  // Unsigned: digits, optional decimal point + digits
  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const [intPart = "0", fracPart = ""] = trimmed.split(".");

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but the token allows ${String(decimals)}`,
    );
  }

  return BigInt(intPart + fracPart.padEnd(decimals, "0"));
}

/**
 * Convert base units back to a decimal token string.
 *
 * 1500000000000000000n with decimals=18 → "1.500000000000000000"
 */
export function formatAmount(units: bigint, decimals: number): string {
  assertNonNegativeAmount(units, "Amount");
  if (decimals === 0) {
    return units.toString();
  }

  const str = units.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  return `${intPart}.${fracPart}`;
}
