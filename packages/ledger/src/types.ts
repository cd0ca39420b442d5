/**
 * @tallystake/ledger: Internal types for the ledger engine.
 *
 * Rules:
 * - All types are readonly
 * - Amounts are bigint base units, never negative
 * - Fail-closed: invalid operations throw, never silently succeed
 */

import type { Address } from "@tallystake/types";

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "INSUFFICIENT_BALANCE"
  | "MAX_SUPPLY_EXCEEDED"
  | "INVALID_RATIO"
  | "INVALID_FEE"
  | "INVALID_ADDRESS";

/**
 * Structured error from the ledger engine.
 * Always thrown, never returned.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Fee Types ───────────────────────────────────────────────────────────

/**
 * Transfer fee configuration. createFeeSchedule() validates and freezes
 * one; applyFee() re-checks whatever it is given.
 */
export interface FeeSchedule {
  /** Fee charged on the gross amount, in basis points. */
  readonly feeBps: number;
  /** Percent of the fee destroyed. */
  readonly burnRatio: number;
  /** Percent of the fee sent to the rewards pool. */
  readonly rewardsRatio: number;
  /** Percent of the fee sent to the dev wallet. */
  readonly devRatio: number;
}

/**
 * Result of applying a fee to a gross transfer amount.
 *
 * net + burnAmount + rewardsAmount + devAmount === gross.
 * `dust` is the flooring remainder; it is already included in burnAmount.
 */
export interface FeeBreakdown {
  readonly gross: bigint;
  readonly fee: bigint;
  readonly net: bigint;
  readonly burnAmount: bigint;
  readonly rewardsAmount: bigint;
  readonly devAmount: bigint;
  readonly dust: bigint;
}

// ─── Balance Types ───────────────────────────────────────────────────────

/**
 * A holder and its balance.
 */
export interface HolderBalance {
  readonly address: Address;
  readonly balance: bigint;
}

/**
 * Snapshot of the balance book.
 * Used for rollback checkpoints and persistence.
 */
export interface BalanceSnapshot {
  readonly version: 1;
  readonly balances: readonly HolderBalance[];
  readonly totalSupply: bigint;
  readonly totalBurned: bigint;
  readonly maxSupply: bigint;
}
