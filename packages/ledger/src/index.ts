/**
 * @tallystake/ledger: Balance bookkeeping and transfer fee arithmetic.
 *
 * A pure TypeScript engine with no runtime dependencies beyond
 * @tallystake/types. Enforces:
 * - Balances never go negative
 * - Supply is conserved and capped
 * - Every fee split conserves the gross amount exactly
 * - All arithmetic uses bigint (no floating point)
 */

// Balance bookkeeping
export { BalanceBook } from "./balance-book.js";

// Fee arithmetic
export {
  createFeeSchedule,
  applyFee,
  exemptBreakdown,
  MAX_TRANSFER_FEE_BPS,
  DEFAULT_FEE_RATIOS,
} from "./fee-splitter.js";

// Integer arithmetic
export {
  BPS_DENOMINATOR,
  PERCENT_DENOMINATOR,
  RATE_PRECISION,
  mulDiv,
  applyBps,
  assertNonNegativeAmount,
  assertPositiveAmount,
  parseAmount,
  formatAmount,
} from "./amount-math.js";

// Types
export type {
  LedgerErrorCode,
  FeeSchedule,
  FeeBreakdown,
  HolderBalance,
  BalanceSnapshot,
} from "./types.js";

export { LedgerError } from "./types.js";
