/**
 * Fee Splitter: transfer fee computation.
 *
 * Computes the fee embedded in a gross transfer amount and its
 * three-way split between burn, rewards pool and dev wallet.
 *
 * Rules:
 * - fee = floor(gross * feeBps / 10000)
 * - each part = floor(fee * ratio / 100)
 * - flooring dust is added to the burn part
 * - net + burn + rewards + dev === gross, always
 * - ratios are validated once, when the schedule is created
 *
 * Whether a transfer is fee-exempt is decided by the caller.
 */

import { BPS_DENOMINATOR, PERCENT_DENOMINATOR, assertNonNegativeAmount, mulDiv } from "./amount-math.js";
import type { FeeBreakdown, FeeSchedule } from "./types.js";
import { LedgerError } from "./types.js";

/** Highest transfer fee a schedule may carry (10%). */
export const MAX_TRANSFER_FEE_BPS = 1_000;

/** Burn 50%, rewards 25%, dev 25%. */
export const DEFAULT_FEE_RATIOS = {
  burnRatio: 50,
  rewardsRatio: 25,
  devRatio: 25,
} as const;

/**
 * Check a fee schedule without copying it.
 *
 * Throws INVALID_FEE when feeBps is out of range and INVALID_RATIO
 * when the split ratios are not non-negative integers summing to 100.
 */
function assertFeeSchedule(schedule: FeeSchedule): void {
  const { feeBps, burnRatio, rewardsRatio, devRatio } = schedule;

  if (!Number.isInteger(feeBps) || feeBps < 0 || feeBps > MAX_TRANSFER_FEE_BPS) {
    throw new LedgerError(
      "INVALID_FEE",
      `Transfer fee must be an integer between 0 and ${String(MAX_TRANSFER_FEE_BPS)} bps, got ${String(feeBps)}`,
    );
  }

  for (const [label, ratio] of [
    ["burnRatio", burnRatio],
    ["rewardsRatio", rewardsRatio],
    ["devRatio", devRatio],
  ] as const) {
    if (!Number.isInteger(ratio) || ratio < 0) {
      throw new LedgerError("INVALID_RATIO", `${label} must be a non-negative integer, got ${String(ratio)}`);
    }
  }

  const total = burnRatio + rewardsRatio + devRatio;
  if (total !== 100) {
    throw new LedgerError("INVALID_RATIO", `Fee ratios must sum to 100, got ${String(total)}`);
  }
}

/**
 * Validate and freeze a fee schedule.
 */
export function createFeeSchedule(input: FeeSchedule): FeeSchedule {
  assertFeeSchedule(input);
  const { feeBps, burnRatio, rewardsRatio, devRatio } = input;
  return Object.freeze({ feeBps, burnRatio, rewardsRatio, devRatio });
}

/**
 * Apply a fee schedule to a gross amount. Rejects an invalid schedule
 * the same way createFeeSchedule() does.
 */
export function applyFee(gross: bigint, schedule: FeeSchedule): FeeBreakdown {
  assertNonNegativeAmount(gross, "Gross amount");
  assertFeeSchedule(schedule);

  const fee = mulDiv(gross, BigInt(schedule.feeBps), BPS_DENOMINATOR);
  const rewardsAmount = mulDiv(fee, BigInt(schedule.rewardsRatio), PERCENT_DENOMINATOR);
  const devAmount = mulDiv(fee, BigInt(schedule.devRatio), PERCENT_DENOMINATOR);
  const burnShare = mulDiv(fee, BigInt(schedule.burnRatio), PERCENT_DENOMINATOR);
  const dust = fee - burnShare - rewardsAmount - devAmount;

  return {
    gross,
    fee,
    net: gross - fee,
    burnAmount: burnShare + dust,
    rewardsAmount,
    devAmount,
    dust,
  };
}

/**
 * Breakdown of a fee-exempt transfer: everything is net.
 */
export function exemptBreakdown(gross: bigint): FeeBreakdown {
  assertNonNegativeAmount(gross, "Gross amount");
  return {
    gross,
    fee: 0n,
    net: gross,
    burnAmount: 0n,
    rewardsAmount: 0n,
    devAmount: 0n,
    dust: 0n,
  };
}
