/**
 * @tallystake/staking domain types.
 *
 * Staking manages locked token positions:
 * - Tiers: ordered stake thresholds granting reward multipliers and capabilities
 * - Stakers: per-account positions with time-weighted reward accrual
 * - Params: the reward rate and early-exit policy
 */

import type { Address, UnixSeconds } from "@tallystake/types";

// =============================================================================
// Error
// =============================================================================

export type StakingErrorCode =
  | "INVALID_AMOUNT"
  | "INSUFFICIENT_STAKE"
  | "TIER_ORDERING_VIOLATION"
  | "INVALID_TIER"
  | "UNKNOWN_TIER"
  | "NO_TIERS"
  | "NOTHING_TO_CLAIM"
  | "CLOCK_REGRESSION"
  | "INVALID_TIMESTAMP"
  | "INVALID_PARAMS";

export class StakingError extends Error {
  public readonly code: StakingErrorCode;
  constructor(code: StakingErrorCode, message: string) {
    super(message);
    this.name = "StakingError";
    this.code = code;
  }
}

// =============================================================================
// Tiers
// =============================================================================

/** A staking bracket. */
export interface Tier {
  readonly name: string;
  /** Lowest stake that qualifies for this tier. Strictly increasing across tiers. */
  readonly minimumStake: bigint;
  /** Reward multiplier in basis points; 10000 is 1.0x. */
  readonly rewardMultiplierBps: number;
  /** Named feature flags granted to members of this tier. */
  readonly capabilities: readonly string[];
}

// =============================================================================
// Stakers
// =============================================================================

/** A staking position. Created on first stake, never deleted. */
export interface StakerInfo {
  readonly stakedAmount: bigint;
  readonly lastStakeTimestamp: UnixSeconds;
  /** Settled, unclaimed rewards. Only claim() lowers it, and only to zero. */
  readonly accumulatedRewards: bigint;
  /** Start of the next accrual window. */
  readonly lastClaimTimestamp: UnixSeconds;
  readonly tierIndex: number;
}

export interface StakingParams {
  /** Reward per staked base unit per second, scaled by 1e18. */
  readonly rewardRatePerSecondPerUnit: bigint;
  /** Seconds a stake must age before it can leave without a fee. */
  readonly minStakingDuration: number;
  readonly earlyUnstakeFeeBps: number;
}

export interface StakeResult {
  readonly info: StakerInfo;
  /** Rewards settled against the previous position before the stake was added. */
  readonly settled: bigint;
}

export interface UnstakeResult {
  readonly info: StakerInfo;
  readonly amount: bigint;
  /** Early-exit fee kept by the staking pool. */
  readonly fee: bigint;
  readonly transferOut: bigint;
}

// =============================================================================
// Snapshot
// =============================================================================

export interface StakerRecord {
  readonly address: Address;
  readonly info: StakerInfo;
}

export interface StakingSnapshot {
  readonly version: 1;
  readonly params: StakingParams;
  readonly stakers: readonly StakerRecord[];
  readonly totalStaked: bigint;
  readonly retainedFees: bigint;
}
