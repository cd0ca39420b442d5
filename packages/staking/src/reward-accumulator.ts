/**
 * Reward Accumulator: time-weighted, tier-multiplied staking rewards.
 *
 * Every mutation settles the position first, so rewards accrue against
 * the old stake and tier up to the moment of change, and the new stake
 * and tier apply only from then on.
 *
 * Accrual for one window:
 *   base   = floor(stakedAmount * rate * elapsed / 1e18)
 *   reward = floor(base * tierMultiplierBps / 10000)
 *
 * Rules:
 * - accumulatedRewards never decreases except through claim(), which zeroes it
 * - settling twice at the same timestamp adds nothing the second time
 * - early-unstake fees stay with the staking pool
 * - all arithmetic is bigint via @tallystake/ledger
 */

import { BPS_DENOMINATOR, RATE_PRECISION, applyBps, mulDiv } from "@tallystake/ledger";
import type { Address, UnixSeconds } from "@tallystake/types";
import { isBasisPoints, isUnixSeconds } from "@tallystake/types";
import type { TierTable } from "./tier-table.js";
import type {
  StakeResult,
  StakerInfo,
  StakerRecord,
  StakingParams,
  StakingSnapshot,
  UnstakeResult,
} from "./types.js";
import { StakingError } from "./types.js";

// =============================================================================
// Pure accrual
// =============================================================================

/**
 * Reward earned by `stakedAmount` over `elapsed` seconds.
 */
export function computeReward(
  stakedAmount: bigint,
  rewardRatePerSecondPerUnit: bigint,
  elapsed: number,
  multiplierBps: number,
): bigint {
  const base = mulDiv(stakedAmount * rewardRatePerSecondPerUnit, BigInt(elapsed), RATE_PRECISION);
  return mulDiv(base, BigInt(multiplierBps), BPS_DENOMINATOR);
}

/**
 * Bring a position's accrual up to `now`.
 * A position with nothing staked is returned unchanged.
 */
export function settle(
  info: StakerInfo,
  now: UnixSeconds,
  rewardRatePerSecondPerUnit: bigint,
  multiplierBps: number,
): StakerInfo {
  if (info.stakedAmount === 0n) {
    return info;
  }

  const elapsed = now - info.lastClaimTimestamp;
  if (elapsed < 0) {
    throw new StakingError(
      "CLOCK_REGRESSION",
      `Cannot settle at ${String(now)}, position was last settled at ${String(info.lastClaimTimestamp)}`,
    );
  }

  const reward = computeReward(info.stakedAmount, rewardRatePerSecondPerUnit, elapsed, multiplierBps);
  return {
    ...info,
    accumulatedRewards: info.accumulatedRewards + reward,
    lastClaimTimestamp: now,
  };
}

// =============================================================================
// Accumulator
// =============================================================================

export class RewardAccumulator {
  private readonly stakers: Map<Address, StakerInfo> = new Map();
  private readonly tiers: TierTable;
  private params: StakingParams;
  private staked = 0n;
  private retained = 0n;

  constructor(tiers: TierTable, params: StakingParams) {
    this.tiers = tiers;
    this.params = validateParams(params);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  get totalStaked(): bigint {
    return this.staked;
  }

  /** Early-unstake fees kept by the pool so far. */
  get retainedFees(): bigint {
    return this.retained;
  }

  getParams(): StakingParams {
    return this.params;
  }

  getStakerInfo(account: Address): StakerInfo | undefined {
    return this.stakers.get(account);
  }

  /**
   * The account's tier, or undefined when it has nothing staked.
   */
  tierOf(account: Address): number | undefined {
    const info = this.stakers.get(account);
    return info !== undefined && info.stakedAmount > 0n ? info.tierIndex : undefined;
  }

  /**
   * Settled plus not-yet-settled rewards at `now`. Read-only.
   */
  pendingRewards(account: Address, now: UnixSeconds): bigint {
    const info = this.stakers.get(account);
    if (info === undefined) {
      return 0n;
    }
    assertTimestamp(now);
    return this.settled(info, now).accumulatedRewards;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Mutations
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Replace some or all staking parameters.
   * Positions are not settled first: unsettled time accrues at the new rate.
   */
  setParams(update: Partial<StakingParams>): StakingParams {
    this.params = validateParams({ ...this.params, ...update });
    return this.params;
  }

  /**
   * Bring an existing position up to `now` without changing it otherwise.
   */
  settleAccount(account: Address, now: UnixSeconds): StakerInfo | undefined {
    const info = this.stakers.get(account);
    if (info === undefined) {
      return undefined;
    }
    assertTimestamp(now);
    const next = this.settled(info, now);
    this.stakers.set(account, next);
    return next;
  }

  stake(account: Address, amount: bigint, now: UnixSeconds): StakeResult {
    assertPositive(amount, "Stake amount");
    assertTimestamp(now);

    const existing = this.stakers.get(account);
    const current = existing === undefined ? undefined : this.settled(existing, now);
    const accumulatedRewards = current?.accumulatedRewards ?? 0n;
    const stakedAmount = (current?.stakedAmount ?? 0n) + amount;
    const tierIndex = this.tiers.tierFor(stakedAmount);

    // A fresh or emptied position starts its accrual window now; a top-up
    // keeps the window the settle above already advanced.
    const info: StakerInfo = {
      stakedAmount,
      lastStakeTimestamp: now,
      accumulatedRewards,
      lastClaimTimestamp:
        current === undefined || current.stakedAmount === 0n ? now : current.lastClaimTimestamp,
      tierIndex,
    };

    this.stakers.set(account, info);
    this.staked += amount;

    return { info, settled: accumulatedRewards - (existing?.accumulatedRewards ?? 0n) };
  }

  unstake(account: Address, amount: bigint, now: UnixSeconds): UnstakeResult {
    assertPositive(amount, "Unstake amount");
    assertTimestamp(now);

    const existing = this.stakers.get(account);
    const stakedAmount = existing?.stakedAmount ?? 0n;
    if (existing === undefined || amount > stakedAmount) {
      throw new StakingError(
        "INSUFFICIENT_STAKE",
        `Account "${account}" has ${stakedAmount.toString()} staked, cannot unstake ${amount.toString()}`,
      );
    }

    const current = this.settled(existing, now);
    const matured = now >= current.lastStakeTimestamp + this.params.minStakingDuration;
    const fee = matured ? 0n : applyBps(amount, this.params.earlyUnstakeFeeBps);
    const remaining = current.stakedAmount - amount;

    const info: StakerInfo = {
      ...current,
      stakedAmount: remaining,
      tierIndex: remaining === 0n ? 0 : this.tiers.tierFor(remaining),
    };

    this.stakers.set(account, info);
    this.staked -= amount;
    this.retained += fee;

    return { info, amount, fee, transferOut: amount - fee };
  }

  /**
   * Settle, then pay out and zero all accumulated rewards.
   */
  claim(account: Address, now: UnixSeconds): bigint {
    assertTimestamp(now);

    const existing = this.stakers.get(account);
    const current = existing === undefined ? undefined : this.settled(existing, now);
    if (current === undefined || current.accumulatedRewards === 0n) {
      throw new StakingError("NOTHING_TO_CLAIM", `Account "${account}" has no rewards to claim`);
    }

    this.stakers.set(account, {
      ...current,
      accumulatedRewards: 0n,
      lastClaimTimestamp: now,
    });
    return current.accumulatedRewards;
  }

  // ─────────────────────────────────────────────────────────────────────
  // Internal state access (for TokenLedger)
  // ─────────────────────────────────────────────────────────────────────

  exportState(): StakingSnapshot {
    const stakers: StakerRecord[] = [...this.stakers].map(([address, info]) => ({ address, info }));
    return {
      version: 1,
      params: this.params,
      stakers,
      totalStaked: this.staked,
      retainedFees: this.retained,
    };
  }

  importState(snapshot: StakingSnapshot): void {
    this.stakers.clear();
    for (const { address, info } of snapshot.stakers) {
      this.stakers.set(address, info);
    }
    this.params = validateParams(snapshot.params);
    this.staked = snapshot.totalStaked;
    this.retained = snapshot.retainedFees;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private settled(info: StakerInfo, now: UnixSeconds): StakerInfo {
    if (info.stakedAmount === 0n) {
      return info;
    }
    const multiplier = this.tiers.getTier(info.tierIndex).rewardMultiplierBps;
    return settle(info, now, this.params.rewardRatePerSecondPerUnit, multiplier);
  }
}

function validateParams(params: StakingParams): StakingParams {
  if (typeof params.rewardRatePerSecondPerUnit !== "bigint" || params.rewardRatePerSecondPerUnit < 0n) {
    throw new StakingError("INVALID_PARAMS", "Reward rate must be a non-negative integer");
  }
  if (!isUnixSeconds(params.minStakingDuration)) {
    throw new StakingError(
      "INVALID_PARAMS",
      `Minimum staking duration must be a non-negative integer of seconds, got ${String(params.minStakingDuration)}`,
    );
  }
  if (!isBasisPoints(params.earlyUnstakeFeeBps)) {
    throw new StakingError(
      "INVALID_PARAMS",
      `Early unstake fee must be between 0 and 10000 bps, got ${String(params.earlyUnstakeFeeBps)}`,
    );
  }
  return Object.freeze({ ...params });
}

function assertPositive(amount: bigint, label: string): void {
  if (typeof amount !== "bigint" || amount <= 0n) {
    throw new StakingError("INVALID_AMOUNT", `${label} must be greater than zero, got ${String(amount)}`);
  }
}

function assertTimestamp(now: UnixSeconds): void {
  if (!isUnixSeconds(now)) {
    throw new StakingError("INVALID_TIMESTAMP", `Timestamp must be a non-negative integer of seconds, got ${String(now)}`);
  }
}
