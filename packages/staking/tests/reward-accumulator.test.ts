/**
 * Tests for RewardAccumulator: time-weighted, tier-multiplied rewards.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { RewardAccumulator, computeReward, settle } from "../src/reward-accumulator.js";
import { TierTable } from "../src/tier-table.js";
import { StakingError } from "../src/types.js";
import type { StakerInfo, StakingErrorCode, StakingParams } from "../src/types.js";

function expectStakingError(fn: () => unknown, code: StakingErrorCode): void {
  try {
    fn();
  } catch (err) {
    expect(err).toBeInstanceOf(StakingError);
    expect((err as StakingError).code).toBe(code);
    return;
  }
  expect.fail(`Expected StakingError ${code}`);
}

const T0 = 1_700_000_000;
const DAY = 86_400;
const WEEK = 7 * DAY;

const PARAMS: StakingParams = {
  rewardRatePerSecondPerUnit: 10n ** 15n,
  minStakingDuration: WEEK,
  earlyUnstakeFeeBps: 500,
};

function makeTiers(): TierTable {
  return new TierTable([
    { name: "bronze", minimumStake: 100n, rewardMultiplierBps: 10_000, capabilities: [] },
    { name: "silver", minimumStake: 500n, rewardMultiplierBps: 12_500, capabilities: ["early-access"] },
    { name: "gold", minimumStake: 1_000n, rewardMultiplierBps: 15_000, capabilities: ["governance"] },
  ]);
}

describe("pure accrual", () => {
  it("computes 30 days of rewards at 1.0x", () => {
    expect(computeReward(100n, 10n ** 15n, 2_592_000, 10_000)).toBe(259_200n);
  });

  it("applies the tier multiplier after flooring the base", () => {
    // base = floor(3 * 1e15 * 1 / 1e18) = 0
    expect(computeReward(3n, 10n ** 15n, 1, 15_000)).toBe(0n);
    // base = 500, reward = floor(500 * 12500 / 10000) = 625
    expect(computeReward(500n, 10n ** 15n, 1_000, 12_500)).toBe(625n);
  });

  it("settle is a no-op for an empty position", () => {
    const info: StakerInfo = {
      stakedAmount: 0n,
      lastStakeTimestamp: T0,
      accumulatedRewards: 7n,
      lastClaimTimestamp: T0,
      tierIndex: 0,
    };
    expect(settle(info, T0 + DAY, 10n ** 15n, 10_000)).toBe(info);
  });

  it("settle rejects a clock that runs backwards", () => {
    const info: StakerInfo = {
      stakedAmount: 100n,
      lastStakeTimestamp: T0,
      accumulatedRewards: 0n,
      lastClaimTimestamp: T0,
      tierIndex: 0,
    };
    expectStakingError(() => settle(info, T0 - 1, 10n ** 15n, 10_000), "CLOCK_REGRESSION");
  });
});

describe("RewardAccumulator", () => {
  let tiers: TierTable;
  let acc: RewardAccumulator;

  beforeEach(() => {
    tiers = makeTiers();
    acc = new RewardAccumulator(tiers, PARAMS);
  });

  // ─── Staking ─────────────────────────────────────────────────────────

  describe("stake", () => {
    it("moves through tiers as the stake grows", () => {
      expect(acc.stake("alice", 100n, T0).info.tierIndex).toBe(0);
      expect(acc.stake("alice", 400n, T0).info.tierIndex).toBe(1);
      expect(acc.stake("alice", 500n, T0).info.tierIndex).toBe(2);
      expect(acc.totalStaked).toBe(1_000n);
    });

    it("opens the accrual window on first stake", () => {
      const { info, settled } = acc.stake("alice", 100n, T0);
      expect(info).toEqual({
        stakedAmount: 100n,
        lastStakeTimestamp: T0,
        accumulatedRewards: 0n,
        lastClaimTimestamp: T0,
        tierIndex: 0,
      });
      expect(settled).toBe(0n);
    });

    it("settles the old position before a top-up", () => {
      acc.stake("alice", 100n, T0);
      const { info, settled } = acc.stake("alice", 400n, T0 + 1_000);

      // 100 units for 1000s at 1.0x
      expect(settled).toBe(100n);
      expect(info.accumulatedRewards).toBe(100n);
      expect(info.lastClaimTimestamp).toBe(T0 + 1_000);
      expect(info.lastStakeTimestamp).toBe(T0 + 1_000);

      // 500 units for 1000s at 1.25x
      expect(acc.pendingRewards("alice", T0 + 2_000)).toBe(725n);
    });

    it("restarts the accrual window when re-staking an emptied position", () => {
      acc.stake("alice", 100n, T0);
      acc.unstake("alice", 100n, T0 + 10);
      acc.stake("alice", 100n, T0 + 1_000);

      expect(acc.getStakerInfo("alice")?.lastClaimTimestamp).toBe(T0 + 1_000);
      // 1 from the first 10s, 100 from the second stake
      expect(acc.pendingRewards("alice", T0 + 2_000)).toBe(101n);
    });

    it("rejects a zero stake", () => {
      expectStakingError(() => acc.stake("alice", 0n, T0), "INVALID_AMOUNT");
    });

    it("rejects a fractional timestamp", () => {
      expectStakingError(() => acc.stake("alice", 10n, T0 + 0.5), "INVALID_TIMESTAMP");
    });

    it("records nothing when no tiers exist", () => {
      const bare = new RewardAccumulator(new TierTable(), PARAMS);
      expectStakingError(() => bare.stake("alice", 100n, T0), "NO_TIERS");
      expect(bare.getStakerInfo("alice")).toBeUndefined();
      expect(bare.totalStaked).toBe(0n);
    });
  });

  // ─── Unstaking ───────────────────────────────────────────────────────

  describe("unstake", () => {
    beforeEach(() => {
      acc.stake("alice", 1_000n, T0);
    });

    it("charges the early fee before the minimum duration", () => {
      const result = acc.unstake("alice", 200n, T0 + WEEK - 1);

      expect(result.fee).toBe(10n);
      expect(result.transferOut).toBe(190n);
      expect(result.info.stakedAmount).toBe(800n);
      expect(result.info.tierIndex).toBe(1);
      expect(acc.retainedFees).toBe(10n);
    });

    it("charges nothing once the minimum duration has passed", () => {
      const result = acc.unstake("alice", 200n, T0 + WEEK);

      expect(result.fee).toBe(0n);
      expect(result.transferOut).toBe(200n);
    });

    it("settles at the old tier before reclassifying", () => {
      const { info } = acc.unstake("alice", 600n, T0 + 1_000);

      // 1000 units for 1000s at 1.5x
      expect(info.accumulatedRewards).toBe(1_500n);
      expect(info.tierIndex).toBe(0);
    });

    it("leaves no tier membership at zero stake", () => {
      acc.unstake("alice", 1_000n, T0 + WEEK);

      expect(acc.tierOf("alice")).toBeUndefined();
      expect(acc.getStakerInfo("alice")?.stakedAmount).toBe(0n);
      expect(acc.totalStaked).toBe(0n);
    });

    it("rejects unstaking more than the stake", () => {
      expectStakingError(() => acc.unstake("alice", 1_001n, T0 + 1), "INSUFFICIENT_STAKE");
      expect(acc.getStakerInfo("alice")?.stakedAmount).toBe(1_000n);
    });

    it("rejects unknown accounts", () => {
      expectStakingError(() => acc.unstake("bob", 1n, T0), "INSUFFICIENT_STAKE");
    });
  });

  // ─── Claiming ────────────────────────────────────────────────────────

  describe("claim", () => {
    it("pays 30 days of accrual and zeroes the balance", () => {
      acc.stake("alice", 100n, T0);
      const claimed = acc.claim("alice", T0 + 2_592_000);

      expect(claimed).toBe(259_200n);
      expect(acc.getStakerInfo("alice")?.accumulatedRewards).toBe(0n);
      expect(acc.getStakerInfo("alice")?.lastClaimTimestamp).toBe(T0 + 2_592_000);
    });

    it("rejects a second claim at the same timestamp", () => {
      acc.stake("alice", 100n, T0);
      acc.claim("alice", T0 + DAY);
      expectStakingError(() => acc.claim("alice", T0 + DAY), "NOTHING_TO_CLAIM");
    });

    it("pays rewards left over after a full unstake", () => {
      acc.stake("alice", 100n, T0);
      acc.unstake("alice", 100n, T0 + 1_000);

      expect(acc.claim("alice", T0 + 5_000)).toBe(100n);
    });

    it("rejects accounts that never staked", () => {
      expectStakingError(() => acc.claim("bob", T0), "NOTHING_TO_CLAIM");
    });

    it("rejects when the rate is zero", () => {
      acc.setParams({ rewardRatePerSecondPerUnit: 0n });
      acc.stake("alice", 100n, T0);
      expectStakingError(() => acc.claim("alice", T0 + DAY), "NOTHING_TO_CLAIM");
    });
  });

  // ─── Projection and settlement ───────────────────────────────────────

  describe("pendingRewards", () => {
    it("does not mutate the position", () => {
      acc.stake("alice", 100n, T0);
      const before = acc.getStakerInfo("alice");

      expect(acc.pendingRewards("alice", T0 + 1_000)).toBe(100n);
      expect(acc.getStakerInfo("alice")).toBe(before);
    });

    it("matches what settlement produces", () => {
      acc.stake("alice", 700n, T0);
      const projected = acc.pendingRewards("alice", T0 + 12_345);
      expect(acc.settleAccount("alice", T0 + 12_345)?.accumulatedRewards).toBe(projected);
    });

    it("returns zero for unknown accounts", () => {
      expect(acc.pendingRewards("bob", T0)).toBe(0n);
    });

    it("uses the current tier multiplier", () => {
      acc.stake("alice", 100n, T0);
      tiers.updateTier(0, { name: "bronze", minimumStake: 100n, rewardMultiplierBps: 20_000, capabilities: [] });
      expect(acc.pendingRewards("alice", T0 + 1_000)).toBe(200n);
    });

    it("applies a new rate to unsettled time", () => {
      acc.stake("alice", 100n, T0);
      acc.setParams({ rewardRatePerSecondPerUnit: 2n * 10n ** 15n });
      expect(acc.pendingRewards("alice", T0 + 1_000)).toBe(200n);
    });
  });

  describe("settleAccount", () => {
    it("is idempotent at the same timestamp", () => {
      acc.stake("alice", 100n, T0);
      const first = acc.settleAccount("alice", T0 + DAY);
      const second = acc.settleAccount("alice", T0 + DAY);

      expect(first?.accumulatedRewards).toBe(8_640n);
      expect(second).toEqual(first);
    });

    it("returns undefined for unknown accounts", () => {
      expect(acc.settleAccount("bob", T0)).toBeUndefined();
    });
  });

  // ─── Params ──────────────────────────────────────────────────────────

  describe("setParams", () => {
    it("merges partial updates", () => {
      const params = acc.setParams({ earlyUnstakeFeeBps: 250 });
      expect(params).toEqual({ ...PARAMS, earlyUnstakeFeeBps: 250 });
    });

    it("rejects an out-of-range fee", () => {
      expectStakingError(() => acc.setParams({ earlyUnstakeFeeBps: 10_001 }), "INVALID_PARAMS");
    });

    it("rejects a negative rate", () => {
      expectStakingError(() => acc.setParams({ rewardRatePerSecondPerUnit: -1n }), "INVALID_PARAMS");
    });

    it("rejects a negative duration", () => {
      expectStakingError(() => acc.setParams({ minStakingDuration: -1 }), "INVALID_PARAMS");
      expect(acc.getParams()).toEqual(PARAMS);
    });
  });

  // ─── Export / import ─────────────────────────────────────────────────

  it("restores exported state", () => {
    acc.stake("alice", 600n, T0);
    const saved = acc.exportState();

    acc.unstake("alice", 100n, T0 + 10);
    acc.stake("bob", 100n, T0 + 10);
    acc.importState(saved);

    expect(acc.getStakerInfo("alice")?.stakedAmount).toBe(600n);
    expect(acc.getStakerInfo("bob")).toBeUndefined();
    expect(acc.totalStaked).toBe(600n);
    expect(acc.retainedFees).toBe(0n);
  });
});
