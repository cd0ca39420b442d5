/**
 * Tier Table: ordered stake thresholds.
 *
 * Resolves a staked amount to the highest tier whose minimum it meets.
 *
 * Rules:
 * - minimumStake is strictly increasing by index
 * - tier 0's minimum is a floor, not a gate: any amount below it still maps to tier 0
 * - multipliers are at least 1.0x (10000 bps)
 * - tiers can be added at the top or edited in place, never removed
 *
 * A zero stake has no tier membership; callers handle that case.
 */

import type { Tier } from "./types.js";
import { StakingError } from "./types.js";

/** 1.0x in basis points. */
export const BASE_MULTIPLIER_BPS = 10_000;

export class TierTable {
  private readonly tiers: Tier[] = [];

  constructor(initial: readonly Tier[] = []) {
    for (const tier of initial) {
      this.addTier(tier);
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  get count(): number {
    return this.tiers.length;
  }

  list(): readonly Tier[] {
    return [...this.tiers];
  }

  getTier(index: number): Tier {
    const tier = this.tiers[index];
    if (tier === undefined) {
      throw new StakingError("UNKNOWN_TIER", `Tier ${String(index)} does not exist`);
    }
    return tier;
  }

  /**
   * Index of the highest tier whose minimum is ≤ stakedAmount, or 0.
   */
  tierFor(stakedAmount: bigint): number {
    if (this.tiers.length === 0) {
      throw new StakingError("NO_TIERS", "No staking tiers are configured");
    }
    if (stakedAmount < 0n) {
      throw new StakingError("INVALID_AMOUNT", `Staked amount cannot be negative, got ${stakedAmount.toString()}`);
    }

    for (let i = this.tiers.length - 1; i > 0; i--) {
      const tier = this.tiers[i];
      if (tier !== undefined && tier.minimumStake <= stakedAmount) {
        return i;
      }
    }
    return 0;
  }

  hasCapability(index: number, capability: string): boolean {
    return this.getTier(index).capabilities.includes(capability);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Mutations
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Append a tier above the current highest. Returns its index.
   */
  addTier(input: Tier): number {
    const tier = normalizeTier(input);
    const highest = this.tiers[this.tiers.length - 1];

    if (highest !== undefined && tier.minimumStake <= highest.minimumStake) {
      throw new StakingError(
        "TIER_ORDERING_VIOLATION",
        `Tier '${tier.name}' minimum ${tier.minimumStake.toString()} must exceed the highest minimum ${highest.minimumStake.toString()}`,
      );
    }

    this.tiers.push(tier);
    return this.tiers.length - 1;
  }

  /**
   * Replace the tier at `index`, keeping the table strictly ordered.
   */
  updateTier(index: number, input: Tier): Tier {
    this.getTier(index);
    const tier = normalizeTier(input);
    const below = this.tiers[index - 1];
    const above = this.tiers[index + 1];

    if (below !== undefined && tier.minimumStake <= below.minimumStake) {
      throw new StakingError(
        "TIER_ORDERING_VIOLATION",
        `Tier ${String(index)} minimum ${tier.minimumStake.toString()} must exceed tier ${String(index - 1)} minimum ${below.minimumStake.toString()}`,
      );
    }
    if (above !== undefined && tier.minimumStake >= above.minimumStake) {
      throw new StakingError(
        "TIER_ORDERING_VIOLATION",
        `Tier ${String(index)} minimum ${tier.minimumStake.toString()} must stay below tier ${String(index + 1)} minimum ${above.minimumStake.toString()}`,
      );
    }

    this.tiers[index] = tier;
    return tier;
  }

  // ─────────────────────────────────────────────────────────────────────
  // Internal state access (for TokenLedger)
  // ─────────────────────────────────────────────────────────────────────

  exportTiers(): readonly Tier[] {
    return this.list();
  }

  importTiers(tiers: readonly Tier[]): void {
    this.tiers.length = 0;
    this.tiers.push(...tiers);
  }
}

function normalizeTier(tier: Tier): Tier {
  if (typeof tier.name !== "string" || tier.name.trim() === "") {
    throw new StakingError("INVALID_TIER", "Tier name cannot be empty");
  }
  if (!Number.isInteger(tier.rewardMultiplierBps) || tier.rewardMultiplierBps < BASE_MULTIPLIER_BPS) {
    throw new StakingError(
      "INVALID_TIER",
      `Tier '${tier.name}' multiplier must be an integer of at least ${String(BASE_MULTIPLIER_BPS)} bps, got ${String(tier.rewardMultiplierBps)}`,
    );
  }
  if (tier.minimumStake < 0n) {
    throw new StakingError("INVALID_TIER", `Tier '${tier.name}' minimum cannot be negative`);
  }

  return Object.freeze({
    name: tier.name,
    minimumStake: tier.minimumStake,
    rewardMultiplierBps: tier.rewardMultiplierBps,
    capabilities: Object.freeze([...new Set(tier.capabilities)]),
  });
}
