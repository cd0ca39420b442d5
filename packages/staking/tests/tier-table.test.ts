/**
 * Tests for TierTable: ordered stake thresholds.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { TierTable } from "../src/tier-table.js";
import { StakingError } from "../src/types.js";
import type { StakingErrorCode, Tier } from "../src/types.js";

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

function tier(name: string, minimumStake: bigint, rewardMultiplierBps = 10_000, capabilities: string[] = []): Tier {
  return { name, minimumStake, rewardMultiplierBps, capabilities };
}

describe("TierTable", () => {
  let table: TierTable;

  beforeEach(() => {
    table = new TierTable([
      tier("bronze", 100n),
      tier("silver", 500n, 12_500, ["early-access"]),
      tier("gold", 1_000n, 15_000, ["early-access", "governance"]),
    ]);
  });

  // ─── Resolution ────────────────────────────────────────────────────

  describe("tierFor", () => {
    it("resolves exact thresholds", () => {
      expect(table.tierFor(100n)).toBe(0);
      expect(table.tierFor(500n)).toBe(1);
      expect(table.tierFor(1_000n)).toBe(2);
    });

    it("resolves amounts between thresholds to the lower tier", () => {
      expect(table.tierFor(499n)).toBe(0);
      expect(table.tierFor(999n)).toBe(1);
      expect(table.tierFor(1_000_000n)).toBe(2);
    });

    it("treats tier 0's minimum as a floor", () => {
      expect(table.tierFor(1n)).toBe(0);
    });

    it("throws when no tiers exist", () => {
      expectStakingError(() => new TierTable().tierFor(100n), "NO_TIERS");
    });

    it("rejects negative amounts", () => {
      expectStakingError(() => table.tierFor(-1n), "INVALID_AMOUNT");
    });
  });

  // ─── Adding ────────────────────────────────────────────────────────

  describe("addTier", () => {
    it("appends above the highest tier", () => {
      expect(table.addTier(tier("platinum", 5_000n, 20_000))).toBe(3);
      expect(table.count).toBe(4);
      expect(table.tierFor(5_000n)).toBe(3);
    });

    it("rejects a minimum equal to the highest", () => {
      expectStakingError(() => table.addTier(tier("copy", 1_000n)), "TIER_ORDERING_VIOLATION");
    });

    it("rejects a minimum below the highest", () => {
      expectStakingError(() => table.addTier(tier("low", 900n)), "TIER_ORDERING_VIOLATION");
      expect(table.count).toBe(3);
    });

    it("rejects an empty name", () => {
      expectStakingError(() => table.addTier(tier("  ", 2_000n)), "INVALID_TIER");
    });

    it("rejects a multiplier below 1.0x", () => {
      expectStakingError(() => table.addTier(tier("weak", 2_000n, 9_999)), "INVALID_TIER");
    });

    it("rejects a negative minimum", () => {
      expectStakingError(() => new TierTable().addTier(tier("neg", -1n)), "INVALID_TIER");
    });

    it("allows a zero minimum for the first tier", () => {
      const fresh = new TierTable();
      expect(fresh.addTier(tier("base", 0n))).toBe(0);
    });
  });

  // ─── Updating ──────────────────────────────────────────────────────

  describe("updateTier", () => {
    it("updates a middle tier within its neighbours", () => {
      const updated = table.updateTier(1, tier("silver", 700n, 13_000));
      expect(updated.minimumStake).toBe(700n);
      expect(table.tierFor(600n)).toBe(0);
    });

    it("rejects a minimum equal to the tier below", () => {
      expectStakingError(() => table.updateTier(1, tier("silver", 100n)), "TIER_ORDERING_VIOLATION");
    });

    it("rejects a minimum equal to the tier above", () => {
      expectStakingError(() => table.updateTier(1, tier("silver", 1_000n)), "TIER_ORDERING_VIOLATION");
    });

    it("leaves the first tier open below", () => {
      expect(table.updateTier(0, tier("bronze", 0n)).minimumStake).toBe(0n);
      expectStakingError(() => table.updateTier(0, tier("bronze", 500n)), "TIER_ORDERING_VIOLATION");
    });

    it("leaves the last tier open above", () => {
      expect(table.updateTier(2, tier("gold", 50_000n, 15_000)).minimumStake).toBe(50_000n);
      expectStakingError(() => table.updateTier(2, tier("gold", 500n)), "TIER_ORDERING_VIOLATION");
    });

    it("rejects unknown indexes", () => {
      expectStakingError(() => table.updateTier(3, tier("ghost", 9_000n)), "UNKNOWN_TIER");
    });

    it("keeps the previous tier when validation fails", () => {
      expectStakingError(() => table.updateTier(1, tier("", 700n)), "INVALID_TIER");
      expect(table.getTier(1).name).toBe("silver");
    });
  });

  // ─── Capabilities ──────────────────────────────────────────────────

  describe("capabilities", () => {
    it("reports capabilities per tier", () => {
      expect(table.hasCapability(2, "governance")).toBe(true);
      expect(table.hasCapability(1, "governance")).toBe(false);
      expect(table.hasCapability(0, "early-access")).toBe(false);
    });

    it("deduplicates capability flags", () => {
      table.addTier(tier("diamond", 10_000n, 20_000, ["vip", "vip", "governance"]));
      expect(table.getTier(3).capabilities).toEqual(["vip", "governance"]);
    });

    it("returns frozen tiers", () => {
      expect(Object.isFrozen(table.getTier(0))).toBe(true);
    });
  });

  // ─── Export / import ───────────────────────────────────────────────

  it("restores exported tiers", () => {
    const saved = table.exportTiers();
    table.addTier(tier("platinum", 5_000n));
    table.importTiers(saved);

    expect(table.count).toBe(3);
    expect(table.list().map((t) => t.name)).toEqual(["bronze", "silver", "gold"]);
  });
});
