/**
 * Shared test fixtures for @tallystake/token.
 */

import { pino } from "pino";
import type { Logger } from "pino";
import { createFeeSchedule } from "@tallystake/ledger";
import type { Tier } from "@tallystake/staking";
import { InMemoryAccessControl, SwitchPauseGate } from "../src/collaborators.js";
import { InMemoryEventSink } from "../src/event-sink.js";
import { TokenLedger } from "../src/token-ledger.js";
import type { TokenLedgerOptions } from "../src/token-ledger.js";
import type { TokenomicsConfig } from "../src/types.js";

export const DAY = 86_400;
export const T0 = 1_000;

export const TIERS: readonly Tier[] = [
  { name: "Bronze", minimumStake: 100n, rewardMultiplierBps: 10_000, capabilities: [] },
  { name: "Silver", minimumStake: 500n, rewardMultiplierBps: 12_500, capabilities: ["governance"] },
  {
    name: "Gold",
    minimumStake: 1_000n,
    rewardMultiplierBps: 15_000,
    capabilities: ["governance", "priority-access"],
  },
];

export const TEST_CONFIG: TokenomicsConfig = {
  decimals: 18,
  maxSupply: 1_000_000_000n,
  feeSchedule: createFeeSchedule({ feeBps: 200, burnRatio: 50, rewardsRatio: 25, devRatio: 25 }),
  staking: {
    rewardRatePerSecondPerUnit: 10n ** 15n,
    minStakingDuration: 7 * DAY,
    earlyUnstakeFeeBps: 500,
  },
  accounts: {
    stakingPool: "staking-pool",
    rewardsPool: "rewards-pool",
    vestingEscrow: "vesting-escrow",
    devWallet: "dev-wallet",
  },
  tiers: TIERS,
};

export interface TestHarness {
  readonly ledger: TokenLedger;
  readonly sink: InMemoryEventSink;
  readonly gate: SwitchPauseGate;
  readonly access: InMemoryAccessControl;
  readonly options: TokenLedgerOptions;
  readonly logLines: string[];
}

/**
 * A ledger with "treasury" as minter and vesting manager and "admin"
 * holding the fee, tier and reward roles. Logs are captured as JSON lines.
 */
export function createHarness(config: TokenomicsConfig = TEST_CONFIG): TestHarness {
  const sink = new InMemoryEventSink();
  const gate = new SwitchPauseGate();
  const access = new InMemoryAccessControl([
    { role: "MINTER", account: "treasury" },
    { role: "VESTING_MANAGER", account: "treasury" },
    { role: "FEE_MANAGER", account: "admin" },
    { role: "TIER_MANAGER", account: "admin" },
    { role: "REWARD_MANAGER", account: "admin" },
  ]);
  const logLines: string[] = [];
  const logger: Logger = pino(
    { level: "debug" },
    {
      write(line: string) {
        logLines.push(line);
      },
    },
  );
  const options: TokenLedgerOptions = { config, accessControl: access, pauseGate: gate, eventSink: sink, logger };
  return { ledger: new TokenLedger(options), sink, gate, access, options, logLines };
}

export function parseLogLines(lines: readonly string[]): Record<string, unknown>[] {
  return lines.map((line) => {
    const parsed: unknown = JSON.parse(line);
    return typeof parsed === "object" && parsed !== null ? { ...parsed } : {};
  });
}
