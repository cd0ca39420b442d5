/**
 * @tallystake/demo: Scenario walkthrough.
 *
 * Drives one TokenLedger through the token lifecycle:
 * mint -> transfer with fee -> fund rewards -> stake -> accrue -> claim ->
 * early unstake -> vesting grant -> release -> revoke -> summary
 *
 * Uses the real domain packages directly. The clock is simulated.
 */

import chalk from "chalk";
import { formatAmount, parseAmount } from "@tallystake/ledger";
import type { Tier } from "@tallystake/staking";
import {
  InMemoryAccessControl,
  InMemoryEventSink,
  SwitchPauseGate,
  TokenLedger,
  parseRoleGrants,
  silentLogger,
  toTokenomicsConfig,
} from "@tallystake/token";
import type { AppConfig, Logger } from "@tallystake/token";
import type { TokenEventType } from "@tallystake/types";

// =============================================================================
// Output
// =============================================================================

export type Print = (line: string) => void;

export interface WalkthroughOptions {
  readonly config: AppConfig;
  readonly print: Print;
  readonly logger?: Logger;
  /** Pause between steps, in milliseconds. */
  readonly delayMs?: number;
}

export interface WalkthroughSummary {
  readonly events: number;
  /** Emitted events per type; types never emitted are absent. */
  readonly eventCounts: Readonly<Partial<Record<TokenEventType, number>>>;
  readonly totalSupply: bigint;
  readonly totalBurned: bigint;
  readonly totalStaked: bigint;
  readonly claimed: bigint;
  readonly unstakeFee: bigint;
  readonly released: bigint;
  readonly returned: bigint;
}

const TOTAL_STEPS = 10;
const DAY = 86_400;
const START = 1_700_000_000;
const DEFAULT_GRANTS = "MINTER:treasury,VESTING_MANAGER:treasury,FEE_MANAGER:admin,TIER_MANAGER:admin,REWARD_MANAGER:admin";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function createPrinter(print: Print, decimals: number) {
  return {
    banner(): void {
      print("");
      print(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
      print(chalk.cyan.bold("  ║") + chalk.white.bold("                    TALLYSTAKE DEMO                       ") + chalk.cyan.bold("║"));
      print(chalk.cyan.bold("  ║") + chalk.gray("         Fees, tiered staking and vesting                 ") + chalk.cyan.bold("║"));
      print(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
      print("");
    },
    stepHeader(step: number, title: string): void {
      const prefix = chalk.cyan.bold(`  Step ${String(step)}/${String(TOTAL_STEPS)}`);
      const line = chalk.gray("─".repeat(Math.max(0, 50 - title.length)));
      print(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
    },
    ok(msg: string): void {
      print(chalk.green("    ✓ ") + chalk.white(msg));
    },
    info(label: string, value: string): void {
      print(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.white(value));
    },
    tokens(units: bigint): string {
      const text = formatAmount(units, decimals);
      return text.includes(".") ? text.replace(/\.?0+$/, "") : text;
    },
  };
}

// =============================================================================
// Walkthrough
// =============================================================================

export async function runWalkthrough(options: WalkthroughOptions): Promise<WalkthroughSummary> {
  const delay = options.delayMs ?? 0;
  const tokenomics = toTokenomicsConfig(options.config);
  const { decimals } = tokenomics;
  const units = (amount: string): bigint => parseAmount(amount, decimals);
  const out = createPrinter(options.print, decimals);

  out.banner();
  options.print(chalk.gray("  Walk-through of one token's lifecycle on a simulated clock."));
  options.print(chalk.gray("  Every step uses the real domain packages.\n"));

  await sleep(delay);

  // ─── Step 1: Boot ───────────────────────────────────────────────────

  out.stepHeader(1, "Boot");

  const tiers: Tier[] = [
    { name: "Bronze", minimumStake: units("100"), rewardMultiplierBps: 10_000, capabilities: [] },
    { name: "Silver", minimumStake: units("1000"), rewardMultiplierBps: 12_500, capabilities: ["governance"] },
    {
      name: "Gold",
      minimumStake: units("10000"),
      rewardMultiplierBps: 15_000,
      capabilities: ["governance", "priority-access"],
    },
  ];
  const grants = parseRoleGrants(options.config.ROLE_GRANTS === "" ? DEFAULT_GRANTS : options.config.ROLE_GRANTS);
  const sink = new InMemoryEventSink();
  const ledger = new TokenLedger({
    config: { ...tokenomics, tiers },
    accessControl: new InMemoryAccessControl(grants),
    pauseGate: new SwitchPauseGate(),
    eventSink: sink,
    logger: options.logger ?? silentLogger(),
  });

  const fee = tokenomics.feeSchedule;
  out.ok(`TokenLedger initialized (max supply ${out.tokens(tokenomics.maxSupply)})`);
  out.info("transfer fee", `${String(fee.feeBps)} bps (${String(fee.burnRatio)}/${String(fee.rewardsRatio)}/${String(fee.devRatio)} burn/rewards/dev)`);
  out.info("tiers", tiers.map((t) => `${t.name} ≥ ${out.tokens(t.minimumStake)}`).join(", "));
  out.info("roles", `${String(grants.length)} grants`);

  await sleep(delay);

  // ─── Step 2: Mint ───────────────────────────────────────────────────

  out.stepHeader(2, "Mint");

  ledger.mint("treasury", "alice", units("100000"), START);
  ledger.mint("treasury", "treasury", units("50000"), START);
  out.ok("Minted 100000 to alice and 50000 to the treasury reserve");
  out.info("total supply", out.tokens(ledger.totalSupply));

  await sleep(delay);

  // ─── Step 3: Transfer ───────────────────────────────────────────────

  out.stepHeader(3, "Transfer With Fee");

  const receipt = ledger.transfer("alice", "bob", units("10000"), START);
  out.ok(`alice -> bob: ${out.tokens(receipt.gross)} sent, ${out.tokens(receipt.net)} received`);
  out.info("fee", out.tokens(receipt.fee));
  out.info("burned", out.tokens(receipt.burnAmount));
  out.info("rewards pool", out.tokens(receipt.rewardsAmount));
  out.info("dev wallet", out.tokens(receipt.devAmount));

  await sleep(delay);

  // ─── Step 4: Fund Rewards ───────────────────────────────────────────

  out.stepHeader(4, "Fund Rewards Pool");

  ledger.fundRewards("treasury", units("1000"), START);
  out.ok(`Rewards pool holds ${out.tokens(ledger.balanceOf(ledger.internalAccounts.rewardsPool))}`);

  await sleep(delay);

  // ─── Step 5: Stake ──────────────────────────────────────────────────

  out.stepHeader(5, "Stake");

  const staked = ledger.stake("bob", units("5000"), START);
  out.ok(`bob staked ${out.tokens(staked.stakedAmount)} (tier ${ledger.getTier(staked.tierIndex).name})`);
  out.info("governance", ledger.hasCapability("bob", "governance") ? "granted" : "not granted");

  await sleep(delay);

  // ─── Step 6: Accrue & Claim ─────────────────────────────────────────

  out.stepHeader(6, "Accrue 30 Days & Claim");

  const day30 = START + 30 * DAY;
  out.info("pending", out.tokens(ledger.pendingRewards("bob", day30)));
  const claimed = ledger.claimRewards("bob", day30);
  out.ok(`bob claimed ${out.tokens(claimed)} from the rewards pool`);

  await sleep(delay);

  // ─── Step 7: Early Unstake ──────────────────────────────────────────

  out.stepHeader(7, "Early Unstake");

  ledger.stake("alice", units("2000"), day30);
  const exit = ledger.unstake("alice", units("2000"), day30 + DAY);
  out.ok(`alice left after 1 day: ${out.tokens(exit.transferOut)} returned`);
  out.info("early fee", `${out.tokens(exit.fee)} kept by the staking pool`);

  await sleep(delay);

  // ─── Step 8: Vesting Grant ──────────────────────────────────────────

  out.stepHeader(8, "Vesting Grant");

  ledger.createVestingSchedule(
    "treasury",
    {
      beneficiary: "carol",
      totalAmount: units("12000"),
      startTime: START,
      cliffDuration: 90 * DAY,
      vestingDuration: 360 * DAY,
      revocable: true,
    },
    START,
  );
  out.ok("carol granted 12000 over 360 days with a 90-day cliff");
  out.info("escrow", out.tokens(ledger.balanceOf(ledger.internalAccounts.vestingEscrow)));

  await sleep(delay);

  // ─── Step 9: Release & Revoke ───────────────────────────────────────

  out.stepHeader(9, "Release & Revoke");

  const released = ledger.releaseVested("carol", START + 180 * DAY);
  out.ok(`Day 180: carol released ${out.tokens(released)}`);
  const revocation = ledger.revokeVesting("treasury", "carol", START + 270 * DAY);
  out.ok(`Day 270: revoked, ${out.tokens(revocation.released)} to carol, ${out.tokens(revocation.returned)} back to treasury`);

  await sleep(delay);

  // ─── Step 10: Summary ───────────────────────────────────────────────

  out.stepHeader(10, "Summary");

  const state = ledger.globalState();
  const eventCounts: Partial<Record<TokenEventType, number>> = {};
  for (const event of sink.events()) {
    eventCounts[event.type] = (eventCounts[event.type] ?? 0) + 1;
  }
  const summary: WalkthroughSummary = {
    events: sink.count,
    eventCounts,
    totalSupply: state.totalSupply,
    totalBurned: state.totalBurned,
    totalStaked: state.totalStaked,
    claimed,
    unstakeFee: exit.fee,
    released: released + revocation.released,
    returned: revocation.returned,
  };

  options.print("");
  options.print(chalk.white("    Events emitted:      ") + chalk.cyan.bold(String(summary.events)));
  options.print(chalk.white("    Total supply:        ") + chalk.cyan.bold(out.tokens(summary.totalSupply)));
  options.print(chalk.white("    Total burned:        ") + chalk.cyan.bold(out.tokens(summary.totalBurned)));
  options.print(chalk.white("    Total staked:        ") + chalk.cyan.bold(out.tokens(summary.totalStaked)));
  options.print(chalk.white("    Vested to carol:     ") + chalk.cyan.bold(out.tokens(summary.released)));
  options.print("");

  return summary;
}
