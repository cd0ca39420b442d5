/**
 * @tallystake/token domain types.
 *
 * The token ledger composes the balance book, fee splitter, staking
 * accumulator and vesting engine behind one transactional surface.
 * Access control, pausing and event delivery are collaborators the
 * ledger consults but does not implement.
 */

import type { BalanceSnapshot, FeeBreakdown, FeeSchedule } from "@tallystake/ledger";
import type { StakingParams, StakingSnapshot, Tier } from "@tallystake/staking";
import type { Address, TokenEvent, UnixSeconds } from "@tallystake/types";
import type { VestingSchedule } from "@tallystake/vesting";

// =============================================================================
// Error
// =============================================================================

export type TokenErrorCode =
  | "PAUSED"
  | "UNAUTHORIZED"
  | "REENTRANT_CALL"
  | "INVALID_TIMESTAMP"
  | "INVALID_ADDRESS";

export class TokenError extends Error {
  public readonly code: TokenErrorCode;
  constructor(code: TokenErrorCode, message: string) {
    super(message);
    this.name = "TokenError";
    this.code = code;
  }
}

// =============================================================================
// Collaborators
// =============================================================================

export type Role =
  | "MINTER"
  | "FEE_MANAGER"
  | "TIER_MANAGER"
  | "REWARD_MANAGER"
  | "VESTING_MANAGER";

export interface RoleGrant {
  readonly role: Role;
  readonly account: Address;
}

/** Answers role membership. Role storage lives outside the ledger. */
export interface AccessControl {
  hasRole(caller: Address, role: Role): boolean;
}

export interface PauseGate {
  isPaused(): boolean;
}

/** Receives committed events, in order. */
export interface EventSink {
  emit(event: TokenEvent): void;
}

// =============================================================================
// Configuration
// =============================================================================

/** Contract-owned accounts. Users cannot transfer to or from them directly. */
export interface InternalAccounts {
  /** Holds staked principal and retained early-unstake fees. */
  readonly stakingPool: Address;
  /** Receives the rewards share of fees; pays claims. */
  readonly rewardsPool: Address;
  /** Holds granted, unreleased vesting amounts. */
  readonly vestingEscrow: Address;
  /** Receives the dev share of fees. */
  readonly devWallet: Address;
}

export interface TokenomicsConfig {
  readonly decimals: number;
  readonly maxSupply: bigint;
  readonly feeSchedule: FeeSchedule;
  readonly staking: StakingParams;
  readonly accounts: InternalAccounts;
  readonly tiers?: readonly Tier[];
}

// =============================================================================
// Results and views
// =============================================================================

export interface TransferReceipt extends FeeBreakdown {
  readonly from: Address;
  readonly to: Address;
  readonly exempt: boolean;
}

export interface GlobalState {
  readonly totalSupply: bigint;
  readonly totalBurned: bigint;
  readonly totalStaked: bigint;
  readonly maxSupply: bigint;
  readonly rewardRatePerSecondPerUnit: bigint;
  readonly minStakingDuration: number;
  readonly earlyUnstakeFeeBps: number;
  readonly retainedUnstakeFees: bigint;
  readonly feeSchedule: FeeSchedule;
}

export interface VestingGrant {
  readonly beneficiary: Address;
  readonly totalAmount: bigint;
  readonly startTime: UnixSeconds;
  readonly cliffDuration: number;
  readonly vestingDuration: number;
  readonly revocable: boolean;
}

// =============================================================================
// Snapshot
// =============================================================================

export interface TokenLedgerSnapshot {
  readonly version: 1;
  readonly balances: BalanceSnapshot;
  readonly tiers: readonly Tier[];
  readonly staking: StakingSnapshot;
  readonly vesting: readonly VestingSchedule[];
  readonly feeSchedule: FeeSchedule;
  readonly feeExempt: readonly Address[];
}
