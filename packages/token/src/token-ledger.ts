/**
 * TokenLedger: the transactional coordinator.
 *
 * Composes the balance book, fee splitter, tier table, reward
 * accumulator and vesting engine behind one set of entry points.
 *
 * Every mutating entry point runs inside execute():
 * 1. Reentrancy guard (a nested call fails with REENTRANT_CALL)
 * 2. Clock and caller validation
 * 3. Pause check, then role check
 * 4. Checkpoint, mutations, buffered events delivered to the sink
 * 5. On any error the checkpoint is restored and the error rethrown
 *
 * Rules:
 * - totalSupply === sum of balances, and never exceeds maxSupply
 * - staking pool balance >= totalStaked + retained early-unstake fees
 * - vesting escrow balance >= outstanding vesting grants
 * - Custodial accounts (staking pool, rewards pool, vesting escrow)
 *   never act as callers; value leaves them only through the
 *   staking and vesting paths
 */

import type { Logger } from "pino";
import type { FeeBreakdown, FeeSchedule } from "@tallystake/ledger";
import {
  BalanceBook,
  applyFee,
  assertPositiveAmount,
  createFeeSchedule,
  exemptBreakdown,
} from "@tallystake/ledger";
import type { StakerInfo, StakingParams, Tier, UnstakeResult } from "@tallystake/staking";
import { RewardAccumulator, TierTable } from "@tallystake/staking";
import type {
  Address,
  EventSource,
  TokenEvent,
  TokenEventPayloads,
  TokenEventType,
  UnixSeconds,
} from "@tallystake/types";
import { ZERO_ADDRESS, isAddress, isUnixSeconds } from "@tallystake/types";
import type { RevocationResult, VestingSchedule } from "@tallystake/vesting";
import { VestingEngine } from "@tallystake/vesting";
import { silentLogger } from "./logger.js";
import type {
  AccessControl,
  EventSink,
  GlobalState,
  InternalAccounts,
  PauseGate,
  Role,
  TokenLedgerSnapshot,
  TokenomicsConfig,
  TransferReceipt,
  VestingGrant,
} from "./types.js";
import { TokenError } from "./types.js";

// =============================================================================
// Options
// =============================================================================

export interface TokenLedgerOptions {
  readonly config: TokenomicsConfig;
  readonly accessControl: AccessControl;
  /** Defaults to never paused. */
  readonly pauseGate?: PauseGate;
  /** Defaults to discarding events. */
  readonly eventSink?: EventSink;
  /** Defaults to a silent logger. */
  readonly logger?: Logger;
}

// =============================================================================
// Internal types
// =============================================================================

/** An event before the transaction stamps its metadata. */
type PendingEvent = {
  readonly [K in TokenEventType]: {
    readonly type: K;
    readonly payload: TokenEventPayloads[K];
  };
}[TokenEventType];

type Emit = (event: PendingEvent) => void;

interface OperationContext {
  readonly operation: string;
  readonly actor: Address;
  readonly now: UnixSeconds;
  readonly role?: Role;
  /** Logged at info rather than debug. */
  readonly admin?: boolean;
}

const SOURCE_BY_TYPE: Readonly<Record<TokenEventType, EventSource>> = {
  Transfer: "ledger",
  FeeDistributed: "ledger",
  Minted: "ledger",
  Burned: "ledger",
  FeeScheduleUpdated: "ledger",
  FeeExemptionSet: "ledger",
  Staked: "staking",
  Unstaked: "staking",
  RewardsClaimed: "staking",
  RewardsFunded: "staking",
  TierAdded: "staking",
  TierUpdated: "staking",
  StakingParamsUpdated: "staking",
  VestingScheduleCreated: "vesting",
  TokensReleased: "vesting",
  VestingRevoked: "vesting",
};

const discardingSink: EventSink = {
  emit: () => undefined,
};

const neverPaused: PauseGate = {
  isPaused: () => false,
};

// =============================================================================
// TokenLedger
// =============================================================================

export class TokenLedger {
  private readonly book: BalanceBook;
  private readonly tiers: TierTable;
  private readonly accumulator: RewardAccumulator;
  private readonly vesting: VestingEngine;
  private feeSchedule: FeeSchedule;
  private readonly feeExempt = new Set<Address>();

  private readonly accounts: InternalAccounts;
  private readonly decimals: number;
  private readonly accessControl: AccessControl;
  private readonly pauseGate: PauseGate;
  private readonly eventSink: EventSink;
  private readonly logger: Logger;

  private busy = false;

  constructor(options: TokenLedgerOptions) {
    const { config } = options;
    assertInternalAccounts(config.accounts);

    this.accounts = Object.freeze({ ...config.accounts });
    this.decimals = config.decimals;
    this.book = new BalanceBook(config.maxSupply);
    this.tiers = new TierTable(config.tiers ?? []);
    this.accumulator = new RewardAccumulator(this.tiers, config.staking);
    this.vesting = new VestingEngine();
    this.feeSchedule = createFeeSchedule(config.feeSchedule);

    this.accessControl = options.accessControl;
    this.pauseGate = options.pauseGate ?? neverPaused;
    this.eventSink = options.eventSink ?? discardingSink;
    this.logger = (options.logger ?? silentLogger()).child({ component: "token-ledger" });
  }

  /**
   * Rebuild a ledger from a snapshot. The options must carry the same
   * max supply the snapshot was taken under.
   */
  static fromSnapshot(snapshot: TokenLedgerSnapshot, options: TokenLedgerOptions): TokenLedger {
    const ledger = new TokenLedger(options);
    ledger.restore(snapshot);
    return ledger;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Transfers and supply
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Move `amount` from the caller to `to`, deducting the transfer fee
   * unless either side is internal or flagged exempt.
   */
  transfer(caller: Address, to: Address, amount: bigint, now: UnixSeconds): TransferReceipt {
    return this.execute({ operation: "transfer", actor: caller, now }, (emit) => {
      this.assertExternalCaller(caller);
      this.assertRecipient(to);
      assertPositiveAmount(amount, "Transfer amount");

      const exempt = this.isExemptTransfer(caller, to);
      const breakdown = exempt ? exemptBreakdown(amount) : applyFee(amount, this.feeSchedule);

      this.book.burn(caller, breakdown.burnAmount);
      this.book.debit(caller, breakdown.gross - breakdown.burnAmount);
      this.book.credit(to, breakdown.net);
      this.book.credit(this.accounts.rewardsPool, breakdown.rewardsAmount);
      this.book.credit(this.accounts.devWallet, breakdown.devAmount);

      emit({ type: "Transfer", payload: { from: caller, to, amount: breakdown.net } });
      if (breakdown.fee > 0n) {
        emit({
          type: "FeeDistributed",
          payload: {
            from: caller,
            fee: breakdown.fee,
            burnAmount: breakdown.burnAmount,
            rewardsAmount: breakdown.rewardsAmount,
            devAmount: breakdown.devAmount,
            dust: breakdown.dust,
          },
        });
      }

      return { ...breakdown, from: caller, to, exempt };
    });
  }

  mint(caller: Address, to: Address, amount: bigint, now: UnixSeconds): void {
    this.execute({ operation: "mint", actor: caller, now, role: "MINTER" }, (emit) => {
      this.assertRecipient(to);
      assertPositiveAmount(amount, "Mint amount");
      this.book.mint(to, amount);
      emit({ type: "Minted", payload: { to, amount } });
    });
  }

  /** Destroy tokens the caller holds. */
  burn(caller: Address, amount: bigint, now: UnixSeconds): void {
    this.execute({ operation: "burn", actor: caller, now }, (emit) => {
      this.assertExternalCaller(caller);
      assertPositiveAmount(amount, "Burn amount");
      this.book.burn(caller, amount);
      emit({ type: "Burned", payload: { from: caller, amount } });
    });
  }

  /** Top up the rewards pool, fee-free. */
  fundRewards(caller: Address, amount: bigint, now: UnixSeconds): void {
    this.execute({ operation: "fundRewards", actor: caller, now }, (emit) => {
      this.assertExternalCaller(caller);
      assertPositiveAmount(amount, "Funding amount");
      this.book.move(caller, this.accounts.rewardsPool, amount);
      emit({ type: "RewardsFunded", payload: { from: caller, amount } });
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Staking
  // ───────────────────────────────────────────────────────────────────────

  stake(caller: Address, amount: bigint, now: UnixSeconds): StakerInfo {
    return this.execute({ operation: "stake", actor: caller, now }, (emit) => {
      this.assertExternalCaller(caller);
      const { info } = this.accumulator.stake(caller, amount, now);
      this.book.move(caller, this.accounts.stakingPool, amount);

      emit({
        type: "Staked",
        payload: { account: caller, amount, stakedAmount: info.stakedAmount, tierIndex: info.tierIndex },
      });
      return info;
    });
  }

  /**
   * Withdraw principal. Before the minimum staking duration a fee is
   * withheld and stays in the staking pool.
   */
  unstake(caller: Address, amount: bigint, now: UnixSeconds): UnstakeResult {
    return this.execute({ operation: "unstake", actor: caller, now }, (emit) => {
      this.assertExternalCaller(caller);
      const result = this.accumulator.unstake(caller, amount, now);
      this.book.move(this.accounts.stakingPool, caller, result.transferOut);

      emit({
        type: "Unstaked",
        payload: {
          account: caller,
          amount: result.amount,
          fee: result.fee,
          transferOut: result.transferOut,
          tierIndex: result.info.tierIndex,
        },
      });
      return result;
    });
  }

  /**
   * Pay out all accrued rewards from the rewards pool.
   * An underfunded pool fails with INSUFFICIENT_BALANCE and nothing changes.
   */
  claimRewards(caller: Address, now: UnixSeconds): bigint {
    return this.execute({ operation: "claimRewards", actor: caller, now }, (emit) => {
      this.assertExternalCaller(caller);
      const amount = this.accumulator.claim(caller, now);
      this.book.move(this.accounts.rewardsPool, caller, amount);
      emit({ type: "RewardsClaimed", payload: { account: caller, amount } });
      return amount;
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Vesting
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Grant a schedule funded from the caller's balance into escrow.
   */
  createVestingSchedule(caller: Address, grant: VestingGrant, now: UnixSeconds): VestingSchedule {
    return this.execute(
      { operation: "createVestingSchedule", actor: caller, now, role: "VESTING_MANAGER" },
      (emit) => {
        this.assertExternalCaller(caller);
        this.assertRecipient(grant.beneficiary);
        const schedule = this.vesting.create({ ...grant, issuer: caller });
        this.book.move(caller, this.accounts.vestingEscrow, schedule.totalAmount);

        emit({
          type: "VestingScheduleCreated",
          payload: {
            beneficiary: schedule.beneficiary,
            totalAmount: schedule.totalAmount,
            startTime: schedule.startTime,
            cliffDuration: schedule.cliffDuration,
            vestingDuration: schedule.vestingDuration,
          },
        });
        return schedule;
      },
    );
  }

  /** Release everything vested so far to the calling beneficiary. */
  releaseVested(caller: Address, now: UnixSeconds): bigint {
    return this.execute({ operation: "releaseVested", actor: caller, now }, (emit) => {
      this.assertExternalCaller(caller);
      const { amount } = this.vesting.release(caller, now);
      this.book.move(this.accounts.vestingEscrow, caller, amount);
      emit({ type: "TokensReleased", payload: { beneficiary: caller, amount } });
      return amount;
    });
  }

  /**
   * Close a revocable schedule: the vested part goes to the beneficiary,
   * the unvested remainder back to the issuer.
   */
  revokeVesting(caller: Address, beneficiary: Address, now: UnixSeconds): RevocationResult {
    return this.execute(
      { operation: "revokeVesting", actor: caller, now, role: "VESTING_MANAGER" },
      (emit) => {
        const result = this.vesting.revoke(beneficiary, now);
        this.book.move(this.accounts.vestingEscrow, beneficiary, result.released);
        this.book.move(this.accounts.vestingEscrow, result.schedule.issuer, result.returned);

        if (result.released > 0n) {
          emit({ type: "TokensReleased", payload: { beneficiary, amount: result.released } });
        }
        emit({
          type: "VestingRevoked",
          payload: { beneficiary, released: result.released, returned: result.returned },
        });
        return result;
      },
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Administration
  // ───────────────────────────────────────────────────────────────────────

  addTier(caller: Address, tier: Tier, now: UnixSeconds): number {
    return this.execute(
      { operation: "addTier", actor: caller, now, role: "TIER_MANAGER", admin: true },
      (emit) => {
        const index = this.tiers.addTier(tier);
        const added = this.tiers.getTier(index);
        emit({
          type: "TierAdded",
          payload: {
            index,
            name: added.name,
            minimumStake: added.minimumStake,
            rewardMultiplierBps: added.rewardMultiplierBps,
          },
        });
        return index;
      },
    );
  }

  /**
   * Edit a tier in place. Existing positions keep their tier index;
   * the new multiplier applies to their unsettled time.
   */
  updateTier(caller: Address, index: number, tier: Tier, now: UnixSeconds): Tier {
    return this.execute(
      { operation: "updateTier", actor: caller, now, role: "TIER_MANAGER", admin: true },
      (emit) => {
        const updated = this.tiers.updateTier(index, tier);
        emit({
          type: "TierUpdated",
          payload: {
            index,
            name: updated.name,
            minimumStake: updated.minimumStake,
            rewardMultiplierBps: updated.rewardMultiplierBps,
          },
        });
        return updated;
      },
    );
  }

  setStakingParams(caller: Address, update: Partial<StakingParams>, now: UnixSeconds): StakingParams {
    return this.execute(
      { operation: "setStakingParams", actor: caller, now, role: "REWARD_MANAGER", admin: true },
      (emit) => {
        const params = this.accumulator.setParams(update);
        emit({
          type: "StakingParamsUpdated",
          payload: {
            rewardRatePerSecondPerUnit: params.rewardRatePerSecondPerUnit,
            minStakingDuration: params.minStakingDuration,
            earlyUnstakeFeeBps: params.earlyUnstakeFeeBps,
          },
        });
        return params;
      },
    );
  }

  setFeeSchedule(caller: Address, schedule: FeeSchedule, now: UnixSeconds): FeeSchedule {
    return this.execute(
      { operation: "setFeeSchedule", actor: caller, now, role: "FEE_MANAGER", admin: true },
      (emit) => {
        this.feeSchedule = createFeeSchedule(schedule);
        emit({ type: "FeeScheduleUpdated", payload: { ...this.feeSchedule } });
        return this.feeSchedule;
      },
    );
  }

  setFeeExempt(caller: Address, account: Address, exempt: boolean, now: UnixSeconds): void {
    this.execute(
      { operation: "setFeeExempt", actor: caller, now, role: "FEE_MANAGER", admin: true },
      (emit) => {
        this.assertRecipient(account);
        if (exempt) {
          this.feeExempt.add(account);
        } else {
          this.feeExempt.delete(account);
        }
        emit({ type: "FeeExemptionSet", payload: { account, exempt } });
      },
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Views
  // ───────────────────────────────────────────────────────────────────────

  balanceOf(account: Address): bigint {
    return this.book.balanceOf(account);
  }

  get totalSupply(): bigint {
    return this.book.totalSupply;
  }

  get totalBurned(): bigint {
    return this.book.totalBurned;
  }

  get tokenDecimals(): number {
    return this.decimals;
  }

  get internalAccounts(): InternalAccounts {
    return this.accounts;
  }

  globalState(): GlobalState {
    const params = this.accumulator.getParams();
    return {
      totalSupply: this.book.totalSupply,
      totalBurned: this.book.totalBurned,
      totalStaked: this.accumulator.totalStaked,
      maxSupply: this.book.maxSupply,
      rewardRatePerSecondPerUnit: params.rewardRatePerSecondPerUnit,
      minStakingDuration: params.minStakingDuration,
      earlyUnstakeFeeBps: params.earlyUnstakeFeeBps,
      retainedUnstakeFees: this.accumulator.retainedFees,
      feeSchedule: this.feeSchedule,
    };
  }

  getStakerInfo(account: Address): StakerInfo | undefined {
    return this.accumulator.getStakerInfo(account);
  }

  pendingRewards(account: Address, now: UnixSeconds): bigint {
    return this.accumulator.pendingRewards(account, now);
  }

  /** Tier index of the account, or undefined when it has nothing staked. */
  tierOf(account: Address): number | undefined {
    return this.accumulator.tierOf(account);
  }

  getTier(index: number): Tier {
    return this.tiers.getTier(index);
  }

  listTiers(): readonly Tier[] {
    return this.tiers.list();
  }

  /** Whether the account's current tier grants `capability`. */
  hasCapability(account: Address, capability: string): boolean {
    const index = this.accumulator.tierOf(account);
    return index !== undefined && this.tiers.hasCapability(index, capability);
  }

  getVestingSchedule(beneficiary: Address): VestingSchedule | undefined {
    return this.vesting.getSchedule(beneficiary);
  }

  listVestingSchedules(): readonly VestingSchedule[] {
    return this.vesting.listSchedules();
  }

  releasable(beneficiary: Address, now: UnixSeconds): bigint {
    return this.vesting.releasable(beneficiary, now);
  }

  isFeeExempt(account: Address): boolean {
    return this.isInternal(account) || this.feeExempt.has(account);
  }

  /**
   * The fee breakdown a transfer would produce right now. Read-only.
   */
  previewTransfer(from: Address, to: Address, amount: bigint): FeeBreakdown & { readonly exempt: boolean } {
    const exempt = this.isExemptTransfer(from, to);
    const breakdown = exempt ? exemptBreakdown(amount) : applyFee(amount, this.feeSchedule);
    return { ...breakdown, exempt };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot
  // ───────────────────────────────────────────────────────────────────────

  snapshot(): TokenLedgerSnapshot {
    return {
      version: 1,
      balances: this.book.export(),
      tiers: this.tiers.exportTiers(),
      staking: this.accumulator.exportState(),
      vesting: this.vesting.exportSchedules(),
      feeSchedule: this.feeSchedule,
      feeExempt: [...this.feeExempt],
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private execute<T>(ctx: OperationContext, body: (emit: Emit) => T): T {
    if (this.busy) {
      throw new TokenError(
        "REENTRANT_CALL",
        `Cannot start "${ctx.operation}" while another operation is in progress`,
      );
    }
    this.busy = true;

    const checkpoint = this.snapshot();
    try {
      if (!isUnixSeconds(ctx.now)) {
        throw new TokenError(
          "INVALID_TIMESTAMP",
          `Timestamp must be a non-negative integer of seconds, got ${String(ctx.now)}`,
        );
      }
      if (!isAddress(ctx.actor) || ctx.actor === ZERO_ADDRESS) {
        throw new TokenError("INVALID_ADDRESS", `Invalid caller: "${String(ctx.actor)}"`);
      }
      if (this.pauseGate.isPaused()) {
        throw new TokenError("PAUSED", `Cannot ${ctx.operation} while the token is paused`);
      }
      if (ctx.role !== undefined && !this.accessControl.hasRole(ctx.actor, ctx.role)) {
        throw new TokenError(
          "UNAUTHORIZED",
          `"${ctx.actor}" lacks the ${ctx.role} role required to ${ctx.operation}`,
        );
      }

      const pending: PendingEvent[] = [];
      const result = body((event) => {
        pending.push(event);
      });

      const metadata = {
        timestamp: ctx.now,
        actor: ctx.actor,
      };
      for (const event of pending) {
        const stamped: TokenEvent = {
          ...event,
          metadata: { ...metadata, source: SOURCE_BY_TYPE[event.type] },
        };
        this.eventSink.emit(stamped);
      }

      const fields = { operation: ctx.operation, actor: ctx.actor, now: ctx.now, events: pending.length };
      if (ctx.admin === true) {
        this.logger.info(fields, "Admin change applied");
      } else {
        this.logger.debug(fields, "Operation committed");
      }
      return result;
    } catch (err) {
      this.restore(checkpoint);
      this.logger.warn(
        { operation: ctx.operation, actor: ctx.actor, now: ctx.now, code: errorCode(err) },
        "Operation rolled back",
      );
      throw err;
    } finally {
      this.busy = false;
    }
  }

  private restore(snapshot: TokenLedgerSnapshot): void {
    this.book.import(snapshot.balances);
    this.tiers.importTiers(snapshot.tiers);
    this.accumulator.importState(snapshot.staking);
    this.vesting.importSchedules(snapshot.vesting);
    this.feeSchedule = snapshot.feeSchedule;
    this.feeExempt.clear();
    for (const account of snapshot.feeExempt) {
      this.feeExempt.add(account);
    }
  }

  private isInternal(account: Address): boolean {
    return (
      account === ZERO_ADDRESS ||
      account === this.accounts.stakingPool ||
      account === this.accounts.rewardsPool ||
      account === this.accounts.vestingEscrow ||
      account === this.accounts.devWallet
    );
  }

  private isCustodial(account: Address): boolean {
    return (
      account === this.accounts.stakingPool ||
      account === this.accounts.rewardsPool ||
      account === this.accounts.vestingEscrow
    );
  }

  private isExemptTransfer(from: Address, to: Address): boolean {
    return this.isFeeExempt(from) || this.isFeeExempt(to);
  }

  private assertExternalCaller(caller: Address): void {
    if (this.isCustodial(caller)) {
      throw new TokenError("INVALID_ADDRESS", `Custodial account "${caller}" cannot initiate operations`);
    }
  }

  private assertRecipient(account: Address): void {
    if (!isAddress(account) || account === ZERO_ADDRESS) {
      throw new TokenError("INVALID_ADDRESS", `Invalid recipient: "${String(account)}"`);
    }
  }
}

function assertInternalAccounts(accounts: InternalAccounts): void {
  const list = [accounts.stakingPool, accounts.rewardsPool, accounts.vestingEscrow, accounts.devWallet];
  for (const account of list) {
    if (!isAddress(account) || account === ZERO_ADDRESS) {
      throw new TokenError("INVALID_ADDRESS", `Invalid internal account: "${String(account)}"`);
    }
  }
  if (new Set(list).size !== list.length) {
    throw new TokenError("INVALID_ADDRESS", "Internal accounts must be distinct");
  }
}

function errorCode(err: unknown): string {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return "UNKNOWN";
}
