/**
 * Event Types
 *
 * Every committed state change is described by a TokenEvent.
 * Events carry the indexed subject address plus the numeric
 * fields of the operation that produced them.
 *
 * Rules:
 * - Events are immutable after creation
 * - Events are delivered only after the operation's mutations succeed
 * - Observers consume events; correctness never depends on them
 */

import type { Address, EventSource, UnixSeconds } from "./primitives.js";

/**
 * Metadata common to all token events.
 */
export interface EventMetadata {
  /** Caller-supplied clock at the start of the operation */
  readonly timestamp: UnixSeconds;

  /** Who invoked the operation */
  readonly actor: Address;

  /** Which subsystem emitted this event */
  readonly source: EventSource;
}

/**
 * Payload shapes keyed by event type.
 */
export interface TokenEventPayloads {
  readonly Transfer: { readonly from: Address; readonly to: Address; readonly amount: bigint };
  readonly FeeDistributed: {
    readonly from: Address;
    readonly fee: bigint;
    readonly burnAmount: bigint;
    readonly rewardsAmount: bigint;
    readonly devAmount: bigint;
    readonly dust: bigint;
  };
  readonly Minted: { readonly to: Address; readonly amount: bigint };
  readonly Burned: { readonly from: Address; readonly amount: bigint };
  readonly Staked: {
    readonly account: Address;
    readonly amount: bigint;
    readonly stakedAmount: bigint;
    readonly tierIndex: number;
  };
  readonly Unstaked: {
    readonly account: Address;
    readonly amount: bigint;
    readonly fee: bigint;
    readonly transferOut: bigint;
    readonly tierIndex: number;
  };
  readonly RewardsClaimed: { readonly account: Address; readonly amount: bigint };
  readonly RewardsFunded: { readonly from: Address; readonly amount: bigint };
  readonly TierAdded: {
    readonly index: number;
    readonly name: string;
    readonly minimumStake: bigint;
    readonly rewardMultiplierBps: number;
  };
  readonly TierUpdated: {
    readonly index: number;
    readonly name: string;
    readonly minimumStake: bigint;
    readonly rewardMultiplierBps: number;
  };
  readonly StakingParamsUpdated: {
    readonly rewardRatePerSecondPerUnit: bigint;
    readonly minStakingDuration: number;
    readonly earlyUnstakeFeeBps: number;
  };
  readonly FeeScheduleUpdated: {
    readonly feeBps: number;
    readonly burnRatio: number;
    readonly rewardsRatio: number;
    readonly devRatio: number;
  };
  readonly FeeExemptionSet: { readonly account: Address; readonly exempt: boolean };
  readonly VestingScheduleCreated: {
    readonly beneficiary: Address;
    readonly totalAmount: bigint;
    readonly startTime: UnixSeconds;
    readonly cliffDuration: number;
    readonly vestingDuration: number;
  };
  readonly TokensReleased: { readonly beneficiary: Address; readonly amount: bigint };
  readonly VestingRevoked: {
    readonly beneficiary: Address;
    readonly released: bigint;
    readonly returned: bigint;
  };
}

export type TokenEventType = keyof TokenEventPayloads;

/**
 * A token event, discriminated by `type`.
 */
export type TokenEvent = {
  readonly [K in TokenEventType]: {
    readonly type: K;
    readonly metadata: EventMetadata;
    readonly payload: TokenEventPayloads[K];
  };
}[TokenEventType];

/** Narrow a TokenEvent union member by its type tag. */
export type TokenEventOf<K extends TokenEventType> = Extract<TokenEvent, { readonly type: K }>;
