/**
 * Runtime Type Guards
 *
 * Narrowing functions for Tallystake primitives.
 * These enable safe runtime validation at system boundaries
 * (configuration, restored snapshots, external callers).
 */

import type { Address, EventSource, UnixSeconds } from "./primitives.js";
import type { EventMetadata, TokenEvent, TokenEventType } from "./event.js";

// =============================================================================
// Scalar guards
// =============================================================================

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && value.trim().length > 0 && value.trim() === value;
}

export function isUnixSeconds(value: unknown): value is UnixSeconds {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

export function isBasisPoints(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= 10_000;
}

export function isNonNegativeAmount(value: unknown): value is bigint {
  return typeof value === "bigint" && value >= 0n;
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["ledger", "staking", "vesting"]);

const EVENT_TYPES = new Set<string>([
  "Transfer",
  "FeeDistributed",
  "Minted",
  "Burned",
  "Staked",
  "Unstaked",
  "RewardsClaimed",
  "RewardsFunded",
  "TierAdded",
  "TierUpdated",
  "StakingParamsUpdated",
  "FeeScheduleUpdated",
  "FeeExemptionSet",
  "VestingScheduleCreated",
  "TokensReleased",
  "VestingRevoked",
] satisfies TokenEventType[]);

export function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

export function isTokenEventType(value: unknown): value is TokenEventType {
  return typeof value === "string" && EVENT_TYPES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return isUnixSeconds(v.timestamp) && isAddress(v.actor) && isEventSource(v.source);
}

export function isTokenEvent(value: unknown): value is TokenEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isTokenEventType(v.type) &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}
