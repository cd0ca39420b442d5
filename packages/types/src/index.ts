/**
 * @tallystake/types: Shared domain types for the Tallystake stack.
 *
 * These types are used across all Tallystake packages:
 * - Address and timestamp conventions
 * - Token events emitted by the ledger, staking and vesting engines
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Types carry no semantics; meaning lives in consuming code
 */

// Primitives
export type { Address, UnixSeconds, EventSource } from "./primitives.js";
export { ZERO_ADDRESS } from "./primitives.js";

// Event types
export type {
  EventMetadata,
  TokenEvent,
  TokenEventOf,
  TokenEventPayloads,
  TokenEventType,
} from "./event.js";

// Runtime type guards
export {
  isAddress,
  isUnixSeconds,
  isBasisPoints,
  isNonNegativeAmount,
  isEventSource,
  isTokenEventType,
  isEventMetadata,
  isTokenEvent,
} from "./guards.js";
