/**
 * Primitive Types
 *
 * Identifiers and scalar conventions shared by every Tallystake package.
 *
 * Rules:
 * - Amounts are unsigned integers in base units, carried as bigint
 * - Timestamps are unix seconds, carried as safe-integer numbers
 * - Addresses are opaque keys; no checksum or format is implied
 */

/**
 * Opaque account identifier.
 * Compared by exact string equality.
 */
export type Address = string;

/** Unix timestamp in whole seconds. */
export type UnixSeconds = number;

/**
 * The zero address. Source of mints, sink of burns.
 * Never holds a balance.
 */
export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

/** Which subsystem emitted an event. */
export type EventSource = "ledger" | "staking" | "vesting";
