/**
 * @tallystake/vesting domain types.
 *
 * A vesting schedule releases a fixed grant to one beneficiary:
 * nothing before the cliff, linearly from startTime, everything at
 * startTime + vestingDuration. Revocable schedules can be cut short
 * by the issuer.
 */

import type { Address, UnixSeconds } from "@tallystake/types";

// =============================================================================
// Error
// =============================================================================

export type VestingErrorCode =
  | "SCHEDULE_EXISTS"
  | "NO_SCHEDULE"
  | "ALREADY_REVOKED"
  | "NOT_REVOCABLE"
  | "NOTHING_RELEASABLE"
  | "INVALID_AMOUNT"
  | "INVALID_DURATION"
  | "INVALID_TIMESTAMP"
  | "INVALID_ADDRESS"
  | "CLOCK_REGRESSION";

export class VestingError extends Error {
  public readonly code: VestingErrorCode;
  constructor(code: VestingErrorCode, message: string) {
    super(message);
    this.name = "VestingError";
    this.code = code;
  }
}

// =============================================================================
// Schedules
// =============================================================================

/**
 * One grant. Only `amountReleased` and `revoked` change after creation.
 */
export interface VestingSchedule {
  readonly beneficiary: Address;
  /** Who funded the grant; receives the unvested remainder on revocation. */
  readonly issuer: Address;
  readonly totalAmount: bigint;
  readonly amountReleased: bigint;
  readonly startTime: UnixSeconds;
  readonly cliffDuration: number;
  readonly vestingDuration: number;
  readonly revocable: boolean;
  readonly revoked: boolean;
}

export interface CreateScheduleParams {
  readonly beneficiary: Address;
  readonly issuer: Address;
  readonly totalAmount: bigint;
  readonly startTime: UnixSeconds;
  readonly cliffDuration: number;
  readonly vestingDuration: number;
  readonly revocable: boolean;
}

export interface ReleaseResult {
  readonly schedule: VestingSchedule;
  readonly amount: bigint;
}

export interface RevocationResult {
  readonly schedule: VestingSchedule;
  /** Vested amount paid to the beneficiary during revocation. */
  readonly released: bigint;
  /** Unvested remainder returned to the issuer. */
  readonly returned: bigint;
}
