/**
 * Vesting Engine: cliff + linear release.
 *
 *   startTime ──── cliff end ───────────── startTime + vestingDuration
 *   | nothing     | floor(total * t / duration) | everything
 *
 * The linear curve runs from startTime, so the first release after the
 * cliff already includes the cliff period's share.
 *
 * Rules:
 * - One schedule per beneficiary, never overwritten or topped up
 * - amountReleased never decreases and never exceeds totalAmount
 * - Revocation releases what is due, then closes the schedule; afterwards
 *   amountReleased === totalAmount
 */

import { mulDiv } from "@tallystake/ledger";
import type { Address, UnixSeconds } from "@tallystake/types";
import { isAddress, isUnixSeconds } from "@tallystake/types";
import type {
  CreateScheduleParams,
  ReleaseResult,
  RevocationResult,
  VestingSchedule,
} from "./types.js";
import { VestingError } from "./types.js";

// =============================================================================
// Pure calculation
// =============================================================================

/**
 * Amount vested at `now`, ignoring what has been released.
 */
export function vestedAmount(schedule: VestingSchedule, now: UnixSeconds): bigint {
  if (schedule.totalAmount === 0n) return 0n;
  if (now < schedule.startTime + schedule.cliffDuration) return 0n;
  if (now >= schedule.startTime + schedule.vestingDuration) return schedule.totalAmount;

  return mulDiv(schedule.totalAmount, BigInt(now - schedule.startTime), BigInt(schedule.vestingDuration));
}

/**
 * Amount the beneficiary could release at `now`.
 * Zero when `now` lies before a point at which more had already vested.
 */
export function releasableAmount(schedule: VestingSchedule, now: UnixSeconds): bigint {
  if (schedule.totalAmount === 0n || schedule.revoked) return 0n;
  const vested = vestedAmount(schedule, now);
  return vested > schedule.amountReleased ? vested - schedule.amountReleased : 0n;
}

// =============================================================================
// Engine
// =============================================================================

export class VestingEngine {
  private readonly schedules: Map<Address, VestingSchedule> = new Map();

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  getSchedule(beneficiary: Address): VestingSchedule | undefined {
    return this.schedules.get(beneficiary);
  }

  listSchedules(): readonly VestingSchedule[] {
    return [...this.schedules.values()];
  }

  releasable(beneficiary: Address, now: UnixSeconds): bigint {
    const schedule = this.schedules.get(beneficiary);
    return schedule === undefined ? 0n : releasableAmount(schedule, now);
  }

  /** Sum of granted but not yet released or returned amounts. */
  get outstanding(): bigint {
    let total = 0n;
    for (const s of this.schedules.values()) {
      total += s.totalAmount - s.amountReleased;
    }
    return total;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Mutations
  // ───────────────────────────────────────────────────────────────────────

  create(params: CreateScheduleParams): VestingSchedule {
    if (!isAddress(params.beneficiary) || !isAddress(params.issuer)) {
      throw new VestingError("INVALID_ADDRESS", "Beneficiary and issuer must be valid addresses");
    }
    if (this.schedules.has(params.beneficiary)) {
      throw new VestingError(
        "SCHEDULE_EXISTS",
        `A vesting schedule already exists for "${params.beneficiary}"`,
      );
    }
    if (typeof params.totalAmount !== "bigint" || params.totalAmount <= 0n) {
      throw new VestingError("INVALID_AMOUNT", `Vesting total must be greater than zero, got ${String(params.totalAmount)}`);
    }
    if (!isUnixSeconds(params.startTime)) {
      throw new VestingError("INVALID_TIMESTAMP", `Start time must be a non-negative integer, got ${String(params.startTime)}`);
    }
    if (!isUnixSeconds(params.vestingDuration) || params.vestingDuration === 0) {
      throw new VestingError(
        "INVALID_DURATION",
        `Vesting duration must be a positive integer of seconds, got ${String(params.vestingDuration)}`,
      );
    }
    if (!isUnixSeconds(params.cliffDuration) || params.cliffDuration > params.vestingDuration) {
      throw new VestingError(
        "INVALID_DURATION",
        `Cliff must be between 0 and the vesting duration (${String(params.vestingDuration)}s), got ${String(params.cliffDuration)}`,
      );
    }

    const schedule: VestingSchedule = {
      beneficiary: params.beneficiary,
      issuer: params.issuer,
      totalAmount: params.totalAmount,
      amountReleased: 0n,
      startTime: params.startTime,
      cliffDuration: params.cliffDuration,
      vestingDuration: params.vestingDuration,
      revocable: params.revocable,
      revoked: false,
    };

    this.schedules.set(schedule.beneficiary, schedule);
    return schedule;
  }

  release(beneficiary: Address, now: UnixSeconds): ReleaseResult {
    const schedule = this.require(beneficiary);
    assertTimestamp(now);
    assertNotBehind(schedule, now);

    const amount = releasableAmount(schedule, now);
    if (amount === 0n) {
      throw new VestingError("NOTHING_RELEASABLE", `Nothing is releasable for "${beneficiary}" at ${String(now)}`);
    }

    const next: VestingSchedule = { ...schedule, amountReleased: schedule.amountReleased + amount };
    this.schedules.set(beneficiary, next);
    return { schedule: next, amount };
  }

  revoke(beneficiary: Address, now: UnixSeconds): RevocationResult {
    const schedule = this.require(beneficiary);
    assertTimestamp(now);

    if (!schedule.revocable) {
      throw new VestingError("NOT_REVOCABLE", `Vesting schedule for "${beneficiary}" is not revocable`);
    }
    if (schedule.revoked) {
      throw new VestingError("ALREADY_REVOKED", `Vesting schedule for "${beneficiary}" is already revoked`);
    }
    assertNotBehind(schedule, now);

    const released = releasableAmount(schedule, now);
    const returned = schedule.totalAmount - schedule.amountReleased - released;

    const next: VestingSchedule = {
      ...schedule,
      amountReleased: schedule.totalAmount,
      revoked: true,
    };
    this.schedules.set(beneficiary, next);
    return { schedule: next, released, returned };
  }

  // ─────────────────────────────────────────────────────────────────────
  // Internal state access (for TokenLedger)
  // ─────────────────────────────────────────────────────────────────────

  exportSchedules(): readonly VestingSchedule[] {
    return this.listSchedules();
  }

  importSchedules(schedules: readonly VestingSchedule[]): void {
    this.schedules.clear();
    for (const s of schedules) {
      this.schedules.set(s.beneficiary, s);
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private require(beneficiary: Address): VestingSchedule {
    const schedule = this.schedules.get(beneficiary);
    if (schedule === undefined) {
      throw new VestingError("NO_SCHEDULE", `No vesting schedule for "${beneficiary}"`);
    }
    return schedule;
  }
}

function assertTimestamp(now: UnixSeconds): void {
  if (!isUnixSeconds(now)) {
    throw new VestingError("INVALID_TIMESTAMP", `Timestamp must be a non-negative integer, got ${String(now)}`);
  }
}

/** Rejects a `now` at which less has vested than was already released. */
function assertNotBehind(schedule: VestingSchedule, now: UnixSeconds): void {
  if (!schedule.revoked && vestedAmount(schedule, now) < schedule.amountReleased) {
    throw new VestingError(
      "CLOCK_REGRESSION",
      `Timestamp ${String(now)} precedes a release of ${String(schedule.amountReleased)} for "${schedule.beneficiary}"`,
    );
  }
}
