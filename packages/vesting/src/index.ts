/**
 * @tallystake/vesting: Cliff + linear vesting schedules.
 */

export { VestingEngine, vestedAmount, releasableAmount } from "./vesting.js";

export type {
  VestingSchedule,
  CreateScheduleParams,
  ReleaseResult,
  RevocationResult,
  VestingErrorCode,
} from "./types.js";

export { VestingError } from "./types.js";
