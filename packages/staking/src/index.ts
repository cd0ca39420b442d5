/**
 * @tallystake/staking: Tiered staking with time-weighted rewards.
 */

// Core engines
export { TierTable, BASE_MULTIPLIER_BPS } from "./tier-table.js";
export { RewardAccumulator, computeReward, settle } from "./reward-accumulator.js";

// Types
export type {
  Tier,
  StakerInfo,
  StakingParams,
  StakeResult,
  UnstakeResult,
  StakerRecord,
  StakingSnapshot,
  StakingErrorCode,
} from "./types.js";

export { StakingError } from "./types.js";
