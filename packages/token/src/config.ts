/**
 * @tallystake/token: Configuration.
 *
 * Loads and validates tokenomics configuration from environment
 * variables using Zod. Amounts are given in whole tokens and scaled
 * by TOKEN_DECIMALS when converted.
 */

import { z } from "zod";
import { createFeeSchedule, parseAmount } from "@tallystake/ledger";
import type { Role, RoleGrant, TokenomicsConfig } from "./types.js";

// =============================================================================
// Schema
// =============================================================================

const wholeTokens = z.string().regex(/^\d+(\.\d+)?$/, "Expected an unsigned decimal amount");
const unsignedInteger = z.string().regex(/^\d+$/, "Expected an unsigned integer");

export const ConfigSchema = z
  .object({
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info"),
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("development"),

    // Supply
    TOKEN_DECIMALS: z.coerce.number().int().min(0).max(36).default(18),
    MAX_SUPPLY: wholeTokens.default("1000000000"),

    // Transfer fee
    TRANSFER_FEE_BPS: z.coerce.number().int().min(0).max(1000).default(200),
    FEE_BURN_RATIO: z.coerce.number().int().min(0).max(100).default(50),
    FEE_REWARDS_RATIO: z.coerce.number().int().min(0).max(100).default(25),
    FEE_DEV_RATIO: z.coerce.number().int().min(0).max(100).default(25),

    // Staking
    REWARD_RATE_PER_SECOND_PER_UNIT: unsignedInteger.default("1000000000"),
    MIN_STAKING_DURATION: z.coerce.number().int().min(0).default(604800),
    EARLY_UNSTAKE_FEE_BPS: z.coerce.number().int().min(0).max(10000).default(500),

    // Internal accounts
    STAKING_POOL_ADDRESS: z.string().min(1).default("staking-pool"),
    REWARDS_POOL_ADDRESS: z.string().min(1).default("rewards-pool"),
    VESTING_ESCROW_ADDRESS: z.string().min(1).default("vesting-escrow"),
    DEV_WALLET_ADDRESS: z.string().min(1).default("dev-wallet"),

    // Roles
    ROLE_GRANTS: z.string().default(""),
  })
  .refine(
    (c) => c.FEE_BURN_RATIO + c.FEE_REWARDS_RATIO + c.FEE_DEV_RATIO === 100,
    { message: "Fee ratios must sum to 100", path: ["FEE_BURN_RATIO"] },
  );

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Role Grant Parsing
// =============================================================================

const VALID_ROLES: ReadonlySet<string> = new Set<Role>([
  "MINTER",
  "FEE_MANAGER",
  "TIER_MANAGER",
  "REWARD_MANAGER",
  "VESTING_MANAGER",
]);

function isRole(value: string): value is Role {
  return VALID_ROLES.has(value);
}

/**
 * Parse the ROLE_GRANTS env var into structured records.
 *
 * Format: "ROLE1:account1,ROLE2:account2"
 */
export function parseRoleGrants(raw: string): readonly RoleGrant[] {
  if (raw.trim() === "") {
    return [];
  }

  const grants: RoleGrant[] = [];

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [role, account] = parts;
    if (parts.length !== 2 || role === undefined || account === undefined) {
      throw new Error(
        `Invalid ROLE_GRANTS entry: "${entry.trim()}". Expected format: ROLE:account`,
      );
    }
    if (!isRole(role)) {
      throw new Error(
        `Invalid role "${role}" in ROLE_GRANTS. Must be one of: ${[...VALID_ROLES].join(", ")}`,
      );
    }
    if (account === "") {
      throw new Error("Account cannot be empty in ROLE_GRANTS");
    }

    grants.push({ role, account });
  }

  return grants;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

/**
 * Convert validated env config into ledger construction parameters.
 */
export function toTokenomicsConfig(config: AppConfig): TokenomicsConfig {
  return {
    decimals: config.TOKEN_DECIMALS,
    maxSupply: parseAmount(config.MAX_SUPPLY, config.TOKEN_DECIMALS),
    feeSchedule: createFeeSchedule({
      feeBps: config.TRANSFER_FEE_BPS,
      burnRatio: config.FEE_BURN_RATIO,
      rewardsRatio: config.FEE_REWARDS_RATIO,
      devRatio: config.FEE_DEV_RATIO,
    }),
    staking: {
      rewardRatePerSecondPerUnit: BigInt(config.REWARD_RATE_PER_SECOND_PER_UNIT),
      minStakingDuration: config.MIN_STAKING_DURATION,
      earlyUnstakeFeeBps: config.EARLY_UNSTAKE_FEE_BPS,
    },
    accounts: {
      stakingPool: config.STAKING_POOL_ADDRESS,
      rewardsPool: config.REWARDS_POOL_ADDRESS,
      vestingEscrow: config.VESTING_ESCROW_ADDRESS,
      devWallet: config.DEV_WALLET_ADDRESS,
    },
  };
}
