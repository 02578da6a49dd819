/**
 * Engine Configuration
 */

import { z } from "zod";
import { getAddress } from "viem";
import {
  addressSchema,
  envSchema,
  CAMPAIGN_DEFAULTS,
  LIQUIDITY_FAILURE_POLICIES,
  REWARD_POOL_DEFAULTS,
} from "@curvefund/shared";

// Development accounts used when the environment names none
export const DEFAULT_ADDRESSES = {
  ledger: getAddress("0x00000000000000000000000000000000000c0f01"),
  platformTreasury: getAddress("0x00000000000000000000000000000000000c0f02"),
  admin: getAddress("0x00000000000000000000000000000000000c0f03"),
  vestingCustodian: getAddress("0x00000000000000000000000000000000000c0f04"),
  rewardCustodian: getAddress("0x00000000000000000000000000000000000c0f05"),
} as const;

// ============================================
// ENGINE CONFIG SCHEMA
// ============================================

const engineConfigSchema = z
  .object({
    // Accounts
    ledgerAddress: addressSchema,
    platformTreasury: addressSchema,
    admin: addressSchema,
    vestingCustodian: addressSchema,
    rewardCustodian: addressSchema,

    // Campaign bounds
    minTargetFunding: z.bigint().positive(),
    maxTargetFunding: z.bigint().positive(),
    minTotalSupply: z.bigint().positive(),
    maxTotalSupply: z.bigint().positive(),
    minDurationMs: z.number().int().positive(),
    maxDurationMs: z.number().int().positive(),

    // Sponsorship and vesting
    sponsorshipFee: z.bigint().nonnegative(),
    pointsBank: z.bigint().nonnegative(),
    vestingDurationMs: z.number().int().positive(),

    // Liquidity
    liquidityFailurePolicy: z.enum([LIQUIDITY_FAILURE_POLICIES.REVERT, LIQUIDITY_FAILURE_POLICIES.DEFER]),
    liquidityRetries: z.number().int().min(0).max(10),
    liquidityRetryDelayMs: z.number().int().nonnegative(),

    // Reward pools
    harvestIntervalMs: z.number().int().nonnegative(),
    volumeEpochMs: z.number().int().positive(),
    volumePointsPerEpoch: z.bigint().positive(),
  })
  .refine((c) => c.minTargetFunding <= c.maxTargetFunding, {
    message: "minTargetFunding must not exceed maxTargetFunding",
    path: ["minTargetFunding"],
  })
  .refine((c) => c.minTotalSupply <= c.maxTotalSupply, {
    message: "minTotalSupply must not exceed maxTotalSupply",
    path: ["minTotalSupply"],
  })
  .refine((c) => c.minDurationMs <= c.maxDurationMs, {
    message: "minDurationMs must not exceed maxDurationMs",
    path: ["minDurationMs"],
  });

export type EngineConfig = z.infer<typeof engineConfigSchema>;

// ============================================
// LOAD CONFIGURATION
// ============================================

export function loadEngineConfig(
  source: NodeJS.ProcessEnv = process.env,
  overrides: Partial<EngineConfig> = {}
): EngineConfig {
  const env = envSchema.parse(source);

  const config: EngineConfig = {
    // Accounts
    ledgerAddress: env.LEDGER_ADDRESS ?? DEFAULT_ADDRESSES.ledger,
    platformTreasury: env.PLATFORM_TREASURY_ADDRESS ?? DEFAULT_ADDRESSES.platformTreasury,
    admin: env.ADMIN_ADDRESS ?? DEFAULT_ADDRESSES.admin,
    vestingCustodian: DEFAULT_ADDRESSES.vestingCustodian,
    rewardCustodian: DEFAULT_ADDRESSES.rewardCustodian,

    // Campaign bounds
    minTargetFunding: env.MIN_TARGET_FUNDING ?? CAMPAIGN_DEFAULTS.minTargetFunding,
    maxTargetFunding: env.MAX_TARGET_FUNDING ?? CAMPAIGN_DEFAULTS.maxTargetFunding,
    minTotalSupply: env.MIN_TOTAL_SUPPLY ?? CAMPAIGN_DEFAULTS.minTotalSupply,
    maxTotalSupply: env.MAX_TOTAL_SUPPLY ?? CAMPAIGN_DEFAULTS.maxTotalSupply,
    minDurationMs: env.MIN_CAMPAIGN_DURATION_MS ?? CAMPAIGN_DEFAULTS.minDurationMs,
    maxDurationMs: env.MAX_CAMPAIGN_DURATION_MS ?? CAMPAIGN_DEFAULTS.maxDurationMs,

    // Sponsorship and vesting
    sponsorshipFee: env.SPONSORSHIP_FEE ?? CAMPAIGN_DEFAULTS.sponsorshipFee,
    pointsBank: env.POINTS_BANK ?? CAMPAIGN_DEFAULTS.pointsBank,
    vestingDurationMs: env.VESTING_DURATION_MS ?? CAMPAIGN_DEFAULTS.vestingDurationMs,

    // Liquidity
    liquidityFailurePolicy: env.LIQUIDITY_FAILURE_POLICY,
    liquidityRetries: env.LIQUIDITY_RETRIES,
    liquidityRetryDelayMs: env.LIQUIDITY_RETRY_DELAY_MS,

    // Reward pools
    harvestIntervalMs: env.HARVEST_INTERVAL_MS ?? REWARD_POOL_DEFAULTS.harvestIntervalMs,
    volumeEpochMs: REWARD_POOL_DEFAULTS.volumeEpochMs,
    volumePointsPerEpoch: REWARD_POOL_DEFAULTS.volumePointsPerEpoch,

    ...overrides,
  };

  const parsed = engineConfigSchema.parse(config);
  return {
    ...parsed,
    ledgerAddress: getAddress(parsed.ledgerAddress),
    platformTreasury: getAddress(parsed.platformTreasury),
    admin: getAddress(parsed.admin),
    vestingCustodian: getAddress(parsed.vestingCustodian),
    rewardCustodian: getAddress(parsed.rewardCustodian),
  };
}
