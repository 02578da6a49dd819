/**
 * CurveFund Constants
 * Fixed-point scales, allocation splits and campaign bounds
 */

// ============================================
// TIME
// ============================================
export const ONE_DAY_MS = 24 * 60 * 60 * 1000;

// ============================================
// UNITS
// ============================================
export const SETTLEMENT_DECIMALS = 6; // USDC
export const TOKEN_DECIMALS = 18;

export const BPS_DENOMINATOR = 10_000n;

// ============================================
// FIXED-POINT SCALES
// ============================================
export const PRICE_SCALE = 10n ** 18n;
export const ACC_SCALE = 10n ** 18n;

// ============================================
// FUND SPLIT (basis points of amount raised)
// ============================================
export const FUND_SPLIT_BPS = {
  instant: 3_000n,   // paid to the creator at completion
  vested: 2_000n,    // linear vesting, principal parked in the yield vault
  fee: 500n,         // platform fee, deposited to the yield vault
  liquidity: 4_500n, // paired with tokens in the liquidity pool
} as const;

export type FundStream = keyof typeof FUND_SPLIT_BPS;

// ============================================
// TOKEN ALLOCATION (basis points of total supply)
// ============================================
export const TOKEN_ALLOCATION_BPS = {
  sale: 5_000n,
  creator: 2_000n,
  liquidity: 2_500n,
  platform: 500n,
} as const;

export type TokenAllocationKind = keyof typeof TOKEN_ALLOCATION_BPS;

// ============================================
// CAMPAIGN DEFAULTS
// ============================================
export const CAMPAIGN_DEFAULTS = {
  minTargetFunding: 1_000n * 10n ** 6n,          // 1,000 USDC
  maxTargetFunding: 10_000_000n * 10n ** 6n,     // 10,000,000 USDC
  minTotalSupply: 100_000n * 10n ** 18n,
  maxTotalSupply: 1_000_000_000_000n * 10n ** 18n,
  minDurationMs: ONE_DAY_MS,
  maxDurationMs: 90 * ONE_DAY_MS,
  sponsorshipFee: 500n * 10n ** 6n,              // 500 USDC
  pointsBank: 10_000n * 10n ** 18n,              // 10,000 points
  vestingDurationMs: 90 * ONE_DAY_MS,
} as const;

// ============================================
// REWARD POOL DEFAULTS
// ============================================
export const REWARD_POOL_DEFAULTS = {
  harvestIntervalMs: ONE_DAY_MS,
  volumeEpochMs: 7 * ONE_DAY_MS,
  volumePointsPerEpoch: 1_000n * 10n ** 18n,
} as const;

// ============================================
// LIQUIDITY FAILURE POLICY
// ============================================
export const LIQUIDITY_FAILURE_POLICIES = {
  REVERT: "revert",
  DEFER: "defer",
} as const;

export type LiquidityFailurePolicy =
  (typeof LIQUIDITY_FAILURE_POLICIES)[keyof typeof LIQUIDITY_FAILURE_POLICIES];

// ============================================
// CAMPAIGN STATUS
// ============================================
export const CAMPAIGN_STATUS = {
  ACTIVE: "active",
  FUNDING_COMPLETE: "funding_complete",
  CANCELLED: "cancelled",
} as const;

export type CampaignStatus = (typeof CAMPAIGN_STATUS)[keyof typeof CAMPAIGN_STATUS];
