/**
 * CurveFund Zod Schemas
 * Validation schemas for environment and campaign input
 */

import { z } from "zod";
import { isAddress, type Address } from "viem";
import { LIQUIDITY_FAILURE_POLICIES } from "../constants/index.js";

// ============================================
// PRIMITIVE SCHEMAS
// ============================================

// Ethereum address validation
export const addressSchema = z.custom<Address>(
  (value) => typeof value === "string" && isAddress(value, { strict: false }),
  "Invalid Ethereum address"
);

// BigInt string (for JSON serialization)
export const bigIntSchema = z.union([
  z.bigint(),
  z.string().regex(/^-?\d+$/, "Expected an integer string").transform((val) => BigInt(val)),
  z.number().int().transform((val) => BigInt(val)),
]);

// Non-negative base-unit amount
export const amountSchema = bigIntSchema.refine((val) => val >= 0n, "Amount must not be negative");

// ============================================
// ENVIRONMENT SCHEMAS
// ============================================

const optionalBigInt = z
  .string()
  .regex(/^\d+$/, "Expected a base-unit integer")
  .transform((val) => BigInt(val))
  .optional();

const optionalNumber = z.string().transform(Number).pipe(z.number().int().nonnegative()).optional();

export const envSchema = z.object({
  // Addresses
  LEDGER_ADDRESS: addressSchema.optional(),
  PLATFORM_TREASURY_ADDRESS: addressSchema.optional(),
  ADMIN_ADDRESS: addressSchema.optional(),

  // Campaign bounds (base units)
  MIN_TARGET_FUNDING: optionalBigInt,
  MAX_TARGET_FUNDING: optionalBigInt,
  MIN_TOTAL_SUPPLY: optionalBigInt,
  MAX_TOTAL_SUPPLY: optionalBigInt,
  MIN_CAMPAIGN_DURATION_MS: optionalNumber,
  MAX_CAMPAIGN_DURATION_MS: optionalNumber,

  // Sponsorship and vesting
  SPONSORSHIP_FEE: optionalBigInt,
  POINTS_BANK: optionalBigInt,
  VESTING_DURATION_MS: optionalNumber,

  // Liquidity
  LIQUIDITY_FAILURE_POLICY: z
    .enum([LIQUIDITY_FAILURE_POLICIES.REVERT, LIQUIDITY_FAILURE_POLICIES.DEFER])
    .default(LIQUIDITY_FAILURE_POLICIES.REVERT),
  LIQUIDITY_RETRIES: z.string().transform(Number).pipe(z.number().int().min(0).max(10)).default("2"),
  LIQUIDITY_RETRY_DELAY_MS: z.string().transform(Number).pipe(z.number().int().nonnegative()).default("250"),

  // Reward pools
  HARVEST_INTERVAL_MS: optionalNumber,

  // Logging
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  LOG_FORMAT: z.enum(["json", "pretty"]).default("json"),

  // Node
  NODE_ENV: z.enum(["development", "production", "test"]).default("production"),
});

export type EnvConfig = z.infer<typeof envSchema>;

// ============================================
// CAMPAIGN SCHEMAS
// ============================================

export const campaignParamsSchema = z.object({
  name: z.string().trim().min(1).max(64),
  symbol: z.string().min(1).max(11).regex(/^[A-Z0-9]+$/, "Symbol must be uppercase alphanumeric"),
  description: z.string().max(5000).default(""),
  targetFunding: amountSchema,
  totalSupply: amountSchema,
  // Legacy field, accepted and stored but never read by pricing
  reserveRatio: z.number().int().min(0).max(1_000_000).default(0),
  deadline: z.number().int().positive(),
});

export type CampaignParamsInput = z.input<typeof campaignParamsSchema>;
export type CampaignParams = z.infer<typeof campaignParamsSchema>;
