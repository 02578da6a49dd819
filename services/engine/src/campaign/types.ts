/**
 * Campaign Types
 */

import type { Address } from "viem";
import type { CampaignStatus, LiquidityFailurePolicy } from "@curvefund/shared";
import type { FundSplit } from "../allocation/types.js";

// ============================================
// CAMPAIGN
// ============================================

export type LiquidityStatus = "none" | "provisioned" | "pending";

export interface Campaign {
  id: number;
  creator: Address;
  token: Address;

  name: string;
  symbol: string;
  description: string;

  // Funding (settlement base units)
  targetFunding: bigint;
  amountRaised: bigint;

  // Supply (token base units)
  totalSupply: bigint;
  tokensForSale: bigint;
  tokensSold: bigint;
  creatorAllocation: bigint;
  liquidityAllocation: bigint;
  platformAllocation: bigint;

  // Accepted and stored, never read by pricing
  reserveRatio: number;

  deadline: number;
  createdAt: number;
  completedAt: number | null;

  // Exactly one of active, fundingComplete, cancelled holds
  active: boolean;
  fundingComplete: boolean;
  cancelled: boolean;

  sponsored: boolean;
  pointsBank: bigint;
  initialPointsBank: bigint;

  liquidityPool: Address | null;
  liquidityStatus: LiquidityStatus;
  // Settlement amount escrowed for the pool until provisioned
  liquidityReserve: bigint;
  vestingId: number | null;
}

export interface CampaignProgress {
  id: number;
  status: CampaignStatus;
  amountRaised: bigint;
  targetFunding: bigint;
  tokensSold: bigint;
  tokensForSale: bigint;
  fundingBps: bigint; // raised / target in basis points, capped at 10000
  remainingTokens: bigint;
  currentPrice: bigint;
  timeRemainingMs: number;
}

// ============================================
// RECEIPTS
// ============================================

export interface PurchaseReceipt {
  campaignId: number;
  buyer: Address;
  tokensOut: bigint;
  amountUsed: bigint;
  refund: bigint;
  price: bigint;
  points: bigint;
  completed: boolean;
}

export interface SponsorshipReceipt {
  campaignId: number;
  fee: bigint;
  pointsBank: bigint;
  vaultShares: bigint;
}

export interface PointsSweep {
  residual: bigint;
  credits: Array<{ investor: Address; points: bigint }>;
}

export interface CompletionSummary {
  campaignId: number;
  amountRaised: bigint;
  split: FundSplit;
  vestingId: number | null;
  pointsSweep: PointsSweep | null;
  liquidityPool: Address | null;
  liquidityStatus: LiquidityStatus;
  triggeredBy: Address;
}

export interface LiquidityResult {
  campaignId: number;
  pool: Address;
  settlementAmount: bigint;
  tokenAmount: bigint;
}

// ============================================
// CONFIGURATION
// ============================================

export interface LedgerConfig {
  ledgerAddress: Address;
  platformTreasury: Address;
  admin: Address;

  minTargetFunding: bigint;
  maxTargetFunding: bigint;
  minTotalSupply: bigint;
  maxTotalSupply: bigint;
  minDurationMs: number;
  maxDurationMs: number;

  sponsorshipFee: bigint;
  pointsBank: bigint;
  vestingDurationMs: number;

  liquidityFailurePolicy: LiquidityFailurePolicy;
  liquidityRetries: number;
  liquidityRetryDelayMs: number;
}

// ============================================
// EVENTS
// ============================================

export interface CampaignLedgerEvents {
  "campaign:created": (campaign: Campaign) => void;
  "campaign:sponsored": (receipt: SponsorshipReceipt) => void;
  "campaign:purchase": (receipt: PurchaseReceipt) => void;
  "campaign:completed": (summary: CompletionSummary) => void;
  "campaign:cancelled": (campaignId: number, caller: Address) => void;
  "liquidity:provisioned": (result: LiquidityResult) => void;
  "liquidity:deferred": (campaignId: number, reason: string) => void;
}
