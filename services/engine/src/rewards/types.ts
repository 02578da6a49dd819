/**
 * Reward Types
 */

import type { Address } from "viem";

// ============================================
// ACCUMULATOR
// ============================================

export interface AccountPosition {
  account: string;
  weight: bigint;
  debt: bigint;
  pending: bigint;
  claimed: bigint;
}

/**
 * deposited = outstanding + claimed + undistributed + dust
 */
export interface AccumulatorAccounting {
  name: string;
  totalDeposited: bigint;
  totalClaimed: bigint;
  outstanding: bigint;
  undistributed: bigint;
  dust: bigint;
  totalWeight: bigint;
  accounts: number;
}

// ============================================
// POOLS
// ============================================

/**
 * Sends a claimed amount to its owner
 */
export type RewardPayout = (account: Address, amount: bigint) => Promise<void>;

export interface RewardClaim {
  pool: string;
  account: Address;
  amount: bigint;
}

export interface HarvestResult {
  profit: bigint;
  harvestedAt: number;
  distributed: boolean; // false when parked for lack of weight
}

export interface EpochResult {
  epoch: number;
  emitted: bigint;
  participants: number;
}

export interface PointsYieldPoolConfig {
  /** Custody account that receives harvested profit and pays claims */
  custodian: Address;
  /** Owner of the yield position profit is harvested from */
  treasury: Address;
  harvestIntervalMs: number;
}

export interface LpFeePoolConfig {
  /** Liquidity pool whose fees this instance distributes */
  pool: Address;
  custodian: Address;
}

export interface VolumePointsPoolConfig {
  epochMs: number;
  pointsPerEpoch: bigint;
}
