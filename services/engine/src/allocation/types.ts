/**
 * Fund Allocation Types
 *
 * - USDC split at completion (30% instant, 20% vested, 5% fee, 45% liquidity)
 * - Token allocations at creation (50% sale, 20% creator, 25% liquidity, 5% platform)
 */

import type { FundStream, TokenAllocationKind } from "@curvefund/shared";

// ============================================
// USDC SPLIT
// ============================================

export type FundSplit = Record<FundStream, bigint>;

export type FundSplitBps = Record<FundStream, bigint>;

// ============================================
// TOKEN ALLOCATIONS
// ============================================

export type TokenAllocations = Record<TokenAllocationKind, bigint>;

export type TokenAllocationBps = Record<TokenAllocationKind, bigint>;

export interface TokenAllocationResult {
  allocations: TokenAllocations;
  totalAllocated: bigint;
  unallocated: bigint; // Due to integer division, never minted
}
