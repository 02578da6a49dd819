/**
 * Fund Allocator
 *
 * Splits raised capital across the four completion streams:
 * - 30% instant creator payout
 * - 20% vested creator payout
 * - 5% platform fee
 * - 45% liquidity
 *
 * The split always sums to the raised amount; the integer-division remainder
 * goes to the liquidity stream.
 */

import {
  engineLogger as logger,
  BPS_DENOMINATOR,
  FUND_SPLIT_BPS,
  TOKEN_ALLOCATION_BPS,
  ValidationError,
} from "@curvefund/shared";
import type {
  FundSplit,
  FundSplitBps,
  TokenAllocationBps,
  TokenAllocationResult,
} from "./types.js";

const allocatorLogger = logger.child({ component: "fund-allocator" });

function sumBps(bps: Record<string, bigint>): bigint {
  return Object.values(bps).reduce((a, b) => a + b, 0n);
}

// ============================================
// FUND ALLOCATOR
// ============================================

export class FundAllocator {
  private readonly splitBps: FundSplitBps;
  private readonly tokenBps: TokenAllocationBps;

  constructor(
    splitBps: FundSplitBps = FUND_SPLIT_BPS,
    tokenBps: TokenAllocationBps = TOKEN_ALLOCATION_BPS
  ) {
    const splitSum = sumBps(splitBps);
    if (splitSum !== BPS_DENOMINATOR) {
      throw new ValidationError(`Fund split must sum to ${BPS_DENOMINATOR} bps, got ${splitSum}`);
    }

    const tokenSum = sumBps(tokenBps);
    if (tokenSum > BPS_DENOMINATOR) {
      throw new ValidationError(`Token allocations exceed total supply: ${tokenSum} bps`);
    }

    this.splitBps = { ...splitBps };
    this.tokenBps = { ...tokenBps };
  }

  /**
   * Split a raised amount into the four streams
   */
  split(raised: bigint): FundSplit {
    if (raised < 0n) {
      throw new ValidationError("Raised amount must not be negative", "raised");
    }

    const instant = (raised * this.splitBps.instant) / BPS_DENOMINATOR;
    const vested = (raised * this.splitBps.vested) / BPS_DENOMINATOR;
    const fee = (raised * this.splitBps.fee) / BPS_DENOMINATOR;
    const liquidity = raised - instant - vested - fee;

    allocatorLogger.debug({
      raised: raised.toString(),
      instant: instant.toString(),
      vested: vested.toString(),
      fee: fee.toString(),
      liquidity: liquidity.toString(),
    }, "Raised funds split");

    return { instant, vested, fee, liquidity };
  }

  /**
   * Fixed token allocations for a total supply
   */
  tokenAllocations(totalSupply: bigint): TokenAllocationResult {
    if (totalSupply <= 0n) {
      throw new ValidationError("Total supply must be positive", "totalSupply");
    }

    const allocations = {
      sale: (totalSupply * this.tokenBps.sale) / BPS_DENOMINATOR,
      creator: (totalSupply * this.tokenBps.creator) / BPS_DENOMINATOR,
      liquidity: (totalSupply * this.tokenBps.liquidity) / BPS_DENOMINATOR,
      platform: (totalSupply * this.tokenBps.platform) / BPS_DENOMINATOR,
    };

    const totalAllocated =
      allocations.sale + allocations.creator + allocations.liquidity + allocations.platform;

    if (totalAllocated > totalSupply) {
      throw new ValidationError(
        `Allocations ${totalAllocated} exceed total supply ${totalSupply}`,
        "totalSupply"
      );
    }

    return {
      allocations,
      totalAllocated,
      unallocated: totalSupply - totalAllocated,
    };
  }

  getSplitBps(): FundSplitBps {
    return { ...this.splitBps };
  }

  getTokenBps(): TokenAllocationBps {
    return { ...this.tokenBps };
  }
}

/**
 * Factory function
 */
export function createFundAllocator(
  splitBps?: FundSplitBps,
  tokenBps?: TokenAllocationBps
): FundAllocator {
  return new FundAllocator(splitBps, tokenBps);
}
