/**
 * Invariant Checker
 *
 * Conservation and state checks for campaigns, reward accumulators and
 * vesting entries:
 * - tokensSold <= tokensForSale
 * - amountRaised == sum of investments
 * - exactly one of active, fundingComplete, cancelled
 * - pointsBank <= initialPointsBank
 * - accumulator: deposited == outstanding + claimed + undistributed + dust, 0 <= dust <= maxDust
 * - vesting: released <= totalAmount
 */

import type { Address } from "viem";
import { engineLogger as logger } from "@curvefund/shared";
import type { Campaign } from "../campaign/types.js";
import type { CampaignLedger } from "../campaign/campaign-ledger.js";
import type { AccumulatorAccounting } from "../rewards/types.js";
import type { VestingEntry } from "../vesting/types.js";
import {
  InvariantViolationError,
  type InvariantCheckResult,
  type InvariantCheckType,
  type InvariantStatistics,
} from "./types.js";

const invariantLogger = logger.child({ component: "invariant-checker" });

// ============================================
// INVARIANT CHECKER
// ============================================

export class InvariantChecker {
  // Check history
  private readonly checkHistory: InvariantCheckResult[] = [];
  private readonly maxHistorySize: number;

  // Statistics
  private totalChecks = 0;
  private passedChecks = 0;

  constructor(maxHistorySize = 1000) {
    this.maxHistorySize = maxHistorySize;
  }

  /**
   * Campaign state and funding conservation
   */
  checkCampaign(
    campaign: Campaign,
    investments: Array<{ investor: Address; contributed: bigint }>,
    checkType: InvariantCheckType = "periodic",
    operationId?: string
  ): InvariantCheckResult {
    const violations: string[] = [];

    if (campaign.tokensSold > campaign.tokensForSale) {
      violations.push(`tokensSold ${campaign.tokensSold} exceeds tokensForSale ${campaign.tokensForSale}`);
    }

    let invested = 0n;
    for (const { contributed } of investments) {
      invested += contributed;
    }
    if (invested !== campaign.amountRaised) {
      violations.push(`amountRaised ${campaign.amountRaised} differs from investments ${invested}`);
    }

    const states = [campaign.active, campaign.fundingComplete, campaign.cancelled].filter(Boolean).length;
    if (states !== 1) {
      violations.push(`expected exactly one lifecycle state, found ${states}`);
    }

    if (campaign.pointsBank > campaign.initialPointsBank) {
      violations.push(`pointsBank ${campaign.pointsBank} exceeds initial ${campaign.initialPointsBank}`);
    }

    const allocated =
      campaign.tokensForSale +
      campaign.creatorAllocation +
      campaign.liquidityAllocation +
      campaign.platformAllocation;
    if (allocated > campaign.totalSupply) {
      violations.push(`allocations ${allocated} exceed totalSupply ${campaign.totalSupply}`);
    }

    if ((campaign.liquidityStatus === "provisioned") !== (campaign.liquidityPool !== null)) {
      violations.push(`liquidityStatus ${campaign.liquidityStatus} inconsistent with pool reference`);
    }

    return this.record(`campaign:${campaign.id}`, violations, checkType, operationId);
  }

  /**
   * Accumulator conservation with a tolerated flooring dust
   */
  checkAccumulator(
    accounting: AccumulatorAccounting,
    maxDust: bigint,
    checkType: InvariantCheckType = "periodic",
    operationId?: string
  ): InvariantCheckResult {
    const violations: string[] = [];
    const { totalDeposited, totalClaimed, outstanding, undistributed, dust } = accounting;

    if (outstanding + totalClaimed + undistributed + dust !== totalDeposited) {
      violations.push(`deposited ${totalDeposited} does not balance`);
    }
    if (dust < 0n) {
      violations.push(`negative dust ${dust}: claimants owed more than deposited`);
    } else if (dust > maxDust) {
      violations.push(`dust ${dust} exceeds tolerance ${maxDust}`);
    }

    return this.record(`accumulator:${accounting.name}`, violations, checkType, operationId);
  }

  checkVesting(
    entry: VestingEntry,
    checkType: InvariantCheckType = "periodic",
    operationId?: string
  ): InvariantCheckResult {
    const violations: string[] = [];
    if (entry.released > entry.totalAmount) {
      violations.push(`released ${entry.released} exceeds total ${entry.totalAmount}`);
    }
    if (entry.released < 0n) {
      violations.push(`negative release ${entry.released}`);
    }
    return this.record(`vesting:${entry.id}`, violations, checkType, operationId);
  }

  /**
   * Check every campaign a ledger holds
   */
  checkLedger(ledger: CampaignLedger, operationId?: string): InvariantCheckResult[] {
    return ledger
      .listCampaigns()
      .map((campaign) =>
        this.checkCampaign(campaign, ledger.getInvestors(campaign.id), "periodic", operationId)
      );
  }

  /**
   * Throw if a check failed
   */
  enforce(result: InvariantCheckResult): void {
    if (!result.passed) {
      throw new InvariantViolationError(
        `Invariant violation on ${result.subject}: ${result.violations.join("; ")}`,
        result.subject,
        result.violations
      );
    }
  }

  getStatistics(): InvariantStatistics {
    const failedChecks = this.totalChecks - this.passedChecks;
    return {
      totalChecks: this.totalChecks,
      passedChecks: this.passedChecks,
      failedChecks,
      successRate: this.totalChecks > 0 ? this.passedChecks / this.totalChecks : 1,
      healthScore: Math.max(0, 100 - failedChecks * 10),
    };
  }

  getHistory(limit = 100): InvariantCheckResult[] {
    return this.checkHistory.slice(-limit);
  }

  getFailedChecks(limit = 50): InvariantCheckResult[] {
    return this.checkHistory.filter((c) => !c.passed).slice(-limit);
  }

  /**
   * Reset statistics (for testing)
   */
  resetStatistics(): void {
    this.totalChecks = 0;
    this.passedChecks = 0;
    this.checkHistory.length = 0;
  }

  // ============================================
  // PRIVATE METHODS
  // ============================================

  private record(
    subject: string,
    violations: string[],
    checkType: InvariantCheckType,
    operationId?: string
  ): InvariantCheckResult {
    this.totalChecks++;
    const passed = violations.length === 0;

    const result: InvariantCheckResult = {
      passed,
      subject,
      violations,
      checkType,
      operationId,
      timestamp: Date.now(),
    };

    if (passed) {
      this.passedChecks++;
      invariantLogger.debug({ subject, checkType, operationId }, "Invariant check passed");
    } else {
      invariantLogger.warn({ subject, checkType, operationId, violations }, "Invariant check FAILED");
    }

    this.checkHistory.push(result);
    if (this.checkHistory.length > this.maxHistorySize) {
      this.checkHistory.splice(0, this.checkHistory.length - this.maxHistorySize);
    }

    return result;
  }
}

/**
 * Factory function
 */
export function createInvariantChecker(maxHistorySize?: number): InvariantChecker {
  return new InvariantChecker(maxHistorySize);
}
