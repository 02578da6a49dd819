/**
 * Engine
 *
 * Wires the ledger, vesting schedule, reward pools and invariant checker
 * around one operation queue and one set of collaborators.
 */

import type { Address } from "viem";
import { engineLogger as logger, withTiming } from "@curvefund/shared";
import type { Collaborators } from "./collaborators/types.js";
import { CampaignLedger } from "./campaign/campaign-ledger.js";
import { FundAllocator } from "./allocation/fund-allocator.js";
import { VestingSchedule } from "./vesting/vesting-schedule.js";
import { LpFeePool, PointsYieldPool, VolumePointsPool } from "./rewards/reward-pool.js";
import { InvariantChecker } from "./invariants/invariant-checker.js";
import type { InvariantCheckResult } from "./invariants/types.js";
import { OperationQueue } from "./runtime/operation-queue.js";
import type { EngineConfig } from "./config.js";

const wiringLogger = logger.child({ component: "engine" });

export interface EnginePools {
  pointsYield: PointsYieldPool;
  volumePoints: VolumePointsPool;
  lpFees: Map<Address, LpFeePool>;
}

export interface Engine<C extends Collaborators = Collaborators> {
  config: EngineConfig;
  collaborators: C;
  queue: OperationQueue;
  ledger: CampaignLedger;
  vesting: VestingSchedule;
  pools: EnginePools;
  invariants: InvariantChecker;

  /**
   * Run every conservation check; `maxDust` bounds each accumulator's flooring loss
   */
  checkInvariants(maxDust?: bigint): InvariantCheckResult[];

  /**
   * Permissionless upkeep: harvest yield and close the volume epoch when due
   */
  runMaintenance(): Promise<void>;

  shutdown(): Promise<void>;
}

export function createEngine<C extends Collaborators>(
  collaborators: C,
  config: EngineConfig
): Engine<C> {
  const queue = new OperationQueue();
  const { asset, vault, points } = collaborators;

  const vesting = new VestingSchedule(
    { queue, asset, vault },
    { custodian: config.vestingCustodian, admin: config.admin }
  );

  const ledger = new CampaignLedger(
    { collaborators, queue, vesting, allocator: new FundAllocator() },
    {
      ledgerAddress: config.ledgerAddress,
      platformTreasury: config.platformTreasury,
      admin: config.admin,
      minTargetFunding: config.minTargetFunding,
      maxTargetFunding: config.maxTargetFunding,
      minTotalSupply: config.minTotalSupply,
      maxTotalSupply: config.maxTotalSupply,
      minDurationMs: config.minDurationMs,
      maxDurationMs: config.maxDurationMs,
      sponsorshipFee: config.sponsorshipFee,
      pointsBank: config.pointsBank,
      vestingDurationMs: config.vestingDurationMs,
      liquidityFailurePolicy: config.liquidityFailurePolicy,
      liquidityRetries: config.liquidityRetries,
      liquidityRetryDelayMs: config.liquidityRetryDelayMs,
    }
  );

  const pools: EnginePools = {
    pointsYield: new PointsYieldPool(
      { queue, asset, vault, points },
      {
        custodian: config.rewardCustodian,
        treasury: config.platformTreasury,
        harvestIntervalMs: config.harvestIntervalMs,
      }
    ),
    volumePoints: new VolumePointsPool(
      { queue, points },
      { epochMs: config.volumeEpochMs, pointsPerEpoch: config.volumePointsPerEpoch }
    ),
    lpFees: new Map(),
  };

  // ============================================
  // EVENT WIRING
  // ============================================

  ledger.on("campaign:sponsored", (receipt) => {
    if (receipt.fee > 0n) {
      pools.pointsYield.recordPrincipal(receipt.fee);
    }
  });

  ledger.on("campaign:purchase", (receipt) => {
    if (receipt.amountUsed > 0n) {
      pools.volumePoints.recordVolume(receipt.buyer, receipt.amountUsed);
    }
  });

  ledger.on("campaign:completed", (summary) => {
    if (summary.split.fee > 0n) {
      pools.pointsYield.recordPrincipal(summary.split.fee);
    }
  });

  ledger.on("liquidity:provisioned", (result) => {
    pools.lpFees.set(
      result.pool,
      new LpFeePool({ queue, asset }, { pool: result.pool, custodian: config.rewardCustodian })
    );
    wiringLogger.info({ campaignId: result.campaignId, pool: result.pool }, "LP fee pool registered");
  });

  const invariants = new InvariantChecker();

  wiringLogger.info({
    ledger: config.ledgerAddress,
    treasury: config.platformTreasury,
    liquidityFailurePolicy: config.liquidityFailurePolicy,
  }, "Engine created");

  return {
    config,
    collaborators,
    queue,
    ledger,
    vesting,
    pools,
    invariants,

    checkInvariants(maxDust = 0n) {
      const results = invariants.checkLedger(ledger);
      const accountings = [
        pools.pointsYield.accounting(),
        pools.volumePoints.accounting(),
        ...Array.from(pools.lpFees.values(), (pool) => pool.accounting()),
      ];
      for (const accounting of accountings) {
        results.push(invariants.checkAccumulator(accounting, maxDust));
      }
      for (const entry of vesting.listEntries()) {
        results.push(invariants.checkVesting(entry));
      }
      return results;
    },

    async runMaintenance() {
      await withTiming("maintenance", async () => {
        await pools.pointsYield.harvest();
        await pools.volumePoints.advanceEpoch();
      });
    },

    async shutdown() {
      pools.pointsYield.detach();
      ledger.removeAllListeners();
      await queue.onIdle();
      wiringLogger.info("Engine stopped");
    },
  };
}
