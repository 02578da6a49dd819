/**
 * Reward Pools
 *
 * Three weighted populations share one accumulator design:
 * - PointsYieldPool: points balances earn the platform treasury's vault profit
 * - LpFeePool: LP shares earn the trading fees of one liquidity pool
 * - VolumePointsPool: traded volume in an epoch earns a points emission
 */

import type { Address } from "viem";
import type { Logger } from "pino";
import {
  rewardsLogger as logger,
  logFundMovement,
  ValidationError,
} from "@curvefund/shared";
import type { PointsRegistry, TransferableAsset, YieldVault } from "../collaborators/types.js";
import { runAtomically } from "../runtime/unit-of-work.js";
import { callCollaborator, transferWithRollback } from "../runtime/collaborator-call.js";
import type { OperationQueue } from "../runtime/operation-queue.js";
import { RewardAccumulator } from "./reward-accumulator.js";
import type {
  AccumulatorAccounting,
  EpochResult,
  HarvestResult,
  LpFeePoolConfig,
  PointsYieldPoolConfig,
  RewardClaim,
  RewardPayout,
  VolumePointsPoolConfig,
} from "./types.js";

// ============================================
// REWARD POOL BASE
// ============================================

export abstract class RewardPool {
  readonly name: string;

  protected readonly accumulator: RewardAccumulator;
  protected readonly queue: OperationQueue;
  protected readonly log: Logger;
  private readonly payout: RewardPayout;

  constructor(name: string, queue: OperationQueue, payout: RewardPayout) {
    this.name = name;
    this.queue = queue;
    this.payout = payout;
    this.accumulator = new RewardAccumulator(name);
    this.log = logger.child({ component: "reward-pool", pool: name });
  }

  /**
   * Move an account to `weight`. Returns the rewards flushed to owed.
   */
  setWeight(account: Address, weight: bigint): bigint {
    return this.accumulator.onWeightChange(account, weight);
  }

  deposit(amount: bigint): void {
    this.accumulator.deposit(amount);
  }

  /**
   * Pay out everything pending for `account`.
   * A failed payout restores the claim.
   */
  async claim(account: Address): Promise<RewardClaim> {
    const operation = `${this.name}.claim`;
    return this.queue.run(operation, () =>
      runAtomically(operation, async (uow) => {
        const amount = this.accumulator.claim(account);
        uow.onRollback("restore claim", () => this.accumulator.restoreClaim(account, amount));

        await callCollaborator(this.name, "payout", () => this.payout(account, amount));

        this.log.info({ account, amount: amount.toString() }, "Reward paid");
        return { pool: this.name, account, amount };
      })
    );
  }

  /**
   * Fold parked deposits into the accumulator. A pool with nothing parked no-ops.
   */
  async flush(): Promise<bigint> {
    return this.queue.run(`${this.name}.flush`, async () => {
      if (this.accumulator.getUndistributed() === 0n) {
        return 0n;
      }
      return this.accumulator.flushUndistributed();
    });
  }

  pending(account: Address): bigint {
    return this.accumulator.pending(account);
  }

  weightOf(account: Address): bigint {
    return this.accumulator.weightOf(account);
  }

  totalWeight(): bigint {
    return this.accumulator.totalWeight();
  }

  accounting(): AccumulatorAccounting {
    return this.accumulator.accounting();
  }
}

// ============================================
// POINTS YIELD POOL
// ============================================

export interface PointsYieldPoolDeps {
  queue: OperationQueue;
  asset: TransferableAsset;
  vault: YieldVault;
  points: PointsRegistry;
}

export class PointsYieldPool extends RewardPool {
  private readonly asset: TransferableAsset;
  private readonly vault: YieldVault;
  private readonly config: PointsYieldPoolConfig;
  private readonly unsubscribe: () => void;

  // Treasury deposits not counted as profit
  private principal = 0n;
  private lastHarvestAt: number;

  constructor(deps: PointsYieldPoolDeps, config: PointsYieldPoolConfig) {
    super("points-yield", deps.queue, (account, amount) =>
      deps.asset.transfer(config.custodian, account, amount)
    );
    this.asset = deps.asset;
    this.vault = deps.vault;
    this.config = { ...config };
    this.lastHarvestAt = Date.now();

    this.unsubscribe = deps.points.onWeightChanged((account, balance) => {
      this.setWeight(account, balance);
    });
  }

  /**
   * Record a deposit into the treasury's vault position
   */
  recordPrincipal(amount: bigint): void {
    if (amount <= 0n) {
      throw new ValidationError("Principal must be positive", "amount");
    }
    this.principal += amount;
  }

  getPrincipal(): bigint {
    return this.principal;
  }

  isDue(now = Date.now()): boolean {
    return now - this.lastHarvestAt >= this.config.harvestIntervalMs;
  }

  /**
   * Withdraw the treasury position's profit and distribute it to points holders.
   * Returns null when not due or when there is no profit.
   */
  async harvest(): Promise<HarvestResult | null> {
    return this.queue.run("points-yield.harvest", () =>
      runAtomically("points-yield.harvest", async (uow) => {
        const now = Date.now();
        if (!this.isDue(now)) {
          return null;
        }

        const { treasury, custodian } = this.config;
        const shares = await callCollaborator("vault", "balanceOf", () => this.vault.balanceOf(treasury));
        const value = await callCollaborator("vault", "convertToAssets", () =>
          this.vault.convertToAssets(shares)
        );
        const profit = value - this.principal;
        if (profit <= 0n) {
          this.log.debug({ value: value.toString(), principal: this.principal.toString() }, "No profit to harvest");
          return null;
        }

        await callCollaborator("vault", "withdraw", () => this.vault.withdraw(profit, custodian, treasury));
        uow.onRollback("return harvested profit", async () => {
          await this.asset.transfer(custodian, this.vault.address, profit);
          await this.vault.deposit(profit, treasury);
        });

        const distributed = this.totalWeight() > 0n;
        this.deposit(profit);
        this.lastHarvestAt = now;

        logFundMovement("info", "yield_harvested", {
          from: this.vault.address,
          to: custodian,
          amount: profit,
          stream: "points-yield",
        });

        return { profit, harvestedAt: now, distributed };
      })
    );
  }

  /**
   * Stop following points balance changes
   */
  detach(): void {
    this.unsubscribe();
  }
}

// ============================================
// LP FEE POOL
// ============================================

export interface LpFeePoolDeps {
  queue: OperationQueue;
  asset: TransferableAsset;
}

export class LpFeePool extends RewardPool {
  readonly pool: Address;
  private readonly asset: TransferableAsset;
  private readonly custodian: Address;

  constructor(deps: LpFeePoolDeps, config: LpFeePoolConfig) {
    super(`lp-fees:${config.pool}`, deps.queue, (account, amount) =>
      deps.asset.transfer(config.custodian, account, amount)
    );
    this.pool = config.pool;
    this.asset = deps.asset;
    this.custodian = config.custodian;
  }

  setShares(account: Address, shares: bigint): bigint {
    return this.setWeight(account, shares);
  }

  /**
   * Pull `amount` of collected fees from `from` and distribute them to LP holders
   */
  async distributeFees(from: Address, amount: bigint): Promise<boolean> {
    if (amount <= 0n) {
      throw new ValidationError("Fee amount must be positive", "amount");
    }

    const operation = `${this.name}.distributeFees`;
    return this.queue.run(operation, () =>
      runAtomically(operation, async (uow) => {
        await transferWithRollback(uow, this.asset, from, this.custodian, amount, "fee pull");
        const distributed = this.totalWeight() > 0n;
        this.deposit(amount);

        logFundMovement("info", "lp_fees_distributed", {
          from,
          to: this.custodian,
          amount,
          stream: this.name,
        });
        return distributed;
      })
    );
  }
}

// ============================================
// VOLUME POINTS POOL
// ============================================

export interface VolumePointsPoolDeps {
  queue: OperationQueue;
  points: PointsRegistry;
}

export class VolumePointsPool extends RewardPool {
  private readonly config: VolumePointsPoolConfig;
  private readonly epochVolume: Map<Address, bigint> = new Map();
  private epoch = 0;
  private epochStartedAt: number;

  constructor(deps: VolumePointsPoolDeps, config: VolumePointsPoolConfig) {
    super("volume-points", deps.queue, (account, amount) => deps.points.credit(account, amount));
    if (config.pointsPerEpoch <= 0n) {
      throw new ValidationError("Epoch emission must be positive", "pointsPerEpoch");
    }
    this.config = { ...config };
    this.epochStartedAt = Date.now();
  }

  /**
   * Add traded volume to the account's weight for the current epoch
   */
  recordVolume(account: Address, amount: bigint): void {
    if (amount <= 0n) {
      throw new ValidationError("Volume must be positive", "amount");
    }
    const volume = (this.epochVolume.get(account) ?? 0n) + amount;
    this.epochVolume.set(account, volume);
    this.setWeight(account, volume);
  }

  volumeOf(account: Address): bigint {
    return this.epochVolume.get(account) ?? 0n;
  }

  getEpoch(): number {
    return this.epoch;
  }

  /**
   * Emit the epoch's points over its volume and start a new epoch.
   * Returns null while the current epoch is still running.
   */
  async advanceEpoch(): Promise<EpochResult | null> {
    return this.queue.run("volume-points.advanceEpoch", async () => {
      const now = Date.now();
      if (now - this.epochStartedAt < this.config.epochMs) {
        return null;
      }

      const result: EpochResult = {
        epoch: this.epoch,
        emitted: this.config.pointsPerEpoch,
        participants: this.epochVolume.size,
      };

      this.deposit(this.config.pointsPerEpoch);

      // Pending emission stays owed while weights reset
      for (const account of this.epochVolume.keys()) {
        this.setWeight(account, 0n);
      }
      this.epochVolume.clear();
      this.epoch++;
      this.epochStartedAt = now;

      this.log.info({
        epoch: result.epoch,
        emitted: result.emitted.toString(),
        participants: result.participants,
      }, "Volume epoch closed");

      return result;
    });
  }
}
