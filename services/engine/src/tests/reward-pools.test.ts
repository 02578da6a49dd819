/**
 * Reward Pool Tests
 *
 * - Points holders share harvested vault profit
 * - LP holders share trading fees
 * - Traders share a per-epoch points emission
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { parseUnits } from "viem";
import { CollaboratorError, StateError } from "@curvefund/shared";
import { LpFeePool, PointsYieldPool, VolumePointsPool } from "../rewards/index.js";
import {
  InMemoryPointsRegistry,
  InMemorySettlementAsset,
  InMemoryYieldVault,
} from "../collaborators/index.js";
import { OperationQueue } from "../runtime/index.js";
import { T0, DAY, addr } from "./helpers.js";

const ALICE = addr(0xa1);
const BOB = addr(0xa2);
const TREASURY = addr(0xa3);
const CUSTODIAN = addr(0xa4);
const FEE_SOURCE = addr(0xa5);
const POOL = addr(0xa6);

describe("Reward pools", () => {
  let queue: OperationQueue;
  let asset: InMemorySettlementAsset;
  let vault: InMemoryYieldVault;
  let points: InMemoryPointsRegistry;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(T0);

    queue = new OperationQueue();
    asset = new InMemorySettlementAsset(addr(0xb1));
    vault = new InMemoryYieldVault(asset, addr(0xb2));
    points = new InMemoryPointsRegistry();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  // ============================================
  // POINTS YIELD POOL
  // ============================================

  describe("PointsYieldPool", () => {
    let pool: PointsYieldPool;

    beforeEach(async () => {
      pool = new PointsYieldPool(
        { queue, asset, vault, points },
        { custodian: CUSTODIAN, treasury: TREASURY, harvestIntervalMs: DAY }
      );

      await points.credit(ALICE, parseUnits("4000", 18));
      await points.credit(BOB, parseUnits("1000", 18));

      // Treasury position of 500 USDC
      asset.mint(vault.address, parseUnits("500", 6));
      await vault.deposit(parseUnits("500", 6), TREASURY);
      pool.recordPrincipal(parseUnits("500", 6));
    });

    afterEach(() => {
      pool.detach();
    });

    async function accrue(amount: bigint): Promise<void> {
      asset.mint(vault.address, amount);
      await vault.accrueYield(amount);
    }

    it("should follow points balances as weight", async () => {
      expect(pool.weightOf(ALICE)).toBe(parseUnits("4000", 18));
      await points.debit(ALICE, parseUnits("1000", 18));
      expect(pool.weightOf(ALICE)).toBe(parseUnits("3000", 18));
      expect(pool.totalWeight()).toBe(parseUnits("4000", 18));
    });

    it("should no-op before the interval has passed", async () => {
      await accrue(parseUnits("50", 6));
      expect(await pool.harvest()).toBeNull();
    });

    it("should no-op when the position has no profit", async () => {
      vi.setSystemTime(T0 + DAY);
      expect(await pool.harvest()).toBeNull();
      expect(await asset.balanceOf(CUSTODIAN)).toBe(0n);
    });

    it("should distribute profit by points balance", async () => {
      await accrue(parseUnits("50", 6));
      vi.setSystemTime(T0 + DAY);

      const result = await pool.harvest();

      expect(result).toEqual({ profit: parseUnits("50", 6), harvestedAt: T0 + DAY, distributed: true });
      expect(await asset.balanceOf(CUSTODIAN)).toBe(parseUnits("50", 6));
      expect(pool.pending(ALICE)).toBe(parseUnits("40", 6));
      expect(pool.pending(BOB)).toBe(parseUnits("10", 6));
      expect(await pool.harvest()).toBeNull();
    });

    it("should pay claims from custody", async () => {
      await accrue(parseUnits("50", 6));
      vi.setSystemTime(T0 + DAY);
      await pool.harvest();

      const claim = await pool.claim(ALICE);

      expect(claim).toEqual({ pool: "points-yield", account: ALICE, amount: parseUnits("40", 6) });
      expect(await asset.balanceOf(ALICE)).toBe(parseUnits("40", 6));
      expect(await asset.balanceOf(CUSTODIAN)).toBe(parseUnits("10", 6));
      await expect(pool.claim(ALICE)).rejects.toBeInstanceOf(StateError);
    });

    it("should restore the claim when the payout fails", async () => {
      await accrue(parseUnits("50", 6));
      vi.setSystemTime(T0 + DAY);
      await pool.harvest();
      asset.failures.failNext("transfer");

      await expect(pool.claim(BOB)).rejects.toBeInstanceOf(CollaboratorError);
      expect(pool.pending(BOB)).toBe(parseUnits("10", 6));
      expect(pool.accounting().totalClaimed).toBe(0n);
    });
  });

  // ============================================
  // LP FEE POOL
  // ============================================

  describe("LpFeePool", () => {
    let pool: LpFeePool;

    beforeEach(() => {
      pool = new LpFeePool({ queue, asset }, { pool: POOL, custodian: CUSTODIAN });
      asset.mint(FEE_SOURCE, 1_100n);
    });

    it("should split fees by LP shares", async () => {
      pool.setShares(ALICE, 300n);
      pool.setShares(BOB, 100n);

      expect(await pool.distributeFees(FEE_SOURCE, 1_000n)).toBe(true);
      expect(pool.pending(ALICE)).toBe(750n);
      expect(pool.pending(BOB)).toBe(250n);
      expect(await asset.balanceOf(CUSTODIAN)).toBe(1_000n);
    });

    it("should park fees until LP shares exist", async () => {
      expect(await pool.distributeFees(FEE_SOURCE, 100n)).toBe(false);
      await expect(pool.flush()).rejects.toMatchObject({ reason: "no_weight" });

      pool.setShares(ALICE, 1n);
      expect(await pool.flush()).toBe(100n);
      expect(pool.pending(ALICE)).toBe(100n);
      expect(await pool.flush()).toBe(0n);
    });

    it("should leave state untouched when the fee pull fails", async () => {
      pool.setShares(ALICE, 1n);
      await expect(pool.distributeFees(FEE_SOURCE, 5_000n)).rejects.toBeInstanceOf(CollaboratorError);
      expect(pool.accounting().totalDeposited).toBe(0n);
    });

    it("should be named after its pool", () => {
      expect(pool.name).toBe(`lp-fees:${POOL}`);
    });
  });

  // ============================================
  // VOLUME POINTS POOL
  // ============================================

  describe("VolumePointsPool", () => {
    let pool: VolumePointsPool;

    beforeEach(() => {
      pool = new VolumePointsPool(
        { queue, points },
        { epochMs: 7 * DAY, pointsPerEpoch: parseUnits("1000", 18) }
      );
    });

    it("should accumulate volume as weight", () => {
      pool.recordVolume(ALICE, parseUnits("1000", 6));
      pool.recordVolume(ALICE, parseUnits("2000", 6));
      expect(pool.volumeOf(ALICE)).toBe(parseUnits("3000", 6));
      expect(pool.weightOf(ALICE)).toBe(parseUnits("3000", 6));
    });

    it("should not close an epoch early", async () => {
      pool.recordVolume(ALICE, 1n);
      vi.setSystemTime(T0 + 7 * DAY - 1);
      expect(await pool.advanceEpoch()).toBeNull();
    });

    it("should emit the epoch's points by volume and reset weights", async () => {
      pool.recordVolume(ALICE, parseUnits("3000", 6));
      pool.recordVolume(BOB, parseUnits("1000", 6));
      vi.setSystemTime(T0 + 7 * DAY);

      const result = await pool.advanceEpoch();

      expect(result).toEqual({ epoch: 0, emitted: parseUnits("1000", 18), participants: 2 });
      expect(pool.getEpoch()).toBe(1);
      expect(pool.pending(ALICE)).toBe(parseUnits("750", 18));
      expect(pool.pending(BOB)).toBe(parseUnits("250", 18));
      expect(pool.totalWeight()).toBe(0n);
      expect(pool.volumeOf(ALICE)).toBe(0n);
    });

    it("should pay claims as points", async () => {
      pool.recordVolume(ALICE, parseUnits("3000", 6));
      pool.recordVolume(BOB, parseUnits("1000", 6));
      vi.setSystemTime(T0 + 7 * DAY);
      await pool.advanceEpoch();

      await pool.claim(ALICE);

      expect(await points.balanceOf(ALICE)).toBe(parseUnits("750", 18));
      expect(pool.pending(ALICE)).toBe(0n);
    });
  });
});
