/**
 * Vesting Schedule Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { parseUnits, type Address } from "viem";
import { AuthorizationError, CollaboratorError, StateError } from "@curvefund/shared";
import { VestingSchedule } from "../vesting/index.js";
import {
  InMemorySettlementAsset,
  InMemoryYieldVault,
} from "../collaborators/index.js";
import { OperationQueue } from "../runtime/index.js";
import { T0, DAY, addr } from "./helpers.js";

const FUNDER = addr(0xa1);
const BENEFICIARY = addr(0xa2);
const CUSTODIAN = addr(0xa3);
const ADMIN = addr(0xa4);
const AMOUNT = parseUnits("2000", 6);

describe("VestingSchedule", () => {
  let asset: InMemorySettlementAsset;
  let vault: InMemoryYieldVault;
  let vesting: VestingSchedule;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(T0);

    asset = new InMemorySettlementAsset(addr(0xb1));
    vault = new InMemoryYieldVault(asset, addr(0xb2));
    vesting = new VestingSchedule(
      { queue: new OperationQueue(), asset, vault },
      { custodian: CUSTODIAN, admin: ADMIN }
    );
    asset.mint(FUNDER, AMOUNT);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  async function createEntry() {
    return vesting.create({
      beneficiary: BENEFICIARY,
      amount: AMOUNT,
      durationMs: 90 * DAY,
      funder: FUNDER,
    });
  }

  describe("create", () => {
    it("should park the principal in the vault under the custodian", async () => {
      const entry = await createEntry();

      expect(entry).toMatchObject({
        id: 1,
        beneficiary: BENEFICIARY,
        totalAmount: AMOUNT,
        released: 0n,
        startTime: T0,
        revoked: false,
        shares: AMOUNT,
      });
      expect(await asset.balanceOf(FUNDER)).toBe(0n);
      expect(await vault.balanceOf(CUSTODIAN)).toBe(AMOUNT);
      expect(await vault.totalAssets()).toBe(AMOUNT);
    });

    it("should record nothing when the deposit fails", async () => {
      vault.failures.failNext("deposit", "vault paused");

      await expect(createEntry()).rejects.toBeInstanceOf(CollaboratorError);
      expect(vesting.listEntries()).toEqual([]);
      expect(await asset.balanceOf(FUNDER)).toBe(AMOUNT);
      expect(await asset.balanceOf(vault.address)).toBe(0n);
    });
  });

  describe("releasable", () => {
    it("should vest linearly and cap at the duration", async () => {
      const { id } = await createEntry();

      expect(vesting.releasable(id, T0)).toBe(0n);
      expect(vesting.releasable(id, T0 + 45 * DAY)).toBe(parseUnits("1000", 6));
      expect(vesting.releasable(id, T0 + 90 * DAY)).toBe(AMOUNT);
      expect(vesting.releasable(id, T0 + 120 * DAY)).toBe(AMOUNT);
    });
  });

  describe("release", () => {
    it("should move the vested amount to the beneficiary's vault position", async () => {
      const { id } = await createEntry();
      vi.setSystemTime(T0 + 45 * DAY);

      const release = await vesting.release(id);

      expect(release.amount).toBe(parseUnits("1000", 6));
      expect(release.totalReleased).toBe(parseUnits("1000", 6));
      expect(await vault.balanceOf(BENEFICIARY)).toBe(parseUnits("1000", 6));
      expect(await vault.balanceOf(CUSTODIAN)).toBe(parseUnits("1000", 6));
      expect(vesting.getEntry(id)?.shares).toBe(parseUnits("1000", 6));
    });

    it("should release the remainder after the duration", async () => {
      const { id } = await createEntry();
      vi.setSystemTime(T0 + 45 * DAY);
      await vesting.release(id);
      vi.setSystemTime(T0 + 100 * DAY);

      const release = await vesting.release(id);

      expect(release.amount).toBe(parseUnits("1000", 6));
      expect(vesting.getEntry(id)?.released).toBe(AMOUNT);
      expect(await vault.balanceOf(BENEFICIARY)).toBe(AMOUNT);
    });

    it("should fail when nothing is releasable", async () => {
      const { id } = await createEntry();
      vi.setSystemTime(T0 + 45 * DAY);
      await vesting.release(id);

      await expect(vesting.release(id)).rejects.toMatchObject({ reason: "nothing_releasable" });
    });

    it("should leave custody untouched when the share transfer fails", async () => {
      const { id } = await createEntry();
      vi.setSystemTime(T0 + 45 * DAY);
      vault.failures.failNext("transferShares");

      await expect(vesting.release(id)).rejects.toBeInstanceOf(CollaboratorError);
      expect(vesting.getEntry(id)).toMatchObject({ released: 0n, shares: AMOUNT });
      expect(await vault.balanceOf(CUSTODIAN)).toBe(AMOUNT);
      expect(await vault.balanceOf(BENEFICIARY)).toBe(0n);
    });

    it("should hand accrued yield over with the principal", async () => {
      const { id } = await createEntry();
      asset.mint(vault.address, parseUnits("200", 6));
      await vault.accrueYield(parseUnits("200", 6));

      vi.setSystemTime(T0 + 45 * DAY);
      const first = await vesting.release(id);

      expect(first).toMatchObject({ amount: parseUnits("1000", 6), shares: parseUnits("1000", 6) });
      expect(await vault.convertToAssets(await vault.balanceOf(BENEFICIARY))).toBe(parseUnits("1100", 6));

      vi.setSystemTime(T0 + 90 * DAY);
      const last = await vesting.release(id);

      expect(last.shares).toBe(parseUnits("1000", 6));
      expect(vesting.getEntry(id)?.shares).toBe(0n);
      expect(await vault.balanceOf(CUSTODIAN)).toBe(0n);
      expect(await vault.convertToAssets(await vault.balanceOf(BENEFICIARY))).toBe(parseUnits("2200", 6));
    });
  });

  describe("revoke", () => {
    it("should stop further releases and report the unreleased principal", async () => {
      const { id } = await createEntry();
      vi.setSystemTime(T0 + 45 * DAY);
      await vesting.release(id);

      const revocation = await vesting.revoke(id, ADMIN);

      expect(revocation).toEqual({ id, unreleased: parseUnits("1000", 6) });
      expect(vesting.releasable(id, T0 + 90 * DAY)).toBe(0n);
      await expect(vesting.release(id)).rejects.toBeInstanceOf(StateError);
      await expect(vesting.revoke(id, ADMIN)).rejects.toMatchObject({ reason: "revoked" });
    });

    it("should be restricted to the administrator", async () => {
      const { id } = await createEntry();
      await expect(vesting.revoke(id, BENEFICIARY)).rejects.toBeInstanceOf(AuthorizationError);
    });
  });

  describe("queries", () => {
    it("should index entries by beneficiary", async () => {
      asset.mint(FUNDER, AMOUNT);
      await createEntry();
      await createEntry();

      expect(vesting.getEntriesByBeneficiary(BENEFICIARY).map((e) => e.id)).toEqual([1, 2]);
      expect(vesting.getEntriesByBeneficiary(FUNDER)).toEqual([]);
      expect(vesting.vestedAmount(2, T0 + 30 * DAY)).toBe(666_666_666n);
    });

    it("should match beneficiaries regardless of address case", async () => {
      const lower: Address = `0x${BENEFICIARY.slice(2).toLowerCase()}`;
      await vesting.create({ beneficiary: lower, amount: AMOUNT, durationMs: 90 * DAY, funder: FUNDER });

      expect(vesting.getEntriesByBeneficiary(BENEFICIARY).map((e) => e.id)).toEqual([1]);
      expect(vesting.getEntriesByBeneficiary(lower).map((e) => e.beneficiary)).toEqual([BENEFICIARY]);
    });
  });
});
