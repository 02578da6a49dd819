/**
 * Fund Allocator Tests
 */

import { describe, it, expect, beforeEach } from "vitest";
import { parseUnits } from "viem";
import { ValidationError } from "@curvefund/shared";
import { FundAllocator, createFundAllocator } from "../allocation/index.js";

describe("FundAllocator", () => {
  let allocator: FundAllocator;

  beforeEach(() => {
    allocator = createFundAllocator();
  });

  describe("split", () => {
    it("should split 30/20/5/45", () => {
      const split = allocator.split(parseUnits("10000", 6));

      expect(split.instant).toBe(parseUnits("3000", 6));
      expect(split.vested).toBe(parseUnits("2000", 6));
      expect(split.fee).toBe(parseUnits("500", 6));
      expect(split.liquidity).toBe(parseUnits("4500", 6));
    });

    it("should give the rounding remainder to liquidity", () => {
      const split = allocator.split(10_001n);

      expect(split).toEqual({ instant: 3000n, vested: 2000n, fee: 500n, liquidity: 4501n });
    });

    it("should always sum to the raised amount", () => {
      for (const raised of [0n, 1n, 7n, 999_999n, 123_456_789_012n]) {
        const { instant, vested, fee, liquidity } = allocator.split(raised);
        expect(instant + vested + fee + liquidity).toBe(raised);
      }
    });

    it("should reject a negative amount", () => {
      expect(() => allocator.split(-1n)).toThrow(ValidationError);
    });
  });

  describe("tokenAllocations", () => {
    it("should allocate 50/20/25/5 of supply", () => {
      const result = allocator.tokenAllocations(parseUnits("1000000", 18));

      expect(result.allocations.sale).toBe(parseUnits("500000", 18));
      expect(result.allocations.creator).toBe(parseUnits("200000", 18));
      expect(result.allocations.liquidity).toBe(parseUnits("250000", 18));
      expect(result.allocations.platform).toBe(parseUnits("50000", 18));
      expect(result.unallocated).toBe(0n);
    });

    it("should report the flooring remainder as unallocated", () => {
      const result = allocator.tokenAllocations(100_001n);

      expect(result.totalAllocated).toBe(100_000n);
      expect(result.unallocated).toBe(1n);
    });
  });

  describe("construction", () => {
    it("should reject splits that do not sum to 10000 bps", () => {
      expect(
        () => new FundAllocator({ instant: 3000n, vested: 2000n, fee: 500n, liquidity: 4000n })
      ).toThrow(ValidationError);
    });

    it("should reject token allocations above the supply", () => {
      expect(
        () =>
          new FundAllocator(undefined, { sale: 6000n, creator: 2000n, liquidity: 2500n, platform: 500n })
      ).toThrow(ValidationError);
    });
  });
});
