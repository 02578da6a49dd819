import { describe, it, expect } from "vitest";
import {
  addressSchema,
  bigIntSchema,
  amountSchema,
  envSchema,
  campaignParamsSchema,
} from "../schemas/index.js";

describe("Schemas", () => {
  describe("addressSchema", () => {
    it("should accept lowercase and checksummed addresses", () => {
      expect(addressSchema.safeParse("0x00000000000000000000000000000000000000a1").success).toBe(true);
      expect(addressSchema.safeParse("0xd8dA6BF26964aF9D7eEd9e03E53415D37aA96045").success).toBe(true);
    });

    it("should reject malformed addresses", () => {
      expect(addressSchema.safeParse("0x1234").success).toBe(false);
      expect(addressSchema.safeParse(42).success).toBe(false);
    });
  });

  describe("bigIntSchema", () => {
    it("should accept bigint, integer string and integer number", () => {
      expect(bigIntSchema.parse(5n)).toBe(5n);
      expect(bigIntSchema.parse("123456789012345678901234567890")).toBe(123456789012345678901234567890n);
      expect(bigIntSchema.parse(7)).toBe(7n);
    });

    it("should reject decimal strings", () => {
      expect(bigIntSchema.safeParse("1.5").success).toBe(false);
    });
  });

  describe("amountSchema", () => {
    it("should reject negative amounts", () => {
      expect(amountSchema.safeParse(-1n).success).toBe(false);
      expect(amountSchema.parse("0")).toBe(0n);
    });
  });

  describe("envSchema", () => {
    it("should apply defaults", () => {
      const env = envSchema.parse({});
      expect(env.LIQUIDITY_FAILURE_POLICY).toBe("revert");
      expect(env.LIQUIDITY_RETRIES).toBe(2);
      expect(env.LIQUIDITY_RETRY_DELAY_MS).toBe(250);
      expect(env.LOG_LEVEL).toBe("info");
      expect(env.SPONSORSHIP_FEE).toBeUndefined();
    });

    it("should parse base-unit overrides", () => {
      const env = envSchema.parse({
        SPONSORSHIP_FEE: "250000000",
        LIQUIDITY_FAILURE_POLICY: "defer",
        HARVEST_INTERVAL_MS: "3600000",
      });
      expect(env.SPONSORSHIP_FEE).toBe(250_000_000n);
      expect(env.LIQUIDITY_FAILURE_POLICY).toBe("defer");
      expect(env.HARVEST_INTERVAL_MS).toBe(3_600_000);
    });

    it("should reject unknown liquidity policies", () => {
      expect(envSchema.safeParse({ LIQUIDITY_FAILURE_POLICY: "ignore" }).success).toBe(false);
    });
  });

  describe("campaignParamsSchema", () => {
    const valid = {
      name: "  Test Campaign ",
      symbol: "TEST1",
      targetFunding: "10000000000",
      totalSupply: 1_000_000n * 10n ** 18n,
      deadline: 1_700_000_000_000,
    };

    it("should trim the name and default optional fields", () => {
      const params = campaignParamsSchema.parse(valid);
      expect(params.name).toBe("Test Campaign");
      expect(params.description).toBe("");
      expect(params.reserveRatio).toBe(0);
      expect(params.targetFunding).toBe(10_000_000_000n);
    });

    it("should require an uppercase alphanumeric symbol", () => {
      expect(campaignParamsSchema.safeParse({ ...valid, symbol: "test" }).success).toBe(false);
      expect(campaignParamsSchema.safeParse({ ...valid, symbol: "TO-LONG" }).success).toBe(false);
    });

    it("should reject an empty name", () => {
      expect(campaignParamsSchema.safeParse({ ...valid, name: "   " }).success).toBe(false);
    });
  });
});
