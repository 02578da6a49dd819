/**
 * In-memory settlement asset for development and tests
 */

import type { Address } from "viem";
import type { SettlementAsset } from "./types.js";
import { FailureInjector } from "./failure-injector.js";

export class InMemorySettlementAsset implements SettlementAsset {
  readonly address: Address;
  readonly decimals: number;
  readonly failures = new FailureInjector<"transfer">();

  private readonly balances: Map<Address, bigint> = new Map();
  private supply = 0n;

  constructor(address: Address, decimals = 6) {
    this.address = address;
    this.decimals = decimals;
  }

  /**
   * Credit `amount` out of thin air (test funding)
   */
  mint(to: Address, amount: bigint): void {
    this.balances.set(to, this.read(to) + amount);
    this.supply += amount;
  }

  async balanceOf(account: Address): Promise<bigint> {
    return this.read(account);
  }

  async transfer(from: Address, to: Address, amount: bigint): Promise<void> {
    this.failures.check("transfer");

    if (amount < 0n) {
      throw new Error(`Negative transfer amount ${amount}`);
    }
    const available = this.read(from);
    if (available < amount) {
      throw new Error(`Insufficient balance for ${from}: available=${available}, requested=${amount}`);
    }

    this.balances.set(from, available - amount);
    this.balances.set(to, this.read(to) + amount);
  }

  totalSupply(): bigint {
    return this.supply;
  }

  private read(account: Address): bigint {
    return this.balances.get(account) ?? 0n;
  }
}
