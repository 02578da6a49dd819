/**
 * In-memory points registry for development and tests
 */

import { EventEmitter } from "eventemitter3";
import type { Address } from "viem";
import type { PointsRegistry, WeightListener } from "./types.js";
import { FailureInjector } from "./failure-injector.js";

interface PointsRegistryEvents {
  "weight:changed": WeightListener;
}

export class InMemoryPointsRegistry
  extends EventEmitter<PointsRegistryEvents>
  implements PointsRegistry
{
  readonly failures = new FailureInjector<"credit" | "debit">();

  private readonly balances: Map<Address, bigint> = new Map();
  private total = 0n;

  async credit(account: Address, amount: bigint): Promise<void> {
    this.failures.check("credit");

    if (amount <= 0n) {
      throw new Error("Credit must be positive");
    }
    const balance = this.read(account) + amount;
    this.balances.set(account, balance);
    this.total += amount;
    this.emit("weight:changed", account, balance);
  }

  async debit(account: Address, amount: bigint): Promise<void> {
    this.failures.check("debit");

    const held = this.read(account);
    if (amount <= 0n || held < amount) {
      throw new Error(`Cannot debit ${amount} from ${account}: held=${held}`);
    }
    const balance = held - amount;
    this.balances.set(account, balance);
    this.total -= amount;
    this.emit("weight:changed", account, balance);
  }

  async balanceOf(account: Address): Promise<bigint> {
    return this.read(account);
  }

  async totalWeight(): Promise<bigint> {
    return this.total;
  }

  onWeightChanged(listener: WeightListener): () => void {
    this.on("weight:changed", listener);
    return () => {
      this.off("weight:changed", listener);
    };
  }

  private read(account: Address): bigint {
    return this.balances.get(account) ?? 0n;
  }
}
