/**
 * In-memory liquidity provider for development and tests
 */

import { getContractAddress, type Address } from "viem";
import type { LiquidityProvider } from "./types.js";
import { FailureInjector } from "./failure-injector.js";

export interface ProvisionedPool {
  pool: Address;
  tokenA: Address;
  tokenB: Address;
  amountA: bigint;
  amountB: bigint;
}

export class InMemoryLiquidityProvider implements LiquidityProvider {
  readonly address: Address;
  readonly failures = new FailureInjector<"provideLiquidity">();

  private readonly pools: ProvisionedPool[] = [];

  constructor(address: Address) {
    this.address = address;
  }

  async provideLiquidity(
    tokenA: Address,
    tokenB: Address,
    amountA: bigint,
    amountB: bigint
  ): Promise<Address> {
    this.failures.check("provideLiquidity");

    if (amountA <= 0n || amountB <= 0n) {
      throw new Error("Both pool amounts must be positive");
    }

    const pool = getContractAddress({
      from: this.address,
      nonce: BigInt(this.pools.length + 1),
    });
    this.pools.push({ pool, tokenA, tokenB, amountA, amountB });
    return pool;
  }

  getPools(): ProvisionedPool[] {
    return [...this.pools];
  }
}
