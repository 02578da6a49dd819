/**
 * In-memory ERC-4626 style vault for development and tests
 *
 * Deposits account for assets already pushed to the vault address.
 * `accrueYield` simulates strategy profit.
 */

import type { Address } from "viem";
import type { TransferableAsset, YieldVault } from "./types.js";
import { FailureInjector } from "./failure-injector.js";

export class InMemoryYieldVault implements YieldVault {
  readonly address: Address;
  readonly failures = new FailureInjector<"deposit" | "withdraw" | "redeem" | "transferShares">();

  private readonly asset: TransferableAsset;
  private readonly shares: Map<Address, bigint> = new Map();
  private totalShares = 0n;
  private managedAssets = 0n;

  constructor(asset: TransferableAsset, address: Address) {
    this.asset = asset;
    this.address = address;
  }

  async deposit(assets: bigint, receiver: Address): Promise<bigint> {
    this.failures.check("deposit");

    if (assets <= 0n) {
      throw new Error("Deposit must be positive");
    }
    const idle = (await this.asset.balanceOf(this.address)) - this.managedAssets;
    if (idle < assets) {
      throw new Error(`Deposit of ${assets} not funded: idle=${idle}`);
    }

    const minted = this.previewShares(assets);
    this.managedAssets += assets;
    this.totalShares += minted;
    this.shares.set(receiver, this.sharesOf(receiver) + minted);
    return minted;
  }

  async withdraw(assets: bigint, receiver: Address, owner: Address): Promise<bigint> {
    this.failures.check("withdraw");

    if (assets <= 0n || assets > this.managedAssets) {
      throw new Error(`Cannot withdraw ${assets} of ${this.managedAssets}`);
    }
    // Round shares up so the vault never pays out more than it burns
    const burned = (assets * this.totalShares + this.managedAssets - 1n) / this.managedAssets;
    this.burn(owner, burned);
    this.managedAssets -= assets;
    await this.asset.transfer(this.address, receiver, assets);
    return burned;
  }

  async redeem(shares: bigint, receiver: Address, owner: Address): Promise<bigint> {
    this.failures.check("redeem");

    if (shares <= 0n || shares > this.sharesOf(owner)) {
      throw new Error(`Cannot redeem ${shares} shares of ${owner}`);
    }
    const assets = (shares * this.managedAssets) / this.totalShares;
    this.burn(owner, shares);
    this.managedAssets -= assets;
    await this.asset.transfer(this.address, receiver, assets);
    return assets;
  }

  async transferShares(from: Address, to: Address, shares: bigint): Promise<void> {
    this.failures.check("transferShares");

    if (shares <= 0n) {
      throw new Error("Share transfer must be positive");
    }
    this.burn(from, shares);
    this.totalShares += shares;
    this.shares.set(to, this.sharesOf(to) + shares);
  }

  async balanceOf(owner: Address): Promise<bigint> {
    return this.sharesOf(owner);
  }

  async convertToAssets(shares: bigint): Promise<bigint> {
    return this.totalShares === 0n ? shares : (shares * this.managedAssets) / this.totalShares;
  }

  async convertToShares(assets: bigint): Promise<bigint> {
    return this.previewShares(assets);
  }

  async totalAssets(): Promise<bigint> {
    return this.managedAssets;
  }

  /**
   * Simulate strategy profit: the assets must already sit at the vault address
   */
  async accrueYield(amount: bigint): Promise<void> {
    const idle = (await this.asset.balanceOf(this.address)) - this.managedAssets;
    if (idle < amount) {
      throw new Error(`Yield of ${amount} not funded: idle=${idle}`);
    }
    this.managedAssets += amount;
  }

  private previewShares(assets: bigint): bigint {
    return this.totalShares === 0n || this.managedAssets === 0n
      ? assets
      : (assets * this.totalShares) / this.managedAssets;
  }

  private sharesOf(owner: Address): bigint {
    return this.shares.get(owner) ?? 0n;
  }

  private burn(owner: Address, amount: bigint): void {
    const held = this.sharesOf(owner);
    if (held < amount) {
      throw new Error(`Insufficient shares for ${owner}: held=${held}, requested=${amount}`);
    }
    this.shares.set(owner, held - amount);
    this.totalShares -= amount;
  }
}
