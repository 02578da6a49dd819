/**
 * Collaborator Interfaces
 *
 * The engine reaches the outside world only through these interfaces:
 * - SettlementAsset: the asset campaigns raise (USDC)
 * - YieldVault: ERC-4626 style sink for idle capital
 * - LiquidityProvider: AMM pool creation at completion
 * - PointsRegistry: points balances, the weight source for points-based rewards
 */

import type { Address } from "viem";

// ============================================
// ASSETS
// ============================================

/**
 * Anything balances can be moved on
 */
export interface TransferableAsset {
  readonly address: Address;
  readonly decimals: number;

  balanceOf(account: Address): Promise<bigint>;

  /**
   * Move `amount` from `from` to `to`. Rejects on insufficient balance.
   */
  transfer(from: Address, to: Address, amount: bigint): Promise<void>;
}

export type SettlementAsset = TransferableAsset;

// ============================================
// YIELD VAULT
// ============================================

export interface YieldVault {
  readonly address: Address;

  /**
   * Account `assets` already transferred to `address` and mint shares to `receiver`
   */
  deposit(assets: bigint, receiver: Address): Promise<bigint>;

  /**
   * Burn the shares of `owner` worth `assets` and send the assets to `receiver`
   */
  withdraw(assets: bigint, receiver: Address, owner: Address): Promise<bigint>;

  /**
   * Burn `shares` of `owner` and send the underlying assets to `receiver`
   */
  redeem(shares: bigint, receiver: Address, owner: Address): Promise<bigint>;

  /**
   * Move `shares` between owners without touching the underlying assets
   */
  transferShares(from: Address, to: Address, shares: bigint): Promise<void>;

  balanceOf(owner: Address): Promise<bigint>;
  convertToAssets(shares: bigint): Promise<bigint>;
  convertToShares(assets: bigint): Promise<bigint>;
  totalAssets(): Promise<bigint>;
}

// ============================================
// LIQUIDITY PROVIDER
// ============================================

export interface LiquidityProvider {
  readonly address: Address;

  /**
   * Create a pool from amounts already transferred to `address`. Returns the pool reference.
   */
  provideLiquidity(
    tokenA: Address,
    tokenB: Address,
    amountA: bigint,
    amountB: bigint
  ): Promise<Address>;
}

// ============================================
// POINTS REGISTRY
// ============================================

export type WeightListener = (account: Address, balance: bigint) => void;

export interface PointsRegistry {
  credit(account: Address, amount: bigint): Promise<void>;
  debit(account: Address, amount: bigint): Promise<void>;
  balanceOf(account: Address): Promise<bigint>;
  totalWeight(): Promise<bigint>;

  /**
   * Subscribe to balance changes. Returns the unsubscribe function.
   */
  onWeightChanged(listener: WeightListener): () => void;
}

// ============================================
// BUNDLE
// ============================================

export interface Collaborators {
  asset: SettlementAsset;
  vault: YieldVault;
  liquidity: LiquidityProvider;
  points: PointsRegistry;
}
