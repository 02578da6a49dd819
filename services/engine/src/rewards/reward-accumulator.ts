/**
 * Reward Accumulator
 *
 * Lazy "reward per unit weight" ledger for one weighted population and one
 * reward asset:
 *   pending(a) = (weight(a) * accPerWeight - debt(a)) / SCALE + owed(a)
 *
 * Debt is kept at full scale so each accrual is floored once.
 * Deposits while nobody holds weight park in `undistributed` until flushed.
 * Every division floors, so dust stays in the pool and no claimant is overpaid.
 * New weight holders start from the current accumulator and earn nothing
 * retroactively.
 */

import {
  rewardsLogger as logger,
  ACC_SCALE,
  StateError,
  ValidationError,
} from "@curvefund/shared";
import type { Logger } from "pino";
import type { AccountPosition, AccumulatorAccounting } from "./types.js";

interface AccountState {
  weight: bigint;
  debt: bigint; // weight * accPerWeight at the last checkpoint, unscaled
  owed: bigint;
  claimed: bigint;
}

// ============================================
// REWARD ACCUMULATOR
// ============================================

export class RewardAccumulator {
  readonly name: string;

  private accPerWeight = 0n;
  private totalWeightValue = 0n;
  private undistributed = 0n;
  private totalDeposited = 0n;
  private totalClaimed = 0n;

  private readonly accounts: Map<string, AccountState> = new Map();
  private readonly log: Logger;

  constructor(name: string) {
    this.name = name;
    this.log = logger.child({ component: "reward-accumulator", pool: name });
  }

  /**
   * Checkpoint an account and move it to `newWeight`.
   * Accrued rewards are kept as owed, including when the new weight is zero.
   */
  onWeightChange(account: string, newWeight: bigint): bigint {
    if (newWeight < 0n) {
      throw new ValidationError("Weight must not be negative", "newWeight");
    }

    const state = this.getOrCreate(account);
    const accrued = this.accrued(state);
    state.owed += accrued;

    this.totalWeightValue += newWeight - state.weight;
    state.weight = newWeight;
    state.debt = newWeight * this.accPerWeight;

    this.log.debug({
      account,
      newWeight: newWeight.toString(),
      flushed: accrued.toString(),
      totalWeight: this.totalWeightValue.toString(),
    }, "Weight changed");

    return accrued;
  }

  /**
   * Distribute `amount` across current weight, or park it when there is none
   */
  deposit(amount: bigint): void {
    if (amount <= 0n) {
      throw new ValidationError("Deposit must be positive", "amount");
    }

    this.totalDeposited += amount;

    if (this.totalWeightValue > 0n) {
      this.accPerWeight += (amount * ACC_SCALE) / this.totalWeightValue;
    } else {
      this.undistributed += amount;
      this.log.info({
        amount: amount.toString(),
        undistributed: this.undistributed.toString(),
      }, "Deposit parked, no weight holders");
    }
  }

  /**
   * Zero the account's pending rewards and return the amount to pay out
   */
  claim(account: string): bigint {
    const state = this.accounts.get(account);
    const amount = state ? this.accrued(state) + state.owed : 0n;

    if (!state || amount === 0n) {
      throw new StateError(`Nothing to claim for ${account} in ${this.name}`, "nothing_to_claim");
    }

    state.owed = 0n;
    state.debt = state.weight * this.accPerWeight;
    state.claimed += amount;
    this.totalClaimed += amount;

    this.log.info({ account, amount: amount.toString() }, "Rewards claimed");

    return amount;
  }

  /**
   * Restore a claim that could not be paid out
   */
  restoreClaim(account: string, amount: bigint): void {
    const state = this.accounts.get(account);
    if (!state || amount <= 0n || amount > state.claimed) {
      throw new ValidationError(`Cannot restore ${amount} to ${account}`, "amount");
    }
    state.owed += amount;
    state.claimed -= amount;
    this.totalClaimed -= amount;
  }

  /**
   * Fold parked deposits into the accumulator. Returns the folded amount.
   */
  flushUndistributed(): bigint {
    if (this.totalWeightValue === 0n) {
      throw new StateError(`Cannot flush ${this.name} with zero total weight`, "no_weight");
    }

    const amount = this.undistributed;
    if (amount === 0n) {
      return 0n;
    }

    this.undistributed = 0n;
    this.accPerWeight += (amount * ACC_SCALE) / this.totalWeightValue;

    this.log.info({
      amount: amount.toString(),
      totalWeight: this.totalWeightValue.toString(),
    }, "Undistributed rewards flushed");

    return amount;
  }

  pending(account: string): bigint {
    const state = this.accounts.get(account);
    return state ? this.accrued(state) + state.owed : 0n;
  }

  weightOf(account: string): bigint {
    return this.accounts.get(account)?.weight ?? 0n;
  }

  totalWeight(): bigint {
    return this.totalWeightValue;
  }

  getUndistributed(): bigint {
    return this.undistributed;
  }

  getAccPerWeight(): bigint {
    return this.accPerWeight;
  }

  getPosition(account: string): AccountPosition {
    const state = this.accounts.get(account);
    return {
      account,
      weight: state?.weight ?? 0n,
      debt: (state?.debt ?? 0n) / ACC_SCALE,
      pending: this.pending(account),
      claimed: state?.claimed ?? 0n,
    };
  }

  listAccounts(): string[] {
    return Array.from(this.accounts.keys());
  }

  /**
   * Conservation snapshot: deposited = outstanding + claimed + undistributed + dust
   */
  accounting(): AccumulatorAccounting {
    let outstanding = 0n;
    for (const state of this.accounts.values()) {
      outstanding += this.accrued(state) + state.owed;
    }

    return {
      name: this.name,
      totalDeposited: this.totalDeposited,
      totalClaimed: this.totalClaimed,
      outstanding,
      undistributed: this.undistributed,
      dust: this.totalDeposited - this.totalClaimed - outstanding - this.undistributed,
      totalWeight: this.totalWeightValue,
      accounts: this.accounts.size,
    };
  }

  // ============================================
  // PRIVATE METHODS
  // ============================================

  private accrued(state: AccountState): bigint {
    return (state.weight * this.accPerWeight - state.debt) / ACC_SCALE;
  }

  private getOrCreate(account: string): AccountState {
    let state = this.accounts.get(account);
    if (!state) {
      state = { weight: 0n, debt: 0n, owed: 0n, claimed: 0n };
      this.accounts.set(account, state);
    }
    return state;
  }
}

/**
 * Factory function
 */
export function createRewardAccumulator(name: string): RewardAccumulator {
  return new RewardAccumulator(name);
}
