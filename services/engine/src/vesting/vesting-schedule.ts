/**
 * Vesting Schedule
 *
 * Linear release of creator principal:
 *   vested(t) = total * min(t - start, duration) / duration
 *   releasable(t) = vested(t) - released
 *
 * Unreleased principal earns in the yield vault under the custodian's
 * position. A release hands the matching share of that position, yield
 * included, to the beneficiary.
 */

import { getAddress, isAddressEqual, type Address } from "viem";
import {
  engineLogger as logger,
  audit,
  logFundMovement,
  AuthorizationError,
  StateError,
  ValidationError,
} from "@curvefund/shared";
import type { TransferableAsset, YieldVault } from "../collaborators/types.js";
import { runAtomically, type UnitOfWork } from "../runtime/unit-of-work.js";
import { callCollaborator, forwardToVault } from "../runtime/collaborator-call.js";
import type { OperationQueue } from "../runtime/operation-queue.js";
import type {
  VestingEntry,
  VestingRelease,
  VestingRequest,
  VestingRevocation,
  VestingScheduleConfig,
} from "./types.js";

const vestingLogger = logger.child({ component: "vesting-schedule" });

export interface VestingScheduleDeps {
  queue: OperationQueue;
  asset: TransferableAsset;
  vault: YieldVault;
}

// ============================================
// VESTING SCHEDULE
// ============================================

export class VestingSchedule {
  private readonly queue: OperationQueue;
  private readonly asset: TransferableAsset;
  private readonly vault: YieldVault;
  private readonly config: VestingScheduleConfig;

  private readonly entries: Map<number, VestingEntry> = new Map();
  private readonly byBeneficiary: Map<Address, number[]> = new Map();
  private nextId = 1;

  constructor(deps: VestingScheduleDeps, config: VestingScheduleConfig) {
    this.queue = deps.queue;
    this.asset = deps.asset;
    this.vault = deps.vault;
    this.config = { ...config };
  }

  /**
   * Start a schedule funded by `request.funder`. The entry exists only once the
   * principal sits in the vault. Pass `uow` to join an operation already running.
   */
  async create(request: VestingRequest, uow?: UnitOfWork): Promise<VestingEntry> {
    if (request.amount <= 0n) {
      throw new ValidationError("Vesting amount must be positive", "amount");
    }
    if (!Number.isInteger(request.durationMs) || request.durationMs <= 0) {
      throw new ValidationError("Vesting duration must be a positive integer", "durationMs");
    }

    if (uow) {
      return this.createWithin(request, uow);
    }
    return this.queue.run("vesting.create", () =>
      runAtomically("vesting.create", (inner) => this.createWithin(request, inner))
    );
  }

  /**
   * Release everything vested so far. Permissionless.
   */
  async release(id: number): Promise<VestingRelease> {
    return this.queue.run("vesting.release", () =>
      runAtomically("vesting.release", async (uow) => {
        const entry = this.require(id);
        if (entry.revoked) {
          throw new StateError(`Vesting ${id} is revoked`, "revoked");
        }
        const amount = this.releasable(id);
        if (amount === 0n) {
          throw new StateError(`Nothing releasable for vesting ${id}`, "nothing_releasable");
        }

        // Shares move pro rata to the unreleased principal; the last release takes them all
        const unreleased = entry.totalAmount - entry.released;
        const shares = amount === unreleased ? entry.shares : (entry.shares * amount) / unreleased;
        uow.set(entry, "released", entry.released + amount);
        uow.set(entry, "shares", entry.shares - shares);

        const { custodian } = this.config;
        if (shares > 0n) {
          await callCollaborator("vault", "transferShares", () =>
            this.vault.transferShares(custodian, entry.beneficiary, shares)
          );
        }

        logFundMovement("info", "vesting_released", {
          from: custodian,
          to: entry.beneficiary,
          amount,
          stream: "vested",
        });

        return {
          id,
          beneficiary: entry.beneficiary,
          amount,
          shares,
          totalReleased: entry.released,
        };
      })
    );
  }

  /**
   * Stop a schedule. Returns the principal that will never be released.
   */
  async revoke(id: number, caller: Address): Promise<VestingRevocation> {
    if (!isAddressEqual(caller, this.config.admin)) {
      throw new AuthorizationError(`Only the administrator can revoke vesting ${id}`, caller);
    }

    return this.queue.run("vesting.revoke", async () => {
      const entry = this.require(id);
      if (entry.revoked) {
        throw new StateError(`Vesting ${id} is already revoked`, "revoked");
      }

      entry.revoked = true;
      const unreleased = entry.totalAmount - entry.released;

      audit({
        action: "vesting_revoked",
        entityType: "vesting",
        entityId: String(id),
        actor: caller,
        details: { unreleased: unreleased.toString() },
      });

      return { id, unreleased };
    });
  }

  // ============================================
  // QUERIES
  // ============================================

  vestedAmount(id: number, at = Date.now()): bigint {
    const entry = this.require(id);
    const elapsed = Math.min(Math.max(at - entry.startTime, 0), entry.durationMs);
    return (entry.totalAmount * BigInt(elapsed)) / BigInt(entry.durationMs);
  }

  releasable(id: number, at = Date.now()): bigint {
    const entry = this.require(id);
    if (entry.revoked) {
      return 0n;
    }
    return this.vestedAmount(id, at) - entry.released;
  }

  getEntry(id: number): VestingEntry | undefined {
    const entry = this.entries.get(id);
    return entry ? { ...entry } : undefined;
  }

  getEntriesByBeneficiary(beneficiary: Address): VestingEntry[] {
    const ids = this.byBeneficiary.get(getAddress(beneficiary)) ?? [];
    return ids.map((id) => ({ ...this.require(id) }));
  }

  listEntries(): VestingEntry[] {
    return Array.from(this.entries.values(), (entry) => ({ ...entry }));
  }

  // ============================================
  // PRIVATE METHODS
  // ============================================

  private async createWithin(request: VestingRequest, uow: UnitOfWork): Promise<VestingEntry> {
    const shares = await forwardToVault(uow, {
      asset: this.asset,
      vault: this.vault,
      from: request.funder,
      receiver: this.config.custodian,
      amount: request.amount,
      label: "vesting principal",
      absorber: request.absorber,
    });

    const id = this.nextId++;
    const entry: VestingEntry = {
      id,
      beneficiary: getAddress(request.beneficiary),
      totalAmount: request.amount,
      released: 0n,
      startTime: Date.now(),
      durationMs: request.durationMs,
      revoked: false,
      shares,
    };

    this.entries.set(id, entry);
    const ids = this.byBeneficiary.get(entry.beneficiary) ?? [];
    ids.push(id);
    this.byBeneficiary.set(entry.beneficiary, ids);

    uow.onRollback(`remove vesting ${id}`, () => {
      this.entries.delete(id);
      ids.pop();
      this.nextId = id;
    });

    vestingLogger.info({
      id,
      beneficiary: entry.beneficiary,
      amount: entry.totalAmount.toString(),
      durationMs: entry.durationMs,
    }, "Vesting schedule created");

    return { ...entry };
  }

  private require(id: number): VestingEntry {
    const entry = this.entries.get(id);
    if (!entry) {
      throw new StateError(`Vesting ${id} not found`, "not_found");
    }
    return entry;
  }
}

/**
 * Factory function
 */
export function createVestingSchedule(
  deps: VestingScheduleDeps,
  config: VestingScheduleConfig
): VestingSchedule {
  return new VestingSchedule(deps, config);
}
