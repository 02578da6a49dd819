/**
 * Collaborator call helpers
 */

import { isAddressEqual, type Address } from "viem";
import { CollaboratorError, isEngineError } from "@curvefund/shared";
import type { TransferableAsset, YieldVault } from "../collaborators/types.js";
import type { UnitOfWork } from "./unit-of-work.js";

/**
 * Await a collaborator, converting foreign failures into CollaboratorError
 */
export async function callCollaborator<T>(
  collaborator: string,
  action: string,
  fn: () => Promise<T>
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (isEngineError(error)) {
      throw error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new CollaboratorError(`${collaborator}.${action} failed: ${reason}`, collaborator, error);
  }
}

/**
 * Journaled transfer: the reverse transfer is registered for rollback
 */
export async function transferWithRollback(
  uow: UnitOfWork,
  asset: TransferableAsset,
  from: Address,
  to: Address,
  amount: bigint,
  label: string
): Promise<void> {
  if (amount === 0n) return;

  await callCollaborator("asset", "transfer", () => asset.transfer(from, to, amount));
  uow.onRollback(`reverse ${label}`, () => asset.transfer(to, from, amount));
}

export interface VaultForward {
  asset: TransferableAsset;
  vault: YieldVault;
  from: Address;
  receiver: Address;
  amount: bigint;
  label: string;
  /** Position that covers deposit rounding when the forward is rolled back */
  absorber?: Address;
}

/**
 * Push `amount` to the vault and deposit it for `receiver`.
 * A failed deposit returns the pushed funds; a rollback returns exactly `amount` to `from`.
 */
export async function forwardToVault(uow: UnitOfWork, forward: VaultForward): Promise<bigint> {
  const { asset, vault, from, receiver, amount, label, absorber } = forward;

  await callCollaborator("asset", "transfer", () => asset.transfer(from, vault.address, amount));

  let shares: bigint;
  try {
    shares = await callCollaborator("vault", "deposit", () => vault.deposit(amount, receiver));
  } catch (error) {
    await callCollaborator("asset", "transfer", () => asset.transfer(vault.address, from, amount));
    throw error;
  }

  uow.onRollback(`return ${label}`, () => returnFromVault(vault, { to: from, owner: receiver, amount, absorber }));

  return shares;
}

interface VaultReturn {
  to: Address;
  owner: Address;
  amount: bigint;
  absorber?: Address;
}

/**
 * Send exactly `amount` out of `owner`'s position. Shares minted on deposit
 * round down, so the position can be worth one unit less than it took in;
 * the absorber's position pays that remainder.
 */
async function returnFromVault(vault: YieldVault, request: VaultReturn): Promise<void> {
  const { to, owner, amount, absorber } = request;

  const held = await vault.balanceOf(owner);
  const worth = await vault.convertToAssets(held);
  if (worth >= amount) {
    await vault.withdraw(amount, to, owner);
    return;
  }

  const returned = held > 0n ? await vault.redeem(held, to, owner) : 0n;
  const shortfall = amount - returned;
  if (absorber === undefined || isAddressEqual(absorber, owner)) {
    throw new Error(`Position of ${owner} returned ${returned} of ${amount}`);
  }
  await vault.withdraw(shortfall, to, absorber);
}
