/**
 * Vesting Types
 */

import type { Address } from "viem";

export interface VestingEntry {
  id: number;
  beneficiary: Address;
  totalAmount: bigint;
  released: bigint;
  startTime: number;
  durationMs: number;
  revoked: boolean;
  shares: bigint; // vault shares held by the custodian for this entry
}

export interface VestingRequest {
  beneficiary: Address;
  amount: bigint;
  durationMs: number;
  /** Account the principal is pulled from */
  funder: Address;
  /** Position that covers vault rounding if the creation is rolled back */
  absorber?: Address;
}

export interface VestingRelease {
  id: number;
  beneficiary: Address;
  amount: bigint;
  shares: bigint; // custody shares moved to the beneficiary
  totalReleased: bigint;
}

export interface VestingRevocation {
  id: number;
  unreleased: bigint;
}

export interface VestingScheduleConfig {
  /** Owner of the vault position that backs unreleased principal */
  custodian: Address;
  admin: Address;
}
