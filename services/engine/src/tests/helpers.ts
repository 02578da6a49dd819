/**
 * Shared test fixtures
 */

import { getAddress, type Address } from "viem";

export const T0 = Date.UTC(2026, 0, 1);
export const DAY = 24 * 60 * 60 * 1000;

export function addr(n: number): Address {
  return getAddress(`0x${n.toString(16).padStart(40, "0")}`);
}
