/**
 * In-memory collaborator bundle for development and tests
 */

import { getAddress } from "viem";
import { SETTLEMENT_DECIMALS } from "@curvefund/shared";
import type { Collaborators } from "./types.js";
import { InMemorySettlementAsset } from "./in-memory-asset.js";
import { InMemoryYieldVault } from "./in-memory-vault.js";
import { InMemoryLiquidityProvider } from "./in-memory-liquidity.js";
import { InMemoryPointsRegistry } from "./in-memory-points.js";

export const IN_MEMORY_ADDRESSES = {
  asset: getAddress("0x00000000000000000000000000000000000c0f11"),
  vault: getAddress("0x00000000000000000000000000000000000c0f12"),
  liquidity: getAddress("0x00000000000000000000000000000000000c0f13"),
} as const;

export interface InMemoryCollaborators extends Collaborators {
  asset: InMemorySettlementAsset;
  vault: InMemoryYieldVault;
  liquidity: InMemoryLiquidityProvider;
  points: InMemoryPointsRegistry;
}

export function createInMemoryCollaborators(): InMemoryCollaborators {
  const asset = new InMemorySettlementAsset(IN_MEMORY_ADDRESSES.asset, SETTLEMENT_DECIMALS);
  return {
    asset,
    vault: new InMemoryYieldVault(asset, IN_MEMORY_ADDRESSES.vault),
    liquidity: new InMemoryLiquidityProvider(IN_MEMORY_ADDRESSES.liquidity),
    points: new InMemoryPointsRegistry(),
  };
}
