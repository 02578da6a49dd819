/**
 * Rewards Module Exports
 */

// Types
export * from "./types.js";

// Accumulator
export { RewardAccumulator, createRewardAccumulator } from "./reward-accumulator.js";

// Pools
export {
  RewardPool,
  PointsYieldPool,
  LpFeePool,
  VolumePointsPool,
  type PointsYieldPoolDeps,
  type LpFeePoolDeps,
  type VolumePointsPoolDeps,
} from "./reward-pool.js";
