/**
 * Vesting Module Exports
 */

export * from "./types.js";
export {
  VestingSchedule,
  createVestingSchedule,
  type VestingScheduleDeps,
} from "./vesting-schedule.js";
