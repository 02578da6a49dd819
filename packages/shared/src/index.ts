/**
 * @curvefund/shared
 * Shared logger, schemas, constants and errors for CurveFund
 */

// Export schemas
export * from "./schemas/index.js";

// Export constants (fixed-point scales, splits, campaign defaults)
export * from "./constants/index.js";

// Export errors
export * from "./errors/index.js";

// Export logger
export {
  logger,
  createServiceLogger,
  engineLogger,
  rewardsLogger,
  logFundMovement,
  audit,
  logError,
  createTimer,
  withTiming,
} from "./logger/index.js";

