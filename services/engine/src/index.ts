/**
 * CurveFund Engine Service
 * Bonding-curve capital raising with vested payouts and reward pools
 *
 * Features:
 * - Linear price curve over a fixed sale allocation
 * - Completion split: instant payout, vesting, platform fee, liquidity
 * - Points bank for sponsored campaigns
 * - Lazy reward accumulators for yield, LP fees and volume points
 * - Serial operations with full rollback on collaborator failure
 */

import "dotenv/config";

// Export all modules
export * from "./pricing/index.js";
export * from "./allocation/index.js";
export * from "./rewards/index.js";
export * from "./vesting/index.js";
export * from "./campaign/index.js";
export * from "./collaborators/index.js";
export * from "./runtime/index.js";
export * from "./invariants/index.js";
export * from "./engine.js";
export * from "./config.js";

import { engineLogger as logger } from "@curvefund/shared";
import { createEngine } from "./engine.js";
import { loadEngineConfig } from "./config.js";
import { createInMemoryCollaborators } from "./collaborators/in-memory-collaborators.js";

async function main(): Promise<void> {
  logger.info("Starting CurveFund engine...");

  const config = loadEngineConfig();

  logger.info({
    ledger: config.ledgerAddress,
    liquidityFailurePolicy: config.liquidityFailurePolicy,
    liquidityRetries: config.liquidityRetries,
    harvestIntervalMs: config.harvestIntervalMs,
  }, "Configuration loaded");

  const engine = createEngine(createInMemoryCollaborators(), config);

  // Upkeep runs through the same queue as every other operation
  const interval = Math.max(config.harvestIntervalMs, 60_000);
  const timer = setInterval(() => {
    engine.runMaintenance().catch((error) => {
      logger.error({ error }, "Scheduled maintenance failed");
    });
  }, interval);

  logger.info({ maintenanceIntervalMs: interval }, "CurveFund engine started with in-memory collaborators");

  process.on("SIGINT", () => {
    logger.info("Shutting down CurveFund engine...");
    clearInterval(timer);
    engine
      .shutdown()
      .then(() => process.exit(0))
      .catch((error) => {
        logger.error({ error }, "Shutdown failed");
        process.exit(1);
      });
  });
}

// Run if executed directly (cross-platform compatible)
const currentFileUrl = import.meta.url;
const argvPath = process.argv[1]?.replace(/\\/g, "/") || "";
const isMainModule = argvPath !== "" && (currentFileUrl.endsWith(argvPath) || currentFileUrl === `file:///${argvPath}` || currentFileUrl === `file://${argvPath}`);
if (isMainModule) {
  main().catch((error) => {
    logger.fatal({ error }, "Failed to start CurveFund engine");
    process.exit(1);
  });
}
