/**
 * Collaborators Module Exports
 *
 * Interfaces the engine depends on, plus in-memory implementations
 * for development and tests.
 */

// Interfaces
export * from "./types.js";

// In-memory implementations
export * from "./failure-injector.js";
export * from "./in-memory-asset.js";
export * from "./in-memory-vault.js";
export * from "./in-memory-liquidity.js";
export * from "./in-memory-points.js";
export * from "./in-memory-collaborators.js";
