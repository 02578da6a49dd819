/**
 * Invariants Module Exports
 */

export * from "./types.js";
export { InvariantChecker, createInvariantChecker } from "./invariant-checker.js";
