/**
 * Allocation Module Exports
 */

export * from "./types.js";
export * from "./fund-allocator.js";
