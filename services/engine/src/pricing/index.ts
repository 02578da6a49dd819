/**
 * Pricing Module Exports
 */

export * from "./types.js";
export * from "./pricing-curve.js";
