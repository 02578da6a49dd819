/**
 * Runtime Module Exports
 */

export * from "./unit-of-work.js";
export * from "./operation-queue.js";
export * from "./collaborator-call.js";
