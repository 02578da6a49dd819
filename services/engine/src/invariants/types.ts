/**
 * Invariant Types
 */

export type InvariantCheckType = "pre_operation" | "post_operation" | "periodic";

export interface InvariantCheckResult {
  passed: boolean;

  // What was checked, e.g. "campaign:1" or "accumulator:points-yield"
  subject: string;
  violations: string[];

  checkType: InvariantCheckType;
  operationId?: string;
  timestamp: number;
}

export interface InvariantStatistics {
  totalChecks: number;
  passedChecks: number;
  failedChecks: number;
  successRate: number;
  healthScore: number;
}

export class InvariantViolationError extends Error {
  constructor(
    message: string,
    public readonly subject: string,
    public readonly violations: string[]
  ) {
    super(message);
    this.name = "InvariantViolationError";
  }
}
