/**
 * CurveFund Errors
 *
 * Every error raised by the engine carries a stable `code`.
 * Validation, authorization and state errors are thrown before any mutation;
 * collaborator errors abort and roll back the triggering operation.
 */

export type EngineErrorCode =
  | "VALIDATION"
  | "UNAUTHORIZED"
  | "INVALID_STATE"
  | "COLLABORATOR_FAILURE";

export abstract class EngineError extends Error {
  abstract readonly code: EngineErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends EngineError {
  readonly code = "VALIDATION" as const;

  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
  }
}

export class AuthorizationError extends EngineError {
  readonly code = "UNAUTHORIZED" as const;

  constructor(
    message: string,
    public readonly caller: string
  ) {
    super(message);
  }
}

/**
 * Raised when an operation is not allowed in the current state
 * (inactive campaign, duplicate sponsorship, nothing to claim, ...)
 */
export class StateError extends EngineError {
  readonly code = "INVALID_STATE" as const;

  constructor(
    message: string,
    public readonly reason: StateErrorReason
  ) {
    super(message);
  }
}

export type StateErrorReason =
  | "not_found"
  | "already_complete"
  | "cancelled"
  | "expired"
  | "already_sponsored"
  | "nothing_to_claim"
  | "no_weight"
  | "revoked"
  | "nothing_releasable"
  | "reentrant";

export class CollaboratorError extends EngineError {
  readonly code = "COLLABORATOR_FAILURE" as const;

  constructor(
    message: string,
    public readonly collaborator: string,
    cause?: unknown
  ) {
    super(message, { cause });
  }
}

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}
