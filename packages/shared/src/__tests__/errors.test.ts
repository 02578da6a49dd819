import { describe, it, expect } from "vitest";
import {
  AuthorizationError,
  CollaboratorError,
  StateError,
  ValidationError,
  isEngineError,
} from "../errors/index.js";

describe("Errors", () => {
  it("should carry stable codes", () => {
    expect(new ValidationError("bad", "amount").code).toBe("VALIDATION");
    expect(new AuthorizationError("no", "0xabc").code).toBe("UNAUTHORIZED");
    expect(new StateError("done", "already_complete").code).toBe("INVALID_STATE");
    expect(new CollaboratorError("down", "vault").code).toBe("COLLABORATOR_FAILURE");
  });

  it("should name errors after their class", () => {
    expect(new StateError("x", "expired").name).toBe("StateError");
    expect(new ValidationError("x").name).toBe("ValidationError");
  });

  it("should keep the wrapped cause", () => {
    const cause = new Error("deposit reverted");
    const error = new CollaboratorError("vault.deposit failed", "vault", cause);
    expect(error.cause).toBe(cause);
    expect(error.collaborator).toBe("vault");
  });

  it("should recognise engine errors only", () => {
    expect(isEngineError(new StateError("x", "revoked"))).toBe(true);
    expect(isEngineError(new Error("plain"))).toBe(false);
    expect(isEngineError("string")).toBe(false);
  });
});
