import type { IdentityRef, OperationName, PartyRole, PRLifecycleState } from "../types.js";

export type ProtocolErrorKind =
  | "AuthorizationDenied"
  | "StateGuardViolation"
  | "ValidationFailed"
  | "MergeNotEligible"
  | "PullRequestNotFound"
  | "ConcurrencyConflict"
  | "PersistenceFailed";

/**
 * Base of every failure the engine reports. An operation that throws one of these
 * has made no observable change.
 */
export abstract class ProtocolError extends Error {
  abstract readonly kind: ProtocolErrorKind;

  constructor(
    message: string,
    readonly operation: OperationName,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class AuthorizationDenied extends ProtocolError {
  readonly kind = "AuthorizationDenied";

  constructor(
    operation: OperationName,
    readonly identity: IdentityRef,
    readonly requiredRoles: readonly PartyRole[],
  ) {
    super(`${identity} is not authorized for ${operation} (requires ${requiredRoles.join(" or ")})`, operation);
  }
}

export class StateGuardViolation extends ProtocolError {
  readonly kind = "StateGuardViolation";

  constructor(
    operation: OperationName,
    readonly currentState: PRLifecycleState,
    readonly allowedStates: readonly PRLifecycleState[],
  ) {
    super(`${operation} is not permitted in state ${currentState} (allowed: ${allowedStates.join(", ")})`, operation);
  }
}

export class ValidationFailed extends ProtocolError {
  readonly kind = "ValidationFailed";

  constructor(
    operation: OperationName,
    readonly rule: string,
    readonly field: string,
    detail: string,
  ) {
    super(`${field}: ${detail}`, operation);
  }
}

export class MergeNotEligible extends ProtocolError {
  readonly kind = "MergeNotEligible";

  constructor(readonly blockers: readonly string[]) {
    super(`Pull request cannot be merged: ${blockers.join("; ")}`, "merge");
  }
}

export class PullRequestNotFound extends ProtocolError {
  readonly kind = "PullRequestNotFound";

  constructor(
    operation: OperationName,
    readonly pullRequestId: string,
  ) {
    super(`No pull request with id ${pullRequestId}`, operation);
  }
}

export class ConcurrencyConflict extends ProtocolError {
  readonly kind = "ConcurrencyConflict";

  constructor(
    operation: OperationName,
    readonly pullRequestId: string,
    readonly expectedVersion: number,
    readonly actualVersion: number,
  ) {
    super(
      `Pull request ${pullRequestId} changed concurrently (expected version ${expectedVersion}, found ${actualVersion})`,
      operation,
    );
  }
}

export class PersistenceFailed extends ProtocolError {
  readonly kind = "PersistenceFailed";

  constructor(
    operation: OperationName,
    readonly pullRequestId: string,
    readonly reason: unknown,
  ) {
    super(`Failed to persist pull request ${pullRequestId}: ${reason instanceof Error ? reason.message : String(reason)}`, operation);
  }
}

export function isProtocolError(err: unknown): err is ProtocolError {
  return err instanceof ProtocolError;
}
