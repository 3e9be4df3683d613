import type { IdentityRef, MutatingOperation, OperationName, Parties, PartyRole, PRLifecycleState } from "../types.js";
import { OPERATION_RULES } from "./state-machine.js";
import { AuthorizationDenied, StateGuardViolation } from "./errors.js";

export type DenialReason = "not_in_role" | "state_not_permitted";

export type AuthorizationDecision =
  | { allowed: true; roles: PartyRole[] }
  | { allowed: false; reason: DenialReason; message: string };

export const ANY_ROLE: readonly PartyRole[] = ["author", "reviewers", "maintainer"];

export function hasRole(parties: Parties, identity: IdentityRef, role: PartyRole): boolean {
  switch (role) {
    case "author":
      return parties.author === identity;
    case "reviewers":
      return parties.reviewers.includes(identity);
    case "maintainer":
      return parties.maintainer === identity;
  }
}

/** All roles the identity holds on this pull request. */
export function resolveRoles(parties: Parties, identity: IdentityRef): PartyRole[] {
  return ANY_ROLE.filter((role) => hasRole(parties, identity, role));
}

/**
 * Pure check of (identity, frozen roles, operation, state). Role membership is
 * tested before the state so a stranger never learns which states are open.
 */
export function authorize(
  parties: Parties,
  identity: IdentityRef,
  operation: MutatingOperation,
  state: PRLifecycleState,
): AuthorizationDecision {
  const rule = OPERATION_RULES[operation];
  const held = resolveRoles(parties, identity);

  if (!rule.roles.some((role) => held.includes(role))) {
    return {
      allowed: false,
      reason: "not_in_role",
      message: `${identity} holds none of [${rule.roles.join(", ")}] for ${operation}`,
    };
  }

  if (!rule.from.includes(state)) {
    return {
      allowed: false,
      reason: "state_not_permitted",
      message: `${operation} is not permitted in state ${state}`,
    };
  }

  return { allowed: true, roles: held };
}

/** Throwing form used by the engine: maps each denial reason onto its failure kind. */
export function assertAuthorized(
  parties: Parties,
  identity: IdentityRef,
  operation: MutatingOperation,
  state: PRLifecycleState,
): PartyRole[] {
  const decision = authorize(parties, identity, operation, state);
  if (decision.allowed) return decision.roles;

  const rule = OPERATION_RULES[operation];
  if (decision.reason === "not_in_role") {
    throw new AuthorizationDenied(operation, identity, rule.roles);
  }
  throw new StateGuardViolation(operation, state, rule.from);
}

/** Queries are open to any party and have no state restriction. */
export function assertParty(parties: Parties, identity: IdentityRef, operation: OperationName): PartyRole[] {
  const held = resolveRoles(parties, identity);
  if (held.length === 0) {
    throw new AuthorizationDenied(operation, identity, ANY_ROLE);
  }
  return held;
}
