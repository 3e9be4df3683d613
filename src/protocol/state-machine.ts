import type { MutatingOperation, PartyRole, PRLifecycleState, ReviewVerdict } from "../types.js";
import { LIFECYCLE_STATES } from "../types.js";

export interface OperationRule {
  /** Any one of these roles is sufficient. */
  roles: readonly PartyRole[];
  /** States the operation may start from. Empty for create. */
  from: readonly PRLifecycleState[];
  /**
   * Target state. `null` leaves the state unchanged; `"by_verdict"` defers to
   * {@link nextStateAfterReview}.
   */
  to: PRLifecycleState | "by_verdict" | null;
  /** States the transition may commit from, when narrower than `from`. */
  commitsFrom?: readonly PRLifecycleState[];
}

export const FINAL_STATES: readonly PRLifecycleState[] = ["merged"];

const REVIEWABLE: readonly PRLifecycleState[] = ["review_requested", "in_review", "changes_requested"];
const EDITABLE: readonly PRLifecycleState[] = ["draft", "open", "review_requested", "changes_requested"];

export const OPERATION_RULES: Readonly<Record<MutatingOperation, OperationRule>> = {
  create: { roles: [], from: [], to: "draft" },
  markReadyForReview: { roles: ["author"], from: ["draft"], to: "open" },
  convertToDraft: { roles: ["author"], from: ["open", "review_requested"], to: "draft" },
  requestReview: { roles: ["reviewers"], from: ["open"], to: "review_requested" },
  submitReview: { roles: ["reviewers"], from: REVIEWABLE, to: "by_verdict" },
  // Premature merges after review started are eligibility failures, not guard failures
  merge: { roles: ["maintainer"], from: ["in_review", "changes_requested", "approved"], to: "merged", commitsFrom: ["approved"] },
  close: {
    roles: ["maintainer"],
    from: LIFECYCLE_STATES.filter((s) => !FINAL_STATES.includes(s) && s !== "closed"),
    to: "closed",
  },
  reopen: { roles: ["maintainer"], from: ["closed"], to: "open" },
  updateDetails: { roles: ["author"], from: EDITABLE, to: null },
  addFiles: { roles: ["author"], from: EDITABLE, to: null },
  addComment: { roles: ["reviewers", "maintainer"], from: ["open", "review_requested", "in_review", "changes_requested"], to: null },
  respondToReview: { roles: ["author"], from: ["in_review", "changes_requested", "approved"], to: null },
  setRequiredApprovals: { roles: ["maintainer"], from: ["draft", "open", "review_requested"], to: null },
};

export function isFinal(state: PRLifecycleState): boolean {
  return FINAL_STATES.includes(state);
}

export function isPermittedIn(operation: MutatingOperation, state: PRLifecycleState): boolean {
  return OPERATION_RULES[operation].from.includes(state);
}

/**
 * Next state after a review is appended. `approvalCount` must already include the
 * new review.
 */
export function nextStateAfterReview(
  current: PRLifecycleState,
  verdict: ReviewVerdict,
  approvalCount: number,
  requiredApprovals: number,
): PRLifecycleState {
  // 1. A change request wins over any number of approvals
  if (verdict === "REQUEST_CHANGES") return "changes_requested";

  // 2. Approvals move to approved once the threshold is met
  if (verdict === "APPROVE") {
    return approvalCount >= requiredApprovals ? "approved" : "in_review";
  }

  // 3. Plain comments only start the review
  if (current === "in_review" || current === "changes_requested") return current;
  return "in_review";
}

function targetsOf(rule: OperationRule): PRLifecycleState[] {
  if (rule.to === "by_verdict") return ["changes_requested", "approved", "in_review"];
  return rule.to ? [rule.to] : [];
}

/** Every edge `from -> to` reachable through some operation of the table. */
export const LEGAL_TRANSITIONS: ReadonlySet<string> = new Set(
  Object.values(OPERATION_RULES).flatMap((rule) =>
    (rule.commitsFrom ?? rule.from).flatMap((from) => targetsOf(rule).filter((to) => to !== from).map((to) => `${from}->${to}`)),
  ),
);

export function isLegalTransition(operation: MutatingOperation, from: PRLifecycleState, to: PRLifecycleState): boolean {
  if (from === to) return true;
  const rule = OPERATION_RULES[operation];
  return (rule.commitsFrom ?? rule.from).includes(from) && targetsOf(rule).includes(to);
}
