import type {
  AuthorResponse,
  CommentInput,
  FileChange,
  IdentityRef,
  MutatingOperation,
  Review,
  ReviewComment,
  SubmitReviewInput,
} from "../types.js";
import { FILE_CHANGE_TYPES, REVIEW_VERDICTS } from "../types.js";
import { ValidationFailed } from "./errors.js";

export const MAX_TITLE_LENGTH = 200;
export const MIN_REQUIRED_APPROVALS = 1;
export const MAX_REQUIRED_APPROVALS = 10;

/** Clock, id source and caller for one operation. */
export interface OperationContext {
  operation: MutatingOperation;
  actor: IdentityRef;
  now: string;
  nextId: () => string;
}

function fail(ctx: Pick<OperationContext, "operation">, rule: string, field: string, detail: string): never {
  throw new ValidationFailed(ctx.operation, rule, field, detail);
}

function isCount(n: number): boolean {
  return Number.isInteger(n) && n >= 0;
}

// --- Field rules ---

export function validateTitle(ctx: Pick<OperationContext, "operation">, title: string): string {
  const trimmed = title.trim();
  if (!trimmed) fail(ctx, "title_required", "title", "must not be empty");
  if (trimmed.length > MAX_TITLE_LENGTH) {
    fail(ctx, "title_too_long", "title", `must be at most ${MAX_TITLE_LENGTH} characters (got ${trimmed.length})`);
  }
  return trimmed;
}

export function validateBranches(
  ctx: Pick<OperationContext, "operation">,
  sourceBranch: string,
  targetBranch: string,
): { sourceBranch: string; targetBranch: string } {
  const source = sourceBranch.trim();
  const target = targetBranch.trim();
  if (!source) fail(ctx, "source_branch_required", "sourceBranch", "must not be empty");
  if (!target) fail(ctx, "target_branch_required", "targetBranch", "must not be empty");
  if (source === target) fail(ctx, "branches_identical", "targetBranch", `must differ from sourceBranch "${source}"`);
  return { sourceBranch: source, targetBranch: target };
}

export function validateRequiredApprovals(ctx: Pick<OperationContext, "operation">, count: number): number {
  if (!Number.isInteger(count) || count < MIN_REQUIRED_APPROVALS || count > MAX_REQUIRED_APPROVALS) {
    fail(
      ctx,
      "required_approvals_range",
      "requiredApprovals",
      `must be an integer between ${MIN_REQUIRED_APPROVALS} and ${MAX_REQUIRED_APPROVALS} (got ${count})`,
    );
  }
  return count;
}

/**
 * Validates a batch of file changes against the paths already on the pull request.
 * Returns frozen copies in input order.
 */
export function validateFileChanges(
  ctx: Pick<OperationContext, "operation">,
  changes: readonly FileChange[],
  existingPaths: readonly string[] = [],
): FileChange[] {
  if (changes.length === 0) fail(ctx, "files_required", "fileChanges", "at least one file change is required");

  const seen = new Set(existingPaths);
  return changes.map((change, i) => {
    const field = `fileChanges[${i}]`;
    const path = change.path.trim();
    if (!path) fail(ctx, "file_path_required", `${field}.path`, "must not be empty");
    if (!FILE_CHANGE_TYPES.includes(change.changeType)) {
      fail(ctx, "change_type_invalid", `${field}.changeType`, `must be one of ${FILE_CHANGE_TYPES.join(", ")}`);
    }
    if (!isCount(change.linesAdded)) fail(ctx, "line_count_invalid", `${field}.linesAdded`, "must be a non-negative integer");
    if (!isCount(change.linesDeleted)) fail(ctx, "line_count_invalid", `${field}.linesDeleted`, "must be a non-negative integer");

    const oldPath = change.oldPath?.trim();
    if (change.changeType === "RENAMED") {
      if (!oldPath) fail(ctx, "old_path_required", `${field}.oldPath`, "is required for RENAMED");
      if (oldPath === path) fail(ctx, "old_path_unchanged", `${field}.oldPath`, "must differ from path");
    } else if (change.oldPath !== undefined) {
      fail(ctx, "old_path_unexpected", `${field}.oldPath`, `is only allowed for RENAMED (got ${change.changeType})`);
    }

    if (seen.has(path)) fail(ctx, "duplicate_path", `${field}.path`, `"${path}" is already part of the pull request`);
    seen.add(path);

    const copy: FileChange = { path, changeType: change.changeType, linesAdded: change.linesAdded, linesDeleted: change.linesDeleted };
    return Object.freeze(oldPath ? { ...copy, oldPath } : copy);
  });
}

export function validateParties(
  ctx: Pick<OperationContext, "operation" | "actor">,
  reviewers: readonly IdentityRef[],
  maintainer: IdentityRef,
): { reviewers: IdentityRef[]; maintainer: IdentityRef } {
  const unique = [...new Set(reviewers)];
  if (unique.length === 0) fail(ctx, "reviewers_required", "reviewers", "at least one reviewer is required");
  if (unique.some((r) => !r.trim())) fail(ctx, "identity_required", "reviewers", "reviewer identities must not be empty");
  if (unique.includes(ctx.actor)) fail(ctx, "self_review", "reviewers", `the author ${ctx.actor} cannot review their own pull request`);

  if (!maintainer.trim()) fail(ctx, "identity_required", "maintainer", "must not be empty");

  return { reviewers: unique, maintainer };
}

// --- Records ---

export function createComment(
  ctx: OperationContext,
  input: CommentInput,
  filePaths: readonly string[],
  field = "comment",
): ReviewComment {
  const filePath = input.filePath.trim();
  if (!filePath) fail(ctx, "file_path_required", `${field}.filePath`, "must not be empty");
  if (!filePaths.includes(filePath)) {
    fail(ctx, "unknown_file", `${field}.filePath`, `"${filePath}" is not part of the pull request`);
  }
  if (!Number.isInteger(input.lineNumber) || input.lineNumber < 1) {
    fail(ctx, "line_number_positive", `${field}.lineNumber`, `must be a positive integer (got ${input.lineNumber})`);
  }
  const text = input.text.trim();
  if (!text) fail(ctx, "comment_text_required", `${field}.text`, "must not be empty");

  return Object.freeze({
    id: ctx.nextId(),
    filePath,
    lineNumber: input.lineNumber,
    text,
    createdAt: ctx.now,
    author: ctx.actor,
  });
}

/** Builds the immutable review record. Nothing about it changes after this call. */
export function createReview(ctx: OperationContext, input: SubmitReviewInput, filePaths: readonly string[]): Review {
  if (!REVIEW_VERDICTS.includes(input.verdict)) {
    fail(ctx, "verdict_invalid", "verdict", `must be one of ${REVIEW_VERDICTS.join(", ")}`);
  }
  const summary = input.summary.trim();
  if (!summary) fail(ctx, "summary_required", "summary", "must not be empty");

  const comments = (input.comments ?? []).map((c, i) => createComment(ctx, c, filePaths, `comments[${i}]`));

  return Object.freeze({
    id: ctx.nextId(),
    verdict: input.verdict,
    summary,
    comments: Object.freeze(comments),
    submittedAt: ctx.now,
    reviewer: ctx.actor,
  });
}

export function createAuthorResponse(
  ctx: OperationContext,
  reviewId: string,
  text: string,
  reviews: readonly Review[],
): AuthorResponse {
  if (!reviews.some((r) => r.id === reviewId)) {
    fail(ctx, "unknown_review", "reviewId", `no review with id ${reviewId}`);
  }
  const body = text.trim();
  if (!body) fail(ctx, "response_text_required", "text", "must not be empty");

  return Object.freeze({
    id: ctx.nextId(),
    reviewId,
    text: body,
    createdAt: ctx.now,
    author: ctx.actor,
  });
}
