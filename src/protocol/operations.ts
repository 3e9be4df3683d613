import { createHash } from "node:crypto";
import type {
  AddCommentResult,
  AddFilesResult,
  CommentInput,
  CreatePullRequestInput,
  CreateResult,
  FileChange,
  MergeResult,
  NotificationEvent,
  PullRequest,
  PullRequestSummary,
  RequiredApprovalsResult,
  RespondToReviewInput,
  RespondToReviewResult,
  StateResult,
  SubmitReviewInput,
  SubmitReviewResult,
  UpdateDetailsInput,
  UpdateDetailsResult,
} from "../types.js";
import type { OperationContext } from "./records.js";
import {
  createAuthorResponse,
  createComment,
  createReview,
  validateBranches,
  validateFileChanges,
  validateParties,
  validateRequiredApprovals,
  validateTitle,
} from "./records.js";
import { canMerge, mergeBlockers, tallyReviews } from "./aggregator.js";
import { nextStateAfterReview } from "./state-machine.js";
import { MergeNotEligible } from "./errors.js";

/** What an operation hands back to the engine: the caller's result and one event description. */
export interface Applied<R> {
  result: R;
  event: NotificationEvent;
}

function envelope(pr: Pick<PullRequest, "id">, ctx: OperationContext): Pick<NotificationEvent, "pullRequestId" | "actor" | "occurredAt"> {
  return { pullRequestId: pr.id, actor: ctx.actor, occurredAt: ctx.now };
}

/**
 * Copy of the aggregate that operations mutate. Records inside the collections are
 * frozen and shared; only the containers are new.
 */
export function stage(pr: PullRequest): PullRequest {
  return {
    ...pr,
    files: [...pr.files],
    reviews: [...pr.reviews],
    discussion: [...pr.discussion],
    responses: [...pr.responses],
  };
}

function filePaths(pr: PullRequest): string[] {
  return pr.files.map((f) => f.path);
}

// --- Creation ---

export function createPullRequest(
  ctx: OperationContext,
  input: CreatePullRequestInput,
  defaultRequiredApprovals: number,
): { pr: PullRequest } & Applied<CreateResult> {
  const title = validateTitle(ctx, input.title);
  const { sourceBranch, targetBranch } = validateBranches(ctx, input.sourceBranch, input.targetBranch);
  const files = validateFileChanges(ctx, input.fileChanges);
  const { reviewers, maintainer } = validateParties(ctx, input.reviewers, input.maintainer);
  const requiredApprovals = validateRequiredApprovals(ctx, input.requiredApprovals ?? defaultRequiredApprovals);

  const pr: PullRequest = {
    id: ctx.nextId(),
    version: 1,
    title,
    description: input.description,
    sourceBranch,
    targetBranch,
    files,
    state: "draft",
    requiredApprovals,
    parties: Object.freeze({ author: ctx.actor, reviewers: Object.freeze(reviewers), maintainer }),
    reviews: [],
    discussion: [],
    responses: [],
    createdAt: ctx.now,
    updatedAt: ctx.now,
    mergeCommitId: null,
    mergeCommitMessage: null,
    mergedAt: null,
    mergedBy: null,
    closedAt: null,
    closeReason: null,
  };

  return {
    pr,
    result: { id: pr.id, state: pr.state },
    event: { ...envelope(pr, ctx), name: "Created", payload: { title, sourceBranch, targetBranch, reviewers, maintainer } },
  };
}

// --- Author operations ---

export function updateDetails(
  draft: PullRequest,
  ctx: OperationContext,
  input: UpdateDetailsInput,
): Applied<UpdateDetailsResult> {
  draft.title = validateTitle(ctx, input.title);
  draft.description = input.description;
  return {
    result: { title: draft.title, description: draft.description, updatedAt: ctx.now },
    event: { ...envelope(draft, ctx), name: "DetailsUpdated", payload: { title: draft.title, description: draft.description } },
  };
}

export function addFiles(draft: PullRequest, ctx: OperationContext, changes: readonly FileChange[]): Applied<AddFilesResult> {
  const added = validateFileChanges(ctx, changes, filePaths(draft));
  draft.files.push(...added);
  return {
    result: { fileCount: draft.files.length },
    event: { ...envelope(draft, ctx), name: "FilesAdded", payload: { paths: added.map((f) => f.path), fileCount: draft.files.length } },
  };
}

export function markReadyForReview(draft: PullRequest, ctx: OperationContext): Applied<StateResult> {
  draft.state = "open";
  return { result: { state: draft.state }, event: { ...envelope(draft, ctx), name: "ReadyForReview", payload: { state: draft.state } } };
}

export function convertToDraft(draft: PullRequest, ctx: OperationContext): Applied<StateResult> {
  draft.state = "draft";
  return { result: { state: draft.state }, event: { ...envelope(draft, ctx), name: "ConvertedToDraft", payload: { state: draft.state } } };
}

export function respondToReview(
  draft: PullRequest,
  ctx: OperationContext,
  input: RespondToReviewInput,
): Applied<RespondToReviewResult> {
  const response = createAuthorResponse(ctx, input.reviewId, input.text, draft.reviews);
  draft.responses.push(response);
  return {
    result: { responseId: response.id },
    event: { ...envelope(draft, ctx), name: "AuthorResponded", payload: { responseId: response.id, reviewId: response.reviewId } },
  };
}

// --- Reviewer operations ---

export function requestReview(draft: PullRequest, ctx: OperationContext): Applied<StateResult> {
  draft.state = "review_requested";
  return {
    result: { state: draft.state },
    event: { ...envelope(draft, ctx), name: "ReviewRequested", payload: { reviewers: [...draft.parties.reviewers] } },
  };
}

export function submitReview(
  draft: PullRequest,
  ctx: OperationContext,
  input: SubmitReviewInput,
): Applied<SubmitReviewResult> {
  const review = createReview(ctx, input, filePaths(draft));
  draft.reviews.push(review);

  const tally = tallyReviews(draft.reviews);
  draft.state = nextStateAfterReview(draft.state, review.verdict, tally.approvalCount, draft.requiredApprovals);

  return {
    result: { reviewId: review.id, state: draft.state, approvalCount: tally.approvalCount },
    event: {
      ...envelope(draft, ctx),
      name: "ReviewSubmitted",
      payload: {
        reviewId: review.id,
        verdict: review.verdict,
        state: draft.state,
        approvalCount: tally.approvalCount,
        changesRequestedCount: tally.changesRequestedCount,
      },
    },
  };
}

export function addComment(draft: PullRequest, ctx: OperationContext, input: CommentInput): Applied<AddCommentResult> {
  const comment = createComment(ctx, input, filePaths(draft));
  draft.discussion.push(comment);
  return {
    result: { commentId: comment.id },
    event: { ...envelope(draft, ctx), name: "CommentAdded", payload: { commentId: comment.id, filePath: comment.filePath, lineNumber: comment.lineNumber } },
  };
}

// --- Maintainer operations ---

export function setRequiredApprovals(
  draft: PullRequest,
  ctx: OperationContext,
  count: number,
): Applied<RequiredApprovalsResult> {
  const previous = draft.requiredApprovals;
  draft.requiredApprovals = validateRequiredApprovals(ctx, count);
  return {
    result: { requiredApprovals: draft.requiredApprovals },
    event: { ...envelope(draft, ctx), name: "RequiredApprovalsChanged", payload: { previous, current: draft.requiredApprovals } },
  };
}

export function mergeCommitId(pr: Pick<PullRequest, "id" | "sourceBranch" | "targetBranch">, message: string, mergedAt: string): string {
  return createHash("sha1")
    .update([pr.id, pr.sourceBranch, pr.targetBranch, message, mergedAt].join("\n"))
    .digest("hex");
}

export function merge(draft: PullRequest, ctx: OperationContext, commitMessage: string): Applied<MergeResult> {
  const blockers = mergeBlockers(draft);
  if (blockers.length > 0) throw new MergeNotEligible(blockers);

  const message = commitMessage.trim() || `Merge pull request ${draft.id} from ${draft.sourceBranch}`;
  const commitId = mergeCommitId(draft, message, ctx.now);

  draft.state = "merged";
  draft.mergeCommitId = commitId;
  draft.mergeCommitMessage = message;
  draft.mergedAt = ctx.now;
  draft.mergedBy = ctx.actor;

  return {
    result: { mergeCommitId: commitId, state: draft.state },
    event: { ...envelope(draft, ctx), name: "Merged", payload: { mergeCommitId: commitId, mergedBy: ctx.actor, targetBranch: draft.targetBranch } },
  };
}

export function close(draft: PullRequest, ctx: OperationContext, reason: string): Applied<StateResult> {
  draft.state = "closed";
  draft.closedAt = ctx.now;
  draft.closeReason = reason.trim() || null;
  return { result: { state: draft.state }, event: { ...envelope(draft, ctx), name: "Closed", payload: { reason: draft.closeReason } } };
}

export function reopen(draft: PullRequest, ctx: OperationContext): Applied<StateResult> {
  draft.state = "open";
  draft.closedAt = null;
  draft.closeReason = null;
  return { result: { state: draft.state }, event: { ...envelope(draft, ctx), name: "Reopened", payload: { state: draft.state } } };
}

// --- Queries ---

export function summarize(pr: PullRequest): PullRequestSummary {
  const tally = tallyReviews(pr.reviews);
  return {
    id: pr.id,
    title: pr.title,
    description: pr.description,
    sourceBranch: pr.sourceBranch,
    targetBranch: pr.targetBranch,
    state: pr.state,
    author: pr.parties.author,
    reviewers: [...pr.parties.reviewers],
    maintainer: pr.parties.maintainer,
    fileCount: pr.files.length,
    linesAdded: pr.files.reduce((sum, f) => sum + f.linesAdded, 0),
    linesDeleted: pr.files.reduce((sum, f) => sum + f.linesDeleted, 0),
    requiredApprovals: pr.requiredApprovals,
    reviewCount: tally.reviewCount,
    approvalCount: tally.approvalCount,
    changesRequestedCount: tally.changesRequestedCount,
    commentCount: tally.commentCount,
    discussionCount: pr.discussion.length,
    hasUnresolvedChangeRequests: tally.hasUnresolvedChangeRequests,
    canMerge: canMerge(pr),
    createdAt: pr.createdAt,
    updatedAt: pr.updatedAt,
    mergeCommitId: pr.mergeCommitId,
    mergedAt: pr.mergedAt,
    mergedBy: pr.mergedBy,
    closedAt: pr.closedAt,
    closeReason: pr.closeReason,
  };
}
