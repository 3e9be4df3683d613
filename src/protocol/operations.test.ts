import { describe, it, expect } from "vitest";
import { createHash } from "node:crypto";
import type { CreatePullRequestInput, IdentityRef, MutatingOperation, PullRequest } from "../types.js";
import type { OperationContext } from "./records.js";
import {
  addFiles,
  close,
  createPullRequest,
  merge,
  mergeCommitId,
  reopen,
  stage,
  submitReview,
  summarize,
} from "./operations.js";
import { MergeNotEligible } from "./errors.js";

const NOW = "2024-03-01T12:00:00.000Z";

function contextFactory() {
  let n = 0;
  return (operation: MutatingOperation, actor: IdentityRef): OperationContext => ({
    operation,
    actor,
    now: NOW,
    nextId: () => `id-${++n}`,
  });
}

const input: CreatePullRequestInput = {
  title: "Add search",
  description: "Adds a search box",
  sourceBranch: "feat/search",
  targetBranch: "main",
  fileChanges: [{ path: "src/search.ts", changeType: "ADDED", linesAdded: 40, linesDeleted: 0 }],
  reviewers: ["bob", "carol"],
  maintainer: "mallory",
  requiredApprovals: 1,
};

function fresh(overrides: Partial<CreatePullRequestInput> = {}): { pr: PullRequest; ctx: ReturnType<typeof contextFactory> } {
  const ctx = contextFactory();
  const { pr } = createPullRequest(ctx("create", "alice"), { ...input, ...overrides }, 2);
  return { pr, ctx };
}

describe("createPullRequest", () => {
  it("builds a draft at version 1 with frozen parties", () => {
    const ctx = contextFactory();
    const created = createPullRequest(ctx("create", "alice"), input, 2);
    expect(created.result).toEqual({ id: "id-1", state: "draft" });
    expect(created.pr).toMatchObject({
      id: "id-1",
      version: 1,
      state: "draft",
      requiredApprovals: 1,
      parties: { author: "alice", reviewers: ["bob", "carol"], maintainer: "mallory" },
      createdAt: NOW,
      updatedAt: NOW,
      mergeCommitId: null,
      closedAt: null,
    });
    expect(Object.isFrozen(created.pr.parties)).toBe(true);
    expect(created.event).toEqual({
      name: "Created",
      pullRequestId: "id-1",
      actor: "alice",
      occurredAt: NOW,
      payload: { title: "Add search", sourceBranch: "feat/search", targetBranch: "main", reviewers: ["bob", "carol"], maintainer: "mallory" },
    });
  });

  it("falls back to the configured approval threshold", () => {
    expect(fresh({ requiredApprovals: undefined }).pr.requiredApprovals).toBe(2);
  });
});

describe("stage", () => {
  it("copies collections so the original is untouched", () => {
    const { pr, ctx } = fresh();
    const draft = stage(pr);
    addFiles(draft, ctx("addFiles", "alice"), [{ path: "README.md", changeType: "MODIFIED", linesAdded: 2, linesDeleted: 2 }]);
    expect(draft.files).toHaveLength(2);
    expect(pr.files).toHaveLength(1);
  });
});

describe("submitReview", () => {
  it("appends the review and picks the next state", () => {
    const { pr, ctx } = fresh();
    const draft = stage({ ...pr, state: "review_requested" });
    const applied = submitReview(draft, ctx("submitReview", "bob"), { verdict: "APPROVE", summary: "ship it" });
    expect(applied.result).toEqual({ reviewId: "id-2", state: "approved", approvalCount: 1 });
    expect(draft.reviews).toHaveLength(1);
    expect(applied.event).toMatchObject({
      name: "ReviewSubmitted",
      payload: { reviewId: "id-2", verdict: "APPROVE", state: "approved", approvalCount: 1, changesRequestedCount: 0 },
    });
  });
});

describe("merge", () => {
  it("records the merge commit", () => {
    const { pr, ctx } = fresh();
    const draft = stage({ ...pr, state: "approved" });
    submitReview(draft, ctx("submitReview", "bob"), { verdict: "APPROVE", summary: "ok" });
    const applied = merge(draft, ctx("merge", "mallory"), "  ");

    const message = "Merge pull request id-1 from feat/search";
    const expectedId = createHash("sha1").update(["id-1", "feat/search", "main", message, NOW].join("\n")).digest("hex");
    expect(applied.result).toEqual({ mergeCommitId: expectedId, state: "merged" });
    expect(draft).toMatchObject({ mergeCommitMessage: message, mergedAt: NOW, mergedBy: "mallory", state: "merged" });
    expect(mergeCommitId(draft, message, NOW)).toBe(expectedId);
  });

  it("throws MergeNotEligible with blockers", () => {
    const { pr, ctx } = fresh({ requiredApprovals: 2 });
    const draft = stage({ ...pr, state: "changes_requested" });
    submitReview(draft, ctx("submitReview", "bob"), { verdict: "REQUEST_CHANGES", summary: "no" });
    expect(() => merge(draft, ctx("merge", "mallory"), "")).toThrow(MergeNotEligible);
    try {
      merge(draft, ctx("merge", "mallory"), "");
    } catch (err) {
      expect(err).toMatchObject({
        blockers: ["state is changes_requested, not approved", "needs 2 more approvals (0/2)", "1 unresolved change request"],
      });
    }
  });
});

describe("close and reopen", () => {
  it("stores a trimmed reason or null, and reopen clears it", () => {
    const { pr, ctx } = fresh();
    const draft = stage(pr);
    const closed = close(draft, ctx("close", "mallory"), " superseded ");
    expect(closed.event).toMatchObject({ name: "Closed", payload: { reason: "superseded" } });
    expect(draft).toMatchObject({ state: "closed", closedAt: NOW, closeReason: "superseded" });

    reopen(draft, ctx("reopen", "mallory"));
    expect(draft).toMatchObject({ state: "open", closedAt: null, closeReason: null });

    close(draft, ctx("close", "mallory"), "");
    expect(draft.closeReason).toBeNull();
  });
});

describe("summarize", () => {
  it("derives counts from the aggregate", () => {
    const { pr, ctx } = fresh();
    const draft = stage({ ...pr, state: "review_requested" });
    submitReview(draft, ctx("submitReview", "bob"), {
      verdict: "COMMENT",
      summary: "a few notes",
      comments: [
        { filePath: "src/search.ts", lineNumber: 3, text: "naming" },
        { filePath: "src/search.ts", lineNumber: 9, text: "typo" },
      ],
    });
    const summary = summarize(draft);
    expect(summary).toMatchObject({
      id: "id-1",
      state: "in_review",
      author: "alice",
      fileCount: 1,
      linesAdded: 40,
      linesDeleted: 0,
      reviewCount: 1,
      approvalCount: 0,
      changesRequestedCount: 0,
      commentCount: 2,
      discussionCount: 0,
      hasUnresolvedChangeRequests: false,
      canMerge: false,
    });
  });
});
