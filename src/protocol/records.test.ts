import { describe, it, expect } from "vitest";
import type { FileChange, MutatingOperation } from "../types.js";
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
import { ValidationFailed } from "./errors.js";

function context(operation: MutatingOperation = "create", actor = "alice"): OperationContext {
  let n = 0;
  return { operation, actor, now: "2024-03-01T12:00:00.000Z", nextId: () => `id-${++n}` };
}

function failure(fn: () => unknown): ValidationFailed {
  try {
    fn();
  } catch (err) {
    if (err instanceof ValidationFailed) return err;
    throw err;
  }
  throw new Error("expected ValidationFailed");
}

const file = (path: string, extra: Partial<FileChange> = {}): FileChange => ({
  path,
  changeType: "MODIFIED",
  linesAdded: 3,
  linesDeleted: 1,
  ...extra,
});

describe("validateTitle", () => {
  it("trims and accepts up to 200 characters", () => {
    expect(validateTitle(context(), "  Fix login  ")).toBe("Fix login");
    expect(validateTitle(context(), "x".repeat(200))).toHaveLength(200);
  });

  it("rejects empty and over-long titles", () => {
    expect(failure(() => validateTitle(context(), "   "))).toMatchObject({ rule: "title_required", field: "title" });
    const tooLong = failure(() => validateTitle(context(), "x".repeat(201)));
    expect(tooLong.rule).toBe("title_too_long");
    expect(tooLong.message).toBe("title: must be at most 200 characters (got 201)");
  });
});

describe("validateBranches", () => {
  it("requires two distinct non-empty branches", () => {
    expect(validateBranches(context(), " feat ", "main")).toEqual({ sourceBranch: "feat", targetBranch: "main" });
    expect(failure(() => validateBranches(context(), "", "main")).rule).toBe("source_branch_required");
    expect(failure(() => validateBranches(context(), "feat", " ")).rule).toBe("target_branch_required");
    expect(failure(() => validateBranches(context(), "main", "main"))).toMatchObject({
      rule: "branches_identical",
      field: "targetBranch",
    });
  });
});

describe("validateRequiredApprovals", () => {
  it("accepts 1 through 10", () => {
    expect(validateRequiredApprovals(context(), 1)).toBe(1);
    expect(validateRequiredApprovals(context(), 10)).toBe(10);
  });

  it.each([0, 11, 2.5, -1])("rejects %s", (count) => {
    expect(failure(() => validateRequiredApprovals(context(), count)).rule).toBe("required_approvals_range");
  });
});

describe("validateFileChanges", () => {
  it("returns frozen copies with trimmed paths", () => {
    const [change] = validateFileChanges(context(), [file(" src/a.ts ")]);
    expect(change).toEqual({ path: "src/a.ts", changeType: "MODIFIED", linesAdded: 3, linesDeleted: 1 });
    expect(Object.isFrozen(change)).toBe(true);
  });

  it("requires at least one change", () => {
    expect(failure(() => validateFileChanges(context(), [])).rule).toBe("files_required");
  });

  it("names the offending entry", () => {
    const err = failure(() => validateFileChanges(context(), [file("a.ts"), file("b.ts", { linesDeleted: -2 })]));
    expect(err).toMatchObject({ rule: "line_count_invalid", field: "fileChanges[1].linesDeleted" });
  });

  it("requires oldPath only for renames", () => {
    expect(validateFileChanges(context(), [file("new.ts", { changeType: "RENAMED", oldPath: "old.ts" })])[0].oldPath).toBe("old.ts");
    expect(failure(() => validateFileChanges(context(), [file("new.ts", { changeType: "RENAMED" })])).rule).toBe("old_path_required");
    expect(
      failure(() => validateFileChanges(context(), [file("same.ts", { changeType: "RENAMED", oldPath: "same.ts" })])).rule,
    ).toBe("old_path_unchanged");
    expect(failure(() => validateFileChanges(context(), [file("a.ts", { oldPath: "b.ts" })])).rule).toBe("old_path_unexpected");
  });

  it("rejects duplicates within the batch and against existing paths", () => {
    expect(failure(() => validateFileChanges(context(), [file("a.ts"), file("a.ts")])).rule).toBe("duplicate_path");
    expect(failure(() => validateFileChanges(context("addFiles"), [file("b.ts")], ["b.ts"]))).toMatchObject({
      rule: "duplicate_path",
      operation: "addFiles",
    });
  });
});

describe("validateParties", () => {
  it("de-duplicates reviewers", () => {
    expect(validateParties(context(), ["bob", "carol", "bob"], "mallory")).toEqual({
      reviewers: ["bob", "carol"],
      maintainer: "mallory",
    });
  });

  it("keeps identities exactly as given", () => {
    expect(validateParties(context(), ["bob ", "bob"], " mallory")).toEqual({
      reviewers: ["bob ", "bob"],
      maintainer: " mallory",
    });
  });

  it("rejects blank reviewer identities", () => {
    expect(failure(() => validateParties(context(), ["bob", "  "], "mallory"))).toMatchObject({
      rule: "identity_required",
      field: "reviewers",
    });
  });

  it("forbids the author reviewing their own pull request", () => {
    expect(failure(() => validateParties(context(), ["alice"], "mallory")).rule).toBe("self_review");
  });

  it("requires reviewers and a maintainer", () => {
    expect(failure(() => validateParties(context(), [], "mallory")).rule).toBe("reviewers_required");
    expect(failure(() => validateParties(context(), ["bob"], " "))).toMatchObject({ rule: "identity_required", field: "maintainer" });
  });
});

describe("createReview", () => {
  it("builds a frozen review with frozen comments, comments taking ids first", () => {
    const ctx = context("submitReview", "bob");
    const review = createReview(
      ctx,
      { verdict: "REQUEST_CHANGES", summary: " Needs tests ", comments: [{ filePath: "src/a.ts", lineNumber: 4, text: "why?" }] },
      ["src/a.ts"],
    );
    expect(review).toEqual({
      id: "id-2",
      verdict: "REQUEST_CHANGES",
      summary: "Needs tests",
      comments: [
        { id: "id-1", filePath: "src/a.ts", lineNumber: 4, text: "why?", createdAt: "2024-03-01T12:00:00.000Z", author: "bob" },
      ],
      submittedAt: "2024-03-01T12:00:00.000Z",
      reviewer: "bob",
    });
    expect(Object.isFrozen(review)).toBe(true);
    expect(Object.isFrozen(review.comments)).toBe(true);
  });

  it("validates comments against the pull request's files", () => {
    const ctx = context("submitReview", "bob");
    const err = failure(() =>
      createReview(ctx, { verdict: "COMMENT", summary: "ok", comments: [{ filePath: "other.ts", lineNumber: 1, text: "?" }] }, ["a.ts"]),
    );
    expect(err).toMatchObject({ rule: "unknown_file", field: "comments[0].filePath" });
  });

  it("requires a summary", () => {
    expect(failure(() => createReview(context("submitReview", "bob"), { verdict: "APPROVE", summary: "" }, [])).rule).toBe(
      "summary_required",
    );
  });
});

describe("createComment", () => {
  it("requires a positive line number", () => {
    const err = failure(() => createComment(context("addComment", "bob"), { filePath: "a.ts", lineNumber: 0, text: "x" }, ["a.ts"]));
    expect(err).toMatchObject({ rule: "line_number_positive", field: "comment.lineNumber" });
  });

  it("requires text", () => {
    expect(failure(() => createComment(context("addComment", "bob"), { filePath: "a.ts", lineNumber: 2, text: "  " }, ["a.ts"])).rule).toBe(
      "comment_text_required",
    );
  });
});

describe("createAuthorResponse", () => {
  it("links to an existing review", () => {
    const review = createReview(context("submitReview", "bob"), { verdict: "COMMENT", summary: "hm" }, []);
    const response = createAuthorResponse(context("respondToReview"), review.id, " Fixed ", [review]);
    expect(response).toEqual({ id: "id-1", reviewId: "id-1", text: "Fixed", createdAt: "2024-03-01T12:00:00.000Z", author: "alice" });
  });

  it("rejects unknown reviews", () => {
    expect(failure(() => createAuthorResponse(context("respondToReview"), "nope", "x", [])).rule).toBe("unknown_review");
  });
});
