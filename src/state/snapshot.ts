import { z } from "zod";
import type { PullRequest, ReviewComment } from "../types.js";
import { FILE_CHANGE_TYPES, LIFECYCLE_STATES, REVIEW_VERDICTS } from "../types.js";

const CommentSchema = z.object({
  id: z.string(),
  filePath: z.string(),
  lineNumber: z.number().int().positive(),
  text: z.string(),
  createdAt: z.string(),
  author: z.string(),
});

const FileChangeSchema = z.object({
  path: z.string().min(1),
  changeType: z.enum(FILE_CHANGE_TYPES),
  linesAdded: z.number().int().nonnegative(),
  linesDeleted: z.number().int().nonnegative(),
  oldPath: z.string().optional(),
});

const ReviewSchema = z.object({
  id: z.string(),
  verdict: z.enum(REVIEW_VERDICTS),
  summary: z.string().min(1),
  comments: z.array(CommentSchema),
  submittedAt: z.string(),
  reviewer: z.string(),
});

const ResponseSchema = z.object({
  id: z.string(),
  reviewId: z.string(),
  text: z.string(),
  createdAt: z.string(),
  author: z.string(),
});

export const PullRequestSnapshotSchema = z.object({
  id: z.string().min(1),
  version: z.number().int().positive(),
  title: z.string().min(1),
  description: z.string(),
  sourceBranch: z.string().min(1),
  targetBranch: z.string().min(1),
  files: z.array(FileChangeSchema),
  state: z.enum(LIFECYCLE_STATES),
  requiredApprovals: z.number().int().min(1).max(10),
  parties: z.object({
    author: z.string(),
    reviewers: z.array(z.string()).min(1),
    maintainer: z.string(),
  }),
  reviews: z.array(ReviewSchema),
  discussion: z.array(CommentSchema),
  responses: z.array(ResponseSchema),
  createdAt: z.string(),
  updatedAt: z.string(),
  mergeCommitId: z.string().nullable(),
  mergeCommitMessage: z.string().nullable(),
  mergedAt: z.string().nullable(),
  mergedBy: z.string().nullable(),
  closedAt: z.string().nullable(),
  closeReason: z.string().nullable(),
});

export function encodePullRequest(pr: PullRequest): string {
  return JSON.stringify(pr);
}

function freezeComment(c: ReviewComment): ReviewComment {
  return Object.freeze({ ...c });
}

/**
 * Validates a stored snapshot and rebuilds the aggregate with its records frozen
 * again. Throws a ZodError when the snapshot is malformed.
 */
export function decodePullRequest(raw: unknown): PullRequest {
  const s = PullRequestSnapshotSchema.parse(typeof raw === "string" ? JSON.parse(raw) : raw);
  return {
    ...s,
    files: s.files.map((f) => Object.freeze({ ...f })),
    parties: Object.freeze({ ...s.parties, reviewers: Object.freeze([...s.parties.reviewers]) }),
    reviews: s.reviews.map((r) => Object.freeze({ ...r, comments: Object.freeze(r.comments.map(freezeComment)) })),
    discussion: s.discussion.map(freezeComment),
    responses: s.responses.map((r) => Object.freeze({ ...r })),
  };
}
