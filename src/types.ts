// --- Identity & parties ---

/** Opaque, stable identity key resolved by the calling layer. Never a full identity object. */
export type IdentityRef = string;

export type PartyRole = "author" | "reviewers" | "maintainer";

export interface Parties {
  readonly author: IdentityRef;
  readonly reviewers: readonly IdentityRef[];
  readonly maintainer: IdentityRef;
}

// --- PR State Machine ---

export type PRLifecycleState =
  | "draft"
  | "open"
  | "review_requested"
  | "in_review"
  | "changes_requested"
  | "approved"
  | "merged"
  | "closed";

export const LIFECYCLE_STATES = [
  "draft",
  "open",
  "review_requested",
  "in_review",
  "changes_requested",
  "approved",
  "merged",
  "closed",
] as const satisfies readonly PRLifecycleState[];

export type MutatingOperation =
  | "create"
  | "updateDetails"
  | "addFiles"
  | "markReadyForReview"
  | "convertToDraft"
  | "requestReview"
  | "submitReview"
  | "addComment"
  | "respondToReview"
  | "setRequiredApprovals"
  | "merge"
  | "close"
  | "reopen";

export type QueryOperation = "getSummary" | "getReviewCount" | "getApprovalCount" | "canMerge" | "getReviews";

export type OperationName = MutatingOperation | QueryOperation;

// --- Value types ---

export type ReviewVerdict = "APPROVE" | "REQUEST_CHANGES" | "COMMENT";

export const REVIEW_VERDICTS = ["APPROVE", "REQUEST_CHANGES", "COMMENT"] as const satisfies readonly ReviewVerdict[];

export type FileChangeType = "ADDED" | "MODIFIED" | "DELETED" | "RENAMED";

export const FILE_CHANGE_TYPES = ["ADDED", "MODIFIED", "DELETED", "RENAMED"] as const satisfies readonly FileChangeType[];

export interface FileChange {
  readonly path: string;
  readonly changeType: FileChangeType;
  readonly linesAdded: number;
  readonly linesDeleted: number;
  readonly oldPath?: string; // RENAMED only
}

export interface ReviewComment {
  readonly id: string;
  readonly filePath: string;
  readonly lineNumber: number;
  readonly text: string;
  readonly createdAt: string;
  readonly author: IdentityRef;
}

export interface Review {
  readonly id: string;
  readonly verdict: ReviewVerdict;
  readonly summary: string;
  readonly comments: readonly ReviewComment[];
  readonly submittedAt: string;
  readonly reviewer: IdentityRef;
}

export interface AuthorResponse {
  readonly id: string;
  readonly reviewId: string;
  readonly text: string;
  readonly createdAt: string;
  readonly author: IdentityRef;
}

// --- Aggregate root ---

export interface PullRequest {
  // Identity
  id: string;
  version: number;

  // Metadata
  title: string;
  description: string;
  sourceBranch: string;
  targetBranch: string;
  files: FileChange[];

  // Lifecycle
  state: PRLifecycleState;
  requiredApprovals: number;
  parties: Parties;

  // Append-only collections
  reviews: Review[];
  discussion: ReviewComment[];
  responses: AuthorResponse[];

  // Timestamps & terminal metadata
  createdAt: string;
  updatedAt: string;
  mergeCommitId: string | null;
  mergeCommitMessage: string | null;
  mergedAt: string | null;
  mergedBy: IdentityRef | null;
  closedAt: string | null;
  closeReason: string | null;
}

// --- Operation inputs ---

export interface CommentInput {
  filePath: string;
  lineNumber: number;
  text: string;
}

export interface CreatePullRequestInput {
  title: string;
  description: string;
  sourceBranch: string;
  targetBranch: string;
  fileChanges: FileChange[];
  reviewers: IdentityRef[];
  maintainer: IdentityRef;
  requiredApprovals?: number;
}

export interface UpdateDetailsInput {
  title: string;
  description: string;
}

export interface SubmitReviewInput {
  verdict: ReviewVerdict;
  summary: string;
  comments?: CommentInput[];
}

export interface RespondToReviewInput {
  reviewId: string;
  text: string;
}

// --- Operation results ---

export interface CreateResult {
  id: string;
  state: PRLifecycleState;
}

export interface StateResult {
  state: PRLifecycleState;
}

export interface UpdateDetailsResult {
  title: string;
  description: string;
  updatedAt: string;
}

export interface AddFilesResult {
  fileCount: number;
}

export interface SubmitReviewResult {
  reviewId: string;
  state: PRLifecycleState;
  approvalCount: number;
}

export interface AddCommentResult {
  commentId: string;
}

export interface RespondToReviewResult {
  responseId: string;
}

export interface RequiredApprovalsResult {
  requiredApprovals: number;
}

export interface MergeResult {
  mergeCommitId: string;
  state: PRLifecycleState;
}

export interface PullRequestSummary {
  id: string;
  title: string;
  description: string;
  sourceBranch: string;
  targetBranch: string;
  state: PRLifecycleState;
  author: IdentityRef;
  reviewers: IdentityRef[];
  maintainer: IdentityRef;
  fileCount: number;
  linesAdded: number;
  linesDeleted: number;
  requiredApprovals: number;
  reviewCount: number;
  approvalCount: number;
  changesRequestedCount: number;
  commentCount: number;
  discussionCount: number;
  hasUnresolvedChangeRequests: boolean;
  canMerge: boolean;
  createdAt: string;
  updatedAt: string;
  mergeCommitId: string | null;
  mergedAt: string | null;
  mergedBy: IdentityRef | null;
  closedAt: string | null;
  closeReason: string | null;
}

// --- Notifications ---

export interface EventPayloads {
  Created: { title: string; sourceBranch: string; targetBranch: string; reviewers: IdentityRef[]; maintainer: IdentityRef };
  ReadyForReview: { state: PRLifecycleState };
  ConvertedToDraft: { state: PRLifecycleState };
  DetailsUpdated: { title: string; description: string };
  FilesAdded: { paths: string[]; fileCount: number };
  ReviewRequested: { reviewers: IdentityRef[] };
  ReviewSubmitted: {
    reviewId: string;
    verdict: ReviewVerdict;
    state: PRLifecycleState;
    approvalCount: number;
    changesRequestedCount: number;
  };
  CommentAdded: { commentId: string; filePath: string; lineNumber: number };
  AuthorResponded: { responseId: string; reviewId: string };
  RequiredApprovalsChanged: { previous: number; current: number };
  Merged: { mergeCommitId: string; mergedBy: IdentityRef; targetBranch: string };
  Closed: { reason: string | null };
  Reopened: { state: PRLifecycleState };
}

export type NotificationEventName = keyof EventPayloads;

export const NOTIFICATION_EVENT_NAMES = [
  "Created",
  "ReadyForReview",
  "ConvertedToDraft",
  "DetailsUpdated",
  "FilesAdded",
  "ReviewRequested",
  "ReviewSubmitted",
  "CommentAdded",
  "AuthorResponded",
  "RequiredApprovalsChanged",
  "Merged",
  "Closed",
  "Reopened",
] as const satisfies readonly NotificationEventName[];

export type NotificationEvent<N extends NotificationEventName = NotificationEventName> = {
  [K in N]: {
    name: K;
    pullRequestId: string;
    actor: IdentityRef;
    occurredAt: string;
    payload: EventPayloads[K];
  };
}[N];

// --- Configuration ---

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface EngineConfig {
  defaultRequiredApprovals: number;
}

export type StoreBackend = "memory" | "json" | "sqlite";

export interface StoreConfig {
  backend: StoreBackend;
  path: string;
}

export interface NotificationsConfig {
  enabled: boolean;
  logEvents: boolean;
  events: NotificationEventName[];
}

export interface AuditConfig {
  enabled: boolean;
  maxEntries: number;
  filePath: string;
  includeMetadata: boolean;
  minSeverity: "info" | "warning" | "error";
}

export interface AppConfig {
  logLevel: LogLevel;
  engine: EngineConfig;
  store: StoreConfig;
  notifications: NotificationsConfig;
  audit: AuditConfig;
}
