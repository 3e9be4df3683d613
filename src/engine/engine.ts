import { randomUUID } from "node:crypto";
import type {
  AddCommentResult,
  AddFilesResult,
  CommentInput,
  CreatePullRequestInput,
  CreateResult,
  EngineConfig,
  FileChange,
  IdentityRef,
  MergeResult,
  MutatingOperation,
  NotificationEvent,
  OperationName,
  PullRequest,
  PullRequestSummary,
  RequiredApprovalsResult,
  RespondToReviewInput,
  RespondToReviewResult,
  Review,
  StateResult,
  SubmitReviewInput,
  SubmitReviewResult,
  UpdateDetailsInput,
  UpdateDetailsResult,
} from "../types.js";
import type { Logger } from "../logger.js";
import type { AuditLogger } from "../audit/logger.js";
import type { MetricsCollector } from "../metrics.js";
import type { NotificationEmitter } from "../notifications/emitter.js";
import type { PullRequestStore } from "../state/store.js";
import type { OperationContext } from "../protocol/records.js";
import type { Applied } from "../protocol/operations.js";
import { MissingEntry, VersionMismatch } from "../state/store.js";
import { assertAuthorized, assertParty } from "../protocol/guard.js";
import { isLegalTransition } from "../protocol/state-machine.js";
import { tallyReviews, canMerge } from "../protocol/aggregator.js";
import * as ops from "../protocol/operations.js";
import {
  ConcurrencyConflict,
  PersistenceFailed,
  PullRequestNotFound,
  ValidationFailed,
  isProtocolError,
} from "../protocol/errors.js";

export interface EngineOptions {
  store: PullRequestStore;
  emitter: NotificationEmitter;
  logger: Logger;
  config: EngineConfig;
  audit?: AuditLogger;
  metrics?: MetricsCollector;
  /** Clock for timestamps. Defaults to the system clock. */
  now?: () => Date;
  /** Id source for pull requests, reviews, comments and responses. Defaults to UUIDs. */
  generateId?: () => string;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Serializes every mutation of one pull request. Each mutating operation runs
 * authorize, stage, apply, persist and emit while holding the per-aggregate lock;
 * a failure at any step before persist leaves the stored aggregate untouched.
 */
export class PullRequestEngine {
  private locks = new Map<string, Promise<void>>();
  private inflightCount = 0;

  private readonly store: PullRequestStore;
  private readonly emitter: NotificationEmitter;
  private readonly logger: Logger;
  private readonly config: EngineConfig;
  private readonly audit?: AuditLogger;
  private readonly metrics?: MetricsCollector;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(options: EngineOptions) {
    this.store = options.store;
    this.emitter = options.emitter;
    this.logger = options.logger;
    this.config = options.config;
    this.audit = options.audit;
    this.metrics = options.metrics;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  get lockKeys(): string[] {
    return [...this.locks.keys()];
  }

  get inflight(): number {
    return this.inflightCount;
  }

  // --- Mutating operations ---

  async create(caller: IdentityRef, input: CreatePullRequestInput): Promise<CreateResult> {
    const operation = "create";
    const t0 = Date.now();
    const ctx = this.context(operation, caller);
    const log = this.logger.child({ op: operation, caller, traceId: this.traceId() });

    try {
      if (!caller.trim()) {
        throw new ValidationFailed(operation, "identity_required", "caller", "must not be empty");
      }
      const { pr, result, event } = ops.createPullRequest(ctx, input, this.config.defaultRequiredApprovals);

      try {
        await this.store.insert(pr);
      } catch (err) {
        throw this.persistenceFailure(operation, pr.id, caller, err, log);
      }

      this.recordCommit(operation, pr, undefined, caller, Date.now() - t0, log.child({ pr: pr.id }));
      await this.publish(event, log);
      return result;
    } catch (err) {
      this.recordRejection(operation, undefined, caller, err, log);
      throw err;
    }
  }

  updateDetails(id: string, caller: IdentityRef, input: UpdateDetailsInput): Promise<UpdateDetailsResult> {
    return this.mutate("updateDetails", id, caller, (draft, ctx) => ops.updateDetails(draft, ctx, input));
  }

  addFiles(id: string, caller: IdentityRef, fileChanges: readonly FileChange[]): Promise<AddFilesResult> {
    return this.mutate("addFiles", id, caller, (draft, ctx) => ops.addFiles(draft, ctx, fileChanges));
  }

  markReadyForReview(id: string, caller: IdentityRef): Promise<StateResult> {
    return this.mutate("markReadyForReview", id, caller, ops.markReadyForReview);
  }

  convertToDraft(id: string, caller: IdentityRef): Promise<StateResult> {
    return this.mutate("convertToDraft", id, caller, ops.convertToDraft);
  }

  requestReview(id: string, caller: IdentityRef): Promise<StateResult> {
    return this.mutate("requestReview", id, caller, ops.requestReview);
  }

  submitReview(id: string, caller: IdentityRef, input: SubmitReviewInput): Promise<SubmitReviewResult> {
    return this.mutate("submitReview", id, caller, (draft, ctx) => ops.submitReview(draft, ctx, input));
  }

  addComment(id: string, caller: IdentityRef, input: CommentInput): Promise<AddCommentResult> {
    return this.mutate("addComment", id, caller, (draft, ctx) => ops.addComment(draft, ctx, input));
  }

  respondToReview(id: string, caller: IdentityRef, input: RespondToReviewInput): Promise<RespondToReviewResult> {
    return this.mutate("respondToReview", id, caller, (draft, ctx) => ops.respondToReview(draft, ctx, input));
  }

  setRequiredApprovals(id: string, caller: IdentityRef, count: number): Promise<RequiredApprovalsResult> {
    return this.mutate("setRequiredApprovals", id, caller, (draft, ctx) => ops.setRequiredApprovals(draft, ctx, count));
  }

  merge(id: string, caller: IdentityRef, commitMessage: string = ""): Promise<MergeResult> {
    return this.mutate("merge", id, caller, (draft, ctx) => ops.merge(draft, ctx, commitMessage));
  }

  close(id: string, caller: IdentityRef, reason: string = ""): Promise<StateResult> {
    return this.mutate("close", id, caller, (draft, ctx) => ops.close(draft, ctx, reason));
  }

  reopen(id: string, caller: IdentityRef): Promise<StateResult> {
    return this.mutate("reopen", id, caller, ops.reopen);
  }

  // --- Queries ---

  async getSummary(id: string, caller: IdentityRef): Promise<PullRequestSummary> {
    return ops.summarize(await this.read("getSummary", id, caller));
  }

  async getReviewCount(id: string, caller: IdentityRef): Promise<number> {
    return tallyReviews((await this.read("getReviewCount", id, caller)).reviews).reviewCount;
  }

  async getApprovalCount(id: string, caller: IdentityRef): Promise<number> {
    return tallyReviews((await this.read("getApprovalCount", id, caller)).reviews).approvalCount;
  }

  async canMerge(id: string, caller: IdentityRef): Promise<boolean> {
    return canMerge(await this.read("canMerge", id, caller));
  }

  async getReviews(id: string, caller: IdentityRef): Promise<Review[]> {
    return [...(await this.read("getReviews", id, caller)).reviews];
  }

  // --- Internals ---

  private traceId(): string {
    return Math.random().toString(36).slice(2, 10);
  }

  private context(operation: MutatingOperation, caller: IdentityRef): OperationContext {
    return {
      operation,
      actor: caller,
      now: this.now().toISOString(),
      nextId: this.generateId,
    };
  }

  private async load(operation: OperationName, id: string): Promise<PullRequest> {
    let pr: PullRequest | undefined;
    try {
      pr = await this.store.get(id);
    } catch (err) {
      throw new PersistenceFailed(operation, id, err);
    }
    if (!pr) throw new PullRequestNotFound(operation, id);
    return pr;
  }

  private async read(operation: OperationName, id: string, caller: IdentityRef): Promise<PullRequest> {
    const pr = await this.load(operation, id);
    assertParty(pr.parties, caller, operation);
    return pr;
  }

  /**
   * Per-PR mutex: wait in a loop until no lock exists for this id. After waking,
   * re-check in case another waiter acquired the lock first.
   */
  private async withLock<T>(id: string, log: Logger, fn: () => Promise<T>): Promise<T> {
    if (this.locks.has(id)) {
      log.debug("Waiting for pull request lock");
    }
    while (this.locks.has(id)) {
      await this.locks.get(id);
    }

    let unlock = (): void => {};
    const lock = new Promise<void>((resolve) => {
      unlock = resolve;
    });
    this.locks.set(id, lock);
    this.inflightCount++;

    try {
      return await fn();
    } finally {
      this.inflightCount--;
      this.locks.delete(id);
      unlock();
    }
  }

  private mutate<R>(
    operation: MutatingOperation,
    id: string,
    caller: IdentityRef,
    apply: (draft: PullRequest, ctx: OperationContext) => Applied<R>,
  ): Promise<R> {
    const log = this.logger.child({ pr: id, op: operation, caller, traceId: this.traceId() });

    return this.withLock(id, log, async () => {
      const t0 = Date.now();
      try {
        const current = await this.load(operation, id);
        assertAuthorized(current.parties, caller, operation, current.state);

        const ctx = this.context(operation, caller);
        const draft = ops.stage(current);
        const { result, event } = apply(draft, ctx);

        if (!isLegalTransition(operation, current.state, draft.state)) {
          throw new Error(`${operation} produced illegal transition ${current.state} -> ${draft.state}`);
        }

        draft.version = current.version + 1;
        draft.updatedAt = ctx.now;
        await this.persist(operation, draft, current.version, caller, log);

        this.recordCommit(operation, draft, current, caller, Date.now() - t0, log);
        await this.publish(event, log);
        return result;
      } catch (err) {
        this.recordRejection(operation, id, caller, err, log);
        throw err;
      }
    });
  }

  private async persist(
    operation: MutatingOperation,
    draft: PullRequest,
    expectedVersion: number,
    caller: IdentityRef,
    log: Logger,
  ): Promise<void> {
    try {
      await this.store.save(draft, expectedVersion);
    } catch (err) {
      if (err instanceof VersionMismatch) {
        throw new ConcurrencyConflict(operation, draft.id, err.expectedVersion, err.actualVersion);
      }
      if (err instanceof MissingEntry) {
        throw new PullRequestNotFound(operation, draft.id);
      }
      throw this.persistenceFailure(operation, draft.id, caller, err, log);
    }
  }

  private persistenceFailure(
    operation: MutatingOperation,
    id: string,
    caller: IdentityRef,
    err: unknown,
    log: Logger,
  ): PersistenceFailed {
    log.error("Persisting pull request failed", { pr: id, error: errorMessage(err) });
    this.audit?.persistenceFailed(id, operation, errorMessage(err), caller);
    return new PersistenceFailed(operation, id, err);
  }

  private recordCommit(
    operation: MutatingOperation,
    next: PullRequest,
    previous: PullRequest | undefined,
    caller: IdentityRef,
    durationMs: number,
    log: Logger,
  ): void {
    this.metrics?.recordOperation(operation, durationMs);
    this.audit?.operationCommitted(next.id, operation, next.version, durationMs, caller);

    if (previous && previous.state !== next.state) {
      this.metrics?.recordTransition(previous.state, next.state);
      this.audit?.stateChanged(next.id, operation, previous.state, next.state, caller);
      log.info("State changed", { from: previous.state, to: next.state, version: next.version });
    } else {
      log.info("Operation committed", { state: next.state, version: next.version, durationMs });
    }
  }

  private recordRejection(
    operation: MutatingOperation,
    id: string | undefined,
    caller: IdentityRef,
    err: unknown,
    log: Logger,
  ): void {
    if (isProtocolError(err)) {
      this.metrics?.recordFailure(err.kind);
      const rule = err instanceof ValidationFailed ? err.rule : undefined;
      this.audit?.operationRejected(id, operation, err.kind, err.message, caller, rule);
      log.warn("Operation rejected", { kind: err.kind, error: err.message, rule });
      return;
    }
    this.audit?.operationRejected(id, operation, "InternalError", errorMessage(err), caller);
    log.error("Operation failed", { error: errorMessage(err) });
  }

  /**
   * Hands the event to the emitter after commit. The operation has already taken
   * effect, so an emitter failure is logged, not rethrown.
   */
  private async publish(event: NotificationEvent, log: Logger): Promise<void> {
    try {
      await this.emitter.emit(event);
    } catch (err) {
      log.error("Notification emit failed", { event: event.name, error: errorMessage(err) });
      this.audit?.notificationFailed(event.pullRequestId, event.name, "emitter", errorMessage(err));
    }
  }
}
