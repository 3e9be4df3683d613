import { writeFileSync, readFileSync, existsSync, mkdirSync, renameSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import type { AuditConfig } from "../types.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import { FileLock } from "../file-lock.js";
import type { AuditEntry, AuditEventType, AuditSeverity, AuditMetadata } from "./types.js";
import { AUDIT_EVENT_TYPES } from "./types.js";

function toMetadata(record: Record<string, string | number | boolean>): AuditMetadata {
  const metadata: AuditMetadata = {};
  for (const [key, value] of Object.entries(record)) {
    metadata[key] = value;
  }
  return metadata;
}

const AuditFileSchema = z.object({
  entries: z.array(
    z.object({
      timestamp: z.string(),
      eventType: z.enum(AUDIT_EVENT_TYPES),
      severity: z.enum(["info", "warning", "error"]),
      message: z.string(),
      metadata: z.record(z.union([z.string(), z.number(), z.boolean()])).optional(),
      actor: z.string().optional(),
    }),
  ),
});

/**
 * Audit trail of engine operations.
 * Maintains a rolling log of events with batched, atomic, lock-guarded writes.
 */
export class AuditLogger {
  private entries: AuditEntry[] = [];
  private pendingWrites: AuditEntry[] = [];
  private flushTimer: NodeJS.Timeout | null = null;
  private consecutiveFlushFailures = 0;
  private readonly FLUSH_INTERVAL_MS = 5000; // Batch writes every 5 seconds
  private readonly FLUSH_BATCH_SIZE = 100; // Or when 100 entries pending
  private readonly MAX_FLUSH_FAILURES = 3; // Warn after this many failures
  private readonly severityRank: Record<AuditSeverity, number> = {
    info: 0,
    warning: 1,
    error: 2,
  };

  constructor(
    private config: AuditConfig,
    private logger: Logger = silentLogger,
  ) {
    if (config.enabled) {
      this.loadExisting();
      this.startFlushTimer();
    }
  }

  private startFlushTimer(): void {
    this.flushTimer = setInterval(() => {
      this.flushPending();
    }, this.FLUSH_INTERVAL_MS);
    this.flushTimer.unref();
  }

  /**
   * Stop flush timer and write whatever is pending
   */
  stop(): void {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
    this.flushPending();
  }

  private loadExisting(): void {
    if (!existsSync(this.config.filePath)) return;
    try {
      const data = AuditFileSchema.parse(JSON.parse(readFileSync(this.config.filePath, "utf-8")));
      this.entries = data.entries.slice(-this.config.maxEntries).map((e) => ({
        ...e,
        metadata: e.metadata && toMetadata(e.metadata),
      }));
    } catch (err) {
      this.logger.warn("Failed to load audit log, starting empty", { path: this.config.filePath, error: String(err) });
      this.entries = [];
    }
  }

  /**
   * Flush pending entries to disk with atomic writes and file locking
   */
  private flushPending(): void {
    if (!this.config.enabled || this.pendingWrites.length === 0) return;

    const lock = new FileLock(this.config.filePath);
    let acquired: boolean;
    try {
      mkdirSync(dirname(this.config.filePath), { recursive: true });
      acquired = lock.acquire();
    } catch (err) {
      this.logger.error("Failed to flush audit log", { error: String(err) });
      this.consecutiveFlushFailures++;
      return;
    }
    if (!acquired) {
      this.consecutiveFlushFailures++;
      if (this.consecutiveFlushFailures >= this.MAX_FLUSH_FAILURES) {
        this.logger.warn("Failed to acquire audit log lock", {
          attempts: this.consecutiveFlushFailures,
          pending: this.pendingWrites.length,
        });
      }
      return;
    }

    try {
      this.entries.push(...this.pendingWrites);
      this.pendingWrites = [];

      const toSave = this.entries.slice(-this.config.maxEntries);
      this.entries = toSave;

      const data = {
        version: 1,
        generatedAt: new Date().toISOString(),
        entries: toSave,
      };

      // Atomic write: temp file + rename
      const tmpPath = `${this.config.filePath}.tmp.${Date.now()}`;
      writeFileSync(tmpPath, JSON.stringify(data, null, 2), "utf-8");
      renameSync(tmpPath, this.config.filePath);

      this.consecutiveFlushFailures = 0;
    } catch (err) {
      this.logger.error("Failed to flush audit log", { error: String(err) });
      this.consecutiveFlushFailures++;
    } finally {
      lock.release();
    }
  }

  /**
   * Log an audit event (non-blocking, batched writes)
   */
  log(
    eventType: AuditEventType,
    severity: AuditSeverity,
    message: string,
    metadata?: AuditMetadata,
    actor?: string,
  ): void {
    if (!this.config.enabled) return;

    if (this.severityRank[severity] < this.severityRank[this.config.minSeverity]) {
      return;
    }

    const entry: AuditEntry = {
      timestamp: new Date().toISOString(),
      eventType,
      severity,
      message,
      metadata: this.config.includeMetadata ? metadata : undefined,
      actor,
    };

    this.pendingWrites.push(entry);

    if (this.pendingWrites.length >= this.FLUSH_BATCH_SIZE) {
      this.flushPending();
    }
  }

  operationCommitted(pullRequestId: string, operation: string, version: number, durationMs: number, actor: string): void {
    this.log(
      "operation_committed",
      "info",
      `${operation} committed on ${pullRequestId} (v${version})`,
      { pullRequestId, operation, version, durationMs },
      actor,
    );
  }

  operationRejected(pullRequestId: string | undefined, operation: string, errorKind: string, error: string, actor: string, rule?: string): void {
    this.log(
      "operation_rejected",
      "warning",
      `${operation} rejected${pullRequestId ? ` on ${pullRequestId}` : ""}: ${errorKind}`,
      { pullRequestId, operation, errorKind, error: error.slice(0, 200), rule },
      actor,
    );
  }

  stateChanged(pullRequestId: string, operation: string, oldState: string, newState: string, actor: string): void {
    this.log(
      "state_changed",
      "info",
      `${pullRequestId} state: ${oldState} → ${newState}`,
      { pullRequestId, operation, oldState, newState },
      actor,
    );
  }

  persistenceFailed(pullRequestId: string, operation: string, error: string, actor: string): void {
    this.log(
      "persistence_failed",
      "error",
      `Persisting ${operation} on ${pullRequestId} failed`,
      { pullRequestId, operation, error: error.slice(0, 200) },
      actor,
    );
  }

  notificationFailed(pullRequestId: string, event: string, sink: string, error: string): void {
    this.log(
      "notification_failed",
      "error",
      `Delivering ${event} for ${pullRequestId} to ${sink} failed`,
      { pullRequestId, event, sink, error: error.slice(0, 200) },
      "system",
    );
  }

  configLoaded(storeBackend: string, defaultRequiredApprovals: number): void {
    this.log(
      "config_loaded",
      "info",
      `Config loaded: store=${storeBackend}, defaultRequiredApprovals=${defaultRequiredApprovals}`,
      { storeBackend, defaultRequiredApprovals },
      "system",
    );
  }

  /**
   * Flushed and pending entries, oldest first
   */
  getEntries(): AuditEntry[] {
    return [...this.entries, ...this.pendingWrites];
  }

  getFiltered(filter: {
    eventType?: AuditEventType;
    severity?: AuditSeverity;
    actor?: string;
    pullRequestId?: string;
    since?: string;
    limit?: number;
  }): AuditEntry[] {
    let filtered = this.getEntries();

    if (filter.eventType) {
      filtered = filtered.filter((e) => e.eventType === filter.eventType);
    }

    if (filter.severity) {
      const minRank = this.severityRank[filter.severity];
      filtered = filtered.filter((e) => this.severityRank[e.severity] >= minRank);
    }

    if (filter.actor) {
      filtered = filtered.filter((e) => e.actor === filter.actor);
    }

    if (filter.pullRequestId) {
      filtered = filtered.filter((e) => e.metadata?.pullRequestId === filter.pullRequestId);
    }

    if (filter.since) {
      const since = filter.since;
      filtered = filtered.filter((e) => e.timestamp >= since);
    }

    if (filter.limit && filter.limit > 0) {
      filtered = filtered.slice(-filter.limit);
    }

    return filtered;
  }

  getStats(): {
    totalEntries: number;
    bySeverity: Record<AuditSeverity, number>;
    byEventType: Record<string, number>;
    byActor: Record<string, number>;
    oldestEntry: string | null;
    newestEntry: string | null;
  } {
    const snapshot = this.getEntries();
    const bySeverity: Record<AuditSeverity, number> = { info: 0, warning: 0, error: 0 };
    const byEventType: Record<string, number> = {};
    const byActor: Record<string, number> = {};

    for (const entry of snapshot) {
      bySeverity[entry.severity]++;
      byEventType[entry.eventType] = (byEventType[entry.eventType] || 0) + 1;
      if (entry.actor) {
        byActor[entry.actor] = (byActor[entry.actor] || 0) + 1;
      }
    }

    return {
      totalEntries: snapshot.length,
      bySeverity,
      byEventType,
      byActor,
      oldestEntry: snapshot[0]?.timestamp ?? null,
      newestEntry: snapshot[snapshot.length - 1]?.timestamp ?? null,
    };
  }
}
