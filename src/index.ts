import type { AppConfig, StoreConfig } from "./types.js";
import type { Logger } from "./logger.js";
import { createLogger } from "./logger.js";
import type { PullRequestStore } from "./state/store.js";
import { JsonFileStore, MemoryStore } from "./state/store.js";
import { SqliteStore } from "./state/sqlite-store.js";
import type { NotificationSink } from "./notifications/emitter.js";
import { NotificationDispatcher } from "./notifications/emitter.js";
import { createLogSink } from "./notifications/sinks.js";
import { AuditLogger } from "./audit/logger.js";
import type { MetricsSnapshot } from "./metrics.js";
import { MetricsCollector } from "./metrics.js";
import { PrometheusExporter } from "./prometheus.js";
import { PullRequestEngine } from "./engine/engine.js";

export * from "./types.js";
export * from "./protocol/errors.js";
export { authorize, assertAuthorized, resolveRoles, hasRole } from "./protocol/guard.js";
export type { AuthorizationDecision, DenialReason } from "./protocol/guard.js";
export { OPERATION_RULES, LEGAL_TRANSITIONS, isFinal, isLegalTransition, nextStateAfterReview } from "./protocol/state-machine.js";
export { tallyReviews, mergeBlockers, canMerge } from "./protocol/aggregator.js";
export type { ReviewTally } from "./protocol/aggregator.js";
export { MAX_TITLE_LENGTH, MIN_REQUIRED_APPROVALS, MAX_REQUIRED_APPROVALS } from "./protocol/records.js";
export { PullRequestEngine } from "./engine/engine.js";
export type { EngineOptions } from "./engine/engine.js";
export { MemoryStore, JsonFileStore, VersionMismatch, MissingEntry } from "./state/store.js";
export type { PullRequestStore, StateCounts } from "./state/store.js";
export { SqliteStore } from "./state/sqlite-store.js";
export { NotificationDispatcher } from "./notifications/emitter.js";
export type { NotificationEmitter, NotificationSink, DeliveryResult } from "./notifications/emitter.js";
export { createLogSink, OutboxSink } from "./notifications/sinks.js";
export { AuditLogger } from "./audit/logger.js";
export type { AuditEntry, AuditEventType, AuditSeverity } from "./audit/types.js";
export { MetricsCollector } from "./metrics.js";
export type { MetricsSnapshot, TimingStats } from "./metrics.js";
export { PrometheusExporter } from "./prometheus.js";
export { loadConfig, validateConfig, DEFAULTS } from "./config.js";
export type { ConfigError } from "./config.js";
export { createLogger, createRootLogger, silentLogger } from "./logger.js";
export type { Logger, LogContext, LogWriter } from "./logger.js";

export interface CreateEngineOptions {
  logger?: Logger;
  /** Sinks registered after the log sink, in order. */
  sinks?: NotificationSink[];
  /** Replaces the store built from `config.store`. */
  store?: PullRequestStore;
  now?: () => Date;
  generateId?: () => string;
  /** Publish metrics through prom-client. */
  prometheus?: boolean;
}

export interface EngineRuntime {
  engine: PullRequestEngine;
  store: PullRequestStore;
  dispatcher: NotificationDispatcher;
  audit: AuditLogger;
  metrics: MetricsCollector;
  exporter: PrometheusExporter | null;
  /** Metrics with per-state pull request counts from the store. */
  snapshotMetrics(): Promise<MetricsSnapshot>;
  /** Prometheus text exposition; empty when the exporter is off. */
  scrape(): Promise<string>;
  /** Waits for in-flight operations (up to `timeoutMs`), flushes the audit trail and closes the store. */
  shutdown(timeoutMs?: number): Promise<void>;
}

export function createStore(config: StoreConfig, logger: Logger): PullRequestStore {
  switch (config.backend) {
    case "memory":
      return new MemoryStore();
    case "json":
      return new JsonFileStore(config.path, logger);
    case "sqlite":
      return new SqliteStore(config.path);
  }
}

export function createEngine(config: AppConfig, options: CreateEngineOptions = {}): EngineRuntime {
  const logger = options.logger ?? createLogger({}, config.logLevel);
  const startTime = Date.now();

  const audit = new AuditLogger(config.audit, logger.child({ component: "audit" }));
  const store = options.store ?? createStore(config.store, logger.child({ component: "store" }));
  const metrics = new MetricsCollector();
  const exporter = options.prometheus ? new PrometheusExporter() : null;

  const dispatcher = new NotificationDispatcher(config.notifications, logger.child({ component: "notifications" }), audit);
  if (config.notifications.logEvents) {
    dispatcher.register(createLogSink(logger.child({ component: "notifications" })));
  }
  for (const sink of options.sinks ?? []) {
    dispatcher.register(sink);
  }

  const engine = new PullRequestEngine({
    store,
    emitter: dispatcher,
    logger,
    config: config.engine,
    audit,
    metrics,
    now: options.now,
    generateId: options.generateId,
  });

  audit.configLoaded(config.store.backend, config.engine.defaultRequiredApprovals);
  logger.info("Engine ready", {
    store: config.store.backend,
    defaultRequiredApprovals: config.engine.defaultRequiredApprovals,
    sinks: dispatcher.sinkNames,
  });

  const snapshotMetrics = async (): Promise<MetricsSnapshot> => {
    const uptime = Math.floor((Date.now() - startTime) / 1000);
    return metrics.snapshot(uptime, await store.countByState());
  };

  let shuttingDown = false;

  return {
    engine,
    store,
    dispatcher,
    audit,
    metrics,
    exporter,
    snapshotMetrics,
    async scrape(): Promise<string> {
      if (!exporter) return "";
      exporter.updateMetrics(await snapshotMetrics());
      return exporter.getMetrics();
    },
    async shutdown(timeoutMs = 60_000): Promise<void> {
      if (shuttingDown) return;
      shuttingDown = true;
      logger.info("Shutting down...");

      if (engine.inflight > 0) {
        logger.info("Waiting for in-flight operations to complete", { inflight: engine.inflight });
        const deadline = Date.now() + timeoutMs;
        while (engine.inflight > 0 && Date.now() < deadline) {
          await new Promise((r) => setTimeout(r, 50));
        }
        if (engine.inflight > 0) {
          logger.warn("Closing with in-flight operations still running", { inflight: engine.inflight });
        }
      }

      audit.stop();
      store.close();
    },
  };
}
