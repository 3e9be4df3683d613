import type { MutatingOperation, PRLifecycleState } from "./types.js";
import type { ProtocolErrorKind } from "./protocol/errors.js";

export interface TimingStats {
  min: number;
  max: number;
  avg: number;
  p95: number;
  count: number;
}

export interface MetricsSnapshot {
  uptime: number;
  operations: {
    total: number;
    byOperation: Partial<Record<MutatingOperation, number>>;
  };
  failures: {
    total: number;
    byKind: Record<ProtocolErrorKind, number>;
  };
  transitions: {
    total: number;
    byEdge: Record<string, number>;
  };
  pullRequests: {
    total: number;
    byState: Partial<Record<PRLifecycleState, number>>;
  };
  timings: {
    total: TimingStats | null;
    byOperation: Partial<Record<MutatingOperation, TimingStats>>;
  };
}

const ROLLING_WINDOW = 100;

export function computeStats(values: number[]): TimingStats | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const sum = sorted.reduce((a, b) => a + b, 0);
  const p95Index = Math.min(Math.floor(sorted.length * 0.95), sorted.length - 1);
  return {
    min: sorted[0],
    max: sorted[sorted.length - 1],
    avg: Math.round(sum / sorted.length),
    p95: sorted[p95Index],
    count: sorted.length,
  };
}

interface TimedOperation {
  operation: MutatingOperation;
  durationMs: number;
}

export class MetricsCollector {
  private operationCount = 0;
  private operationCounts: Partial<Record<MutatingOperation, number>> = {};
  private failureCount = 0;
  private failureKindCounts: Record<ProtocolErrorKind, number> = {
    AuthorizationDenied: 0,
    StateGuardViolation: 0,
    ValidationFailed: 0,
    MergeNotEligible: 0,
    PullRequestNotFound: 0,
    ConcurrencyConflict: 0,
    PersistenceFailed: 0,
  };
  private transitionCount = 0;
  private edgeCounts: Record<string, number> = {};

  // Operation timing rolling window
  private timingWindow: TimedOperation[] = [];

  recordOperation(operation: MutatingOperation, durationMs: number): void {
    this.operationCount++;
    this.operationCounts[operation] = (this.operationCounts[operation] ?? 0) + 1;
    this.timingWindow.push({ operation, durationMs });
    if (this.timingWindow.length > ROLLING_WINDOW) {
      this.timingWindow.shift();
    }
  }

  recordFailure(kind: ProtocolErrorKind): void {
    this.failureCount++;
    this.failureKindCounts[kind]++;
  }

  recordTransition(from: PRLifecycleState, to: PRLifecycleState): void {
    const edge = `${from}->${to}`;
    this.transitionCount++;
    this.edgeCounts[edge] = (this.edgeCounts[edge] ?? 0) + 1;
  }

  snapshot(uptimeSeconds: number, stateCounts: Partial<Record<PRLifecycleState, number>>): MetricsSnapshot {
    const prTotal = Object.values(stateCounts).reduce((sum, n) => sum + (n ?? 0), 0);

    const byOperation: Partial<Record<MutatingOperation, TimingStats>> = {};
    for (const operation of new Set(this.timingWindow.map((t) => t.operation))) {
      const stats = computeStats(this.timingWindow.filter((t) => t.operation === operation).map((t) => t.durationMs));
      if (stats) byOperation[operation] = stats;
    }

    return {
      uptime: uptimeSeconds,
      operations: {
        total: this.operationCount,
        byOperation: { ...this.operationCounts },
      },
      failures: {
        total: this.failureCount,
        byKind: { ...this.failureKindCounts },
      },
      transitions: {
        total: this.transitionCount,
        byEdge: { ...this.edgeCounts },
      },
      pullRequests: {
        total: prTotal,
        byState: stateCounts,
      },
      timings: {
        total: computeStats(this.timingWindow.map((t) => t.durationMs)),
        byOperation,
      },
    };
  }
}
