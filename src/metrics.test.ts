import { describe, it, expect } from "vitest";
import { MetricsCollector, computeStats } from "./metrics.js";
import { PrometheusExporter } from "./prometheus.js";

describe("computeStats", () => {
  it("returns null for no samples", () => {
    expect(computeStats([])).toBeNull();
  });

  it("summarizes a window", () => {
    expect(computeStats([30, 10, 20])).toEqual({ min: 10, max: 30, avg: 20, p95: 30, count: 3 });
  });
});

describe("MetricsCollector", () => {
  it("counts operations, failures and transitions", () => {
    const metrics = new MetricsCollector();
    metrics.recordOperation("create", 4);
    metrics.recordOperation("submitReview", 8);
    metrics.recordOperation("submitReview", 12);
    metrics.recordFailure("StateGuardViolation");
    metrics.recordTransition("in_review", "approved");

    const snapshot = metrics.snapshot(42, { approved: 1, draft: 2 });
    expect(snapshot.uptime).toBe(42);
    expect(snapshot.operations).toEqual({ total: 3, byOperation: { create: 1, submitReview: 2 } });
    expect(snapshot.failures.total).toBe(1);
    expect(snapshot.failures.byKind.StateGuardViolation).toBe(1);
    expect(snapshot.failures.byKind.MergeNotEligible).toBe(0);
    expect(snapshot.transitions.byEdge).toEqual({ "in_review->approved": 1 });
    expect(snapshot.pullRequests.total).toBe(3);
    expect(snapshot.timings.total).toEqual({ min: 4, max: 12, avg: 8, p95: 12, count: 3 });
    expect(snapshot.timings.byOperation.submitReview).toEqual({ min: 8, max: 12, avg: 10, p95: 12, count: 2 });
  });

  it("keeps a rolling window of 100 timings", () => {
    const metrics = new MetricsCollector();
    for (let i = 1; i <= 150; i++) metrics.recordOperation("addComment", i);
    const snapshot = metrics.snapshot(0, {});
    expect(snapshot.operations.total).toBe(150);
    expect(snapshot.timings.total).toMatchObject({ min: 51, max: 150, count: 100 });
  });
});

describe("PrometheusExporter", () => {
  it("publishes the snapshot as gauges", async () => {
    const metrics = new MetricsCollector();
    metrics.recordOperation("markReadyForReview", 2000);
    metrics.recordTransition("draft", "open");
    metrics.recordFailure("AuthorizationDenied");

    const exporter = new PrometheusExporter({ prefix: "test", defaultMetrics: false });
    exporter.updateMetrics(metrics.snapshot(12, { open: 1 }));
    const text = await exporter.getMetrics();

    expect(text).toContain('test_operations_total{operation="markReadyForReview"} 1');
    expect(text).toContain('test_failures_total{kind="AuthorizationDenied"} 1');
    expect(text).toContain('test_transitions_total{from="draft",to="open"} 1');
    expect(text).toContain('test_pull_requests{state="open"} 1');
    expect(text).toContain("test_uptime_seconds 12");
    expect(text).toContain('test_operation_duration_max_seconds{operation="all"} 2');
  });
});
