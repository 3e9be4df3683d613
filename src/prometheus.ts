import { Registry, Gauge, collectDefaultMetrics } from "prom-client";
import type { MetricsSnapshot } from "./metrics.js";

export interface PrometheusOptions {
  /** Metric name prefix */
  prefix?: string;
  /** Also collect process_* and nodejs_* metrics */
  defaultMetrics?: boolean;
}

/**
 * Prometheus exporter for the engine's metrics snapshot.
 *
 * Note: cumulative values are published as gauges because they are synced from a
 * snapshot rather than incremented on events.
 */
export class PrometheusExporter {
  private registry: Registry;

  private operationsTotalGauge: Gauge<string>;
  private failuresTotalGauge: Gauge<string>;
  private transitionsTotalGauge: Gauge<string>;
  private pullRequestsGauge: Gauge<string>;
  private uptimeGauge: Gauge;

  private durationAvg: Gauge<string>;
  private durationP95: Gauge<string>;
  private durationMax: Gauge<string>;

  constructor(options: PrometheusOptions = {}) {
    const prefix = options.prefix ?? "pr_engine";
    this.registry = new Registry();

    if (options.defaultMetrics ?? true) {
      collectDefaultMetrics({ register: this.registry });
    }

    this.operationsTotalGauge = new Gauge({
      name: `${prefix}_operations_total`,
      help: "Committed operations by operation name",
      labelNames: ["operation"],
      registers: [this.registry],
    });

    this.failuresTotalGauge = new Gauge({
      name: `${prefix}_failures_total`,
      help: "Rejected operations by failure kind",
      labelNames: ["kind"],
      registers: [this.registry],
    });

    this.transitionsTotalGauge = new Gauge({
      name: `${prefix}_transitions_total`,
      help: "Lifecycle transitions taken, by from and to state",
      labelNames: ["from", "to"],
      registers: [this.registry],
    });

    this.pullRequestsGauge = new Gauge({
      name: `${prefix}_pull_requests`,
      help: "Current number of pull requests by lifecycle state",
      labelNames: ["state"],
      registers: [this.registry],
    });

    this.uptimeGauge = new Gauge({
      name: `${prefix}_uptime_seconds`,
      help: "Engine uptime in seconds",
      registers: [this.registry],
    });

    this.durationAvg = new Gauge({
      name: `${prefix}_operation_duration_avg_seconds`,
      help: "Average operation duration (rolling window)",
      labelNames: ["operation"],
      registers: [this.registry],
    });

    this.durationP95 = new Gauge({
      name: `${prefix}_operation_duration_p95_seconds`,
      help: "95th percentile operation duration (rolling window)",
      labelNames: ["operation"],
      registers: [this.registry],
    });

    this.durationMax = new Gauge({
      name: `${prefix}_operation_duration_max_seconds`,
      help: "Maximum operation duration (rolling window)",
      labelNames: ["operation"],
      registers: [this.registry],
    });
  }

  /**
   * Sync gauges from a snapshot. Call before every scrape.
   */
  updateMetrics(snapshot: MetricsSnapshot): void {
    for (const [operation, count] of Object.entries(snapshot.operations.byOperation)) {
      if (count !== undefined) this.operationsTotalGauge.labels(operation).set(count);
    }

    for (const [kind, count] of Object.entries(snapshot.failures.byKind)) {
      this.failuresTotalGauge.labels(kind).set(count);
    }

    for (const [edge, count] of Object.entries(snapshot.transitions.byEdge)) {
      const [from, to] = edge.split("->");
      this.transitionsTotalGauge.labels(from, to).set(count);
    }

    for (const [state, count] of Object.entries(snapshot.pullRequests.byState)) {
      if (count !== undefined) this.pullRequestsGauge.labels(state).set(count);
    }

    this.uptimeGauge.set(snapshot.uptime);

    if (snapshot.timings.total) {
      this.durationAvg.labels("all").set(snapshot.timings.total.avg / 1000);
      this.durationP95.labels("all").set(snapshot.timings.total.p95 / 1000);
      this.durationMax.labels("all").set(snapshot.timings.total.max / 1000);
    }

    for (const [operation, stats] of Object.entries(snapshot.timings.byOperation)) {
      if (stats) {
        this.durationAvg.labels(operation).set(stats.avg / 1000);
        this.durationP95.labels(operation).set(stats.p95 / 1000);
        this.durationMax.labels(operation).set(stats.max / 1000);
      }
    }
  }

  /**
   * Prometheus text exposition format
   */
  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  getRegistry(): Registry {
    return this.registry;
  }
}
