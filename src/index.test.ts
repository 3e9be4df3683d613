import { describe, it, expect } from "vitest";
import type { AppConfig } from "./types.js";
import { DEFAULTS } from "./config.js";
import { silentLogger } from "./logger.js";
import { OutboxSink } from "./notifications/sinks.js";
import { JsonFileStore, MemoryStore } from "./state/store.js";
import { createEngine, createStore } from "./index.js";

const config: AppConfig = {
  ...DEFAULTS,
  store: { backend: "memory", path: "" },
  notifications: { ...DEFAULTS.notifications, logEvents: false },
};

describe("createStore", () => {
  it("builds the configured backend", () => {
    expect(createStore({ backend: "memory", path: "" }, silentLogger)).toBeInstanceOf(MemoryStore);
    expect(createStore({ backend: "json", path: "does-not-exist/state.json" }, silentLogger)).toBeInstanceOf(JsonFileStore);
  });
});

describe("createEngine", () => {
  it("wires sinks, metrics and the exporter", async () => {
    const outbox = new OutboxSink();
    let n = 0;
    const runtime = createEngine(config, {
      logger: silentLogger,
      sinks: [outbox],
      prometheus: true,
      generateId: () => `pr-${++n}`,
      now: () => new Date("2024-03-01T12:00:00.000Z"),
    });

    const { id } = await runtime.engine.create("alice", {
      title: "Wire it",
      description: "",
      sourceBranch: "feat/wire",
      targetBranch: "main",
      fileChanges: [{ path: "src/index.ts", changeType: "MODIFIED", linesAdded: 1, linesDeleted: 1 }],
      reviewers: ["bob"],
      maintainer: "mallory",
    });

    expect(id).toBe("pr-1");
    expect(runtime.dispatcher.sinkNames).toEqual(["outbox"]);
    expect(outbox.pending.map((e) => e.name)).toEqual(["Created"]);
    expect((await runtime.engine.getSummary(id, "bob")).requiredApprovals).toBe(DEFAULTS.engine.defaultRequiredApprovals);

    const snapshot = await runtime.snapshotMetrics();
    expect(snapshot.pullRequests.byState).toEqual({ draft: 1 });
    expect(await runtime.scrape()).toContain('pr_engine_pull_requests{state="draft"} 1');

    await runtime.shutdown();
  });

  it("registers the log sink first when logging events", () => {
    const runtime = createEngine(
      { ...config, notifications: { ...config.notifications, logEvents: true } },
      { logger: silentLogger, sinks: [new OutboxSink("audit-feed")] },
    );
    expect(runtime.dispatcher.sinkNames).toEqual(["log", "audit-feed"]);
    expect(runtime.exporter).toBeNull();
  });
});
