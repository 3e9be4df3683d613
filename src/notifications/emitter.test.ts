import { describe, it, expect } from "vitest";
import type { NotificationEvent } from "../types.js";
import { NOTIFICATION_EVENT_NAMES } from "../types.js";
import { createLogger, silentLogger } from "../logger.js";
import { NotificationDispatcher } from "./emitter.js";
import { OutboxSink, createLogSink } from "./sinks.js";

const closed: NotificationEvent = {
  name: "Closed",
  pullRequestId: "pr-7",
  actor: "mallory",
  occurredAt: "2024-03-01T12:00:00.000Z",
  payload: { reason: "stale" },
};

const merged: NotificationEvent = {
  name: "Merged",
  pullRequestId: "pr-8",
  actor: "mallory",
  occurredAt: "2024-03-01T12:00:00.000Z",
  payload: { mergeCommitId: "abc123", mergedBy: "mallory", targetBranch: "main" },
};

describe("NotificationDispatcher", () => {
  it("delivers to every accepting sink in registration order", async () => {
    const first = new OutboxSink("first");
    const onlyMerges = new OutboxSink("merges", ["Merged"]);
    const dispatcher = new NotificationDispatcher(
      { enabled: true, logEvents: false, events: [...NOTIFICATION_EVENT_NAMES] },
      silentLogger,
    )
      .register(first)
      .register(onlyMerges);

    await dispatcher.emit(closed);
    await dispatcher.emit(merged);

    expect(first.pending).toEqual([closed, merged]);
    expect(onlyMerges.pending).toEqual([merged]);
    expect(dispatcher.sinkNames).toEqual(["first", "merges"]);
    expect(dispatcher.lastDelivery.map((r) => r.status)).toEqual(["delivered", "delivered"]);
  });

  it("skips events outside the configured list", async () => {
    const outbox = new OutboxSink();
    const dispatcher = new NotificationDispatcher({ enabled: true, logEvents: false, events: ["Merged"] }, silentLogger).register(outbox);
    await dispatcher.emit(closed);
    expect(outbox.pending).toEqual([]);
    expect(dispatcher.lastDelivery).toEqual([{ sink: "outbox", status: "skipped", durationMs: 0 }]);
  });

  it("skips everything when disabled", async () => {
    const outbox = new OutboxSink();
    const dispatcher = new NotificationDispatcher({ enabled: false, logEvents: false, events: ["Merged"] }, silentLogger).register(outbox);
    await dispatcher.emit(merged);
    expect(outbox.drain()).toEqual([]);
  });

  it("keeps delivering after a sink fails", async () => {
    const outbox = new OutboxSink();
    const dispatcher = new NotificationDispatcher({ enabled: true, logEvents: false, events: ["Closed"] }, silentLogger)
      .register({
        name: "flaky",
        accepts: () => true,
        deliver: async () => {
          throw new Error("connection refused");
        },
      })
      .register(outbox);

    await expect(dispatcher.emit(closed)).resolves.toBeUndefined();
    expect(outbox.drain()).toEqual([closed]);
    expect(outbox.pending).toEqual([]);
    expect(dispatcher.lastDelivery[0]).toMatchObject({ sink: "flaky", status: "error", error: "connection refused" });
  });

  it("hands out a copy of the queued events", async () => {
    const outbox = new OutboxSink();
    await outbox.deliver(closed);
    const view = outbox.pending;
    await outbox.deliver(merged);
    expect(view).toEqual([closed]);
    expect(outbox.pending).toEqual([closed, merged]);
  });

  it("refuses duplicate sink names", () => {
    const dispatcher = new NotificationDispatcher({ enabled: true, logEvents: false, events: [] }, silentLogger).register(new OutboxSink());
    expect(() => dispatcher.register(new OutboxSink())).toThrow('Notification sink "outbox" is already registered');
  });
});

describe("createLogSink", () => {
  it("writes one info line per event", async () => {
    const lines: string[] = [];
    const sink = createLogSink(createLogger({}, "info", (_level, line) => lines.push(line)));
    await sink.deliver(closed);
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({
      level: "info",
      msg: "Notification",
      event: "Closed",
      pr: "pr-7",
      actor: "mallory",
      payload: { reason: "stale" },
    });
  });
});
