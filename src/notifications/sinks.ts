import type { NotificationEvent, NotificationEventName } from "../types.js";
import type { Logger } from "../logger.js";
import type { NotificationSink } from "./emitter.js";

/** Writes each event as a structured log line. */
export function createLogSink(logger: Logger): NotificationSink {
  return {
    name: "log",
    accepts: () => true,
    async deliver(event: NotificationEvent): Promise<void> {
      logger.info("Notification", {
        event: event.name,
        pr: event.pullRequestId,
        actor: event.actor,
        occurredAt: event.occurredAt,
        payload: event.payload,
      });
    },
  };
}

/**
 * Keeps delivered events in memory, in order, for a caller that drains them into
 * its own transport.
 */
export class OutboxSink implements NotificationSink {
  readonly name: string;
  private events: NotificationEvent[] = [];

  constructor(
    name = "outbox",
    private only?: readonly NotificationEventName[],
  ) {
    this.name = name;
  }

  accepts(event: NotificationEvent): boolean {
    return !this.only || this.only.includes(event.name);
  }

  async deliver(event: NotificationEvent): Promise<void> {
    this.events.push(event);
  }

  get pending(): readonly NotificationEvent[] {
    return [...this.events];
  }

  /** Removes and returns every queued event. */
  drain(): NotificationEvent[] {
    const drained = this.events;
    this.events = [];
    return drained;
  }
}
