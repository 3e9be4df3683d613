import type { NotificationEvent, NotificationEventName, NotificationsConfig } from "../types.js";
import type { Logger } from "../logger.js";
import type { AuditLogger } from "../audit/logger.js";

/** Receives the one event description produced by each committed operation. */
export interface NotificationEmitter {
  emit(event: NotificationEvent): Promise<void>;
}

export interface NotificationSink {
  /** Unique identifier, used in logs and the audit trail */
  name: string;
  /** Determine if this sink wants the event */
  accepts(event: NotificationEvent): boolean;
  /** Hand the event to the transport */
  deliver(event: NotificationEvent): Promise<void>;
}

export interface DeliveryResult {
  sink: string;
  status: "delivered" | "skipped" | "error";
  durationMs: number;
  error?: string;
}

/**
 * Fans each event out to the registered sinks, in order. Delivery failures are
 * recorded but never rethrown: the operation that produced the event has already
 * committed.
 */
export class NotificationDispatcher implements NotificationEmitter {
  private sinks: NotificationSink[] = [];
  private lastResults: DeliveryResult[] = [];
  private readonly events: ReadonlySet<NotificationEventName>;

  constructor(
    private config: NotificationsConfig,
    private logger: Logger,
    private audit?: AuditLogger,
  ) {
    this.events = new Set(config.events);
  }

  register(sink: NotificationSink): this {
    if (this.sinks.some((s) => s.name === sink.name)) {
      throw new Error(`Notification sink "${sink.name}" is already registered`);
    }
    this.sinks.push(sink);
    return this;
  }

  get sinkNames(): string[] {
    return this.sinks.map((s) => s.name);
  }

  /** Results of the most recent emit, one per sink. */
  get lastDelivery(): readonly DeliveryResult[] {
    return this.lastResults;
  }

  async emit(event: NotificationEvent): Promise<void> {
    const results: DeliveryResult[] = [];
    const log = this.logger.child({ pr: event.pullRequestId, event: event.name });

    for (const sink of this.sinks) {
      const t0 = Date.now();
      let result: DeliveryResult;

      try {
        if (!this.config.enabled || !this.events.has(event.name) || !sink.accepts(event)) {
          result = { sink: sink.name, status: "skipped", durationMs: 0 };
        } else {
          await sink.deliver(event);
          result = { sink: sink.name, status: "delivered", durationMs: Date.now() - t0 };
          log.debug("Notification delivered", { sink: sink.name });
        }
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        result = { sink: sink.name, status: "error", durationMs: Date.now() - t0, error: message };
        log.warn("Notification sink failed", { sink: sink.name, error: message });
        this.audit?.notificationFailed(event.pullRequestId, event.name, sink.name, message);
      }

      results.push(result);
    }

    this.lastResults = results;
  }
}
