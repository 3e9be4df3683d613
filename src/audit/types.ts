/**
 * Audit log types for tracking pull request operations
 */

export const AUDIT_EVENT_TYPES = [
  "operation_committed",
  "operation_rejected",
  "state_changed",
  "persistence_failed",
  "notification_failed",
  "config_loaded",
] as const;

export type AuditEventType = (typeof AUDIT_EVENT_TYPES)[number];

export type AuditSeverity = "info" | "warning" | "error";

export interface AuditMetadata {
  // Aggregate context
  pullRequestId?: string;
  operation?: string;
  version?: number;

  // State tracking
  oldState?: string;
  newState?: string;

  // Failures
  errorKind?: string;
  error?: string;
  rule?: string;

  // Notifications
  event?: string;
  sink?: string;

  durationMs?: number;

  // Generic
  [key: string]: string | number | boolean | undefined;
}

export interface AuditEntry {
  timestamp: string; // ISO 8601
  eventType: AuditEventType;
  severity: AuditSeverity;
  message: string;
  metadata?: AuditMetadata;
  actor?: string; // caller identity, or "system"
}
