// Audit log event types
export type AuditEventType =
  | "auth_success"
  | "auth_failure"
  | "logout"
  | "record_submitted";

export interface AuditEvent {
  timestamp: string;
  event: AuditEventType;
  user_id: number;
  [key: string]: unknown;
}
