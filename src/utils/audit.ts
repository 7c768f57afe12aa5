import { appendFile } from "fs/promises";
import type { AuditEvent, AuditEventType } from "../types/audit";

export interface AuditLogger {
  log(
    userId: number,
    event: AuditEventType,
    details?: Record<string, unknown>
  ): Promise<void>;
}

export interface FileAuditLoggerOptions {
  path: string;
  json?: boolean;
  now?: () => Date;
}

export function formatAuditEvent(event: AuditEvent, json: boolean): string {
  if (json) {
    return JSON.stringify(event) + "\n";
  }

  // Plain text format for readability
  const lines = ["\n" + "=".repeat(60)];
  for (const [key, value] of Object.entries(event)) {
    const displayValue =
      typeof value === "object" && value !== null ? JSON.stringify(value) : String(value);
    lines.push(`${key}: ${displayValue}`);
  }
  return lines.join("\n") + "\n";
}

export class FileAuditLogger implements AuditLogger {
  private readonly path: string;
  private readonly json: boolean;
  private readonly now: () => Date;

  constructor(options: FileAuditLoggerOptions) {
    this.path = options.path;
    this.json = options.json ?? false;
    this.now = options.now ?? (() => new Date());
  }

  async log(
    userId: number,
    event: AuditEventType,
    details: Record<string, unknown> = {}
  ): Promise<void> {
    const entry: AuditEvent = {
      timestamp: this.now().toISOString(),
      event,
      user_id: userId,
      ...details,
    };

    try {
      await appendFile(this.path, formatAuditEvent(entry, this.json));
    } catch (error) {
      console.error("Failed to write audit log:", error);
    }
  }
}

export const noopAuditLogger: AuditLogger = {
  log: async () => {},
};
