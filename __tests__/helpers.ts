import type { Logger, LogLevel } from "../src/core/index.js";
import type { MessageRecord } from "../src/rules/types.js";

export interface LogEntry {
  level: LogLevel;
  msg: string;
  data?: Record<string, unknown>;
}

/** Logger that keeps entries in memory instead of printing them. */
export class MemoryLogger implements Logger {
  readonly entries: LogEntry[] = [];

  debug(msg: string, data?: Record<string, unknown>): void {
    this.entries.push({ level: "debug", msg, data });
  }
  info(msg: string, data?: Record<string, unknown>): void {
    this.entries.push({ level: "info", msg, data });
  }
  warn(msg: string, data?: Record<string, unknown>): void {
    this.entries.push({ level: "warn", msg, data });
  }
  error(msg: string, data?: Record<string, unknown>): void {
    this.entries.push({ level: "error", msg, data });
  }
  progress(): void {}

  at(level: LogLevel): LogEntry[] {
    return this.entries.filter((e) => e.level === level);
  }
}

export function makeRecord(overrides: Partial<MessageRecord> = {}): MessageRecord {
  return {
    id: "msg-1",
    threadId: "thread-1",
    from: "Alice <alice@example.com>",
    to: ["bob@example.com"],
    cc: [],
    bcc: [],
    subject: "Hello",
    bodyPlain: "Just saying hi",
    receivedAt: "2024-06-01T12:00:00.000Z",
    labelIds: ["INBOX", "UNREAD"],
    ...overrides,
  };
}
