/**
 * SQLite-backed message store.
 *
 * One row per Gmail message id. Address lists and label ids are kept as JSON
 * arrays so a row round-trips to the same `MessageRecord` it was written from.
 */

import Database from "better-sqlite3";
import type { MessageRecord } from "../rules/types.js";

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS messages (
    id          TEXT PRIMARY KEY,
    thread_id   TEXT NOT NULL,
    from_addr   TEXT NOT NULL,
    to_addrs    TEXT NOT NULL,
    cc_addrs    TEXT NOT NULL,
    bcc_addrs   TEXT NOT NULL,
    subject     TEXT NOT NULL,
    body_plain  TEXT NOT NULL,
    received_at TEXT NOT NULL,
    label_ids   TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_messages_received_at ON messages (received_at);
`;

interface MessageRow {
  id: string;
  thread_id: string;
  from_addr: string;
  to_addrs: string;
  cc_addrs: string;
  bcc_addrs: string;
  subject: string;
  body_plain: string;
  received_at: string;
  label_ids: string;
}

function parseList(json: string): string[] {
  const value: unknown = JSON.parse(json);
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === "string") : [];
}

function toRecord(row: MessageRow): MessageRecord {
  return {
    id: row.id,
    threadId: row.thread_id,
    from: row.from_addr,
    to: parseList(row.to_addrs),
    cc: parseList(row.cc_addrs),
    bcc: parseList(row.bcc_addrs),
    subject: row.subject,
    bodyPlain: row.body_plain,
    receivedAt: row.received_at,
    labelIds: parseList(row.label_ids),
  };
}

export class RecordStore {
  private readonly db: Database.Database;
  private readonly insertStmt: Database.Statement<[MessageRow]>;
  private readonly getStmt: Database.Statement<[string], MessageRow>;
  private readonly hasStmt: Database.Statement<[string], { found: number }>;
  private readonly allStmt: Database.Statement<[], MessageRow>;
  private readonly countStmt: Database.Statement<[], { total: number }>;
  private readonly labelsStmt: Database.Statement<[string, string]>;

  /** `dbPath` may be `":memory:"`. */
  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(SCHEMA);

    this.insertStmt = this.db.prepare<[MessageRow]>(`
      INSERT OR IGNORE INTO messages
        (id, thread_id, from_addr, to_addrs, cc_addrs, bcc_addrs, subject, body_plain, received_at, label_ids)
      VALUES
        (@id, @thread_id, @from_addr, @to_addrs, @cc_addrs, @bcc_addrs, @subject, @body_plain, @received_at, @label_ids)
    `);
    this.getStmt = this.db.prepare<[string], MessageRow>("SELECT * FROM messages WHERE id = ?");
    this.hasStmt = this.db.prepare<[string], { found: number }>("SELECT 1 AS found FROM messages WHERE id = ?");
    this.allStmt = this.db.prepare<[], MessageRow>("SELECT * FROM messages ORDER BY received_at DESC, id");
    this.countStmt = this.db.prepare<[], { total: number }>("SELECT COUNT(*) AS total FROM messages");
    this.labelsStmt = this.db.prepare<[string, string]>("UPDATE messages SET label_ids = ? WHERE id = ?");
  }

  /**
   * Store a record unless its id is already present. Returns `false` for a
   * duplicate; the stored row is left untouched.
   */
  insert(record: MessageRecord): boolean {
    const result = this.insertStmt.run({
      id: record.id,
      thread_id: record.threadId,
      from_addr: record.from,
      to_addrs: JSON.stringify(record.to),
      cc_addrs: JSON.stringify(record.cc),
      bcc_addrs: JSON.stringify(record.bcc),
      subject: record.subject,
      body_plain: record.bodyPlain,
      received_at: record.receivedAt,
      label_ids: JSON.stringify(record.labelIds),
    });
    return result.changes > 0;
  }

  has(id: string): boolean {
    return this.hasStmt.get(id) !== undefined;
  }

  get(id: string): MessageRecord | null {
    const row = this.getStmt.get(id);
    return row ? toRecord(row) : null;
  }

  /** All records, newest first. */
  all(): MessageRecord[] {
    return this.allStmt.all().map(toRecord);
  }

  count(): number {
    return this.countStmt.get()?.total ?? 0;
  }

  /** Returns `false` when no record has this id. */
  updateLabels(id: string, labelIds: string[]): boolean {
    return this.labelsStmt.run(JSON.stringify(labelIds), id).changes > 0;
  }

  close(): void {
    this.db.close();
  }
}
