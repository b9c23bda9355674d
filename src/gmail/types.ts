/**
 * Gmail connector type definitions.
 *
 * These are the domain types used by the connector, not the raw googleapis
 * response schemas (those come from `gmail_v1.Schema$*`).
 */

import type { gmail_v1 } from "googleapis";

// ─── Label ───

export interface GmailLabel {
  id: string;
  name: string;
  type: "system" | "user";
}

// ─── MIME walk result ───

export interface MimeWalkResult {
  plain: string;
  html: string;
}

// ─── Configuration (resolved from env vars) ───

export interface GmailConfig {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
  /** Search query used by `fetch`, e.g. `in:inbox`. */
  query: string;
  /** Upper bound on messages listed per fetch run. */
  maxMessages: number;
  /** Messages per page (messages.list maxResults). */
  pageSize: number;
}

// ─── Message stubs ───

export interface MessageStub {
  id: string;
  threadId: string;
}

export interface Profile {
  emailAddress: string;
  historyId: string;
  messagesTotal: number;
}

// ─── Client surface used by the drivers ───

/**
 * The subset of the Gmail API the fetch and process drivers call. Tests
 * substitute an in-memory implementation.
 */
export interface MailboxClient {
  listLabels(): Promise<GmailLabel[]>;
  listMessageIds(
    query: string,
    maxMessages: number,
    signal: AbortSignal,
  ): AsyncGenerator<MessageStub[]>;
  getMessage(messageId: string): Promise<gmail_v1.Schema$Message>;
  modifyLabels(
    messageId: string,
    addLabelIds: string[],
    removeLabelIds: string[],
  ): Promise<string[]>;
}
