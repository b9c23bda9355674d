// Client
export { GmailClient } from "./client.js";
export { loadConfig } from "./config.js";
// Label resolution
export { LabelResolver, SYSTEM_LABELS } from "./labels.js";
export type { LabelSource } from "./labels.js";
// MIME utilities
export { bodyText, getHeader, receivedAt, toMessageRecord, walkParts } from "./mime.js";
// Types
export type {
  GmailConfig,
  GmailLabel,
  MailboxClient,
  MessageStub,
  MimeWalkResult,
  Profile,
} from "./types.js";
