/**
 * MIME parsing for Gmail message payloads.
 *
 * Gmail returns message bodies in the `payload` tree (nested `MessagePart`
 * objects). This module walks that tree for text/plain and text/html bodies,
 * decodes them (base64url, declared charset) and flattens the message into
 * the `MessageRecord` the rule engine evaluates.
 */

import type { gmail_v1 } from "googleapis";
import TurndownService from "turndown";
import { splitAddressList } from "../rules/addresses.js";
import { type MessageRecord, SENTINEL_TIMESTAMP } from "../rules/types.js";
import type { MimeWalkResult } from "./types.js";

// ─── Turndown singleton ───

const turndown = new TurndownService({
  headingStyle: "atx",
  codeBlockStyle: "fenced",
  bulletListMarker: "-",
});

// ─── Charset helpers ───

function extractCharset(mimeType: string | undefined | null): string {
  if (!mimeType) return "utf-8";
  const match = /charset\s*=\s*"?([^";\s]+)"?/i.exec(mimeType);
  return match ? match[1].toLowerCase() : "utf-8";
}

/**
 * Map legacy charset names to labels recognised by `TextDecoder`.
 */
const CHARSET_LABELS: Record<string, string> = {
  ascii: "utf-8",
  "us-ascii": "utf-8",
  cp1252: "windows-1252",
  "iso-8859-1": "windows-1252",
  latin1: "windows-1252",
  gb2312: "gbk",
  gb_2312: "gbk",
};

function decodeBody(data: string, contentType?: string | null): string {
  const raw = Buffer.from(data, "base64url");
  const charset = extractCharset(contentType);
  const label = CHARSET_LABELS[charset] ?? charset;

  if (label === "utf-8") {
    return raw.toString("utf-8");
  }

  try {
    return new TextDecoder(label).decode(raw);
  } catch {
    // Unknown charset label: read the bytes as UTF-8
    return raw.toString("utf-8");
  }
}

// ─── Part walking ───

/**
 * Recursively collect text/plain and text/html bodies. Parts with a filename
 * are attachments and are ignored.
 */
export function walkParts(
  part: gmail_v1.Schema$MessagePart | undefined | null,
): MimeWalkResult {
  let plain = "";
  let html = "";

  if (!part) {
    return { plain, html };
  }

  const mime = (part.mimeType ?? "").toLowerCase();
  const data = part.body?.data;

  if (data && !part.filename && (mime === "text/plain" || mime === "text/html")) {
    const contentType = getHeader(part.headers, "Content-Type") || part.mimeType;
    const text = decodeBody(data, contentType);
    if (mime === "text/plain") plain += text;
    else html += text;
  }

  for (const sub of part.parts ?? []) {
    const result = walkParts(sub);
    plain += result.plain;
    html += result.html;
  }

  return { plain, html };
}

// ─── Header extraction helper ───

/**
 * Case-insensitive header lookup. Missing headers read as "".
 */
export function getHeader(
  headers: gmail_v1.Schema$MessagePartHeader[] | undefined | null,
  name: string,
): string {
  if (!headers) return "";
  const lower = name.toLowerCase();
  return headers.find((h) => h.name?.toLowerCase() === lower)?.value ?? "";
}

// ─── Dates ───

/**
 * Pick the received timestamp: the Date header, then Gmail's internalDate,
 * then the sentinel.
 */
export function receivedAt(dateHeader: string, internalDate: string | null | undefined): string {
  if (dateHeader) {
    const parsed = new Date(dateHeader);
    if (!Number.isNaN(parsed.getTime())) return parsed.toISOString();
  }
  const ms = Number(internalDate);
  if (internalDate && Number.isFinite(ms)) {
    return new Date(ms).toISOString();
  }
  return SENTINEL_TIMESTAMP;
}

// ─── Full message parser ───

/**
 * Body text for rule matching: text/plain, else the HTML body converted to
 * markdown, else Gmail's snippet.
 */
export function bodyText({ plain, html }: MimeWalkResult, snippet: string): string {
  if (plain) return plain;
  if (html) return turndown.turndown(html);
  return snippet;
}

/**
 * Flatten a Gmail API `Schema$Message` (fetched with `format=full`) into a
 * `MessageRecord`.
 */
export function toMessageRecord(msg: gmail_v1.Schema$Message): MessageRecord {
  if (!msg.id) {
    throw new Error("Gmail message has no id");
  }
  const headers = msg.payload?.headers;

  return {
    id: msg.id,
    threadId: msg.threadId ?? "",
    from: getHeader(headers, "From"),
    to: splitAddressList(getHeader(headers, "To")),
    cc: splitAddressList(getHeader(headers, "Cc")),
    bcc: splitAddressList(getHeader(headers, "Bcc")),
    subject: getHeader(headers, "Subject"),
    bodyPlain: bodyText(walkParts(msg.payload), msg.snippet ?? ""),
    receivedAt: receivedAt(getHeader(headers, "Date"), msg.internalDate),
    labelIds: msg.labelIds ?? [],
  };
}
