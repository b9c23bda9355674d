import type { gmail_v1 } from "googleapis";
import { describe, expect, it } from "vitest";
import {
  bodyText,
  getHeader,
  receivedAt,
  toMessageRecord,
  walkParts,
} from "../../src/gmail/mime.js";
import { SENTINEL_TIMESTAMP } from "../../src/rules/types.js";

// ─── Helpers ───

/** Encode a UTF-8 string as base64url (mimicking Gmail API body encoding). */
function b64url(text: string): string {
  return Buffer.from(text, "utf-8").toString("base64url");
}

// ─── Test fixtures ───

function makeSimpleTextMessage(): gmail_v1.Schema$Message {
  return {
    id: "msg123",
    threadId: "thread123",
    labelIds: ["INBOX", "UNREAD"],
    internalDate: "1704067200000",
    snippet: "Hello world",
    payload: {
      mimeType: "text/plain",
      headers: [
        { name: "From", value: "Alice Example <alice@example.com>" },
        { name: "To", value: "bob@example.com, Carol <carol@example.com>" },
        { name: "Subject", value: "Test Subject" },
        { name: "Date", value: "Mon, 01 Jan 2024 09:30:00 +0100" },
      ],
      body: { size: 11, data: b64url("Hello world") },
    },
  };
}

function makeMultipartMessage(): gmail_v1.Schema$Message {
  return {
    id: "msg456",
    threadId: "thread456",
    labelIds: ["INBOX"],
    internalDate: "1704153600000",
    snippet: "Rich email",
    payload: {
      mimeType: "multipart/mixed",
      headers: [
        { name: "From", value: "carol@example.com" },
        { name: "To", value: "dave@example.com" },
        { name: "CC", value: "eve@example.com" },
        { name: "Subject", value: "Multipart Test" },
      ],
      body: { size: 0 },
      parts: [
        {
          mimeType: "multipart/alternative",
          body: { size: 0 },
          parts: [
            {
              mimeType: "text/plain",
              body: { size: 10, data: b64url("Rich email") },
            },
            {
              mimeType: "text/html",
              body: { size: 30, data: b64url("<p>Rich <strong>email</strong></p>") },
            },
          ],
        },
        {
          mimeType: "text/plain",
          filename: "notes.txt",
          body: { attachmentId: "att_001", size: 2048, data: b64url("attached notes") },
        },
      ],
    },
  };
}

// ─── walkParts ───

describe("walkParts", () => {
  it("returns empty result for null/undefined payload", () => {
    expect(walkParts(null)).toEqual({ plain: "", html: "" });
    expect(walkParts(undefined)).toEqual({ plain: "", html: "" });
  });

  it("extracts text/plain body from a simple payload", () => {
    const result = walkParts(makeSimpleTextMessage().payload);
    expect(result).toEqual({ plain: "Hello world", html: "" });
  });

  it("extracts both bodies from multipart/alternative and skips attachments", () => {
    const result = walkParts(makeMultipartMessage().payload);
    expect(result.plain).toBe("Rich email");
    expect(result.html).toBe("<p>Rich <strong>email</strong></p>");
  });

  it("decodes the declared charset", () => {
    const latin1 = Buffer.from([0x63, 0x61, 0x66, 0xe9]).toString("base64url"); // "café"
    const result = walkParts({
      mimeType: "text/plain",
      headers: [{ name: "Content-Type", value: 'text/plain; charset="ISO-8859-1"' }],
      body: { data: latin1 },
    });
    expect(result.plain).toBe("café");
  });
});

// ─── Headers and dates ───

describe("getHeader", () => {
  it("looks headers up case-insensitively", () => {
    const headers = makeMultipartMessage().payload?.headers;
    expect(getHeader(headers, "cc")).toBe("eve@example.com");
    expect(getHeader(headers, "Bcc")).toBe("");
  });
});

describe("receivedAt", () => {
  it("prefers the Date header", () => {
    expect(receivedAt("Mon, 01 Jan 2024 09:30:00 +0100", "0")).toBe("2024-01-01T08:30:00.000Z");
  });

  it("falls back to internalDate, then the sentinel", () => {
    expect(receivedAt("", "1704153600000")).toBe("2024-01-02T00:00:00.000Z");
    expect(receivedAt("not a date", undefined)).toBe(SENTINEL_TIMESTAMP);
  });
});

describe("bodyText", () => {
  it("converts HTML to markdown when there is no plain body", () => {
    expect(bodyText({ plain: "", html: "<p>Rich <strong>email</strong></p>" }, "snip")).toBe(
      "Rich **email**",
    );
  });

  it("uses the snippet when there is no body at all", () => {
    expect(bodyText({ plain: "", html: "" }, "snip")).toBe("snip");
  });
});

// ─── toMessageRecord ───

describe("toMessageRecord", () => {
  it("flattens a message into a record", () => {
    expect(toMessageRecord(makeSimpleTextMessage())).toEqual({
      id: "msg123",
      threadId: "thread123",
      from: "Alice Example <alice@example.com>",
      to: ["bob@example.com", "Carol <carol@example.com>"],
      cc: [],
      bcc: [],
      subject: "Test Subject",
      bodyPlain: "Hello world",
      receivedAt: "2024-01-01T08:30:00.000Z",
      labelIds: ["INBOX", "UNREAD"],
    });
  });

  it("uses internalDate when the Date header is missing", () => {
    const record = toMessageRecord(makeMultipartMessage());
    expect(record.receivedAt).toBe("2024-01-02T00:00:00.000Z");
    expect(record.cc).toEqual(["eve@example.com"]);
    expect(record.bodyPlain).toBe("Rich email");
  });

  it("rejects a message without an id", () => {
    expect(() => toMessageRecord({ threadId: "t" })).toThrow("Gmail message has no id");
  });
});
