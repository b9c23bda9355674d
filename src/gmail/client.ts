/**
 * Gmail API client wrapper.
 *
 * Thin layer over `googleapis` that exposes typed helpers for the operations
 * the drivers need: list labels, list message ids for a query, get a message,
 * modify a message's labels, and get the profile.
 *
 * Every public method acquires a rate-limiter token before calling the API so
 * callers never have to think about quota management.
 */

import { type gmail_v1, google } from "googleapis";
import type { Logger, RateLimiter, RetryOptions } from "../core/index.js";
import { errorStatus, isRetryableError, withRetry } from "../core/index.js";
import type {
  GmailConfig,
  GmailLabel,
  MailboxClient,
  MessageStub,
  Profile,
} from "./types.js";

// ─── Quota costs (units per call) ───

const COST_LIST_MESSAGES = 5;
const COST_GET_MESSAGE = 5;
const COST_MODIFY_MESSAGE = 5;
const COST_LIST_LABELS = 1;
const COST_GET_PROFILE = 1;

/** Pause applied to the whole client when Gmail answers 429. */
const RATE_LIMIT_PAUSE_MS = 5_000;

function hasId<T extends { id?: string | null }>(item: T): item is T & { id: string } {
  return typeof item.id === "string" && item.id.length > 0;
}

// ─── Client ───

export class GmailClient implements MailboxClient {
  private readonly gmail: gmail_v1.Gmail;
  private readonly rateLimiter: RateLimiter;
  private readonly config: GmailConfig;
  private readonly logger: Logger;

  constructor(config: GmailConfig, rateLimiter: RateLimiter, logger: Logger) {
    this.config = config;
    this.rateLimiter = rateLimiter;
    this.logger = logger;

    const auth = new google.auth.OAuth2(config.clientId, config.clientSecret);
    auth.setCredentials({ refresh_token: config.refreshToken });
    this.gmail = google.gmail({ version: "v1", auth });
  }

  private retryOptions(operation: string): RetryOptions {
    return {
      retryOn: isRetryableError,
      onRetry: (err, attempt, delayMs) => {
        if (errorStatus(err) === 429) {
          this.rateLimiter.backoff(RATE_LIMIT_PAUSE_MS);
        }
        this.logger.warn("Gmail call failed, retrying", {
          operation,
          attempt,
          delayMs: Math.round(delayMs),
          status: errorStatus(err),
        });
      },
    };
  }

  // ── Labels ──

  async listLabels(): Promise<GmailLabel[]> {
    await this.rateLimiter.acquire(COST_LIST_LABELS);
    const res = await withRetry(
      () => this.gmail.users.labels.list({ userId: "me" }),
      this.retryOptions("labels.list"),
    );

    return (res.data.labels ?? []).filter(hasId).map((l): GmailLabel => ({
      id: l.id,
      name: l.name ?? l.id,
      type: l.type === "system" ? "system" : "user",
    }));
  }

  // ── Messages ──

  /**
   * List message ids matching `query`, newest first, stopping after
   * `maxMessages`. Yields one page of stubs at a time.
   */
  async *listMessageIds(
    query: string,
    maxMessages: number,
    signal: AbortSignal,
  ): AsyncGenerator<MessageStub[]> {
    let pageToken: string | undefined;
    let remaining = maxMessages;

    do {
      if (signal.aborted || remaining <= 0) return;

      await this.rateLimiter.acquire(COST_LIST_MESSAGES);

      const res = await withRetry(
        () =>
          this.gmail.users.messages.list({
            userId: "me",
            q: query,
            maxResults: Math.min(this.config.pageSize, remaining),
            pageToken,
          }),
        this.retryOptions("messages.list"),
      );

      const messages = (res.data.messages ?? [])
        .filter(hasId)
        .slice(0, remaining)
        .map((m) => ({ id: m.id, threadId: m.threadId ?? "" }));

      if (messages.length > 0) {
        remaining -= messages.length;
        yield messages;
      }

      pageToken = res.data.nextPageToken ?? undefined;
    } while (pageToken);
  }

  /**
   * Fetch a single message with `format=full`.
   */
  async getMessage(messageId: string): Promise<gmail_v1.Schema$Message> {
    await this.rateLimiter.acquire(COST_GET_MESSAGE);
    const res = await withRetry(
      () =>
        this.gmail.users.messages.get({
          userId: "me",
          id: messageId,
          format: "full",
        }),
      this.retryOptions("messages.get"),
    );
    return res.data;
  }

  /**
   * Add and remove labels on one message. Returns the message's label ids
   * after the change.
   */
  async modifyLabels(
    messageId: string,
    addLabelIds: string[],
    removeLabelIds: string[],
  ): Promise<string[]> {
    if (addLabelIds.length === 0 && removeLabelIds.length === 0) {
      throw new Error(`Nothing to modify for message ${messageId}`);
    }

    await this.rateLimiter.acquire(COST_MODIFY_MESSAGE);
    const res = await withRetry(
      () =>
        this.gmail.users.messages.modify({
          userId: "me",
          id: messageId,
          requestBody: {
            addLabelIds: addLabelIds.length > 0 ? addLabelIds : undefined,
            removeLabelIds: removeLabelIds.length > 0 ? removeLabelIds : undefined,
          },
        }),
      this.retryOptions("messages.modify"),
    );
    return res.data.labelIds ?? [];
  }

  // ── Profile ──

  async getProfile(): Promise<Profile> {
    await this.rateLimiter.acquire(COST_GET_PROFILE);
    const res = await withRetry(
      () => this.gmail.users.getProfile({ userId: "me" }),
      this.retryOptions("getProfile"),
    );
    return {
      emailAddress: res.data.emailAddress ?? "",
      historyId: res.data.historyId ?? "",
      messagesTotal: res.data.messagesTotal ?? 0,
    };
  }
}
