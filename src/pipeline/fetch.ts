/**
 * Fetch driver: pull messages matching a Gmail query into the record store.
 *
 * Messages already stored are skipped without a `messages.get` call. A
 * failure on one message is recorded in the result and the run moves on.
 */

import type { Logger, RunError } from "../core/index.js";
import { errorMessage, isRetryableError } from "../core/index.js";
import { toMessageRecord } from "../gmail/mime.js";
import type { MailboxClient } from "../gmail/types.js";
import type { RecordStore } from "../store/records.js";

export interface FetchOptions {
  query: string;
  maxMessages: number;
  logger: Logger;
  signal?: AbortSignal;
}

export interface FetchResult {
  listed: number;
  stored: number;
  skipped: number;
  failed: number;
  errors: RunError[];
  durationMs: number;
}

export async function fetchMessages(
  client: MailboxClient,
  store: RecordStore,
  options: FetchOptions,
): Promise<FetchResult> {
  const { query, maxMessages, logger } = options;
  const signal = options.signal ?? new AbortController().signal;
  const startTime = Date.now();
  const result: FetchResult = {
    listed: 0,
    stored: 0,
    skipped: 0,
    failed: 0,
    errors: [],
    durationMs: 0,
  };

  logger.info("Listing messages", { query, maxMessages });

  for await (const page of client.listMessageIds(query, maxMessages, signal)) {
    for (const stub of page) {
      if (signal.aborted) break;
      result.listed++;

      if (store.has(stub.id)) {
        result.skipped++;
        continue;
      }

      try {
        const msg = await client.getMessage(stub.id);
        const record = toMessageRecord(msg);
        if (store.insert(record)) {
          result.stored++;
        } else {
          result.skipped++;
        }
      } catch (err) {
        result.failed++;
        result.errors.push({
          entity: `message:${stub.id}`,
          error: errorMessage(err),
          retryable: isRetryableError(err),
        });
        logger.warn("Failed to fetch message", {
          messageId: stub.id,
          error: errorMessage(err),
        });
      }

      logger.progress(result.listed, maxMessages, "messages");
    }
    if (signal.aborted) {
      logger.warn("Fetch interrupted", { listed: result.listed });
      break;
    }
  }

  result.durationMs = Date.now() - startTime;
  logger.info(
    `Fetch complete: ${result.stored} stored, ${result.skipped} skipped, ${result.failed} failed`,
    { durationMs: result.durationMs },
  );
  return result;
}
