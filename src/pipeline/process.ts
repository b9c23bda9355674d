/**
 * Process driver: evaluate every stored message against every rule and apply
 * the planned label changes.
 *
 * A message may match several rules; each match is planned and applied on its
 * own, in rule order. The stored label set follows every applied change so a
 * later run sees what Gmail now holds.
 */

import type { Logger, RunError } from "../core/index.js";
import { errorMessage, isRetryableError } from "../core/index.js";
import type { MailboxClient } from "../gmail/types.js";
import { evaluate } from "../rules/evaluator.js";
import { plan } from "../rules/planner.js";
import type { LabelNameResolver, MessageRecord, Rule } from "../rules/types.js";
import type { RecordStore } from "../store/records.js";

export interface ProcessOptions {
  rules: Rule[];
  resolver: LabelNameResolver;
  logger: Logger;
  /** Plan and log, but never call `modifyLabels`. */
  dryRun?: boolean;
  /** Reference instant for date predicates; one value for the whole run. */
  now?: Date;
  signal?: AbortSignal;
}

export interface ProcessResult {
  messages: number;
  /** (message, rule) pairs that matched. */
  matches: number;
  /** Mutations sent to Gmail, or that would be sent under `dryRun`. */
  mutations: number;
  /** (message, rule) pairs whose mutation failed. */
  failed: number;
  errors: RunError[];
  durationMs: number;
}

/**
 * Plan and apply one matched rule. Returns `true` when a mutation was sent
 * (or would be, under `dryRun`).
 */
async function applyRule(
  record: MessageRecord,
  rule: Rule,
  client: MailboxClient,
  store: RecordStore,
  options: ProcessOptions,
): Promise<boolean> {
  const { resolver, logger, dryRun = false } = options;

  const intent = await plan(record.id, rule.actions, resolver, { logger });
  if (!intent) return false;

  const add = [...intent.labelsToAdd];
  const remove = [...intent.labelsToRemove];

  if (dryRun) {
    logger.info("Would modify labels", {
      messageId: record.id,
      rule: rule.description,
      add,
      remove,
    });
    return true;
  }

  const labelIds = await client.modifyLabels(record.id, add, remove);
  store.updateLabels(record.id, labelIds);
  logger.info("Labels modified", {
    messageId: record.id,
    rule: rule.description,
    add,
    remove,
  });
  return true;
}

/**
 * Run every rule against one record. A failed mutation is recorded against
 * its (message, rule) pair and the remaining rules still run.
 */
async function processRecord(
  record: MessageRecord,
  client: MailboxClient,
  store: RecordStore,
  options: ProcessOptions,
  now: Date,
  result: ProcessResult,
): Promise<void> {
  const { rules, logger } = options;

  for (const [index, rule] of rules.entries()) {
    if (!evaluate(record, rule, { now, logger })) continue;
    result.matches++;

    try {
      if (await applyRule(record, rule, client, store, options)) {
        result.mutations++;
      }
    } catch (err) {
      const ruleName = rule.description || `#${index}`;
      result.failed++;
      result.errors.push({
        entity: `message:${record.id} rule:${ruleName}`,
        error: errorMessage(err),
        retryable: isRetryableError(err),
      });
      logger.warn("Failed to apply rule", {
        messageId: record.id,
        rule: ruleName,
        error: errorMessage(err),
      });
    }
  }
}

export async function processMessages(
  client: MailboxClient,
  store: RecordStore,
  options: ProcessOptions,
): Promise<ProcessResult> {
  const { logger } = options;
  const now = options.now ?? new Date();
  const startTime = Date.now();
  const result: ProcessResult = {
    messages: 0,
    matches: 0,
    mutations: 0,
    failed: 0,
    errors: [],
    durationMs: 0,
  };

  const records = store.all();
  logger.info(`Processing ${records.length} messages against ${options.rules.length} rules`, {
    dryRun: options.dryRun ?? false,
  });

  for (const record of records) {
    if (options.signal?.aborted) {
      logger.warn("Processing interrupted", { processed: result.messages });
      break;
    }
    result.messages++;

    await processRecord(record, client, store, options, now, result);

    logger.progress(result.messages, records.length, "messages");
  }

  result.durationMs = Date.now() - startTime;
  logger.info(
    `Processing complete: ${result.matches} matches, ${result.mutations} mutations, ${result.failed} failed`,
    { durationMs: result.durationMs },
  );
  return result;
}
