/**
 * Action planner.
 *
 * Turns a matched rule's actions into one label mutation for a message.
 * Actions that cannot be planned (unknown type, missing target, label that
 * does not exist) are skipped with a warning; the rest of the plan stands.
 */

import { createLogger, type Logger } from "../core/index.js";
import type {
  LabelNameResolver,
  MutationIntent,
  RuleAction,
} from "./types.js";

/** Gmail system label ids; they double as their own names. */
export const INBOX = "INBOX";
export const UNREAD = "UNREAD";
const ARCHIVE_MAILBOX = "ARCHIVE";

export interface PlanOptions {
  logger?: Logger;
}

let defaultLogger: Logger | null = null;

function plannerLogger(): Logger {
  defaultLogger ??= createLogger("planner");
  return defaultLogger;
}

interface Draft {
  add: string[];
  remove: string[];
}

async function resolveOrSkip(
  resolver: LabelNameResolver,
  name: string,
  messageId: string,
  actionType: string,
  logger: Logger,
): Promise<string | null> {
  let labelId: string | null;
  try {
    labelId = await resolver.resolve(name);
  } catch (err) {
    logger.warn("Label lookup failed; skipping action", {
      messageId,
      action: actionType,
      label: name,
      error: err instanceof Error ? err.message : String(err),
    });
    return null;
  }
  if (labelId === null) {
    logger.warn("Label not found; skipping action", {
      messageId,
      action: actionType,
      label: name,
    });
  }
  return labelId;
}

async function applyAction(
  draft: Draft,
  action: RuleAction,
  messageId: string,
  resolver: LabelNameResolver,
  logger: Logger,
): Promise<void> {
  const type = action.type.trim().toLowerCase();

  switch (type) {
    case "mark_as_read":
      draft.remove.push(UNREAD);
      return;

    case "mark_as_unread":
      draft.add.push(UNREAD);
      return;

    case "move_message": {
      const mailbox = action.mailbox?.trim();
      if (!mailbox) {
        logger.warn("move_message has no mailbox; skipping", { messageId });
        return;
      }
      // Archiving in Gmail is just leaving the inbox.
      if (mailbox.toUpperCase() === ARCHIVE_MAILBOX) {
        draft.remove.push(INBOX);
        return;
      }
      const target = await resolveOrSkip(resolver, mailbox, messageId, type, logger);
      if (target === null) return;
      draft.add.push(target);
      draft.remove.push(INBOX);
      return;
    }

    case "add_label":
    case "remove_label": {
      const name = action.labelName?.trim();
      if (!name) {
        logger.warn(`${type} has no label_name; skipping`, { messageId });
        return;
      }
      const labelId = await resolveOrSkip(resolver, name, messageId, type, logger);
      if (labelId === null) return;
      (type === "add_label" ? draft.add : draft.remove).push(labelId);
      return;
    }

    default:
      logger.warn("Unknown action type; skipping", {
        messageId,
        action: action.type,
      });
  }
}

/**
 * Dedupe and settle add/remove conflicts. Removal wins for every label except
 * the inbox, where an explicit add (a "move to Inbox") wins.
 */
export function resolveConflicts(
  messageId: string,
  add: Iterable<string>,
  remove: Iterable<string>,
): MutationIntent {
  const labelsToAdd = new Set(add);
  const labelsToRemove = new Set(remove);

  for (const id of [...labelsToAdd]) {
    if (!labelsToRemove.has(id)) continue;
    if (id === INBOX) {
      labelsToRemove.delete(id);
    } else {
      labelsToAdd.delete(id);
    }
  }

  return { messageId, labelsToAdd, labelsToRemove };
}

/**
 * Plan the label mutation for one message and one matched rule's actions.
 * Returns `null` when there is nothing to change.
 */
export async function plan(
  messageId: string,
  actions: RuleAction[],
  resolver: LabelNameResolver,
  options: PlanOptions = {},
): Promise<MutationIntent | null> {
  const logger = options.logger ?? plannerLogger();
  const draft: Draft = { add: [], remove: [] };

  for (const action of actions) {
    await applyAction(draft, action, messageId, resolver, logger);
  }

  const intent = resolveConflicts(messageId, draft.add, draft.remove);

  if (intent.labelsToAdd.size === 0 && intent.labelsToRemove.size === 0) {
    logger.debug("Nothing to change", { messageId });
    return null;
  }
  return intent;
}
