import { createLogger, type Logger } from "../core/index.js";
import { evaluateCondition } from "./conditions.js";
import type { MessageRecord, Rule } from "./types.js";

export interface EvaluateOptions {
  /** Reference instant for date predicates. Defaults to the current time. */
  now?: Date;
  logger?: Logger;
}

let defaultLogger: Logger | null = null;

function rulesLogger(): Logger {
  defaultLogger ??= createLogger("rules");
  return defaultLogger;
}

export type ConditionsPolicy = "all" | "any";

/**
 * Read a rule's combinator. Unknown values fall back to `all` with
 * `recognized: false` so the caller can warn.
 */
export function conditionsPolicy(raw: string): {
  policy: ConditionsPolicy;
  recognized: boolean;
} {
  const lower = raw.trim().toLowerCase();
  if (lower === "any") return { policy: "any", recognized: true };
  return { policy: "all", recognized: lower === "all" || lower === "" };
}

/**
 * Decide whether `record` matches `rule`.
 *
 * Every condition is evaluated, even after the outcome is known, so that each
 * malformed condition is reported. A rule without conditions never matches.
 */
export function evaluate(
  record: MessageRecord,
  rule: Rule,
  options: EvaluateOptions = {},
): boolean {
  const logger = options.logger ?? rulesLogger();
  const description = rule.description || "(unnamed rule)";

  if (rule.conditions.length === 0) {
    logger.warn("Rule has no conditions; it matches nothing", {
      rule: description,
    });
    return false;
  }

  const { policy, recognized } = conditionsPolicy(rule.conditionsPredicate);
  if (!recognized) {
    logger.warn("Unknown conditions predicate; defaulting to 'all'", {
      rule: description,
      conditionsPredicate: rule.conditionsPredicate,
    });
  }

  const ctx = { now: options.now ?? new Date(), logger, ruleDescription: description };
  const results = rule.conditions.map((condition) =>
    evaluateCondition(record, condition, ctx),
  );

  return policy === "any" ? results.some(Boolean) : results.every(Boolean);
}
