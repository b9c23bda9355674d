import { conditionsPolicy } from "./evaluator.js";
import { resolveField } from "./fields.js";
import {
  DATE_PREDICATES,
  isDatePredicate,
  isStringPredicate,
  STRING_PREDICATES,
} from "./predicates.js";
import type { FieldKind, Rule } from "./types.js";

const KNOWN_ACTIONS = new Set([
  "mark_as_read",
  "mark_as_unread",
  "move_message",
  "add_label",
  "remove_label",
]);

export interface RuleIssue {
  /** `conditions[2]`, `actions[0]`, or `rule`. */
  path: string;
  message: string;
}

function predicateAllowed(kind: FieldKind, predicate: string): boolean {
  return kind === "timestamp"
    ? isDatePredicate(predicate)
    : isStringPredicate(predicate);
}

function allowedList(kind: FieldKind): string {
  return (kind === "timestamp" ? DATE_PREDICATES : STRING_PREDICATES).join(", ");
}

/**
 * Static checks run when rules are loaded. Issues are advisory: the rule is
 * still evaluated, and the same problems are reported per message at
 * evaluation time.
 */
export function validateRule(rule: Rule): RuleIssue[] {
  const issues: RuleIssue[] = [];

  if (rule.conditions.length === 0) {
    issues.push({ path: "conditions", message: "rule has no conditions and will never match" });
  }
  if (!conditionsPolicy(rule.conditionsPredicate).recognized) {
    issues.push({
      path: "conditions_predicate",
      message: `unknown value '${rule.conditionsPredicate}', 'all' will be used`,
    });
  }

  rule.conditions.forEach((condition, i) => {
    const path = `conditions[${i}]`;
    if (!condition.field || !condition.predicate || condition.value === null) {
      issues.push({ path, message: "field, predicate and value are all required" });
      return;
    }
    const resolved = resolveField(condition.field);
    if (!resolved) {
      issues.push({ path, message: `unknown field '${condition.field}'` });
      return;
    }
    if (!predicateAllowed(resolved.kind, condition.predicate)) {
      issues.push({
        path,
        message: `predicate '${condition.predicate}' is not valid for ${resolved.field} (expected one of: ${allowedList(resolved.kind)})`,
      });
      return;
    }
    if (resolved.kind === "timestamp" && !/^\s*[+-]?\d+\s*$/.test(condition.value)) {
      issues.push({ path, message: `value '${condition.value}' is not a whole number` });
    }
  });

  rule.actions.forEach((action, i) => {
    const path = `actions[${i}]`;
    const type = action.type.trim().toLowerCase();
    if (!KNOWN_ACTIONS.has(type)) {
      issues.push({ path, message: `unknown action type '${action.type}'` });
    } else if (type === "move_message" && !action.mailbox?.trim()) {
      issues.push({ path, message: "move_message needs a mailbox" });
    } else if ((type === "add_label" || type === "remove_label") && !action.labelName?.trim()) {
      issues.push({ path, message: `${type} needs a label_name` });
    }
  });

  return issues;
}
