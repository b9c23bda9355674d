// Evaluation
export { conditionsPolicy, evaluate } from "./evaluator.js";
export type { ConditionsPolicy, EvaluateOptions } from "./evaluator.js";
export { checkCondition, evaluateCondition } from "./conditions.js";
export type { ConditionContext } from "./conditions.js";
export { FIELD_KINDS, resolveField } from "./fields.js";
export type { ResolvedField } from "./fields.js";
export {
  checkDate,
  checkString,
  normalize,
  parseTimestamp,
  subtractMonths,
} from "./predicates.js";
export { bareAddress, splitAddressList } from "./addresses.js";
export { ConditionError } from "./errors.js";
export type { CheckResult, ConditionErrorKind } from "./errors.js";

// Planning
export { INBOX, plan, resolveConflicts, UNREAD } from "./planner.js";
export type { PlanOptions } from "./planner.js";

// Rule files
export { loadRules, parseRules, RuleFileError } from "./loader.js";
export type { LoadRulesOptions } from "./loader.js";
export { validateRule } from "./validate.js";
export type { RuleIssue } from "./validate.js";

// Types
export { SENTINEL_TIMESTAMP } from "./types.js";
export type {
  CanonicalField,
  Condition,
  DatePredicate,
  FieldKind,
  LabelNameResolver,
  MessageRecord,
  MutationIntent,
  Rule,
  RuleAction,
  StringPredicate,
} from "./types.js";
