import type { Logger } from "../core/index.js";
import { bareAddress } from "./addresses.js";
import { type CheckResult, failed, matched } from "./errors.js";
import { resolveField } from "./fields.js";
import {
  checkDate,
  checkString,
  isNegativePredicate,
  isStringPredicate,
  positiveForm,
} from "./predicates.js";
import type { CanonicalField, Condition, MessageRecord } from "./types.js";

export interface ConditionContext {
  /** Captured once per rule evaluation. */
  now: Date;
  logger: Logger;
  ruleDescription: string;
}

function addressList(record: MessageRecord, field: CanonicalField): string[] {
  switch (field) {
    case "cc_addresses":
      return record.cc;
    case "bcc_addresses":
      return record.bcc;
    default:
      return record.to;
  }
}

/**
 * Quantify a string predicate over a list: positive predicates hold if any
 * element matches, negative ones only if no element matches the positive
 * form. An empty list therefore satisfies every negative predicate.
 */
function checkAddressList(
  values: string[],
  predicate: string,
  ruleValue: string,
  field: CanonicalField,
): CheckResult {
  if (!isStringPredicate(predicate)) {
    return failed(
      "UnsupportedPredicate",
      `Unsupported predicate '${predicate}' for address list field '${field}'`,
    );
  }

  const positive = positiveForm(predicate);
  const anyMatch = values.some((raw) => {
    const result = checkString(bareAddress(raw), positive, ruleValue);
    return result.ok && result.value;
  });
  return matched(isNegativePredicate(predicate) ? !anyMatch : anyMatch);
}

/**
 * Evaluate one condition, reporting malformed input as a typed failure.
 */
export function checkCondition(
  record: MessageRecord,
  condition: Condition,
  now: Date,
): CheckResult {
  const { field, predicate, value } = condition;
  if (!field || !predicate || value === null) {
    return failed(
      "MalformedCondition",
      `Condition needs a field, a predicate and a value: ${JSON.stringify(condition)}`,
    );
  }

  const resolved = resolveField(field);
  if (!resolved) {
    return failed("UnresolvedField", `Unknown field '${field}'`);
  }

  switch (resolved.field) {
    case "from_address":
      return checkString(bareAddress(record.from), predicate, value);
    case "subject":
      return checkString(record.subject, predicate, value);
    case "body_plain":
      return checkString(record.bodyPlain, predicate, value);
    case "to_addresses":
    case "cc_addresses":
    case "bcc_addresses":
      return checkAddressList(
        addressList(record, resolved.field),
        predicate,
        value,
        resolved.field,
      );
    case "received_datetime":
      return checkDate(record.receivedAt, predicate, value, now);
  }
}

/**
 * Evaluate one condition to a plain boolean. Any failure is logged and
 * counts as "not met"; it never reaches sibling conditions.
 */
export function evaluateCondition(
  record: MessageRecord,
  condition: Condition,
  ctx: ConditionContext,
): boolean {
  let result: CheckResult;
  try {
    result = checkCondition(record, condition, ctx.now);
  } catch (err) {
    ctx.logger.warn("Unexpected error while evaluating condition", {
      rule: ctx.ruleDescription,
      messageId: record.id,
      condition,
      error: err instanceof Error ? err.message : String(err),
    });
    return false;
  }

  if (!result.ok) {
    ctx.logger.warn("Condition failed to evaluate; treating as not met", {
      rule: ctx.ruleDescription,
      messageId: record.id,
      kind: result.error.kind,
      error: result.error.message,
    });
    return false;
  }

  ctx.logger.debug("Condition evaluated", {
    rule: ctx.ruleDescription,
    messageId: record.id,
    field: condition.field,
    predicate: condition.predicate,
    result: result.value,
  });
  return result.value;
}
