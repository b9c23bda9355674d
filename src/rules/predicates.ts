/**
 * Predicate primitives.
 *
 * Each check returns a `CheckResult` instead of throwing; the condition
 * evaluator decides what a failure means for the rule.
 */

import { type CheckResult, failed, matched } from "./errors.js";
import type { DatePredicate, StringPredicate } from "./types.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export const STRING_PREDICATES: readonly StringPredicate[] = [
  "contains",
  "does_not_contain",
  "equals",
  "does_not_equal",
];

export const DATE_PREDICATES: readonly DatePredicate[] = [
  "less_than_days",
  "greater_than_days",
  "less_than_months",
  "greater_than_months",
];

export function isStringPredicate(name: string): name is StringPredicate {
  return STRING_PREDICATES.some((p) => p === name);
}

export function isDatePredicate(name: string): name is DatePredicate {
  return DATE_PREDICATES.some((p) => p === name);
}

/** Negative string predicates quantify universally over list fields. */
export function isNegativePredicate(predicate: StringPredicate): boolean {
  return predicate === "does_not_contain" || predicate === "does_not_equal";
}

/** The positive counterpart of a string predicate. */
export function positiveForm(predicate: StringPredicate): "contains" | "equals" {
  return predicate === "contains" || predicate === "does_not_contain"
    ? "contains"
    : "equals";
}

// ─── Strings ───

export function normalize(text: string): string {
  return text.toLowerCase().trim();
}

export function checkString(
  value: string,
  predicate: string,
  ruleValue: string,
): CheckResult {
  const subject = normalize(value);
  const wanted = normalize(ruleValue);

  switch (predicate) {
    case "contains":
      return matched(subject.includes(wanted));
    case "does_not_contain":
      return matched(!subject.includes(wanted));
    case "equals":
      return matched(subject === wanted);
    case "does_not_equal":
      return matched(subject !== wanted);
    default:
      return failed(
        "UnsupportedPredicate",
        `Unsupported string predicate: ${predicate}`,
      );
  }
}

// ─── Timestamps ───

const OFFSET_SUFFIX = /(?:z|[+-]\d{2}(?::?\d{2})?)$/i;
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const SPACE_SEPARATED = /^(\d{4}-\d{2}-\d{2}) (\d)/;

/**
 * Parse a stored timestamp to an instant. Values without an offset are read
 * as UTC. Returns `null` when the text is not a timestamp.
 */
export function parseTimestamp(text: string): Date | null {
  let iso = text.trim();
  if (iso === "") return null;
  if (DATE_ONLY.test(iso)) {
    iso = `${iso}T00:00:00Z`;
  } else {
    iso = iso.replace(SPACE_SEPARATED, "$1T$2");
    if (!OFFSET_SUFFIX.test(iso)) iso = `${iso}Z`;
  }
  const ms = Date.parse(iso);
  return Number.isNaN(ms) ? null : new Date(ms);
}

/**
 * Step back `months` calendar months. The day of month is clamped to the
 * length of the target month (31 March − 1 month = 28/29 February).
 */
export function subtractMonths(date: Date, months: number): Date {
  const total = date.getUTCFullYear() * 12 + date.getUTCMonth() - months;
  const year = Math.floor(total / 12);
  const month = total - year * 12;
  const lastDay = new Date(Date.UTC(year, month + 1, 0)).getUTCDate();

  const result = new Date(date.getTime());
  result.setUTCFullYear(year, month, Math.min(date.getUTCDate(), lastDay));
  return result;
}

const INTEGER = /^[+-]?\d+$/;

function parseCount(ruleValue: string): number | null {
  const trimmed = ruleValue.trim();
  return INTEGER.test(trimmed) ? Number.parseInt(trimmed, 10) : null;
}

/**
 * Compare a record timestamp against `now` minus N days/months. Both
 * boundaries are exclusive: a message exactly N days old satisfies neither
 * `less_than_days(N)` nor `greater_than_days(N)`.
 */
export function checkDate(
  receivedAt: string,
  predicate: string,
  ruleValue: string,
  now: Date,
): CheckResult {
  if (!isDatePredicate(predicate)) {
    return failed(
      "UnsupportedPredicate",
      `Unsupported date predicate: ${predicate}`,
    );
  }

  const count = parseCount(ruleValue);
  if (count === null) {
    return failed(
      "InvalidConditionValue",
      `Invalid numeric value for date condition: ${JSON.stringify(ruleValue)}`,
    );
  }

  const received = parseTimestamp(receivedAt);
  if (!received) {
    return failed(
      "InvalidRecordValue",
      `Record timestamp is not a valid date: ${JSON.stringify(receivedAt)}`,
    );
  }

  const ts = received.getTime();
  switch (predicate) {
    case "less_than_days":
      return matched(ts > now.getTime() - count * DAY_MS);
    case "greater_than_days":
      return matched(ts < now.getTime() - count * DAY_MS);
    case "less_than_months":
      return matched(ts > subtractMonths(now, count).getTime());
    case "greater_than_months":
      return matched(ts < subtractMonths(now, count).getTime());
  }
}
