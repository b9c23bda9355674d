export type ConditionErrorKind =
  | "UnsupportedPredicate"
  | "InvalidConditionValue"
  | "UnresolvedField"
  | "InvalidRecordValue"
  | "MalformedCondition";

export class ConditionError extends Error {
  readonly kind: ConditionErrorKind;

  constructor(kind: ConditionErrorKind, message: string) {
    super(message);
    this.name = "ConditionError";
    this.kind = kind;
  }
}

/**
 * Outcome of a fallible condition primitive. Collapsed to a plain boolean at
 * the condition evaluator.
 */
export type CheckResult =
  | { ok: true; value: boolean }
  | { ok: false; error: ConditionError };

export function matched(value: boolean): CheckResult {
  return { ok: true, value };
}

export function failed(kind: ConditionErrorKind, message: string): CheckResult {
  return { ok: false, error: new ConditionError(kind, message) };
}
