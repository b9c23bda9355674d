/**
 * Rule engine type definitions.
 *
 * `MessageRecord` and `Rule` are read-only inputs owned by the store and the
 * rule loader; `MutationIntent` is produced fresh for every matched rule.
 */

// ─── Message record ───

export interface MessageRecord {
  id: string;
  threadId: string;
  /** Raw From header, may embed a display name. */
  from: string;
  /** Raw address strings (`Name <addr>` or bare `addr`), in header order. */
  to: string[];
  cc: string[];
  bcc: string[];
  subject: string;
  bodyPlain: string;
  /**
   * ISO-8601 timestamp. Values without an offset are read as UTC.
   */
  receivedAt: string;
  labelIds: string[];
}

/** Stored when a message carries no usable date. */
export const SENTINEL_TIMESTAMP = "1970-01-01T00:00:00.000Z";

// ─── Canonical fields & predicates ───

export type CanonicalField =
  | "from_address"
  | "subject"
  | "body_plain"
  | "to_addresses"
  | "cc_addresses"
  | "bcc_addresses"
  | "received_datetime";

export type FieldKind = "address" | "text" | "address_list" | "timestamp";

export type StringPredicate =
  | "contains"
  | "does_not_contain"
  | "equals"
  | "does_not_equal";

export type DatePredicate =
  | "less_than_days"
  | "greater_than_days"
  | "less_than_months"
  | "greater_than_months";

// ─── Rule ───

export interface Condition {
  field: string;
  predicate: string;
  /** `null` means the value was absent; `""` is a legitimate value. */
  value: string | null;
}

export interface RuleAction {
  type: string;
  /** Target for `move_message`. */
  mailbox?: string;
  /** Target for `add_label` / `remove_label`. */
  labelName?: string;
}

export interface Rule {
  description: string;
  /** `all` or `any`, case-insensitive. Anything else is treated as `all`. */
  conditionsPredicate: string;
  conditions: Condition[];
  actions: RuleAction[];
}

// ─── Planner output ───

export interface MutationIntent {
  messageId: string;
  labelsToAdd: Set<string>;
  labelsToRemove: Set<string>;
}

// ─── Collaborators ───

export interface LabelNameResolver {
  /** Resolve a human label name to a label id, `null` when none exists. */
  resolve(name: string): Promise<string | null>;
}
