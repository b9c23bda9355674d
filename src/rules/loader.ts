/**
 * Rule file loader.
 *
 * Reads the persisted rule list (JSON, or YAML for hand-edited files) and
 * turns each entry into a `Rule`. The persisted format uses snake_case keys:
 *
 *   [
 *     {
 *       "description": "Archive newsletters",
 *       "conditions_predicate": "any",
 *       "conditions": [{ "field": "From", "predicate": "contains", "value": "news" }],
 *       "actions": [{ "type": "move_message", "mailbox": "Archive" }]
 *     }
 *   ]
 *
 * Entries that do not fit the schema are dropped with a warning. Entries that
 * fit but reference unknown fields or predicates are kept and reported.
 */

import * as fs from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { Logger } from "../core/index.js";
import type { Rule } from "./types.js";
import { validateRule } from "./validate.js";

export class RuleFileError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super(`${filePath}: ${message}`);
    this.name = "RuleFileError";
    this.filePath = filePath;
  }
}

const ConditionSchema = z.object({
  field: z.string().default(""),
  predicate: z.string().default(""),
  value: z
    .union([z.string(), z.number(), z.boolean()])
    .nullish()
    .transform((v) => (v === null || v === undefined ? null : String(v))),
});

// A missing type reaches the planner as an unknown action, which skips it.
const ActionSchema = z.object({
  type: z.string().default(""),
  mailbox: z.string().optional(),
  label_name: z.string().optional(),
});

const RuleSchema = z
  .object({
    description: z.string().default(""),
    conditions_predicate: z.string().default("all"),
    conditions: z.array(ConditionSchema).default([]),
    actions: z.array(ActionSchema).default([]),
  })
  .transform(
    (raw): Rule => ({
      description: raw.description,
      conditionsPredicate: raw.conditions_predicate,
      conditions: raw.conditions,
      actions: raw.actions.map((a) => ({
        type: a.type,
        mailbox: a.mailbox,
        labelName: a.label_name,
      })),
    }),
  );

function describeEntry(entry: unknown, index: number): string {
  if (entry !== null && typeof entry === "object" && "description" in entry) {
    const { description } = entry;
    if (typeof description === "string" && description) return description;
  }
  return `#${index}`;
}

export interface LoadRulesOptions {
  /** Log `validateRule` issues as warnings. Defaults to `true`. */
  reportIssues?: boolean;
}

/**
 * Parse rule file contents. `source` is only used in messages.
 */
export function parseRules(
  text: string,
  source: string,
  logger: Logger,
  options: LoadRulesOptions = {},
): Rule[] {
  const reportIssues = options.reportIssues ?? true;
  let doc: unknown;
  try {
    doc = parseYaml(text);
  } catch (err) {
    throw new RuleFileError(
      source,
      `could not parse rules: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  if (doc === null || doc === undefined) return [];
  if (!Array.isArray(doc)) {
    throw new RuleFileError(source, "expected a list of rules at the top level");
  }

  const rules: Rule[] = [];
  doc.forEach((entry: unknown, index: number) => {
    const result = RuleSchema.safeParse(entry);
    if (!result.success) {
      logger.warn("Skipping malformed rule", {
        rule: describeEntry(entry, index),
        errors: result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      });
      return;
    }

    const issues = reportIssues ? validateRule(result.data) : [];
    for (const issue of issues) {
      logger.warn("Rule check", {
        rule: describeEntry(entry, index),
        path: issue.path,
        issue: issue.message,
      });
    }
    rules.push(result.data);
  });

  return rules;
}

export async function loadRules(
  filePath: string,
  logger: Logger,
  options: LoadRulesOptions = {},
): Promise<Rule[]> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    const reason =
      err instanceof Error && "code" in err && err.code === "ENOENT"
        ? "rules file not found"
        : `could not read rules file: ${err instanceof Error ? err.message : String(err)}`;
    throw new RuleFileError(filePath, reason);
  }

  const rules = parseRules(text, filePath, logger, options);
  logger.info("Rules loaded", { file: filePath, count: rules.length });
  return rules;
}
