#!/usr/bin/env node
import { Command } from "commander";
import { config as loadDotenv } from "dotenv";
import { GmailClient, type GmailConfig, LabelResolver, loadConfig } from "../gmail/index.js";
import {
  type FetchResult,
  fetchMessages,
  type ProcessResult,
  processMessages,
  withInterrupt,
} from "../pipeline/index.js";
import { loadRules, validateRule } from "../rules/index.js";
import { RecordStore } from "../store/index.js";
import type { RunError } from "./index.js";
import { createLogger, createRateLimiter, errorMessage } from "./index.js";

loadDotenv();
loadDotenv({ path: ".env.local", override: true });

/** Gmail's per-user budget is 15 000 units/min; stay under it. */
const GMAIL_RATE_LIMIT = { maxUnitsPerWindow: 14_000, unitsWindowMs: 60_000 };

const logger = createLogger("inbox-rules");

function createClient(config: GmailConfig): GmailClient {
  return new GmailClient(config, createRateLimiter(GMAIL_RATE_LIMIT), createLogger("gmail"));
}

function printErrors(errors: RunError[]): void {
  for (const err of errors.slice(0, 5)) {
    console.log(`  ✗ ${err.entity}: ${err.error}`);
  }
  if (errors.length > 5) {
    console.log(`  ... and ${errors.length - 5} more errors`);
  }
}

function printFetchResult(r: FetchResult): void {
  console.log("\n═══ Fetch Summary ═══\n");
  const status = r.errors.length === 0 ? "✓" : "⚠";
  console.log(
    `${status} ${r.listed} listed: ${r.stored} stored, ${r.skipped} already stored, ${r.failed} failed [${(r.durationMs / 1000).toFixed(1)}s]`,
  );
  printErrors(r.errors);
}

function printProcessResult(r: ProcessResult, dryRun: boolean): void {
  console.log(`\n═══ Process Summary${dryRun ? " (dry run)" : ""} ═══\n`);
  const status = r.errors.length === 0 ? "✓" : "⚠";
  const verb = dryRun ? "planned" : "applied";
  console.log(
    `${status} ${r.messages} messages: ${r.matches} rule matches, ${r.mutations} mutations ${verb}, ${r.failed} failed [${(r.durationMs / 1000).toFixed(1)}s]`,
  );
  printErrors(r.errors);
}

async function run(action: () => Promise<boolean>): Promise<void> {
  try {
    const ok = await action();
    process.exit(ok ? 0 : 1);
  } catch (err) {
    logger.error(errorMessage(err));
    process.exit(1);
  }
}

const program = new Command()
  .name("inbox-rules")
  .description("Apply rule-based label changes to a Gmail mailbox")
  .version("1.0.0");

program
  .command("fetch")
  .description("Fetch messages matching a query into the local store")
  .option("--query <q>", "Gmail search query (default: GMAIL_FETCH_QUERY or in:inbox)")
  .option("--max <n>", "Maximum messages to list (default: GMAIL_MAX_MESSAGES or 25)")
  .option("--db <path>", "SQLite store path", process.env.INBOX_RULES_DB ?? "emails.db")
  .action((opts: { query?: string; max?: string; db: string }) =>
    run(async () => {
      const config = loadConfig({
        ...process.env,
        GMAIL_FETCH_QUERY: opts.query ?? process.env.GMAIL_FETCH_QUERY,
        GMAIL_MAX_MESSAGES: opts.max ?? process.env.GMAIL_MAX_MESSAGES,
      });
      const store = new RecordStore(opts.db);
      try {
        const result = await withInterrupt(logger, (signal) =>
          fetchMessages(createClient(config), store, {
            query: config.query,
            maxMessages: config.maxMessages,
            logger,
            signal,
          }),
        );
        printFetchResult(result);
        return result.errors.length === 0;
      } finally {
        store.close();
      }
    }),
  );

program
  .command("process")
  .description("Evaluate stored messages against the rules and apply actions")
  .option("--rules <path>", "Rules file (JSON or YAML)", process.env.INBOX_RULES_FILE ?? "rules.json")
  .option("--db <path>", "SQLite store path", process.env.INBOX_RULES_DB ?? "emails.db")
  .option("--dry-run", "Plan label changes without applying them")
  .action((opts: { rules: string; db: string; dryRun?: boolean }) =>
    run(async () => {
      const dryRun = opts.dryRun ?? false;
      const rules = await loadRules(opts.rules, logger);
      if (rules.length === 0) {
        logger.warn("No rules loaded; nothing to do", { file: opts.rules });
        return true;
      }

      const client = createClient(loadConfig());
      const store = new RecordStore(opts.db);
      try {
        const result = await withInterrupt(logger, (signal) =>
          processMessages(client, store, {
            rules,
            resolver: new LabelResolver(client, createLogger("labels")),
            logger,
            dryRun,
            signal,
          }),
        );
        printProcessResult(result, dryRun);
        return result.errors.length === 0;
      } finally {
        store.close();
      }
    }),
  );

program
  .command("check-rules")
  .description("Load a rules file and report problems without touching Gmail")
  .option("--rules <path>", "Rules file (JSON or YAML)", process.env.INBOX_RULES_FILE ?? "rules.json")
  .action((opts: { rules: string }) =>
    run(async () => {
      // Issues are printed below instead of logged.
      const rules = await loadRules(opts.rules, logger, { reportIssues: false });
      let problems = 0;
      for (const [i, rule] of rules.entries()) {
        const issues = validateRule(rule);
        const status = issues.length === 0 ? "✓" : "⚠";
        console.log(`${status} [${i}] ${rule.description || "(unnamed rule)"}`);
        for (const issue of issues) {
          console.log(`  ✗ ${issue.path}: ${issue.message}`);
        }
        problems += issues.length;
      }
      console.log(`\n${rules.length} rules, ${problems} problems`);
      return problems === 0;
    }),
  );

program
  .command("labels")
  .description("List the account's labels and their ids")
  .action(() =>
    run(async () => {
      const client = createClient(loadConfig());
      const profile = await client.getProfile();
      console.log(`${profile.emailAddress} (${profile.messagesTotal} messages)\n`);
      const labels = await client.listLabels();
      for (const label of [...labels].sort((a, b) => a.name.localeCompare(b.name))) {
        console.log(`${label.type === "system" ? "S" : " "} ${label.name}  (${label.id})`);
      }
      return true;
    }),
  );

program.parseAsync().catch((err: unknown) => {
  logger.error(errorMessage(err));
  process.exit(1);
});
