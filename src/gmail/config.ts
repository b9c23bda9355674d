import type { GmailConfig } from "./types.js";

const MAX_PAGE_SIZE = 500;

function positiveInt(raw: string | undefined, fallback: number, name: string): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

/**
 * Resolve Gmail settings from environment variables.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GmailConfig {
  const clientId = env.GMAIL_CLIENT_ID;
  const clientSecret = env.GMAIL_CLIENT_SECRET;
  const refreshToken = env.GMAIL_REFRESH_TOKEN;

  if (!clientId || !clientSecret || !refreshToken) {
    throw new Error(
      "Missing required environment variables: GMAIL_CLIENT_ID, GMAIL_CLIENT_SECRET, GMAIL_REFRESH_TOKEN",
    );
  }

  return {
    clientId,
    clientSecret,
    refreshToken,
    query: env.GMAIL_FETCH_QUERY?.trim() || "in:inbox",
    maxMessages: positiveInt(env.GMAIL_MAX_MESSAGES, 25, "GMAIL_MAX_MESSAGES"),
    pageSize: Math.min(
      positiveInt(env.GMAIL_BATCH_SIZE, 100, "GMAIL_BATCH_SIZE"),
      MAX_PAGE_SIZE,
    ),
  };
}
