/** Shared infrastructure types for inbox-rules. */

// ─── Logger ───

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  progress(current: number, total: number, label: string): void;
}

// ─── Rate Limiter ───

export interface RateLimiterConfig {
  /** Minimum spacing between two calls. */
  minDelayMs?: number;
  /** Quota units allowed per `unitsWindowMs`. */
  maxUnitsPerWindow?: number;
  unitsWindowMs?: number;
}

export interface RateLimiter {
  acquire(cost?: number): Promise<void>;
  backoff(retryAfterMs: number): void;
}

// ─── Run results (fetch / process drivers) ───

export interface RunError {
  entity: string;
  error: string;
  retryable: boolean;
}
