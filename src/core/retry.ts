function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  retryOn?: (err: unknown) => boolean;
  /** Called before each backoff sleep, e.g. to log or pause a rate limiter. */
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
}

const TRANSIENT_NETWORK_MARKERS = [
  "econnreset",
  "etimedout",
  "enotfound",
  "socket hang up",
  "fetch failed",
];

/** Read an HTTP status from a googleapis / gaxios style error. */
export function errorStatus(err: unknown): number | undefined {
  if (err == null || typeof err !== "object") return undefined;
  if ("code" in err && typeof err.code === "number") return err.code;
  if ("status" in err && typeof err.status === "number") return err.status;
  return undefined;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Transient failures: 429, 5xx and connection-level errors.
 */
export function isRetryableError(err: unknown): boolean {
  const status = errorStatus(err);
  if (status === 429 || (status !== undefined && status >= 500 && status < 600)) {
    return true;
  }
  if (err instanceof Error) {
    const msg = err.message.toLowerCase();
    return TRANSIENT_NETWORK_MARKERS.some((marker) => msg.includes(marker));
  }
  return false;
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  opts: RetryOptions = {},
): Promise<T> {
  const maxRetries = opts.maxRetries ?? 3;
  const baseDelay = opts.baseDelayMs ?? 1000;
  const maxDelay = opts.maxDelayMs ?? 30_000;
  const retryOn = opts.retryOn ?? isRetryableError;

  let lastError: unknown;
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      if (attempt === maxRetries || !retryOn(err)) {
        throw err;
      }
      // Exponential backoff with jitter
      const delay = Math.min(baseDelay * 2 ** attempt, maxDelay);
      const jitter = delay * 0.1 * Math.random();
      opts.onRetry?.(err, attempt + 1, delay + jitter);
      await sleep(delay + jitter);
    }
  }
  throw lastError;
}
