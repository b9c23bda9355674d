import type { Logger } from "../core/index.js";

/**
 * Run `task` with an abort signal tied to SIGINT. The first Ctrl-C lets the
 * in-flight message finish; the handler is removed once `task` settles.
 */
export async function withInterrupt<T>(
  logger: Logger,
  task: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const ac = new AbortController();

  const sigHandler = () => {
    logger.warn("Received interrupt, finishing current message...");
    ac.abort();
  };
  process.on("SIGINT", sigHandler);

  try {
    return await task(ac.signal);
  } finally {
    process.removeListener("SIGINT", sigHandler);
  }
}
