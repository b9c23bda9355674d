import type { Logger, LogLevel } from "./types.js";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function parseLevel(raw: string | undefined): LogLevel {
  const lower = raw?.toLowerCase();
  if (lower === "debug" || lower === "warn" || lower === "error") return lower;
  return "info";
}

export class ConsoleLogger implements Logger {
  private readonly prefix: string;
  private readonly threshold: number;

  constructor(component: string, level: LogLevel = parseLevel(process.env.LOG_LEVEL)) {
    this.prefix = `[${component}]`;
    this.threshold = LEVEL_ORDER[level];
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= this.threshold;
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    if (!this.enabled("debug")) return;
    const extra = data ? ` ${JSON.stringify(data)}` : "";
    console.debug(`${this.prefix} · ${msg}${extra}`);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    if (!this.enabled("info")) return;
    const extra = data ? ` ${JSON.stringify(data)}` : "";
    console.log(`${this.prefix} ${msg}${extra}`);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    if (!this.enabled("warn")) return;
    const extra = data ? ` ${JSON.stringify(data)}` : "";
    console.warn(`${this.prefix} ⚠ ${msg}${extra}`);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    const extra = data ? ` ${JSON.stringify(data)}` : "";
    console.error(`${this.prefix} ✗ ${msg}${extra}`);
  }

  progress(current: number, total: number, label: string): void {
    if (!this.enabled("info")) return;
    const pct = total > 0 ? Math.round((current / total) * 100) : 0;
    process.stdout.write(
      `\r${this.prefix} ${label}: ${current}/${total} (${pct}%)`,
    );
    if (current >= total) process.stdout.write("\n");
  }
}

export function createLogger(component: string, level?: LogLevel): Logger {
  return new ConsoleLogger(component, level);
}
