import type { Logger, LogLevel } from "./types.js";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

export class ConsoleLogger implements Logger {
  private readonly prefix: string;
  private readonly threshold: number;

  constructor(name: string, level: LogLevel = "info") {
    this.prefix = `[${name}]`;
    this.threshold = LEVEL_ORDER[level];
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= this.threshold;
  }

  private format(msg: string, data?: Record<string, unknown>): string {
    const extra = data ? ` ${JSON.stringify(data)}` : "";
    return `${msg}${extra}`;
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    if (!this.enabled("debug")) return;
    console.debug(`${this.prefix} · ${this.format(msg, data)}`);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    if (!this.enabled("info")) return;
    console.log(`${this.prefix} ${this.format(msg, data)}`);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    if (!this.enabled("warn")) return;
    console.warn(`${this.prefix} ⚠ ${this.format(msg, data)}`);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    console.error(`${this.prefix} ✗ ${this.format(msg, data)}`);
  }

  progress(current: number, total: number, label: string): void {
    if (!this.enabled("info") || !process.stdout.isTTY) return;
    const pct = total > 0 ? Math.round((current / total) * 100) : 0;
    process.stdout.write(
      `\r${this.prefix} ${label}: ${current}/${total} (${pct}%)`,
    );
    if (current >= total) process.stdout.write("\n");
  }
}

export function createLogger(name: string, level?: LogLevel): Logger {
  return new ConsoleLogger(name, level);
}

/** Discards everything. Handy for library callers that log elsewhere. */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
  progress() {},
};
