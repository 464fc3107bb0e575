// =============================================================================
// ConsoleLoggingAdapter — Leveled console logging
// =============================================================================

import type { LogLevel } from "../../domain/workflow.schema.js";
import type { LogEntry, LoggingPort } from "../../ports/logging.port.js";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface ConsoleLoggingAdapterOptions {
  /** Minimum level written (default: "info") */
  level?: LogLevel;
  /** Prefix prepended after the level tag, e.g. the workflow name */
  scope?: string;
  /** Custom sink (defaults to the matching console method) */
  sink?: (entry: LogEntry, line: string) => void;
}

export class ConsoleLoggingAdapter implements LoggingPort {
  private readonly threshold: number;
  private readonly scope?: string;
  private readonly sink: (entry: LogEntry, line: string) => void;

  constructor(options: ConsoleLoggingAdapterOptions = {}) {
    this.threshold = LEVEL_ORDER[options.level ?? "info"];
    this.scope = options.scope;
    this.sink = options.sink ?? ((entry, line) => {
      // eslint-disable-next-line no-console
      console[entry.level](line);
    });
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.write("error", message, data);
  }

  private write(level: LogEntry["level"], message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < this.threshold) return;
    const entry: LogEntry = { timestamp: Date.now(), level, message, data };
    const scope = this.scope ? ` [${this.scope}]` : "";
    const suffix = data && Object.keys(data).length > 0 ? ` ${JSON.stringify(data)}` : "";
    this.sink(entry, `[${new Date(entry.timestamp).toISOString()}] [${level}]${scope} ${message}${suffix}`);
  }
}

/** Discards every entry. */
export class SilentLoggingAdapter implements LoggingPort {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}
