import type { LoggerProvider, LogLevel } from "./LoggerProvider.js";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  silent: 5,
};

/**
 * Default logger of a Schema. Writes `[schemanode]`-prefixed lines to the
 * console and drops anything below the current level; `Schema` reports
 * outcomes at `debug` and failures at `warn`.
 */
export class ConsoleLogger implements LoggerProvider {
  constructor(private level: LogLevel = "info") {}

  setLevel(level: LogLevel) {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  debug(...args: unknown[]) {
    if (this.enabled("debug")) console.debug("[schemanode][debug]", ...args);
  }

  info(...args: unknown[]) {
    if (this.enabled("info")) console.info("[schemanode]", ...args);
  }

  warn(...args: unknown[]) {
    if (this.enabled("warn")) console.warn("[schemanode][warn]", ...args);
  }

  error(...args: unknown[]) {
    if (this.enabled("error")) console.error("[schemanode][error]", ...args);
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }
}
