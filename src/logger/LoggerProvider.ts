/**
 * LogLevel: Defines the supported log verbosity levels.
 */
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

/**
 * LoggerProvider: Abstract interface for pluggable loggers.
 *
 * Used by the schema facade to report validation outcomes
 * (e.g., console, file, remote logger).
 */
export interface LoggerProvider {
  /**
   * Logs low-level debug information.
   */
  debug(...args: unknown[]): void;

  /**
   * Logs general informational messages.
   */
  info(...args: unknown[]): void;

  /**
   * Logs warnings (non-fatal issues).
   */
  warn(...args: unknown[]): void;

  /**
   * Logs errors or critical failures.
   */
  error(...args: unknown[]): void;
}
