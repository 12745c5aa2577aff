/**
 * @file src/core/logger.ts
 * @summary Centralised logging abstraction for the scheduler. Every message is prefixed with
 * "[leitner]" so host output can be filtered. Supports four severity levels (debug, info,
 * warn, error) plus a "silent" mode. The initial level can be taken from the
 * `LEITNER_LOG_LEVEL` environment variable and changed at runtime with `log.setLevel`.
 *
 * @exports
 *   - LogLevel — type union of log severity levels
 *   - isLogLevel — type guard for LogLevel strings
 *   - log — singleton logger object with debug/info/warn/error methods
 */

const PREFIX = "[leitner]";

// Resolved per call so call-sites don't trigger the no-console rule and a
// replaced console (test spies, host redirection) is honoured.
const out = () => globalThis.console;

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(v: unknown): v is LogLevel {
  return typeof v === "string" && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, v);
}

function initialLevel(): LogLevel {
  const fromEnv = process.env.LEITNER_LOG_LEVEL?.trim().toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : "info";
}

let currentLevel: LogLevel = initialLevel();

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export const log = {
  /** Set the minimum log level.  "silent" suppresses everything. */
  setLevel(level: LogLevel) {
    currentLevel = level;
  },

  getLevel(): LogLevel {
    return currentLevel;
  },

  /** Verbose detail — silenced unless level is "debug". */
  debug(...args: unknown[]) {
    if (shouldLog("debug")) out().debug(PREFIX, ...args);
  },

  /** General informational messages. */
  info(...args: unknown[]) {
    if (shouldLog("info")) out().log(PREFIX, ...args);
  },

  /** Unexpected-but-recoverable situations. */
  warn(...args: unknown[]) {
    if (shouldLog("warn")) out().warn(PREFIX, ...args);
  },

  /** Genuine errors that need attention. */
  error(...args: unknown[]) {
    if (shouldLog("error")) out().error(PREFIX, ...args);
  },
};
