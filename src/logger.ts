// CHANGE: Levelled console logger for mirror runs.
// WHY: Per-task progress stays at INFO while HTTP and planning detail stays at DEBUG.

import chalk from "chalk";

export type LogLevel = "debug" | "info" | "error";

const levelWeight: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  error: 2
};

let activeLevel: LogLevel = process.env.MIRROR_LOG_LEVEL === "debug" ? "debug" : "info";

const formatters: Record<LogLevel, (message: string) => string> = {
  debug: message => chalk.gray(`[DEBUG] ${message}`),
  info: message => chalk.blue(`[INFO] ${message}`),
  error: message => chalk.red(`[ERROR] ${message}`)
};

function shouldLog(level: LogLevel): boolean {
  return levelWeight[level] >= levelWeight[activeLevel];
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(levelWeight, value);
}

/**
 * Set log level for runtime diagnostics.
 *
 * @param level - Level name, usually from `--verbose` or `MIRROR_LOG_LEVEL`.
 * @throws Error if level is not recognised.
 */
export function setLogLevel(level: string): void {
  if (!isLogLevel(level)) {
    throw new Error(`Unsupported log level: ${level}`);
  }
  activeLevel = level;
}

/**
 * Emit information-level log entry: phase banners and per-file progress.
 *
 * @param message - Log message text.
 */
export function info(message: string): void {
  if (shouldLog("info")) {
    console.log(formatters.info(message));
  }
}

/**
 * Emit debug-level log entry: request, pause and planning detail.
 *
 * @param message - Diagnostic message.
 */
export function debug(message: string): void {
  if (shouldLog("debug")) {
    console.log(formatters.debug(message));
  }
}

/**
 * Emit error-level log entry on stderr.
 *
 * @param message - Description of the failure.
 */
export function error(message: string): void {
  if (shouldLog("error")) {
    console.error(formatters.error(message));
  }
}
