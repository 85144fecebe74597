// CHANGE: Structured console logger with DEBUG/INFO/ERROR levels.
// WHY: Launcher steps are traced at DEBUG, the launched command at INFO, failures at ERROR.

import chalk from "chalk";
import { LauncherSettings } from "./types.js";

export type LogLevel = LauncherSettings["logLevel"];

const levelWeight: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  error: 2
};

/**
 * Interpret a raw level string, falling back to `info` for anything unknown.
 *
 * @param value - Raw value, typically from `LAUNCHER_LOG_LEVEL`.
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const normalised = value?.trim().toLowerCase();
  return normalised === "debug" || normalised === "error" ? normalised : "info";
}

let activeLevel: LogLevel = parseLogLevel(process.env.LAUNCHER_LOG_LEVEL);

const formatters: Record<LogLevel, (message: string) => string> = {
  debug: message => chalk.gray(`[DEBUG] ${message}`),
  info: message => chalk.blue(`[INFO] ${message}`),
  error: message => chalk.red(`[ERROR] ${message}`)
};

function shouldLog(level: LogLevel): boolean {
  return levelWeight[level] >= levelWeight[activeLevel];
}

/**
 * Set log level for runtime diagnostics.
 *
 * @throws Error if level is not recognised.
 */
export function setLogLevel(level: LogLevel): void {
  if (levelWeight[level] === undefined) {
    throw new Error(`Unsupported log level: ${level}`);
  }
  activeLevel = level;
}

/**
 * Emit information-level log entry.
 */
export function info(message: string): void {
  if (shouldLog("info")) {
    console.log(formatters.info(message));
  }
}

/**
 * Emit debug-level log entry.
 */
export function debug(message: string): void {
  if (shouldLog("debug")) {
    console.log(formatters.debug(message));
  }
}

/**
 * Emit error-level log entry on stderr.
 */
export function error(message: string): void {
  if (shouldLog("error")) {
    console.error(formatters.error(message));
  }
}
