// CHANGE: Centralise the fixed invocation and the launcher's own settings.
// WHY: The child command line is constant; only launcher diagnostics are tunable, through the environment.

import { parseLogLevel } from "./logger.js";
import { LauncherSettings } from "./types.js";

/**
 * The child command line: `poetry run python src/live_main.py --tickers AAPL`.
 *
 * `ARGUMENT_MODE` stays `fixed`: caller arguments are accepted but not forwarded.
 */
export const INVOCATION = {
  MANAGER: "poetry",
  MANAGER_ARGS: ["run", "python"],
  TARGET: "src/live_main.py",
  TICKERS_FLAG: "--tickers",
  FIXED_TICKERS: ["AAPL"],
  ARGUMENT_MODE: "fixed"
} as const;

/**
 * Search-path variable exported to the child so it resolves `src.*` imports
 * from the launcher directory without installation.
 */
export const SEARCH_PATH = {
  VARIABLE: "PYTHONPATH"
} as const;

/**
 * Launcher settings sources. The marker file identifies the launcher directory.
 */
export const SETTINGS = {
  LOG_LEVEL_VAR: "LAUNCHER_LOG_LEVEL",
  ROOT_MARKER: "package.json"
} as const;

/**
 * Read launcher settings from the environment. No file is consulted: the
 * launcher directory's `.env` belongs to the live program.
 *
 * @param env - Environment to read from.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): LauncherSettings {
  return {
    logLevel: parseLogLevel(env[SETTINGS.LOG_LEVEL_VAR])
  };
}
