// CHANGE: Define the launcher's data model: plan, child outcome and lifecycle phases.
// WHY: Every step before the spawn produces a value that the next step consumes unchanged.

/**
 * How the argument list handed to the live program is formed.
 *
 * - `fixed`: the configured ticker list, caller arguments ignored.
 * - `forward`: caller arguments appended after the tickers flag.
 */
export type ArgumentMode = "fixed" | "forward";

/**
 * Lifecycle of a single launch: `starting` until the child is spawned,
 * `running` while it executes, `terminated` once it exits or fails to start.
 */
export type LaunchPhase = "starting" | "running" | "terminated";

/**
 * Fully resolved child invocation, computed before anything is spawned.
 *
 * @property command - Executable looked up on `PATH`.
 * @property args - Argument list passed verbatim.
 * @property cwd - Working directory of the child (the launcher directory).
 * @property env - Complete child environment.
 * @property argumentMode - Mode that produced `args`.
 *
 * Invariant: `env[SEARCH_PATH.VARIABLE] === cwd`.
 */
export interface LaunchPlan {
  readonly command: string;
  readonly args: readonly string[];
  readonly cwd: string;
  readonly env: NodeJS.ProcessEnv;
  readonly argumentMode: ArgumentMode;
}

/**
 * How the child process ended.
 */
export type ChildExit =
  | { readonly kind: "exited"; readonly code: number }
  | { readonly kind: "signaled"; readonly signal: NodeJS.Signals };

/**
 * Result of a completed launch.
 *
 * @property exitCode - Status the launcher itself should exit with.
 */
export interface LaunchResult {
  readonly plan: LaunchPlan;
  readonly exit: ChildExit;
  readonly exitCode: number;
}

/**
 * Settings that tune the launcher only; they never reach the child environment.
 */
export interface LauncherSettings {
  readonly logLevel: "debug" | "info" | "error";
}
