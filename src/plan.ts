// CHANGE: Assemble the child invocation before anything is spawned.
// WHY: Separating the plan from the spawn lets the `plan` command print exactly what `run` would execute.

import { INVOCATION } from "./config.js";
import { buildChildEnv } from "./environment.js";
import { ArgumentMode, LaunchPlan } from "./types.js";

/**
 * Build the argument list passed to the package manager.
 *
 * In `fixed` mode caller arguments are ignored and the configured tickers are
 * used; in `forward` mode caller arguments follow the tickers flag verbatim.
 */
export function buildChildArgs(mode: ArgumentMode, callerArgs: readonly string[]): string[] {
  const prefix = [...INVOCATION.MANAGER_ARGS, INVOCATION.TARGET, INVOCATION.TICKERS_FLAG];
  return mode === "forward" ? [...prefix, ...callerArgs] : [...prefix, ...INVOCATION.FIXED_TICKERS];
}

export interface LaunchPlanInput {
  readonly workingDirectory: string;
  readonly parentEnv: NodeJS.ProcessEnv;
  readonly callerArgs: readonly string[];
  readonly argumentMode: ArgumentMode;
}

/**
 * Resolve the full child invocation.
 */
export function buildLaunchPlan(input: LaunchPlanInput): LaunchPlan {
  return {
    command: INVOCATION.MANAGER,
    args: buildChildArgs(input.argumentMode, input.callerArgs),
    cwd: input.workingDirectory,
    env: buildChildEnv(input.workingDirectory, input.parentEnv),
    argumentMode: input.argumentMode
  };
}

/**
 * Render the command line for logs; arguments containing whitespace are quoted.
 */
export function formatCommand(plan: Pick<LaunchPlan, "command" | "args">): string {
  return [plan.command, ...plan.args].map(token => (/\s/.test(token) ? JSON.stringify(token) : token)).join(" ");
}
