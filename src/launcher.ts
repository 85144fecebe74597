// CHANGE: Orchestrate a launch: enter the launcher directory, spawn the live program, wait, report its status.
// WHY: The directory change and environment setup must complete before the single child is started.

import { spawn } from "child_process";
import { constants } from "os";
import { loadSettings } from "./config.js";
import { enterDirectory, resolveLauncherDirectory } from "./directory.js";
import { InterpreterNotFoundError, ProcessSpawnError } from "./errors.js";
import { debug, setLogLevel } from "./logger.js";
import { buildLaunchPlan, formatCommand } from "./plan.js";
import { ArgumentMode, ChildExit, LaunchPhase, LaunchPlan, LaunchResult } from "./types.js";

const signalNumbers = new Map<string, number>(Object.entries(constants.signals));

/**
 * Options accepted by {@link launch}.
 *
 * @property moduleUrl - `import.meta.url` of a launcher module, used to find the launcher directory.
 * @property callerArgs - Arguments the launcher was invoked with.
 * @property argumentMode - How `callerArgs` affect the child command line.
 * @property onPhase - Observer notified on every lifecycle transition.
 */
export interface LaunchOptions {
  readonly moduleUrl: string;
  readonly callerArgs: readonly string[];
  readonly argumentMode: ArgumentMode;
  readonly onPhase?: (phase: LaunchPhase) => void;
}

/**
 * Enter the launcher directory, apply launcher settings and resolve the plan.
 */
export async function prepareLaunch(
  moduleUrl: string,
  callerArgs: readonly string[],
  argumentMode: ArgumentMode
): Promise<LaunchPlan> {
  const workingDirectory = await enterDirectory(resolveLauncherDirectory(moduleUrl));
  setLogLevel(loadSettings().logLevel);
  if (argumentMode === "fixed" && callerArgs.length > 0) {
    debug(`Ignoring caller arguments: ${callerArgs.join(" ")}`);
  }
  return buildLaunchPlan({
    workingDirectory,
    parentEnv: process.env,
    callerArgs,
    argumentMode
  });
}

function toSpawnError(command: string, error: Error): InterpreterNotFoundError | ProcessSpawnError {
  const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
  return code === "ENOENT" ? new InterpreterNotFoundError(command, error) : new ProcessSpawnError(command, code, error);
}

/**
 * Spawn the planned child with inherited stdio and wait for it to close.
 *
 * @param onSpawn - Invoked once the child process has started.
 * @throws InterpreterNotFoundError or ProcessSpawnError when the child cannot start.
 */
export function runChild(plan: LaunchPlan, onSpawn?: () => void): Promise<ChildExit> {
  return new Promise<ChildExit>((resolve, reject) => {
    let failed = false;
    const child = spawn(plan.command, [...plan.args], {
      cwd: plan.cwd,
      env: plan.env,
      stdio: "inherit"
    });
    child.once("spawn", () => {
      onSpawn?.();
    });
    child.once("error", (error: Error) => {
      failed = true;
      reject(toSpawnError(plan.command, error));
    });
    child.once("close", (code: number | null, signal: NodeJS.Signals | null) => {
      if (failed) {
        return;
      }
      resolve(signal ? { kind: "signaled", signal } : { kind: "exited", code: code ?? 0 });
    });
  });
}

/**
 * Map a child outcome to the launcher's exit status: the exit code itself, or
 * `128 + signal number` for a child terminated by a signal.
 */
export function exitCodeOf(exit: ChildExit): number {
  if (exit.kind === "exited") {
    return exit.code;
  }
  return 128 + (signalNumbers.get(exit.signal) ?? 0);
}

/**
 * Run the live program once and report how it ended.
 *
 * Phases: `starting` → `running` (child spawned) → `terminated`. A child that
 * never starts goes straight from `starting` to `terminated`.
 */
export async function launch(options: LaunchOptions): Promise<LaunchResult> {
  const enterPhase = (phase: LaunchPhase): void => {
    debug(`Launcher phase: ${phase}`);
    options.onPhase?.(phase);
  };

  enterPhase("starting");
  try {
    const plan = await prepareLaunch(options.moduleUrl, options.callerArgs, options.argumentMode);
    // stdout is inherited by the child.
    debug(`Launching ${formatCommand(plan)} in ${plan.cwd}`);
    const exit = await runChild(plan, () => enterPhase("running"));
    const exitCode = exitCodeOf(exit);
    debug(
      exit.kind === "exited"
        ? `Child exited with code ${exit.code}`
        : `Child terminated by ${exit.signal} (status ${exitCode})`
    );
    return { plan, exit, exitCode };
  } finally {
    enterPhase("terminated");
  }
}
