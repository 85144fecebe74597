// CHANGE: Extract CLI orchestration functions for reuse in the program entrypoint and tests.
// WHY: Lets tests drive the commands without spawning the live program.

import { Command } from "commander";
import { INVOCATION, SEARCH_PATH } from "./config.js";
import { LauncherError } from "./errors.js";
import { launch, prepareLaunch } from "./launcher.js";
import { error as logError, info } from "./logger.js";
import { formatCommand } from "./plan.js";

/**
 * Run mode entry point: launch the live program and adopt its exit status.
 *
 * @param callerArgs - Arguments given to the launcher; ignored while the mode is `fixed`.
 * @param moduleUrl - Module location used to find the launcher directory.
 */
export async function runAction(callerArgs: readonly string[], moduleUrl: string): Promise<void> {
  const result = await launch({
    moduleUrl,
    callerArgs,
    argumentMode: INVOCATION.ARGUMENT_MODE
  });
  process.exitCode = result.exitCode;
}

/**
 * Plan mode entry point: print the resolved invocation without spawning it.
 */
export async function planAction(moduleUrl: string): Promise<void> {
  const plan = await prepareLaunch(moduleUrl, [], INVOCATION.ARGUMENT_MODE);
  console.table([
    {
      command: formatCommand(plan),
      cwd: plan.cwd,
      [SEARCH_PATH.VARIABLE]: plan.env[SEARCH_PATH.VARIABLE] ?? "",
      argumentMode: plan.argumentMode
    }
  ]);
  info(`Plan only: nothing was started.`);
}

/**
 * Construct commander program. The launcher parses no flags of its own:
 * help is disabled and unknown options fall through to the ignored arguments.
 *
 * @param moduleUrl - Module location used to find the launcher directory.
 */
export function buildProgram(moduleUrl: string = import.meta.url): Command {
  const program = new Command();
  program
    .name("run-live")
    .description("Run the live trading program from the launcher directory")
    .helpOption(false)
    .helpCommand(false)
    .allowUnknownOption()
    .argument("[args...]", "caller arguments (not forwarded while the ticker list is fixed)")
    .action(async (args: string[]) => runAction(args, moduleUrl));

  program
    .command("plan")
    .description("Print the resolved child invocation without starting it")
    .action(async () => planAction(moduleUrl));

  return program;
}

/**
 * Execute CLI with provided argv array. Never rejects: failures are logged and
 * reflected in `process.exitCode`.
 *
 * @param argv - Process arguments.
 * @param moduleUrl - Module location used to find the launcher directory.
 */
export async function runCli(argv: readonly string[], moduleUrl: string = import.meta.url): Promise<void> {
  const program = buildProgram(moduleUrl);
  try {
    await program
      .configureOutput({
        outputError: (str: string) => logError(str.trim())
      })
      .parseAsync([...argv]);
  } catch (error) {
    if (error instanceof LauncherError) {
      logError(error.message);
      process.exitCode = error.exitCode;
      return;
    }
    logError(`Launcher failed: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  }
}
