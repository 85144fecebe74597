#!/usr/bin/env node
// CHANGE: Delegate execution to the modular CLI runner.
// WHY: Allows importing CLI helpers without triggering immediate command parsing.

import fs from "fs-extra";
import { pathToFileURL } from "url";
import { runCli } from "./cli.js";

// npm installs bins as symlinks; compare the resolved path.
const executedDirectly = process.argv[1]
  ? pathToFileURL(fs.realpathSync(process.argv[1])).href === import.meta.url
  : false;

if (executedDirectly) {
  void runCli(process.argv, import.meta.url);
}

export { runCli };
export { launch, prepareLaunch, exitCodeOf } from "./launcher.js";
export { DirectoryResolutionError, InterpreterNotFoundError, LauncherError, ProcessSpawnError } from "./errors.js";
export type { ArgumentMode, ChildExit, LaunchPhase, LaunchPlan, LaunchResult } from "./types.js";
