// CHANGE: Resolve the launcher's own directory and make it the working directory.
// WHY: The live program must start from the same place whatever directory the caller is in.

import fs from "fs-extra";
import path from "path";
import { fileURLToPath } from "url";
import { SETTINGS } from "./config.js";
import { DirectoryResolutionError } from "./errors.js";
import { debug } from "./logger.js";

/**
 * Locate the launcher directory: the nearest ancestor of the given module that
 * holds the package marker file.
 *
 * @param moduleUrl - `import.meta.url` of a launcher module.
 * @returns Absolute launcher directory.
 * @throws DirectoryResolutionError if the URL is not a file URL or no marker exists.
 */
export function resolveLauncherDirectory(moduleUrl: string): string {
  let start: string;
  try {
    start = path.dirname(fileURLToPath(moduleUrl));
  } catch (cause) {
    throw new DirectoryResolutionError(moduleUrl, cause);
  }

  let dir = start;
  for (;;) {
    if (fs.pathExistsSync(path.join(dir, SETTINGS.ROOT_MARKER))) {
      debug(`Launcher directory resolved to ${dir}`);
      return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      throw new DirectoryResolutionError(start, new Error(`no ${SETTINGS.ROOT_MARKER} above the launcher module`));
    }
    dir = parent;
  }
}

/**
 * Change the process working directory.
 *
 * @returns The working directory as reported by the process after the change.
 * @throws DirectoryResolutionError if the directory is missing, not a directory or not enterable.
 */
export async function enterDirectory(directory: string): Promise<string> {
  try {
    const stats = await fs.stat(directory);
    if (!stats.isDirectory()) {
      throw new Error("not a directory");
    }
    process.chdir(directory);
  } catch (cause) {
    throw new DirectoryResolutionError(directory, cause);
  }
  const cwd = process.cwd();
  debug(`Working directory set to ${cwd}`);
  return cwd;
}
