// CHANGE: Typed launcher failures, each carrying the exit status it maps to.
// WHY: The CLI surfaces every failure once and exits with the status a shell would report.

/**
 * Base class of every failure raised by the launcher itself.
 */
export abstract class LauncherError extends Error {
  abstract readonly exitCode: number;

  protected constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * The launcher cannot determine or enter its own directory.
 */
export class DirectoryResolutionError extends LauncherError {
  readonly exitCode = 1;

  constructor(readonly directory: string, cause: unknown) {
    super(`Cannot enter launcher directory ${directory}: ${describeCause(cause)}`, cause);
  }
}

/**
 * The package-environment manager is absent from `PATH`.
 */
export class InterpreterNotFoundError extends LauncherError {
  readonly exitCode = 127;

  constructor(readonly command: string, cause?: unknown) {
    super(`${command}: command not found`, cause);
  }
}

/**
 * The child could not be started for a reason other than a missing executable.
 *
 * Permission failures map to 126, as in a shell.
 */
export class ProcessSpawnError extends LauncherError {
  readonly exitCode: number;

  constructor(readonly command: string, readonly code: string | undefined, cause: unknown) {
    super(`Failed to start ${command}${code ? ` (${code})` : ""}: ${describeCause(cause)}`, cause);
    this.exitCode = code === "EACCES" ? 126 : 1;
  }
}
