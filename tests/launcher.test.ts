// CHANGE: Verify the launch sequence end to end against a stand-in child process.
// WHY: Working directory, search path, argument list and exit status are the launcher's whole contract.

import { EventEmitter } from "events";
import fs from "fs-extra";
import os from "os";
import path from "path";
import { pathToFileURL } from "url";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const spawnMock = vi.hoisted(() => vi.fn());

vi.mock("child_process", () => ({
  spawn: spawnMock
}));

import { InterpreterNotFoundError, ProcessSpawnError } from "../src/errors.js";
import { exitCodeOf, launch } from "../src/launcher.js";
import { setLogLevel } from "../src/logger.js";
import { LaunchPhase } from "../src/types.js";

const FIXED_ARGS = ["run", "python", "src/live_main.py", "--tickers", "AAPL"];

function childThatExits(code: number | null, signal: NodeJS.Signals | null = null): EventEmitter {
  const child = new EventEmitter();
  setImmediate(() => {
    child.emit("spawn");
    child.emit("close", code, signal);
  });
  return child;
}

function childThatFails(code: string): EventEmitter {
  const child = new EventEmitter();
  setImmediate(() => {
    child.emit("error", Object.assign(new Error(`spawn poetry ${code}`), { code }));
    child.emit("close", -2, null);
  });
  return child;
}

describe("launch", () => {
  const originalCwd = process.cwd();
  let launcherDir: string;
  let callerDir: string;
  let moduleUrl: string;

  beforeEach(async () => {
    launcherDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), "live-runner-")));
    callerDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), "live-runner-caller-")));
    await fs.writeJson(path.join(launcherDir, "package.json"), { name: "fixture" });
    await fs.ensureDir(path.join(launcherDir, "src"));
    moduleUrl = pathToFileURL(path.join(launcherDir, "src", "launcher.js")).href;
    process.chdir(callerDir);
    vi.stubEnv("LAUNCHER_LOG_LEVEL", "info");
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    process.chdir(originalCwd);
    spawnMock.mockReset();
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    setLogLevel("info");
    await fs.remove(launcherDir);
    await fs.remove(callerDir);
  });

  it("runs the fixed command from the launcher directory, not the caller's", async () => {
    let cwdAtSpawn = "";
    spawnMock.mockImplementation(() => {
      cwdAtSpawn = process.cwd();
      return childThatExits(0);
    });

    const result = await launch({ moduleUrl, callerArgs: [], argumentMode: "fixed" });

    expect(spawnMock).toHaveBeenCalledTimes(1);
    const [command, args, options] = spawnMock.mock.calls[0] ?? [];
    expect(command).toBe("poetry");
    expect(args).toEqual(FIXED_ARGS);
    expect(options).toMatchObject({ cwd: launcherDir, stdio: "inherit" });
    expect(cwdAtSpawn).toBe(launcherDir);
    expect(process.cwd()).toBe(launcherDir);
    expect(result.plan.cwd).toBe(launcherDir);
    expect(result.exitCode).toBe(0);
  });

  it("sets PYTHONPATH to the working directory without touching the parent environment", async () => {
    vi.stubEnv("PYTHONPATH", "/elsewhere");
    vi.stubEnv("LIVE_RUNNER_TEST_MARKER", "kept");
    spawnMock.mockImplementation(() => childThatExits(0));

    await launch({ moduleUrl, callerArgs: [], argumentMode: "fixed" });

    const options = spawnMock.mock.calls[0]?.[2];
    expect(options.env.PYTHONPATH).toBe(launcherDir);
    expect(options.env.LIVE_RUNNER_TEST_MARKER).toBe("kept");
    expect(process.env.PYTHONPATH).toBe("/elsewhere");
  });

  it("ignores trailing caller arguments in fixed mode", async () => {
    spawnMock.mockImplementation(() => childThatExits(0));

    await launch({ moduleUrl, callerArgs: ["MSFT", "GOOG"], argumentMode: "fixed" });

    expect(spawnMock.mock.calls[0]?.[1]).toEqual(FIXED_ARGS);
  });

  it("appends caller arguments after the tickers flag in forward mode", async () => {
    spawnMock.mockImplementation(() => childThatExits(0));

    const result = await launch({ moduleUrl, callerArgs: ["AAPL", "MSFT"], argumentMode: "forward" });

    expect(spawnMock.mock.calls[0]?.[1]).toEqual(["run", "python", "src/live_main.py", "--tickers", "AAPL", "MSFT"]);
    expect(result.plan.argumentMode).toBe("forward");
  });

  it.each([0, 1, 2, 127, 255])("passes child exit code %i through unchanged", async code => {
    spawnMock.mockImplementation(() => childThatExits(code));

    const result = await launch({ moduleUrl, callerArgs: [], argumentMode: "fixed" });

    expect(result.exit).toEqual({ kind: "exited", code });
    expect(result.exitCode).toBe(code);
  });

  it("reports a signalled child as 128 plus the signal number", async () => {
    spawnMock.mockImplementation(() => childThatExits(null, "SIGTERM"));

    const result = await launch({ moduleUrl, callerArgs: [], argumentMode: "fixed" });

    expect(result.exit).toEqual({ kind: "signaled", signal: "SIGTERM" });
    expect(result.exitCode).toBe(128 + os.constants.signals.SIGTERM);
  });

  it("walks through starting, running and terminated", async () => {
    spawnMock.mockImplementation(() => childThatExits(0));
    const phases: LaunchPhase[] = [];

    await launch({ moduleUrl, callerArgs: [], argumentMode: "fixed", onPhase: phase => phases.push(phase) });

    expect(phases).toEqual(["starting", "running", "terminated"]);
  });

  it("fails with InterpreterNotFoundError when the manager is missing", async () => {
    spawnMock.mockImplementation(() => childThatFails("ENOENT"));
    const phases: LaunchPhase[] = [];

    const failure = await launch({
      moduleUrl,
      callerArgs: [],
      argumentMode: "fixed",
      onPhase: phase => phases.push(phase)
    }).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(InterpreterNotFoundError);
    expect(failure).toMatchObject({ exitCode: 127, command: "poetry", message: "poetry: command not found" });
    expect(phases).toEqual(["starting", "terminated"]);
  });

  it("maps a permission failure to ProcessSpawnError with status 126", async () => {
    spawnMock.mockImplementation(() => childThatFails("EACCES"));

    const failure = await launch({ moduleUrl, callerArgs: [], argumentMode: "fixed" }).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(ProcessSpawnError);
    expect(failure).toMatchObject({ exitCode: 126, code: "EACCES" });
  });

  it("launches unchanged when the launcher directory holds an unreadable .env", async () => {
    await fs.ensureDir(path.join(launcherDir, ".env"));
    spawnMock.mockImplementation(() => childThatExits(0));

    const result = await launch({ moduleUrl, callerArgs: [], argumentMode: "fixed" });

    expect(spawnMock).toHaveBeenCalledTimes(1);
    expect(spawnMock.mock.calls[0]?.[1]).toEqual(FIXED_ARGS);
    expect(result.exitCode).toBe(0);
  });

  it("takes the log level from the environment, not from the .env file", async () => {
    await fs.writeFile(path.join(launcherDir, ".env"), "LAUNCHER_LOG_LEVEL=debug\n");
    spawnMock.mockImplementation(() => childThatExits(0));
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);

    await launch({ moduleUrl, callerArgs: ["MSFT"], argumentMode: "fixed" });

    expect(logSpy).not.toHaveBeenCalled();
    expect(spawnMock.mock.calls[0]?.[2].env.LAUNCHER_LOG_LEVEL).toBe("info");
  });

  it("logs the launched command at debug level", async () => {
    vi.stubEnv("LAUNCHER_LOG_LEVEL", "debug");
    spawnMock.mockImplementation(() => childThatExits(0));
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);

    await launch({ moduleUrl, callerArgs: [], argumentMode: "fixed" });

    expect(logSpy).toHaveBeenCalledWith(
      expect.stringContaining(`[DEBUG] Launching poetry run python src/live_main.py --tickers AAPL in ${launcherDir}`)
    );
  });
});

describe("exitCodeOf", () => {
  it("returns the exit code of an exited child", () => {
    expect(exitCodeOf({ kind: "exited", code: 42 })).toBe(42);
  });

  it("adds 128 to the number of the terminating signal", () => {
    expect(exitCodeOf({ kind: "signaled", signal: "SIGINT" })).toBe(128 + os.constants.signals.SIGINT);
  });
});
