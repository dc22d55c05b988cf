import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";

import { HELP_TEXT } from "../src/commands/index.js";
import type { Environment } from "../src/config.js";
import { VERSION } from "../src/constants.js";
import { LogLevel, setLogLevel } from "../src/logger.js";
import { createProgram } from "../src/program.js";
import { RunnerMockRecorder, pathWithout } from "./mocks/runner-mock.js";

const CREDS: Environment = { PIA_USER: "test-user", PIA_PASS: "test-secret" };

let project: string;

beforeAll(() => {
  project = mkdtempSync(join(tmpdir(), "privateerr-cli-"));
  mkdirSync(join(project, "docker"));
  writeFileSync(join(project, "docker", "Dockerfile"), "FROM alpine:3.19\n");
});

afterAll(() => {
  rmSync(project, { recursive: true, force: true });
});

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  setLogLevel(LogLevel.INFO);
});

async function runCli(
  argv: string[],
  env: Environment = CREDS,
  commandExists = pathWithout(),
  globalFlags: string[] = ["-C", project]
): Promise<{ exitCode: number | undefined; runner: RunnerMockRecorder; cwds: string[] }> {
  const runner = new RunnerMockRecorder();
  const cwds: string[] = [];
  let exitCode: number | undefined;

  const program = createProgram({
    env,
    commandExists,
    createRunner: (cwd) => {
      cwds.push(cwd);
      return runner;
    },
    onExit: (code) => {
      exitCode = code;
    },
  });
  program.exitOverride().configureOutput({ writeOut: () => {}, writeErr: () => {} });

  await program.parseAsync([...globalFlags, ...argv], { from: "user" });
  return { exitCode, runner, cwds };
}

describe("privateerr CLI", () => {
  it("starts the stack when no operation is given", async () => {
    const { exitCode, runner } = await runCli([]);

    expect(exitCode).toBe(0);
    expect(runner.commandLines()).toEqual(["docker-compose up --build --force-recreate --pull always"]);
  });

  it("runs aliases through their target", async () => {
    const down = await runCli(["down"]);
    const clean = await runCli(["clean"]);
    const run = await runCli(["run"]);

    expect(clean.runner.calls).toEqual(down.runner.calls);
    expect(run.runner.commandLines()).toEqual(["docker-compose up --build --force-recreate --pull always"]);
  });

  it("resolves the working directory from --chdir", async () => {
    const { cwds, runner } = await runCli(["down"]);

    expect(cwds).toEqual([project]);
    expect(runner.commandLines()).toContain("docker images -q alpine");
  });

  it("prints usage for help", async () => {
    const { exitCode, runner } = await runCli(["help"], {});

    expect(exitCode).toBe(0);
    expect(console.log).toHaveBeenCalledWith(HELP_TEXT);
    expect(runner.calls).toEqual([]);
  });

  it("exits 1 naming an unknown operation", async () => {
    const { exitCode, runner } = await runCli(["deploy"]);

    expect(exitCode).toBe(1);
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining("Unknown operation 'deploy'"));
    expect(runner.calls).toEqual([]);
  });

  it("exits 1 naming a missing credential", async () => {
    const { exitCode, runner } = await runCli(["build"], { PIA_USER: "test-user" });

    expect(exitCode).toBe(1);
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining("Please set PIA_PASS"));
    expect(runner.calls).toEqual([]);
  });

  it("exits 1 naming a missing executable", async () => {
    const { exitCode } = await runCli(["down"], CREDS, pathWithout("docker"));

    expect(exitCode).toBe(1);
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining("No docker in PATH"));
  });

  it("runs logs and up normally with a non-numeric teardown timeout", async () => {
    const env = { ...CREDS, COMPOSE_DOWN_TIMEOUT: "1m" };
    const logs = await runCli(["logs"], env);
    const up = await runCli(["up"], env);

    expect(logs.exitCode).toBe(0);
    expect(logs.runner.commandLines()).toEqual(["docker-compose logs --follow"]);
    expect(up.exitCode).toBe(0);
    expect(up.runner.commandLines()).toEqual(["docker-compose up --build --force-recreate --pull always"]);
  });

  it("passes a non-numeric teardown timeout to docker-compose as given", async () => {
    const { exitCode, runner } = await runCli(["down"], { COMPOSE_DOWN_TIMEOUT: "1m" });

    expect(exitCode).toBe(0);
    expect(runner.commandLines()[0]).toBe("docker-compose down --timeout 1m --rmi all --volumes");
  });

  it("exits with the orchestration tool's status", async () => {
    const runner = new RunnerMockRecorder().on("docker-compose logs --follow", 130);
    let exitCode: number | undefined;
    const program = createProgram({
      env: {},
      commandExists: pathWithout(),
      createRunner: () => runner,
      onExit: (code) => {
        exitCode = code;
      },
    });

    await program.parseAsync(["logs"], { from: "user" });

    expect(exitCode).toBe(130);
  });

  it("suppresses its own output with --quiet", async () => {
    const { exitCode } = await runCli(["-q", "build"], {});

    expect(exitCode).toBe(1);
    expect(console.error).not.toHaveBeenCalled();
  });

  it("enables debug output with --verbose", async () => {
    await runCli(["--verbose", "up"]);

    expect(console.log).toHaveBeenCalledWith(expect.stringContaining("Found docker-compose in PATH"));
  });

  it("accepts global flags after the operation", async () => {
    const { exitCode, cwds } = await runCli(["down", "-C", project, "-q"], CREDS, pathWithout(), []);

    expect(exitCode).toBe(0);
    expect(cwds).toEqual([project]);
    expect(console.log).not.toHaveBeenCalled();
  });

  it("reads --chdir given after the operation", async () => {
    const { cwds, runner } = await runCli(["up", "--chdir", project], CREDS, pathWithout(), []);

    expect(cwds).toEqual([project]);
    expect(runner.commandLines()).toEqual(["docker-compose up --build --force-recreate --pull always"]);
  });

  it("prints the package version", async () => {
    const writeOut = vi.fn();
    const program = createProgram({ onExit: () => {} });
    program.exitOverride().configureOutput({ writeOut, writeErr: () => {} });

    await expect(program.parseAsync(["--version"], { from: "user" })).rejects.toThrow(VERSION);
    expect(writeOut).toHaveBeenCalledWith(`${VERSION}\n`);
  });
});
