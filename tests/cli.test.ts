import { afterEach, before, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import { spawnSync } from "node:child_process";
import { EventEmitter } from "node:events";
import { mkdir, mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { EXIT_USAGE, runCli, type CliIo } from "../src/cli.js";
import { USAGE } from "../src/cliOptions.js";
import { readLockMetadata, withLock } from "../src/locks/repositoryLock.js";
import { delay } from "../src/runtime/timers.js";

describe("cli/runCli", () => {
  let directory: string;
  let stdout: string[];
  let stderr: string[];
  let signals: EventEmitter;

  function io(env: NodeJS.ProcessEnv = {}): CliIo {
    return {
      stdout: (text) => {
        stdout.push(text);
      },
      stderr: (text) => {
        stderr.push(text);
      },
      env: { SUPERVISOR_FLAG_FILE: path.join(directory, "protected.flag"), ...env },
      signals,
    };
  }

  beforeEach(async () => {
    directory = await mkdtemp(path.join(tmpdir(), "supervisor-cli-"));
    stdout = [];
    stderr = [];
    signals = new EventEmitter();
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("prints the usage for help", async () => {
    expect(await runCli(["help"], io())).to.equal(0);
    expect(stdout).to.deep.equal([USAGE]);
  });

  it("exits with the usage status on invalid invocations", async () => {
    expect(await runCli(["deploy"], io())).to.equal(EXIT_USAGE);
    expect(stderr).to.deep.equal([`agent-supervisor: unknown command deploy\n\n${USAGE}`]);
  });

  it("lists every configuration issue", async () => {
    const code = await runCli(["protected", "status"], io({ SUPERVISOR_MAX_WORKERS: "0" }));

    expect(code).to.equal(EXIT_USAGE);
    expect(stderr).to.deep.equal([
      "agent-supervisor: invalid supervisor configuration (1 issue(s))\n  - SUPERVISOR_MAX_WORKERS: Number must be greater than 0\n",
    ]);
  });

  it("activates, reports and clears protected mode", async () => {
    const flagPath = path.join(directory, "protected.flag");

    expect(await runCli(["protected", "activate"], io())).to.equal(0);
    expect(await runCli(["protected", "clear"], io())).to.equal(0);

    expect(stdout).to.have.lengthOf(2);
    const activated: unknown = JSON.parse(stdout[0] ?? "");
    expect(activated).to.deep.include({ path: flagPath, present: true, stale: false });
    expect(JSON.parse(stdout[1] ?? "")).to.deep.equal({ path: flagPath, present: false, ageMs: null, stale: false });
  });

  it("reports supervisor errors with their code and hint", async () => {
    const repository = path.join(directory, "not-a-repo");

    const code = await runCli(["lock", repository, "--", "true"], io());

    expect(code).to.equal(EXIT_USAGE);
    expect(stderr).to.deep.equal([
      `agent-supervisor: ${repository} is not a repository: ${path.join(repository, ".git")} is missing (E-LOCK-INVALID-RESOURCE)\nhint: pass the root of a git checkout (the directory containing .git/)\n`,
    ]);
  });

  describe("lock with flock(1)", function () {
    before(function () {
      if (spawnSync("flock", ["--version"]).status !== 0) {
        this.skip();
      }
    });

    it("releases the repository when interrupted", async () => {
      const repository = path.join(directory, "repo");
      await mkdir(path.join(repository, ".git"), { recursive: true });

      const running = runCli(["lock", repository, "--timeout", "5", "--", "sleep", "20"], io());
      let metadata: string | null = null;
      for (let attempt = 0; attempt < 200 && metadata === null; attempt += 1) {
        await delay(10);
        metadata = await readLockMetadata(repository);
      }
      expect(metadata).to.match(/:sleep 20$/);

      signals.emit("SIGINT");

      expect(await running).to.equal(130);
      expect(signals.listenerCount("SIGINT")).to.equal(0);
      const next = await withLock(repository, ["true"], { timeoutSec: 2 });
      expect(next).to.deep.include({ status: "completed", exitCode: 0 });
    });
  });
});
