import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { ZodError } from "zod";

import { TaskArchive, toArchivedTask } from "../src/tasks/taskArchive.js";
import type { TaskSnapshot } from "../src/tasks/taskRegistry.js";

const CREATED = Date.parse("2026-04-01T08:00:00.000Z");

function terminal(overrides: Partial<TaskSnapshot> = {}): TaskSnapshot {
  return {
    id: "task-1",
    status: "completed",
    role: "agent",
    prompt: "summarise the logs",
    workingDirectory: "/srv/repo",
    primary: false,
    createdAt: CREATED,
    startedAt: CREATED + 1_000,
    finishedAt: CREATED + 61_000,
    pid: 321,
    exitInfo: { exitCode: 0, signal: null, timedOut: false, outputTail: "done\n", errorTail: "", durationMs: 60_000 },
    attempts: 1,
    lastDenial: null,
    ...overrides,
  };
}

describe("tasks/TaskArchive", () => {
  let directory: string;
  let archive: TaskArchive;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(tmpdir(), "archive-"));
    archive = new TaskArchive(path.join(directory, "tasks"));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("converts a completed task", () => {
    expect(toArchivedTask(terminal())).to.deep.equal({
      id: "task-1",
      status: "completed",
      role: "agent",
      prompt: "summarise the logs",
      workingDirectory: "/srv/repo",
      primary: false,
      createdAt: "2026-04-01T08:00:00.000Z",
      startedAt: "2026-04-01T08:00:01.000Z",
      finishedAt: "2026-04-01T08:01:01.000Z",
      pid: 321,
      exitCode: 0,
      signal: null,
      timedOut: false,
      error: null,
      output: "done\n",
      attempts: 1,
    });
  });

  it("explains each failure mode", () => {
    const base = { outputTail: "", errorTail: "", durationMs: 1, timedOut: false };
    const failed = (exitInfo: TaskSnapshot["exitInfo"], status: TaskSnapshot["status"] = "failed"): string | null =>
      toArchivedTask(terminal({ status, exitInfo })).error;

    expect(failed(null, "cancelled")).to.equal("cancelled before start");
    expect(failed({ ...base, exitCode: null, signal: null, spawnError: "spawn claude ENOENT" })).to.equal(
      "spawn claude ENOENT",
    );
    expect(failed({ ...base, exitCode: null, signal: "SIGKILL", timedOut: true }, "timed_out")).to.equal("runner timeout");
    expect(failed({ ...base, exitCode: null, signal: "SIGTERM" })).to.equal("terminated by SIGTERM");
    expect(failed({ ...base, exitCode: 2, signal: null, errorTail: "bad flag\n" })).to.equal("exit code 2: bad flag");
    expect(failed({ ...base, exitCode: 2, signal: null })).to.equal("exit code 2");
  });

  it("truncates the prompt and keeps the output tail", () => {
    const archived = toArchivedTask(
      terminal({
        prompt: "p".repeat(800),
        exitInfo: {
          exitCode: 0,
          signal: null,
          timedOut: false,
          outputTail: `${"a".repeat(10_000)}END`,
          errorTail: "",
          durationMs: 1,
        },
      }),
    );

    expect(archived.prompt).to.have.lengthOf(500);
    expect(archived.output).to.have.lengthOf(10_000);
    expect(archived.output?.endsWith("END")).to.equal(true);
  });

  it("refuses live tasks", () => {
    expect(() => toArchivedTask(terminal({ status: "running" }))).to.throw(TypeError);
  });

  it("saves atomically and loads back", async () => {
    const saved = await archive.save(terminal());

    expect(await archive.load("task-1")).to.deep.equal(saved);
    expect(await readdir(path.join(directory, "tasks"))).to.deep.equal(["task-1.json"]);
  });

  it("returns null for unknown or unsafe ids", async () => {
    expect(await archive.load("missing")).to.equal(null);
    expect(await archive.load("../escape")).to.equal(null);
  });

  it("rejects documents that fail validation", async () => {
    await archive.save(terminal());
    await writeFile(path.join(directory, "tasks", "task-1.json"), JSON.stringify({ id: "task-1", status: "odd" }));

    try {
      await archive.load("task-1");
      expect.fail("expected a validation error");
    } catch (error) {
      expect(error).to.be.instanceOf(ZodError);
    }
  });
});
