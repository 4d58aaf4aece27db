import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { AdmissionController } from "../src/admission/admissionController.js";
import type { BackoffPolicy } from "../src/admission/backoff.js";
import { DuplicateTaskError, UnknownTaskError } from "../src/errors.js";
import type { WorkerRole } from "../src/probe/resourceProbe.js";
import { AgentSupervisor, describeOutcome } from "../src/supervisor/agentSupervisor.js";
import { TaskArchive } from "../src/tasks/taskArchive.js";
import { TaskRegistry } from "../src/tasks/taskRegistry.js";
import { ControlledSleep } from "./helpers/controlledSleep.js";
import { FakeResourceProbe, FakeTaskRunner, flushMicrotasks, snapshot } from "./helpers/fakeHost.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";
import { RecordingNotifier } from "./helpers/recordingNotifier.js";

const ROLE: WorkerRole = { name: "agent", commandPattern: /^claude/ };

describe("supervisor/AgentSupervisor", () => {
  let probe: FakeResourceProbe;
  let runner: FakeTaskRunner;
  let registry: TaskRegistry;
  let notifier: RecordingNotifier;
  let logger: RecordingLogger;
  let sleeper: ControlledSleep;

  function createSupervisor(extra: { backoff?: BackoffPolicy; archive?: TaskArchive; sleep?: () => Promise<void> } = {}): AgentSupervisor {
    return new AgentSupervisor({
      role: ROLE,
      admission: new AdmissionController({ probe, logger }),
      probe,
      registry,
      runner,
      notifier,
      logger,
      limits: { maxConcurrent: 2, minFreeGb: 4 },
      sleep: extra.sleep ?? sleeper.sleep,
      ...(extra.backoff !== undefined ? { backoff: extra.backoff } : {}),
      ...(extra.archive !== undefined ? { archive: extra.archive } : {}),
    });
  }

  beforeEach(() => {
    probe = new FakeResourceProbe();
    // Workers started here never show up in the host listing: the census must
    // rely on what the supervisor itself launched.
    runner = new FakeTaskRunner();
    registry = new TaskRegistry();
    notifier = new RecordingNotifier();
    logger = new RecordingLogger();
    sleeper = new ControlledSleep();
  });

  describe("admission race", () => {
    it("starts at most the ceiling among three concurrent submissions", async () => {
      const supervisor = createSupervisor();

      supervisor.submit({ id: "a", prompt: "one" });
      supervisor.submit({ id: "b", prompt: "two" });
      supervisor.submit({ id: "c", prompt: "three" });
      await flushMicrotasks();

      expect(runner.handles.map((handle) => handle.spec.taskId)).to.deep.equal(["a", "b"]);
      expect(registry.get("c")).to.deep.include({
        status: "queued",
        attempts: 1,
        lastDenial: "ConcurrencyCeiling: 2 agent worker(s) running, limit is 2",
      });
      expect(sleeper.requested).to.deep.equal([1_000]);
    });

    it("counts host workers it did not launch", async () => {
      probe.processes = [snapshot({ pid: 7 }), snapshot({ pid: 8 })];
      const supervisor = createSupervisor();

      supervisor.submit({ id: "a", prompt: "one" });
      await flushMicrotasks();

      expect(runner.handles).to.have.lengthOf(0);
      expect(registry.get("a")?.status).to.equal("queued");
    });

    it("admits the queued task once a slot frees up", async () => {
      const supervisor = createSupervisor();
      supervisor.submit({ id: "a", prompt: "one" });
      supervisor.submit({ id: "b", prompt: "two" });
      supervisor.submit({ id: "c", prompt: "three" });
      await flushMicrotasks();

      runner.handleFor("a").finish({ outputTail: "all done" });
      await flushMicrotasks();
      sleeper.releaseAll();
      await flushMicrotasks();

      expect(registry.get("a")?.status).to.equal("completed");
      expect(registry.get("c")).to.deep.include({ status: "running", pid: 1002, attempts: 2 });
    });

    it("backs off exponentially while denied", async () => {
      probe.freeGb = 1;
      const supervisor = createSupervisor();
      supervisor.submit({ id: "a", prompt: "one" });
      await flushMicrotasks();
      sleeper.releaseAll();
      await flushMicrotasks();
      sleeper.releaseAll();
      await flushMicrotasks();

      expect(sleeper.requested).to.deep.equal([1_000, 2_000, 4_000]);
      expect(registry.get("a")).to.deep.include({
        attempts: 3,
        lastDenial: "InsufficientMemory: 1.0 GB free, 4 GB required",
      });
    });

    it("fails the task once the attempt limit is reached", async () => {
      probe.processes = [snapshot({ pid: 7 }), snapshot({ pid: 8 })];
      const supervisor = createSupervisor({
        backoff: { initialDelayMs: 1_000, factor: 2, maxDelayMs: 30_000, maxAttempts: 2 },
        sleep: async () => undefined,
      });

      supervisor.submit({ id: "x", prompt: "one" });
      await flushMicrotasks();

      expect(registry.get("x")).to.deep.include({ status: "failed", attempts: 2 });
      expect(notifier.notifications).to.deep.equal([{ taskId: "x", status: "failed", text: "Task x failed" }]);
      expect(logger.messages("warn")).to.include("task_admission_exhausted");
    });
  });

  describe("completion", () => {
    let directory: string;

    beforeEach(async () => {
      directory = await mkdtemp(path.join(tmpdir(), "supervisor-"));
    });

    afterEach(async () => {
      await rm(directory, { recursive: true, force: true });
    });

    it("notifies, archives and serves acknowledged tasks from the archive", async () => {
      const supervisor = createSupervisor({ archive: new TaskArchive(directory) });
      supervisor.submit({ id: "a", prompt: "summarise", workingDirectory: "/srv/repo" });
      await flushMicrotasks();

      runner.handleFor("a").finish({ outputTail: "all done" });
      await supervisor.idle();

      expect(notifier.notifications).to.deep.equal([{ taskId: "a", status: "completed", text: "Task a completed\nall done" }]);
      const acknowledged = supervisor.acknowledge("a");
      expect(acknowledged).to.deep.include({ status: "completed", source: "registry", output: "all done" });

      const archived = await supervisor.status("a");
      expect(archived).to.deep.include({
        id: "a",
        status: "completed",
        source: "archive",
        output: "all done",
        workingDirectory: "/srv/repo",
        pid: 1000,
        lastDenial: null,
      });
    });

    it("reports spawn failures", async () => {
      const supervisor = createSupervisor();
      supervisor.submit({ id: "a", prompt: "summarise" });
      await flushMicrotasks();

      runner.handleFor("a").finish({ exitCode: null, spawnError: "spawn claude ENOENT" });
      await flushMicrotasks();

      expect(notifier.notifications[0]?.text).to.equal("Task a failed: spawn claude ENOENT");
    });

    it("marks runner timeouts", async () => {
      const supervisor = createSupervisor();
      supervisor.submit({ id: "a", prompt: "summarise" });
      await flushMicrotasks();

      runner.handleFor("a").finish({ exitCode: null, signal: "SIGKILL", timedOut: true });
      await flushMicrotasks();

      expect(registry.get("a")?.status).to.equal("timed_out");
      expect(notifier.notifications[0]?.text).to.equal("Task a timed out: runner timeout");
    });
  });

  describe("cancellation", () => {
    it("cancels a queued task without starting it", async () => {
      const supervisor = createSupervisor();
      supervisor.submit({ id: "a", prompt: "one" });
      supervisor.submit({ id: "b", prompt: "two" });
      supervisor.submit({ id: "c", prompt: "three" });
      await flushMicrotasks();

      const view = supervisor.cancel("c");
      await flushMicrotasks();

      expect(view.status).to.equal("cancelled");
      expect(sleeper.waiting).to.equal(0);
      expect(runner.handles).to.have.lengthOf(2);
      expect(notifier.notifications).to.deep.equal([
        { taskId: "c", status: "cancelled", text: "Task c cancelled: cancelled before start" },
      ]);
    });

    it("terminates a running worker and records the cancellation", async () => {
      const supervisor = createSupervisor();
      supervisor.submit({ id: "a", prompt: "one" });
      await flushMicrotasks();

      const view = supervisor.cancel("a");
      await flushMicrotasks();

      expect(view.status).to.equal("running");
      expect(runner.handleFor("a").signals).to.deep.equal(["SIGTERM"]);
      expect(registry.get("a")?.status).to.equal("cancelled");
      expect(notifier.notifications[0]?.text).to.equal("Task a cancelled: terminated by SIGTERM");
    });

    it("discards a worker spawned after the task was cancelled during admission", async () => {
      class CancellingProbe extends FakeResourceProbe {
        onMemorySample: (() => void) | null = null;

        override async freeMemoryGB(): Promise<number> {
          const hook = this.onMemorySample;
          this.onMemorySample = null;
          hook?.();
          return super.freeMemoryGB();
        }
      }
      const cancelling = new CancellingProbe();
      probe = cancelling;
      const supervisor = createSupervisor();
      cancelling.onMemorySample = () => {
        supervisor.cancel("a");
      };

      supervisor.submit({ id: "a", prompt: "one" });
      await flushMicrotasks();

      expect(registry.get("a")?.status).to.equal("cancelled");
      expect(runner.handles[0]?.signals).to.deep.equal(["SIGKILL"]);
      expect(logger.messages("warn")).to.include("task_spawn_discarded");
    });

    it("leaves terminal tasks unchanged", async () => {
      const supervisor = createSupervisor();
      supervisor.submit({ id: "a", prompt: "one" });
      await flushMicrotasks();
      runner.handleFor("a").finish();
      await flushMicrotasks();

      expect(supervisor.cancel("a").status).to.equal("completed");
      expect(notifier.notifications).to.have.lengthOf(1);
    });

    it("cancels queued work on shutdown", async () => {
      const supervisor = createSupervisor();
      supervisor.submit({ id: "a", prompt: "one" });
      supervisor.submit({ id: "b", prompt: "two" });
      supervisor.submit({ id: "c", prompt: "three" });
      await flushMicrotasks();

      await supervisor.shutdown();

      expect(registry.get("c")?.status).to.equal("cancelled");
      expect(registry.get("a")?.status).to.equal("running");

      await supervisor.shutdown(true);
      expect(registry.get("a")?.status).to.equal("cancelled");
      expect(registry.get("b")?.status).to.equal("cancelled");
    });
  });

  describe("validation and lookups", () => {
    it("rejects invalid ids, empty prompts and duplicates", () => {
      const supervisor = createSupervisor();

      expect(() => supervisor.submit({ id: "../etc", prompt: "x" })).to.throw(TypeError);
      expect(() => supervisor.submit({ prompt: "   " })).to.throw(TypeError, "prompt must not be empty");
      supervisor.submit({ id: "a", prompt: "x" });
      expect(() => supervisor.submit({ id: "a", prompt: "x" })).to.throw(DuplicateTaskError);
    });

    it("raises UnknownTaskError for tasks it never saw", async () => {
      const supervisor = createSupervisor();

      try {
        await supervisor.status("ghost");
        expect.fail("expected an unknown task");
      } catch (error) {
        expect(error).to.be.instanceOf(UnknownTaskError);
      }
      expect(() => supervisor.cancel("ghost")).to.throw(UnknownTaskError);
    });

    it("exposes primary pids of running primary tasks", async () => {
      const supervisor = createSupervisor();
      supervisor.submit({ id: "a", prompt: "one", primary: true });
      supervisor.submit({ id: "b", prompt: "two" });
      await flushMicrotasks();

      expect(supervisor.primaryPids()).to.deep.equal([1000]);
    });

    it("summarises the queue with a fresh host sample", async () => {
      probe.processes = [snapshot({ pid: 7 })];
      runner = new FakeTaskRunner(probe);
      const supervisor = createSupervisor();
      supervisor.submit({ id: "a", prompt: "one" });
      supervisor.submit({ id: "b", prompt: "two" });
      await flushMicrotasks();

      const status = await supervisor.queueStatus();

      expect(status).to.deep.equal({
        tasks: { queued: 1, running: 1, completed: 0, failed: 0, timed_out: 0, cancelled: 0, total: 2 },
        limits: { maxConcurrent: 2, minFreeGb: 4 },
        hostWorkers: 2,
        freeMemoryGB: 16,
      });
    });

    it("reports null samples when the probe fails", async () => {
      probe.failure = new Error("ps missing");
      const supervisor = createSupervisor();

      const status = await supervisor.queueStatus();

      expect(status.hostWorkers).to.equal(null);
      expect(status.freeMemoryGB).to.equal(null);
    });
  });

  it("summarises outcomes for notifications", () => {
    const text = describeOutcome({
      id: "t",
      status: "completed",
      role: "agent",
      prompt: "p",
      workingDirectory: null,
      primary: false,
      createdAt: 0,
      startedAt: 0,
      finishedAt: 1,
      pid: 1,
      exitInfo: { exitCode: 0, signal: null, timedOut: false, outputTail: `${"x".repeat(1_500)}tail`, errorTail: "", durationMs: 1 },
      attempts: 1,
      lastDenial: null,
    });

    expect(text).to.equal(`Task t completed\n${"x".repeat(996)}tail`);
  });
});
