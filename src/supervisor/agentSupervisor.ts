import { randomUUID } from "node:crypto";

import {
  DEFAULT_ADMISSION_LIMITS,
  type AdmissionController,
  type AdmissionDecision,
  type AdmissionLimits,
} from "../admission/admissionController.js";
import { DEFAULT_BACKOFF_POLICY, requestAdmissionWithBackoff, type BackoffPolicy } from "../admission/backoff.js";
import { UnknownTaskError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import { describeError } from "../nodePrimitives.js";
import type { Notifier } from "../notify/notifier.js";
import type { ResourceProbe, WorkerRole } from "../probe/resourceProbe.js";
import { delay, DelayAbortedError } from "../runtime/timers.js";
import { TASK_ID_PATTERN, toArchivedTask, type ArchivedTask, type TaskArchive } from "../tasks/taskArchive.js";
import {
  isTerminalStatus,
  type TaskRegistry,
  type TaskSnapshot,
  type TaskStatus,
  type TaskSummary,
} from "../tasks/taskRegistry.js";
import type { TaskRunner, WorkerHandle } from "../tasks/taskRunner.js";

/** Work submitted by a caller. */
export interface SubmitRequest {
  readonly prompt: string;
  readonly workingDirectory?: string;
  /** Caller-chosen identifier; generated when omitted. */
  readonly id?: string;
  /** Marks the worker as primary: the watchdog never terminates it for the ceiling or memory. */
  readonly primary?: boolean;
}

/** Uniform view of a task, live or archived. */
export type TaskView = Omit<ArchivedTask, "status"> & {
  readonly status: TaskStatus;
  readonly lastDenial: string | null;
  /** `archive` once the task was acknowledged and only its stored result remains. */
  readonly source: "registry" | "archive";
};

export interface QueueStatus {
  readonly tasks: TaskSummary;
  readonly limits: AdmissionLimits;
  /** Host census of live workers, `null` when the probe failed. */
  readonly hostWorkers: number | null;
  readonly freeMemoryGB: number | null;
}

export interface AgentSupervisorOptions {
  readonly role: WorkerRole;
  readonly admission: AdmissionController;
  readonly probe: ResourceProbe;
  readonly registry: TaskRegistry;
  readonly runner: TaskRunner;
  readonly notifier: Notifier;
  readonly logger: StructuredLogger;
  readonly limits?: AdmissionLimits;
  readonly backoff?: BackoffPolicy;
  readonly archive?: TaskArchive | null;
  readonly generateId?: () => string;
  readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/** Raised inside the admission loop once the task left the queue. */
class TaskWithdrawnError extends Error {
  constructor(taskId: string) {
    super(`task ${taskId} left the queue`);
    this.name = "TaskWithdrawnError";
  }
}

const NOTIFICATION_OUTPUT_CHARS = 1_000;

/**
 * Entry point callers use to run agent work. `submit` returns immediately
 * with a task id; admission, spawning, retries and completion bookkeeping
 * proceed in the background.
 *
 * Admission and spawn are serialized within this process and the census
 * counts workers this supervisor launched even before the host process table
 * reflects them, so concurrent submissions never overshoot the ceiling
 * locally.
 */
export class AgentSupervisor {
  private readonly role: WorkerRole;
  private readonly admission: AdmissionController;
  private readonly probe: ResourceProbe;
  private readonly registry: TaskRegistry;
  private readonly runner: TaskRunner;
  private readonly notifier: Notifier;
  private readonly logger: StructuredLogger;
  private readonly limits: AdmissionLimits;
  private readonly backoff: BackoffPolicy;
  private readonly archive: TaskArchive | null;
  private readonly generateId: () => string;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  /** Tail of the admission/spawn critical section. */
  private gate: Promise<void> = Promise.resolve();
  private readonly queuedAborts = new Map<string, AbortController>();
  private readonly cancelRequested = new Set<string>();
  private readonly background = new Set<Promise<void>>();

  constructor(options: AgentSupervisorOptions) {
    this.role = options.role;
    this.admission = options.admission;
    this.probe = options.probe;
    this.registry = options.registry;
    this.runner = options.runner;
    this.notifier = options.notifier;
    this.logger = options.logger;
    this.limits = options.limits ?? DEFAULT_ADMISSION_LIMITS;
    this.backoff = options.backoff ?? DEFAULT_BACKOFF_POLICY;
    this.archive = options.archive ?? null;
    this.generateId = options.generateId ?? (() => randomUUID().slice(0, 8));
    this.sleep = options.sleep ?? delay;
  }

  /** Registers the task as `queued` and starts driving it in the background. */
  submit(request: SubmitRequest): TaskSnapshot {
    const id = request.id ?? this.generateId();
    if (!TASK_ID_PATTERN.test(id)) {
      throw new TypeError(`invalid task id ${JSON.stringify(id)}: use letters, digits, '-' or '_' (max 64)`);
    }
    if (request.prompt.trim().length === 0) {
      throw new TypeError("prompt must not be empty");
    }
    const snapshot = this.registry.register({
      id,
      role: this.role.name,
      prompt: request.prompt,
      ...(request.workingDirectory !== undefined ? { workingDirectory: request.workingDirectory } : {}),
      ...(request.primary !== undefined ? { primary: request.primary } : {}),
    });
    this.logger.info("task_submitted", { task_id: id, primary: snapshot.primary });

    const abort = new AbortController();
    this.queuedAborts.set(id, abort);
    this.track(this.drive(id, abort.signal));
    return snapshot;
  }

  /** Current view of a task; acknowledged tasks are served from the archive. */
  async status(id: string): Promise<TaskView> {
    const snapshot = this.registry.get(id);
    if (snapshot) {
      return toTaskView(snapshot);
    }
    const archived = this.archive ? await this.archive.load(id) : null;
    if (archived === null) {
      throw new UnknownTaskError(id);
    }
    return { ...archived, lastDenial: null, source: "archive" };
  }

  /** Removes a terminal task from the registry and returns its final view. */
  acknowledge(id: string): TaskView {
    const snapshot = this.registry.acknowledge(id);
    this.cancelRequested.delete(id);
    this.logger.info("task_acknowledged", { task_id: id, status: snapshot.status });
    return toTaskView(snapshot);
  }

  /**
   * Cancels a task. A queued task becomes `cancelled` immediately; a running
   * worker receives SIGTERM and the task turns `cancelled` once it exits.
   * Terminal tasks are returned unchanged.
   */
  cancel(id: string): TaskView {
    const snapshot = this.registry.get(id);
    if (!snapshot) {
      throw new UnknownTaskError(id);
    }
    if (snapshot.status === "queued") {
      this.queuedAborts.get(id)?.abort();
      this.queuedAborts.delete(id);
      const cancelled = this.registry.markTerminal(id, null, "cancelled");
      this.logger.info("task_cancelled", { task_id: id, while: "queued" });
      this.finalize(cancelled);
      return toTaskView(cancelled);
    }
    if (snapshot.status === "running") {
      this.cancelRequested.add(id);
      this.registry.handle(id)?.terminate();
      this.logger.info("task_cancel_requested", { task_id: id, pid: snapshot.pid });
    }
    return toTaskView(snapshot);
  }

  /** Task counters plus a fresh host sample. */
  async queueStatus(): Promise<QueueStatus> {
    const [hostWorkers, freeMemoryGB] = await Promise.all([
      this.probe.liveWorkerCount(this.role).catch((error: unknown) => {
        this.logger.warn("queue_status_probe_failed", { probe: "workers", message: describeError(error) });
        return null;
      }),
      this.probe.freeMemoryGB().catch((error: unknown) => {
        this.logger.warn("queue_status_probe_failed", { probe: "memory", message: describeError(error) });
        return null;
      }),
    ]);
    return { tasks: this.registry.summary(), limits: this.limits, hostWorkers, freeMemoryGB };
  }

  /** Pids the watchdog must treat as primary. */
  primaryPids(): number[] {
    return this.registry.primaryPids();
  }

  /** Resolves once every background admission loop and worker watch settled. */
  async idle(): Promise<void> {
    while (this.background.size > 0) {
      await Promise.all([...this.background]);
    }
  }

  /**
   * Stops admitting: queued tasks are cancelled. Running workers are
   * terminated when {@link terminateRunning} is set, otherwise left running.
   */
  async shutdown(terminateRunning = false): Promise<void> {
    for (const task of this.registry.list()) {
      if (task.status === "queued") {
        this.cancel(task.id);
      } else if (task.status === "running" && terminateRunning) {
        this.cancel(task.id);
      }
    }
    if (terminateRunning) {
      await this.idle();
    }
  }

  private track(work: Promise<void>): void {
    const tracked: Promise<void> = work.then(() => {
      this.background.delete(tracked);
    });
    this.background.add(tracked);
  }

  /** Runs {@link section} once every previously entered section finished. */
  private exclusive<T>(section: () => Promise<T>): Promise<T> {
    const run = this.gate.then(section);
    this.gate = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async drive(id: string, signal: AbortSignal): Promise<void> {
    try {
      const { decision } = await requestAdmissionWithBackoff(() => this.exclusive(() => this.admitAndSpawn(id)), {
        policy: this.backoff,
        signal,
        sleep: this.sleep,
        onDenied: (denied, attempt, nextDelayMs) => {
          this.logger.info("task_admission_retry", {
            task_id: id,
            attempt,
            next_delay_ms: nextDelayMs,
            reason: denied.admitted ? null : denied.reason,
          });
        },
      });
      if (!decision.admitted) {
        // Attempt limit reached.
        const failed = this.registry.markTerminal(id, null, "failed");
        this.logger.warn("task_admission_exhausted", { task_id: id, reason: decision.reason });
        this.finalize(failed);
      }
    } catch (error) {
      if (error instanceof DelayAbortedError || error instanceof TaskWithdrawnError) {
        return;
      }
      this.logger.error("task_drive_failed", { task_id: id, message: describeError(error) });
      if (this.registry.get(id)?.status === "queued") {
        this.finalize(this.registry.markTerminal(id, null, "failed"));
      }
    } finally {
      this.queuedAborts.delete(id);
    }
  }

  /** Critical section: census, admission and spawn happen without interleaving. */
  private async admitAndSpawn(id: string): Promise<AdmissionDecision> {
    const task = this.registry.get(id);
    if (!task || task.status !== "queued") {
      throw new TaskWithdrawnError(id);
    }
    const decision = await this.admission.requestAdmission(this.role, this.limits, {
      trackedWorkers: this.registry.countRunning(this.role.name),
    });
    this.registry.recordAttempt(id, decision.admitted ? null : `${decision.reason}: ${decision.detail}`);
    if (!decision.admitted) {
      return decision;
    }
    const handle = this.runner.start({
      taskId: id,
      prompt: task.prompt,
      ...(task.workingDirectory !== null ? { workingDirectory: task.workingDirectory } : {}),
    });
    if (!this.registry.markRunning(id, handle)) {
      // Cancelled while the admission samples were taken.
      handle.kill();
      this.logger.warn("task_spawn_discarded", { task_id: id, pid: handle.pid });
      throw new TaskWithdrawnError(id);
    }
    this.logger.info("task_started", { task_id: id, pid: handle.pid });
    this.track(this.watch(id, handle));
    return decision;
  }

  private async watch(id: string, handle: WorkerHandle): Promise<void> {
    const exit = await handle.wait();
    const cancelled = this.cancelRequested.has(id);
    const snapshot = this.registry.markTerminal(id, exit, cancelled ? "cancelled" : undefined);
    this.logger.info("task_finished", {
      task_id: id,
      status: snapshot.status,
      exit_code: exit.exitCode,
      signal: exit.signal,
      duration_ms: exit.durationMs,
    });
    this.finalize(snapshot);
  }

  /** Archives the terminal task and notifies, both best-effort. */
  private finalize(snapshot: TaskSnapshot): void {
    this.notifier.notify({ taskId: snapshot.id, status: snapshot.status, text: describeOutcome(snapshot) });
    if (!this.archive) {
      return;
    }
    const archive = this.archive;
    this.track(
      archive.save(snapshot).then(
        () => undefined,
        (error: unknown) => {
          this.logger.error("task_archive_failed", { task_id: snapshot.id, message: describeError(error) });
        },
      ),
    );
  }
}

/** Converts a registry snapshot to the public view. */
export function toTaskView(snapshot: TaskSnapshot): TaskView {
  if (isTerminalStatus(snapshot.status)) {
    return { ...toArchivedTask(snapshot), lastDenial: snapshot.lastDenial, source: "registry" };
  }
  return {
    id: snapshot.id,
    status: snapshot.status,
    role: snapshot.role,
    prompt: snapshot.prompt,
    workingDirectory: snapshot.workingDirectory,
    primary: snapshot.primary,
    createdAt: new Date(snapshot.createdAt).toISOString(),
    startedAt: snapshot.startedAt === null ? null : new Date(snapshot.startedAt).toISOString(),
    finishedAt: null,
    pid: snapshot.pid,
    exitCode: null,
    signal: null,
    timedOut: false,
    error: null,
    output: null,
    attempts: snapshot.attempts,
    lastDenial: snapshot.lastDenial,
    source: "registry",
  };
}

/** One-paragraph human readable summary used for notifications. */
export function describeOutcome(snapshot: TaskSnapshot): string {
  const view = toTaskView(snapshot);
  const header = `Task ${snapshot.id} ${snapshot.status.replace("_", " ")}`;
  if (view.error !== null) {
    return `${header}: ${view.error}`;
  }
  if (view.output !== null) {
    return `${header}\n${view.output.slice(-NOTIFICATION_OUTPUT_CHARS)}`;
  }
  return header;
}
