import { DuplicateTaskError, TaskNotTerminalError, UnknownTaskError } from "../errors.js";
import type { ExitInfo, WorkerHandle } from "./taskRunner.js";

/**
 * Lifecycle of a submitted task. `queued` and `running` are live, every other
 * state is terminal.
 */
export type TaskStatus = "queued" | "running" | "completed" | "failed" | "timed_out" | "cancelled";

export type TerminalTaskStatus = Exclude<TaskStatus, "queued" | "running">;

const TERMINAL_STATUSES: ReadonlySet<TaskStatus> = new Set(["completed", "failed", "timed_out", "cancelled"]);

export function isTerminalStatus(status: TaskStatus): status is TerminalTaskStatus {
  return TERMINAL_STATUSES.has(status);
}

/** Public, immutable view of a task. */
export interface TaskSnapshot {
  readonly id: string;
  readonly status: TaskStatus;
  readonly role: string;
  readonly prompt: string;
  readonly workingDirectory: string | null;
  /** Marks the worker as the protected primary process. */
  readonly primary: boolean;
  readonly createdAt: number;
  readonly startedAt: number | null;
  readonly finishedAt: number | null;
  readonly pid: number | null;
  readonly exitInfo: ExitInfo | null;
  /** Admission attempts performed so far. */
  readonly attempts: number;
  /** Detail of the most recent admission denial. */
  readonly lastDenial: string | null;
}

export interface RegisterTaskOptions {
  readonly id: string;
  readonly role: string;
  readonly prompt: string;
  readonly workingDirectory?: string;
  readonly primary?: boolean;
  readonly createdAt?: number;
}

/** Counters returned by {@link TaskRegistry.summary}. */
export type TaskSummary = Record<TaskStatus, number> & { readonly total: number };

interface MutableTaskRecord {
  snapshot: TaskSnapshot;
  handle: WorkerHandle | null;
}

/** Maps a worker exit to the terminal status it implies. */
export function statusForExit(exit: ExitInfo): TerminalTaskStatus {
  if (exit.timedOut) {
    return "timed_out";
  }
  if (exit.spawnError !== undefined || exit.signal !== null || exit.exitCode !== 0) {
    return "failed";
  }
  return "completed";
}

/**
 * In-memory index of submitted tasks. A task owns at most one worker handle,
 * held exactly while the task is `running`. Terminal tasks stay listed until
 * a caller acknowledges them.
 */
export class TaskRegistry {
  private readonly records = new Map<string, MutableTaskRecord>();

  constructor(private readonly now: () => number = Date.now) {}

  /** Registers a new `queued` task. */
  register(options: RegisterTaskOptions): TaskSnapshot {
    if (this.records.has(options.id)) {
      throw new DuplicateTaskError(options.id);
    }
    const snapshot: TaskSnapshot = {
      id: options.id,
      status: "queued",
      role: options.role,
      prompt: options.prompt,
      workingDirectory: options.workingDirectory ?? null,
      primary: options.primary ?? false,
      createdAt: options.createdAt ?? this.now(),
      startedAt: null,
      finishedAt: null,
      pid: null,
      exitInfo: null,
      attempts: 0,
      lastDenial: null,
    };
    this.records.set(options.id, { snapshot, handle: null });
    return snapshot;
  }

  has(id: string): boolean {
    return this.records.has(id);
  }

  get(id: string): TaskSnapshot | undefined {
    return this.records.get(id)?.snapshot;
  }

  /** Snapshots ordered by creation time. */
  list(): TaskSnapshot[] {
    return [...this.records.values()]
      .map((record) => record.snapshot)
      .sort((left, right) => left.createdAt - right.createdAt || left.id.localeCompare(right.id));
  }

  /** Worker handle of a running task. */
  handle(id: string): WorkerHandle | null {
    return this.records.get(id)?.handle ?? null;
  }

  /** Records one admission attempt and, for denials, its explanation. */
  recordAttempt(id: string, denial: string | null): TaskSnapshot {
    const record = this.require(id);
    record.snapshot = {
      ...record.snapshot,
      attempts: record.snapshot.attempts + 1,
      lastDenial: denial ?? record.snapshot.lastDenial,
    };
    return record.snapshot;
  }

  /**
   * Transitions a queued task to `running`. Returns `false` without touching
   * the task when it left the queue meanwhile (cancelled).
   */
  markRunning(id: string, handle: WorkerHandle, at: number = this.now()): boolean {
    const record = this.require(id);
    if (record.snapshot.status !== "queued") {
      return false;
    }
    record.handle = handle;
    record.snapshot = { ...record.snapshot, status: "running", startedAt: at, pid: handle.pid };
    return true;
  }

  /**
   * Moves a task to a terminal status and releases its handle. The status
   * defaults to the one implied by {@link exit}. Calling this on a task that
   * is already terminal leaves it unchanged.
   */
  markTerminal(id: string, exit: ExitInfo | null, status?: TerminalTaskStatus, at: number = this.now()): TaskSnapshot {
    const record = this.require(id);
    if (isTerminalStatus(record.snapshot.status)) {
      return record.snapshot;
    }
    const resolved = status ?? (exit !== null ? statusForExit(exit) : "failed");
    record.handle = null;
    record.snapshot = { ...record.snapshot, status: resolved, finishedAt: at, exitInfo: exit };
    return record.snapshot;
  }

  /** Removes a terminal task and returns its final snapshot. */
  acknowledge(id: string): TaskSnapshot {
    const record = this.require(id);
    if (!isTerminalStatus(record.snapshot.status)) {
      throw new TaskNotTerminalError(id, record.snapshot.status);
    }
    this.records.delete(id);
    return record.snapshot;
  }

  /** Running tasks, optionally restricted to one role. */
  countRunning(role?: string): number {
    let count = 0;
    for (const { snapshot } of this.records.values()) {
      if (snapshot.status === "running" && (role === undefined || snapshot.role === role)) {
        count += 1;
      }
    }
    return count;
  }

  /** Pids of running tasks submitted as primary. */
  primaryPids(): number[] {
    const pids: number[] = [];
    for (const { snapshot } of this.records.values()) {
      if (snapshot.primary && snapshot.status === "running" && snapshot.pid !== null) {
        pids.push(snapshot.pid);
      }
    }
    return pids;
  }

  summary(): TaskSummary {
    const counts: Record<TaskStatus, number> = {
      queued: 0,
      running: 0,
      completed: 0,
      failed: 0,
      timed_out: 0,
      cancelled: 0,
    };
    for (const { snapshot } of this.records.values()) {
      counts[snapshot.status] += 1;
    }
    return { ...counts, total: this.records.size };
  }

  private require(id: string): MutableTaskRecord {
    const record = this.records.get(id);
    if (!record) {
      throw new UnknownTaskError(id);
    }
    return record;
  }
}
