import { readFile } from "node:fs/promises";
import { freemem } from "node:os";

import { ProbeUnavailableError } from "../errors.js";
import { isMissingEntryError } from "../nodePrimitives.js";
import { listArtifactsOldestFirst, type ArtifactEntry } from "./artifacts.js";
import { isDefunct, type ProcessSnapshot, type ProcessTable } from "./processTable.js";

const BYTES_PER_GB = 1024 ** 3;

/**
 * Worker role: how processes belonging to a class of workers are recognised
 * on the host. The pattern is matched against the full command line.
 */
export interface WorkerRole {
  readonly name: string;
  readonly commandPattern: RegExp;
  /** Restricts matches to processes owned by this user when set. */
  readonly user?: string;
}

/**
 * Read-only queries of host state shared by the admission controller and the
 * watchdog. Every value is sampled at call time; two calls carry no
 * consistency guarantee and callers must tolerate processes vanishing between
 * samples.
 */
export interface ResourceProbe {
  liveWorkerCount(role: WorkerRole): Promise<number>;
  /** Live workers of {@link role}, oldest first (ties broken by lowest pid). */
  listWorkers(role: WorkerRole): Promise<ProcessSnapshot[]>;
  /** Elapsed seconds since {@link pid} started, `null` when it already exited. */
  processAge(pid: number): Promise<number | null>;
  freeMemoryGB(): Promise<number>;
  /** Live processes whose command line matches {@link pattern}. */
  listProcesses(pattern: RegExp): Promise<ProcessSnapshot[]>;
  /** Number of defunct processes whose command line matches {@link pattern}. */
  defunctCount(pattern: RegExp): Promise<number>;
  staleArtifactCount(directory: string, pattern: string): Promise<number>;
  listArtifactsOldestFirst(directory: string, pattern: string): Promise<ArtifactEntry[]>;
}

/** Orders snapshots oldest first; equal ages fall back to the lowest pid. */
export function sortOldestFirst(snapshots: readonly ProcessSnapshot[]): ProcessSnapshot[] {
  return [...snapshots].sort((left, right) => right.elapsedSeconds - left.elapsedSeconds || left.pid - right.pid);
}

/** True when {@link snapshot} is a live process of {@link role}. */
export function matchesRole(snapshot: ProcessSnapshot, role: WorkerRole): boolean {
  if (isDefunct(snapshot)) {
    return false;
  }
  if (role.user !== undefined && snapshot.user !== role.user) {
    return false;
  }
  return role.commandPattern.test(snapshot.command);
}

/**
 * Extracts `MemAvailable` from the content of `/proc/meminfo`, in gigabytes.
 * Returns `null` when the field is absent (very old kernels).
 */
export function parseMemAvailableGB(meminfo: string): number | null {
  const match = /^MemAvailable:\s+(\d+)\s+kB$/m.exec(meminfo);
  if (!match?.[1]) {
    return null;
  }
  return (Number.parseInt(match[1], 10) * 1024) / BYTES_PER_GB;
}

export interface HostResourceProbeOptions {
  readonly processTable: ProcessTable;
  /** Location of the kernel memory report (overridable in tests). */
  readonly meminfoPath?: string;
  /** Fallback used when `/proc/meminfo` is missing (defaults to `os.freemem`). */
  readonly freeMemoryBytes?: () => number;
}

/** {@link ResourceProbe} sampling the local host. */
export class HostResourceProbe implements ResourceProbe {
  private readonly processTable: ProcessTable;
  private readonly meminfoPath: string;
  private readonly freeMemoryBytes: () => number;

  constructor(options: HostResourceProbeOptions) {
    this.processTable = options.processTable;
    this.meminfoPath = options.meminfoPath ?? "/proc/meminfo";
    this.freeMemoryBytes = options.freeMemoryBytes ?? freemem;
  }

  async liveWorkerCount(role: WorkerRole): Promise<number> {
    return (await this.listWorkers(role)).length;
  }

  async listWorkers(role: WorkerRole): Promise<ProcessSnapshot[]> {
    const snapshots = await this.processTable.list();
    return sortOldestFirst(snapshots.filter((snapshot) => matchesRole(snapshot, role)));
  }

  async processAge(pid: number): Promise<number | null> {
    return this.processTable.elapsedSeconds(pid);
  }

  async freeMemoryGB(): Promise<number> {
    let meminfo: string;
    try {
      meminfo = await readFile(this.meminfoPath, "utf8");
    } catch (error) {
      if (!isMissingEntryError(error)) {
        throw new ProbeUnavailableError("free_memory", error);
      }
      return this.freeMemoryBytes() / BYTES_PER_GB;
    }
    return parseMemAvailableGB(meminfo) ?? this.freeMemoryBytes() / BYTES_PER_GB;
  }

  async listProcesses(pattern: RegExp): Promise<ProcessSnapshot[]> {
    const snapshots = await this.processTable.list();
    return snapshots.filter((snapshot) => !isDefunct(snapshot) && pattern.test(snapshot.command));
  }

  async defunctCount(pattern: RegExp): Promise<number> {
    const snapshots = await this.processTable.list();
    return snapshots.filter((snapshot) => isDefunct(snapshot) && pattern.test(snapshot.command)).length;
  }

  async staleArtifactCount(directory: string, pattern: string): Promise<number> {
    return (await this.listArtifactsOldestFirst(directory, pattern)).length;
  }

  async listArtifactsOldestFirst(directory: string, pattern: string): Promise<ArtifactEntry[]> {
    try {
      return await listArtifactsOldestFirst(directory, pattern);
    } catch (error) {
      throw new ProbeUnavailableError("session_artifacts", error);
    }
  }
}
