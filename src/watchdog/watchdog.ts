import { rm } from "node:fs/promises";
import { basename } from "node:path";

import type { ProtectedModeEvaluation } from "../coordination/protectedModeFlag.js";
import type { HealthProbe, ServiceController } from "../health/siblingService.js";
import type { StructuredLogger } from "../logger.js";
import { describeError, isErrnoException, type TerminationSignal } from "../nodePrimitives.js";
import type { ResourceProbe, WorkerRole } from "../probe/resourceProbe.js";
import {
  delay,
  runtimeClearInterval,
  runtimeSetInterval,
  type IntervalHandle,
} from "../runtime/timers.js";
import type { ActionLog, WatchdogAction, WatchdogCheckName } from "./actionLog.js";
import {
  selectCeilingVictims,
  selectMemoryVictims,
  selectPrimaryPids,
  selectPrunableArtifacts,
  selectRunawayBuilds,
} from "./victims.js";

/** Thresholds enforced by each sweep. */
export interface WatchdogLimits {
  readonly workerRole: WorkerRole;
  readonly maxWorkers: number;
  /** Directory holding session artifacts; pruning is skipped when `null`. */
  readonly sessionDirectory: string | null;
  readonly sessionPattern: string;
  readonly maxSessionFiles: number;
  readonly buildPattern: RegExp;
  readonly buildMaxSeconds: number;
  /** Age ceiling of build processes while protected mode is active. */
  readonly buildProtectedMaxSeconds: number;
  readonly zombiePattern: RegExp;
  readonly criticalMemoryGb: number;
  /** Delay before re-probing an unhealthy sibling service. */
  readonly healthRecheckMs: number;
}

/** Read side of the coordination flag. */
export interface ProtectedModeReader {
  readonly path: string;
  evaluate(): Promise<ProtectedModeEvaluation>;
}

export interface SiblingService {
  readonly probe: HealthProbe;
  readonly controller: ServiceController;
}

export interface WatchdogOptions {
  readonly limits: WatchdogLimits;
  readonly probe: ResourceProbe;
  readonly flag: ProtectedModeReader;
  readonly actionLog: ActionLog;
  readonly logger: StructuredLogger;
  /** Pids designated as primary (explicit markers and configured pids). */
  readonly primaryPids?: () => Iterable<number>;
  /** Sibling service watched by the liveness check; skipped when absent. */
  readonly sibling?: SiblingService | null;
  readonly sendSignal?: (pid: number, signal: TerminationSignal) => void;
  readonly removeFile?: (path: string) => Promise<void>;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly now?: () => number;
}

export type CheckStatus = "ok" | "acted" | "skipped" | "error";

export interface CheckReport {
  readonly check: WatchdogCheckName;
  readonly status: CheckStatus;
  readonly actions: readonly WatchdogAction[];
  readonly detail?: string;
}

export interface SweepReport {
  readonly startedAt: number;
  readonly finishedAt: number;
  /** Protected-mode state sampled once at the start of the sweep. */
  readonly protectedMode: boolean;
  readonly checks: readonly CheckReport[];
}

/** Mutable collector handed to a single check. */
interface CheckContext {
  readonly actions: WatchdogAction[];
  detail?: string;
  skipped: boolean;
}

function defaultSendSignal(pid: number, signal: TerminationSignal): void {
  process.kill(pid, signal);
}

async function defaultRemoveFile(path: string): Promise<void> {
  await rm(path, { force: true });
}

/**
 * Periodic enforcement loop. Each sweep runs six checks in a fixed order,
 * every check isolated from the others, and keeps no state between sweeps:
 * all decisions derive from fresh probe samples and the coordination flag.
 */
export class Watchdog {
  private readonly limits: WatchdogLimits;
  private readonly probe: ResourceProbe;
  private readonly flag: ProtectedModeReader;
  private readonly actionLog: ActionLog;
  private readonly logger: StructuredLogger;
  private readonly primaryPids: () => Iterable<number>;
  private readonly sibling: SiblingService | null;
  private readonly sendSignal: (pid: number, signal: TerminationSignal) => void;
  private readonly removeFile: (path: string) => Promise<void>;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  private inFlight: Promise<SweepReport> | null = null;
  private interval: IntervalHandle | null = null;

  constructor(options: WatchdogOptions) {
    this.limits = options.limits;
    this.probe = options.probe;
    this.flag = options.flag;
    this.actionLog = options.actionLog;
    this.logger = options.logger;
    this.primaryPids = options.primaryPids ?? (() => []);
    this.sibling = options.sibling ?? null;
    this.sendSignal = options.sendSignal ?? defaultSendSignal;
    this.removeFile = options.removeFile ?? defaultRemoveFile;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.now = options.now ?? Date.now;
  }

  /** True while a sweep is executing. */
  get sweeping(): boolean {
    return this.inFlight !== null;
  }

  /**
   * Runs one sweep. A call made while a sweep is in progress joins it instead
   * of starting a second one.
   */
  sweep(): Promise<SweepReport> {
    if (this.inFlight) {
      return this.inFlight;
    }
    const run = this.runSweep().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = run;
    return run;
  }

  /** Starts sweeping every {@link intervalMs}; ticks overlapping a running sweep are skipped. */
  start(intervalMs: number): void {
    if (this.interval !== null) {
      return;
    }
    this.interval = runtimeSetInterval(() => this.tick(), intervalMs);
    this.interval.unref?.();
    this.logger.info("watchdog_started", { interval_ms: intervalMs });
  }

  /** Stops the timer and waits for the sweep in progress, if any. */
  async stop(): Promise<void> {
    if (this.interval !== null) {
      runtimeClearInterval(this.interval);
      this.interval = null;
      this.logger.info("watchdog_stopped");
    }
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  private tick(): void {
    if (this.inFlight) {
      this.logger.debug("watchdog_tick_skipped");
      return;
    }
    this.sweep().catch((error: unknown) => {
      this.logger.error("watchdog_sweep_failed", { message: describeError(error) });
    });
  }

  private async runSweep(): Promise<SweepReport> {
    const startedAt = this.now();
    const flagState = await this.readFlag();
    const protectedMode = flagState.active;
    const checks: CheckReport[] = [
      await this.runCheck("process_ceiling", async (ctx) => {
        if (flagState.clearedStale) {
          await this.record(ctx, {
            check: "process_ceiling",
            action: "delete",
            target: this.flag.path,
            outcome: "done",
            detail: "stale protected-mode flag",
          });
        }
        await this.enforceProcessCeiling(ctx, protectedMode);
      }),
      await this.runCheck("session_pruning", (ctx) => this.pruneSessions(ctx)),
      await this.runCheck("runaway_builds", (ctx) => this.killRunawayBuilds(ctx, protectedMode)),
      await this.runCheck("zombies", (ctx) => this.countZombies(ctx)),
      await this.runCheck("liveness", (ctx) => this.checkLiveness(ctx)),
      await this.runCheck("critical_memory", (ctx) => this.relieveMemory(ctx)),
    ];
    const report: SweepReport = { startedAt, finishedAt: this.now(), protectedMode, checks };
    this.logger.info("watchdog_sweep_completed", {
      protected_mode: protectedMode,
      actions: checks.reduce((total, check) => total + check.actions.length, 0),
      errors: checks.filter((check) => check.status === "error").map((check) => check.check),
    });
    return report;
  }

  private async readFlag(): Promise<ProtectedModeEvaluation> {
    try {
      return await this.flag.evaluate();
    } catch (error) {
      // An unreadable flag cannot grant leniency.
      this.logger.error("watchdog_flag_unreadable", { message: describeError(error) });
      return { active: false, clearedStale: false };
    }
  }

  private async runCheck(check: WatchdogCheckName, body: (ctx: CheckContext) => Promise<void>): Promise<CheckReport> {
    const ctx: CheckContext = { actions: [], skipped: false };
    try {
      await body(ctx);
    } catch (error) {
      const message = describeError(error);
      this.logger.error("watchdog_check_failed", { check, message });
      return { check, status: "error", actions: ctx.actions, detail: message };
    }
    const status: CheckStatus = ctx.skipped
      ? "skipped"
      : ctx.actions.some((action) => action.action !== "report")
        ? "acted"
        : "ok";
    return { check, status, actions: ctx.actions, ...(ctx.detail !== undefined ? { detail: ctx.detail } : {}) };
  }

  private async record(ctx: CheckContext, action: WatchdogAction): Promise<void> {
    ctx.actions.push(action);
    const level = action.outcome === "failed" ? "error" : action.action === "report" || action.action === "skip" ? "warn" : "info";
    this.logger[level]("watchdog_action", { ...action });
    try {
      await this.actionLog.append(action);
    } catch (error) {
      this.logger.error("watchdog_action_log_failed", { check: action.check, message: describeError(error) });
    }
  }

  private async signalProcess(
    ctx: CheckContext,
    check: WatchdogCheckName,
    pid: number,
    signal: TerminationSignal,
    detail: string,
  ): Promise<void> {
    const action = signal === "SIGTERM" ? "sigterm" : "sigkill";
    try {
      this.sendSignal(pid, signal);
      await this.record(ctx, { check, action, target: String(pid), outcome: "done", detail });
    } catch (error) {
      const vanished = isErrnoException(error) && error.code === "ESRCH";
      await this.record(ctx, {
        check,
        action,
        target: String(pid),
        outcome: vanished ? "vanished" : "failed",
        detail: vanished ? detail : `${detail}; ${describeError(error)}`,
      });
    }
  }

  private async enforceProcessCeiling(ctx: CheckContext, protectedMode: boolean): Promise<void> {
    const { workerRole, maxWorkers } = this.limits;
    const workers = await this.probe.listWorkers(workerRole);
    ctx.detail = `${workers.length} live, max ${maxWorkers}`;
    if (workers.length <= maxWorkers) {
      return;
    }
    if (protectedMode) {
      ctx.skipped = true;
      await this.record(ctx, {
        check: "process_ceiling",
        action: "skip",
        target: workerRole.name,
        outcome: "done",
        detail: `${workers.length} workers exceed ${maxWorkers} but protected mode is active`,
      });
      return;
    }
    const primaries = selectPrimaryPids(workers, this.primaryPids());
    for (const victim of selectCeilingVictims(workers, maxWorkers, primaries)) {
      await this.signalProcess(
        ctx,
        "process_ceiling",
        victim.pid,
        "SIGTERM",
        `excess worker (${workers.length} live, max ${maxWorkers}, age ${victim.elapsedSeconds}s)`,
      );
    }
  }

  private async pruneSessions(ctx: CheckContext): Promise<void> {
    const { sessionDirectory, sessionPattern, maxSessionFiles } = this.limits;
    if (sessionDirectory === null) {
      ctx.skipped = true;
      ctx.detail = "no session directory configured";
      return;
    }
    const artifacts = await this.probe.listArtifactsOldestFirst(sessionDirectory, sessionPattern);
    ctx.detail = `${artifacts.length} artifacts, max ${maxSessionFiles}`;
    for (const artifact of selectPrunableArtifacts(artifacts, maxSessionFiles)) {
      try {
        await this.removeFile(artifact.path);
        await this.record(ctx, {
          check: "session_pruning",
          action: "delete",
          target: artifact.path,
          outcome: "done",
          detail: `removed old session ${basename(artifact.path)}`,
        });
      } catch (error) {
        await this.record(ctx, {
          check: "session_pruning",
          action: "delete",
          target: artifact.path,
          outcome: "failed",
          detail: describeError(error),
        });
      }
    }
  }

  private async killRunawayBuilds(ctx: CheckContext, protectedMode: boolean): Promise<void> {
    const limit = protectedMode ? this.limits.buildProtectedMaxSeconds : this.limits.buildMaxSeconds;
    const builds = await this.probe.listProcesses(this.limits.buildPattern);
    ctx.detail = `${builds.length} build process(es), limit ${limit}s`;
    for (const build of selectRunawayBuilds(builds, limit)) {
      // Re-sample: the listing may be stale and the pid recycled or gone.
      const age = await this.probe.processAge(build.pid);
      if (age === null || age <= limit) {
        continue;
      }
      await this.signalProcess(ctx, "runaway_builds", build.pid, "SIGKILL", `build running ${age}s, limit ${limit}s`);
    }
  }

  private async countZombies(ctx: CheckContext): Promise<void> {
    const count = await this.probe.defunctCount(this.limits.zombiePattern);
    ctx.detail = `${count} zombie(s)`;
    if (count > 0) {
      // Only the parent can reap them.
      await this.record(ctx, {
        check: "zombies",
        action: "report",
        target: this.limits.zombiePattern.source,
        outcome: "done",
        detail: `found ${count} zombie process(es)`,
      });
    }
  }

  private async checkLiveness(ctx: CheckContext): Promise<void> {
    if (this.sibling === null) {
      ctx.skipped = true;
      ctx.detail = "no sibling service configured";
      return;
    }
    const { probe, controller } = this.sibling;
    if (!(await controller.isActive())) {
      ctx.skipped = true;
      ctx.detail = `${controller.serviceName} is not active`;
      return;
    }
    const first = await probe.check();
    if (first.healthy) {
      ctx.detail = "healthy";
      return;
    }
    await this.sleep(this.limits.healthRecheckMs);
    const second = await probe.check();
    if (second.healthy) {
      ctx.detail = "recovered on recheck";
      return;
    }
    const observed = second.status === null ? (second.error ?? "no response") : `HTTP ${second.status}`;
    try {
      await controller.restart();
      await this.record(ctx, {
        check: "liveness",
        action: "restart",
        target: controller.serviceName,
        outcome: "done",
        detail: `unresponsive (${observed})`,
      });
    } catch (error) {
      await this.record(ctx, {
        check: "liveness",
        action: "restart",
        target: controller.serviceName,
        outcome: "failed",
        detail: `unresponsive (${observed}); ${describeError(error)}`,
      });
    }
  }

  private async relieveMemory(ctx: CheckContext): Promise<void> {
    const freeGb = await this.probe.freeMemoryGB();
    ctx.detail = `${freeGb.toFixed(1)} GB free, critical below ${this.limits.criticalMemoryGb} GB`;
    if (freeGb >= this.limits.criticalMemoryGb) {
      return;
    }
    const workers = await this.probe.listWorkers(this.limits.workerRole);
    const primaries = selectPrimaryPids(workers, this.primaryPids());
    const victims = selectMemoryVictims(workers, primaries);
    if (victims.length === 0) {
      await this.record(ctx, {
        check: "critical_memory",
        action: "report",
        target: this.limits.workerRole.name,
        outcome: "done",
        detail: `only ${freeGb.toFixed(1)} GB free and no expendable worker`,
      });
      return;
    }
    for (const victim of victims) {
      await this.signalProcess(
        ctx,
        "critical_memory",
        victim.pid,
        "SIGKILL",
        `emergency kill, only ${freeGb.toFixed(1)} GB free`,
      );
    }
  }
}
