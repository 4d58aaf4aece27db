import type { StructuredLogger } from "../logger.js";
import { describeError } from "../nodePrimitives.js";
import type { ResourceProbe, WorkerRole } from "../probe/resourceProbe.js";

/** Why a spawn request was refused. */
export type DenialReason = "ConcurrencyCeiling" | "InsufficientMemory" | "ProbeUnavailable";

/** Limits evaluated on every admission request. */
export interface AdmissionLimits {
  /** Live workers allowed at once; a request is denied at or above this count. */
  readonly maxConcurrent: number;
  /** Free memory (GB) that must remain available before a worker is spawned. */
  readonly minFreeGb: number;
}

export const DEFAULT_ADMISSION_LIMITS: AdmissionLimits = Object.freeze({ maxConcurrent: 2, minFreeGb: 4 });

export type AdmissionDecision =
  | {
      readonly admitted: true;
      readonly liveWorkers: number;
      readonly freeMemoryGB: number;
    }
  | {
      readonly admitted: false;
      readonly reason: DenialReason;
      /** Human readable explanation forwarded to callers and notifications. */
      readonly detail: string;
      readonly liveWorkers?: number;
      readonly freeMemoryGB?: number;
    };

/** Additional census information known to the caller. */
export interface AdmissionContext {
  /**
   * Workers the caller already launched and still tracks. The census is the
   * maximum of this value and the host sample, so workers that the process
   * table has not caught up with still count.
   */
  readonly trackedWorkers?: number;
}

export interface AdmissionControllerOptions {
  readonly probe: ResourceProbe;
  readonly logger?: StructuredLogger;
}

/**
 * Gate consulted before any worker is spawned. It keeps no state between
 * calls and no queue: a denial is final for that request and the caller
 * decides whether to retry (see {@link requestAdmissionWithBackoff}).
 *
 * Admission is advisory. Two independent callers may both be admitted when
 * one slot remains; the watchdog's process ceiling corrects the overshoot.
 */
export class AdmissionController {
  private readonly probe: ResourceProbe;
  private readonly logger: StructuredLogger | undefined;

  constructor(options: AdmissionControllerOptions) {
    this.probe = options.probe;
    this.logger = options.logger;
  }

  async requestAdmission(
    role: WorkerRole,
    limits: AdmissionLimits = DEFAULT_ADMISSION_LIMITS,
    context: AdmissionContext = {},
  ): Promise<AdmissionDecision> {
    let hostWorkers: number;
    try {
      hostWorkers = await this.probe.liveWorkerCount(role);
    } catch (error) {
      return this.deny(role, { reason: "ProbeUnavailable", detail: `worker census failed: ${describeError(error)}` });
    }
    const liveWorkers = Math.max(hostWorkers, context.trackedWorkers ?? 0);
    if (liveWorkers >= limits.maxConcurrent) {
      return this.deny(role, {
        reason: "ConcurrencyCeiling",
        detail: `${liveWorkers} ${role.name} worker(s) running, limit is ${limits.maxConcurrent}`,
        liveWorkers,
      });
    }

    let freeMemoryGB: number;
    try {
      freeMemoryGB = await this.probe.freeMemoryGB();
    } catch (error) {
      return this.deny(role, {
        reason: "ProbeUnavailable",
        detail: `memory sample failed: ${describeError(error)}`,
        liveWorkers,
      });
    }
    if (freeMemoryGB < limits.minFreeGb) {
      return this.deny(role, {
        reason: "InsufficientMemory",
        detail: `${freeMemoryGB.toFixed(1)} GB free, ${limits.minFreeGb} GB required`,
        liveWorkers,
        freeMemoryGB,
      });
    }

    this.logger?.info("admission_granted", { role: role.name, live_workers: liveWorkers, free_memory_gb: freeMemoryGB });
    return { admitted: true, liveWorkers, freeMemoryGB };
  }

  private deny(role: WorkerRole, decision: Omit<Extract<AdmissionDecision, { admitted: false }>, "admitted">): AdmissionDecision {
    this.logger?.warn("admission_denied", {
      role: role.name,
      reason: decision.reason,
      detail: decision.detail,
    });
    return { admitted: false, ...decision };
  }
}
