import { mkdir, rm, stat, utimes, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import type { StructuredLogger } from "../logger.js";
import { isMissingEntryError } from "../nodePrimitives.js";

/** Default staleness window after which a forgotten marker stops counting. */
export const DEFAULT_FLAG_STALE_MS = 30 * 60 * 1_000;

/** Snapshot returned by {@link ProtectedModeFlag.inspect}. */
export interface ProtectedModeState {
  readonly present: boolean;
  /** Age of the marker in milliseconds, `null` when absent. */
  readonly ageMs: number | null;
  readonly stale: boolean;
}

/** Result of {@link ProtectedModeFlag.evaluate}. */
export interface ProtectedModeEvaluation {
  readonly active: boolean;
  /** True when this evaluation removed a stale marker. */
  readonly clearedStale: boolean;
}

export interface ProtectedModeFlagOptions {
  /** Marker file path. */
  readonly path: string;
  readonly staleAfterMs?: number;
  readonly now?: () => number;
  readonly logger?: StructuredLogger;
}

/**
 * Durable marker a long-running batch job sets to request relaxed enforcement
 * from the watchdog ("protected mode"). The marker's mtime is the activation
 * timestamp.
 *
 * Ownership is split: the protected job is the only writer (`activate`,
 * `clear`, `runProtected`), the watchdog is the only reader of
 * {@link isActive} and the only party allowed to clear a stale marker. A job
 * that crashes without clearing therefore relaxes enforcement for at most one
 * staleness window.
 */
export class ProtectedModeFlag {
  readonly path: string;
  private readonly staleAfterMs: number;
  private readonly now: () => number;
  private readonly logger: StructuredLogger | undefined;

  constructor(options: ProtectedModeFlagOptions) {
    this.path = options.path;
    this.staleAfterMs = Math.max(1, options.staleAfterMs ?? DEFAULT_FLAG_STALE_MS);
    this.now = options.now ?? Date.now;
    this.logger = options.logger;
  }

  /**
   * True iff the marker exists and is younger than the staleness window. A
   * stale marker is removed before returning `false`.
   */
  async isActive(): Promise<boolean> {
    return (await this.evaluate()).active;
  }

  /** Same as {@link isActive}, also telling whether a stale marker was removed. */
  async evaluate(): Promise<ProtectedModeEvaluation> {
    const state = await this.inspect();
    if (!state.present) {
      return { active: false, clearedStale: false };
    }
    if (state.stale) {
      this.logger?.warn("protected_mode_flag_stale", { path: this.path, age_ms: state.ageMs });
      await rm(this.path, { force: true });
      return { active: false, clearedStale: true };
    }
    return { active: true, clearedStale: false };
  }

  /** Creates the marker, or refreshes its timestamp when it already exists. */
  async activate(): Promise<void> {
    const at = new Date(this.now());
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, `${process.pid} ${at.toISOString()}\n`, "utf8");
    await utimes(this.path, at, at);
    this.logger?.info("protected_mode_activated", { path: this.path });
  }

  /** Removes the marker. Clearing an absent marker is a no-op. */
  async clear(): Promise<void> {
    await rm(this.path, { force: true });
    this.logger?.info("protected_mode_cleared", { path: this.path });
  }

  /** Reports the marker state without clearing anything. */
  async inspect(): Promise<ProtectedModeState> {
    let modifiedAt: number;
    try {
      modifiedAt = (await stat(this.path)).mtimeMs;
    } catch (error) {
      if (isMissingEntryError(error)) {
        return { present: false, ageMs: null, stale: false };
      }
      throw error;
    }
    const ageMs = Math.max(0, this.now() - modifiedAt);
    return { present: true, ageMs, stale: ageMs >= this.staleAfterMs };
  }

  /**
   * Runs {@link job} in protected mode: the marker is set before the job
   * starts and removed once it settles, whatever the outcome.
   */
  async runProtected<T>(job: () => Promise<T>): Promise<T> {
    await this.activate();
    try {
      return await job();
    } finally {
      await this.clear();
    }
  }
}
