import type { ArtifactEntry } from "../probe/artifacts.js";
import type { ProcessSnapshot } from "../probe/processTable.js";
import { sortOldestFirst } from "../probe/resourceProbe.js";

/**
 * Pure selection rules used by the watchdog. Keeping them free of I/O lets
 * the enforcement decisions be tested exhaustively against synthetic process
 * tables.
 */

/**
 * Resolves the primary workers among {@link workers}: the live ones listed in
 * {@link designated}, or, when none of those is live, the single oldest
 * worker (lowest pid on ties).
 */
export function selectPrimaryPids(workers: readonly ProcessSnapshot[], designated: Iterable<number>): Set<number> {
  const wanted = new Set(designated);
  const live = workers.filter((worker) => wanted.has(worker.pid)).map((worker) => worker.pid);
  if (live.length > 0) {
    return new Set(live);
  }
  const [oldest] = sortOldestFirst(workers);
  return oldest ? new Set([oldest.pid]) : new Set();
}

/**
 * Workers to terminate when {@link workers} exceeds {@link maxWorkers}: the
 * oldest non-primary ones, exactly `live - maxWorkers` of them (fewer only
 * when not enough non-primary workers exist).
 */
export function selectCeilingVictims(
  workers: readonly ProcessSnapshot[],
  maxWorkers: number,
  primaries: ReadonlySet<number>,
): ProcessSnapshot[] {
  const excess = workers.length - maxWorkers;
  if (excess <= 0) {
    return [];
  }
  return sortOldestFirst(workers)
    .filter((worker) => !primaries.has(worker.pid))
    .slice(0, excess);
}

/** Every non-primary worker, oldest first. */
export function selectMemoryVictims(
  workers: readonly ProcessSnapshot[],
  primaries: ReadonlySet<number>,
): ProcessSnapshot[] {
  return sortOldestFirst(workers).filter((worker) => !primaries.has(worker.pid));
}

/** Build processes running for strictly more than {@link maxAgeSeconds}. */
export function selectRunawayBuilds(builds: readonly ProcessSnapshot[], maxAgeSeconds: number): ProcessSnapshot[] {
  return sortOldestFirst(builds).filter((build) => build.elapsedSeconds > maxAgeSeconds);
}

/**
 * Artifacts to delete so that at most {@link maxFiles} remain. The input is
 * expected oldest first; the oldest `count - maxFiles` entries are returned.
 */
export function selectPrunableArtifacts(artifacts: readonly ArtifactEntry[], maxFiles: number): ArtifactEntry[] {
  const excess = artifacts.length - Math.max(0, maxFiles);
  return excess > 0 ? artifacts.slice(0, excess) : [];
}
