import fg from "fast-glob";

/** Session artifact found on disk. */
export interface ArtifactEntry {
  /** Absolute path of the artifact. */
  readonly path: string;
  /** Last modification time in epoch milliseconds. */
  readonly modifiedAt: number;
}

/**
 * Lists the files of {@link directory} matching {@link pattern}, oldest first
 * (modification time ascending, path as tie-breaker). A missing directory
 * yields an empty list.
 */
export async function listArtifactsOldestFirst(directory: string, pattern: string): Promise<ArtifactEntry[]> {
  const entries = await fg(pattern, {
    cwd: directory,
    absolute: true,
    onlyFiles: true,
    dot: false,
    deep: 1,
    stats: true,
    suppressErrors: true,
  });
  return entries
    .map((entry) => ({ path: entry.path, modifiedAt: entry.stats?.mtimeMs ?? 0 }))
    .sort((left, right) => left.modifiedAt - right.modifiedAt || left.path.localeCompare(right.path));
}
