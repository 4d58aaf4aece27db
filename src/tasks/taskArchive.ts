import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { z } from "zod";

import { isMissingEntryError } from "../nodePrimitives.js";
import { isTerminalStatus, type TaskSnapshot } from "./taskRegistry.js";

/** Task identifiers accepted by the supervisor; also safe as file names. */
export const TASK_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]{0,63}$/;

const PROMPT_ARCHIVE_CHARS = 500;
const OUTPUT_ARCHIVE_CHARS = 10_000;

const ArchivedTaskSchema = z
  .object({
    id: z.string(),
    status: z.enum(["completed", "failed", "timed_out", "cancelled"]),
    role: z.string(),
    prompt: z.string(),
    workingDirectory: z.string().nullable(),
    primary: z.boolean(),
    createdAt: z.string(),
    startedAt: z.string().nullable(),
    finishedAt: z.string().nullable(),
    pid: z.number().int().nullable(),
    exitCode: z.number().int().nullable(),
    signal: z.string().nullable(),
    timedOut: z.boolean(),
    error: z.string().nullable(),
    output: z.string().nullable(),
    attempts: z.number().int().nonnegative(),
  })
  .strict();

/** Terminal task as persisted on disk. */
export type ArchivedTask = z.infer<typeof ArchivedTaskSchema>;

function isoOrNull(value: number | null): string | null {
  return value === null ? null : new Date(value).toISOString();
}

/** Renders the failure explanation stored alongside a terminal task. */
function describeFailure(snapshot: TaskSnapshot): string | null {
  const exit = snapshot.exitInfo;
  if (exit === null) {
    return snapshot.status === "cancelled" ? "cancelled before start" : null;
  }
  if (exit.spawnError !== undefined) {
    return exit.spawnError;
  }
  if (exit.timedOut) {
    return "runner timeout";
  }
  if (exit.signal !== null) {
    return `terminated by ${exit.signal}`;
  }
  if (exit.exitCode !== 0) {
    const stderr = exit.errorTail.trim();
    return `exit code ${exit.exitCode}${stderr ? `: ${stderr}` : ""}`;
  }
  return null;
}

/** Converts a terminal snapshot to its archived form (prompt and output truncated). */
export function toArchivedTask(snapshot: TaskSnapshot): ArchivedTask {
  if (!isTerminalStatus(snapshot.status)) {
    throw new TypeError(`task ${snapshot.id} is not terminal (${snapshot.status})`);
  }
  const output = snapshot.exitInfo?.outputTail ?? "";
  return {
    id: snapshot.id,
    status: snapshot.status,
    role: snapshot.role,
    prompt: snapshot.prompt.slice(0, PROMPT_ARCHIVE_CHARS),
    workingDirectory: snapshot.workingDirectory,
    primary: snapshot.primary,
    createdAt: new Date(snapshot.createdAt).toISOString(),
    startedAt: isoOrNull(snapshot.startedAt),
    finishedAt: isoOrNull(snapshot.finishedAt),
    pid: snapshot.pid,
    exitCode: snapshot.exitInfo?.exitCode ?? null,
    signal: snapshot.exitInfo?.signal ?? null,
    timedOut: snapshot.exitInfo?.timedOut ?? false,
    error: describeFailure(snapshot),
    output: output.length > 0 ? output.slice(-OUTPUT_ARCHIVE_CHARS) : null,
    attempts: snapshot.attempts,
  };
}

/**
 * Directory of terminal task results, one JSON document per task, so results
 * stay retrievable after the in-memory record was acknowledged or the
 * supervisor restarted.
 */
export class TaskArchive {
  constructor(private readonly directory: string) {}

  private pathFor(id: string): string {
    if (!TASK_ID_PATTERN.test(id)) {
      throw new TypeError(`invalid task id: ${JSON.stringify(id)}`);
    }
    return join(this.directory, `${id}.json`);
  }

  /** Writes the archived form of {@link snapshot} atomically. */
  async save(snapshot: TaskSnapshot): Promise<ArchivedTask> {
    const archived = toArchivedTask(snapshot);
    const target = this.pathFor(snapshot.id);
    const temporary = `${target}.${process.pid}.tmp`;
    await mkdir(this.directory, { recursive: true });
    await writeFile(temporary, `${JSON.stringify(archived, null, 2)}\n`, "utf8");
    await rename(temporary, target);
    return archived;
  }

  /** Loads an archived task, `null` when none was written for {@link id}. */
  async load(id: string): Promise<ArchivedTask | null> {
    if (!TASK_ID_PATTERN.test(id)) {
      return null;
    }
    let raw: string;
    try {
      raw = await readFile(this.pathFor(id), "utf8");
    } catch (error) {
      if (isMissingEntryError(error)) {
        return null;
      }
      throw error;
    }
    return ArchivedTaskSchema.parse(JSON.parse(raw));
  }
}
