import { appendFile, mkdir, readFile } from "node:fs/promises";
import { dirname } from "node:path";

import { z } from "zod";

import { isMissingEntryError } from "../nodePrimitives.js";

/** Checks performed by a sweep, in execution order. */
export const WATCHDOG_CHECKS = [
  "process_ceiling",
  "session_pruning",
  "runaway_builds",
  "zombies",
  "liveness",
  "critical_memory",
] as const;

export type WatchdogCheckName = (typeof WATCHDOG_CHECKS)[number];

export type WatchdogActionKind = "sigterm" | "sigkill" | "delete" | "restart" | "report" | "skip";

/** Outcome of an enforcement action. `vanished` means the target was already gone. */
export type WatchdogActionOutcome = "done" | "vanished" | "failed";

export interface WatchdogAction {
  readonly check: WatchdogCheckName;
  readonly action: WatchdogActionKind;
  /** Pid, file path or service name the action applied to. */
  readonly target: string;
  readonly outcome: WatchdogActionOutcome;
  readonly detail?: string;
}

/** Line written to the action log. */
export interface ActionLogEntry extends WatchdogAction {
  readonly timestamp: string;
}

/** Append-only JSONL record of every watchdog action. */
export interface ActionLog {
  append(action: WatchdogAction): Promise<void>;
}

/** {@link ActionLog} appending JSON lines to a file. */
export class FileActionLog implements ActionLog {
  private directoryReady = false;

  constructor(
    readonly path: string,
    private readonly now: () => number = Date.now,
  ) {}

  async append(action: WatchdogAction): Promise<void> {
    if (!this.directoryReady) {
      await mkdir(dirname(this.path), { recursive: true });
      this.directoryReady = true;
    }
    const entry: ActionLogEntry = { timestamp: new Date(this.now()).toISOString(), ...action };
    await appendFile(this.path, `${JSON.stringify(entry)}\n`, "utf8");
  }

  /** Returns the last {@link limit} entries, oldest first. Malformed lines are skipped. */
  async readRecent(limit: number): Promise<ActionLogEntry[]> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf8");
    } catch (error) {
      if (isMissingEntryError(error)) {
        return [];
      }
      throw error;
    }
    const entries: ActionLogEntry[] = [];
    for (const line of raw.split("\n")) {
      const parsed = parseEntry(line);
      if (parsed) {
        entries.push(parsed);
      }
    }
    return limit > 0 ? entries.slice(-limit) : [];
  }
}

const ActionLogEntrySchema = z.object({
  timestamp: z.string(),
  check: z.enum(WATCHDOG_CHECKS),
  action: z.enum(["sigterm", "sigkill", "delete", "restart", "report", "skip"]),
  target: z.string(),
  outcome: z.enum(["done", "vanished", "failed"]),
  detail: z.string().optional(),
});

function parseEntry(line: string): ActionLogEntry | null {
  if (line.trim().length === 0) {
    return null;
  }
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    return null;
  }
  const parsed = ActionLogEntrySchema.safeParse(value);
  if (!parsed.success) {
    return null;
  }
  const { detail, ...rest } = parsed.data;
  return { ...rest, ...(detail !== undefined ? { detail } : {}) };
}
