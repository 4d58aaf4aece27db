import { runCommand, type ChildProcessGateway, type CommandResult } from "../gateways/childProcess.js";
import { ProbeUnavailableError } from "../errors.js";

/** Point-in-time description of one host process. */
export interface ProcessSnapshot {
  readonly pid: number;
  readonly ppid: number;
  /** Wall-clock seconds since the process started. */
  readonly elapsedSeconds: number;
  /** Raw `ps` state column (`S`, `R`, `Z+`, ...). */
  readonly state: string;
  readonly user: string;
  /** Full command line. */
  readonly command: string;
}

/** Source of process listings consumed by the resource probe. */
export interface ProcessTable {
  list(): Promise<ProcessSnapshot[]>;
  /** Elapsed seconds of {@link pid}, or `null` when the process is gone. */
  elapsedSeconds(pid: number): Promise<number | null>;
}

/** True when the `ps` state marks a defunct (zombie) process. */
export function isDefunct(snapshot: ProcessSnapshot): boolean {
  return snapshot.state.startsWith("Z");
}

const PS_LINE = /^\s*(\d+)\s+(\d+)\s+(\d+)\s+(\S+)\s+(\S+)\s+(.*)$/;

/**
 * Parses the output of `ps -eo pid=,ppid=,etimes=,stat=,user=,args=`. Lines
 * that do not match the column layout are ignored.
 */
export function parsePsListing(output: string): ProcessSnapshot[] {
  const snapshots: ProcessSnapshot[] = [];
  for (const line of output.split("\n")) {
    const match = PS_LINE.exec(line);
    if (!match) {
      continue;
    }
    const [, pid, ppid, elapsed, state, user, command] = match;
    if (!pid || !ppid || !elapsed || !state || !user || command === undefined) {
      continue;
    }
    snapshots.push({
      pid: Number.parseInt(pid, 10),
      ppid: Number.parseInt(ppid, 10),
      elapsedSeconds: Number.parseInt(elapsed, 10),
      state,
      user,
      command: command.trim(),
    });
  }
  return snapshots;
}

/** {@link ProcessTable} backed by the procps `ps` binary. */
export class PsProcessTable implements ProcessTable {
  constructor(private readonly gateway: ChildProcessGateway) {}

  async list(): Promise<ProcessSnapshot[]> {
    let result: CommandResult;
    try {
      result = await runCommand(this.gateway, {
        command: "ps",
        args: ["-eo", "pid=,ppid=,etimes=,stat=,user=,args="],
        allowedEnvKeys: ["PATH", "LANG"],
        timeoutMs: 10_000,
      });
    } catch (error) {
      throw new ProbeUnavailableError("process_list", error);
    }
    if (result.exitCode !== 0) {
      throw new ProbeUnavailableError("process_list", result.stderr.trim() || `ps exited with ${result.exitCode}`);
    }
    return parsePsListing(result.stdout);
  }

  async elapsedSeconds(pid: number): Promise<number | null> {
    let result: CommandResult;
    try {
      result = await runCommand(this.gateway, {
        command: "ps",
        args: ["-o", "etimes=", "-p", String(pid)],
        allowedEnvKeys: ["PATH", "LANG"],
        timeoutMs: 5_000,
      });
    } catch (error) {
      throw new ProbeUnavailableError("process_age", error);
    }
    const raw = result.stdout.trim();
    // `ps -p` exits 1 with no output once the process is gone.
    if (raw.length === 0) {
      return null;
    }
    const seconds = Number.parseInt(raw, 10);
    return Number.isFinite(seconds) ? seconds : null;
  }
}
