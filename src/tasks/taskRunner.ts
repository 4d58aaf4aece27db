import type { ChildProcess } from "node:child_process";

import { createChildProcessGateway, type ChildProcessGateway, type SpawnedChildProcess } from "../gateways/childProcess.js";
import type { StructuredLogger } from "../logger.js";
import type { TerminationSignal } from "../nodePrimitives.js";

/** Placeholder substituted with the task prompt in the argument template. */
export const PROMPT_PLACEHOLDER = "{prompt}";

const DEFAULT_OUTPUT_TAIL_CHARS = 10_000;
const DEFAULT_ERROR_TAIL_CHARS = 2_000;

/** How a worker process ended. */
export interface ExitInfo {
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
  /** True when the runner's own timeout killed the worker. */
  readonly timedOut: boolean;
  /** Set when the process could not be started at all. */
  readonly spawnError?: string;
  /** Last characters written on stdout. */
  readonly outputTail: string;
  /** Last characters written on stderr. */
  readonly errorTail: string;
  readonly durationMs: number;
}

/** What the runner needs to start one worker. */
export interface WorkerSpec {
  readonly taskId: string;
  readonly prompt: string;
  readonly workingDirectory?: string;
}

/** Live handle on a spawned worker. */
export interface WorkerHandle {
  /** Operating system pid, `null` when spawning failed. */
  readonly pid: number | null;
  isAlive(): boolean;
  /** Polite termination (SIGTERM). */
  terminate(): void;
  /** Forced termination (SIGKILL). */
  kill(): void;
  /** Resolves once the worker exited; never rejects. */
  wait(): Promise<ExitInfo>;
}

/** Collaborator that spawns and owns agent processes. */
export interface TaskRunner {
  start(spec: WorkerSpec): WorkerHandle;
}

/** Keeps the last {@link limit} characters of a stream. */
class TailBuffer {
  private content = "";

  constructor(private readonly limit: number) {}

  push(chunk: Buffer | string): void {
    this.content += typeof chunk === "string" ? chunk : chunk.toString("utf8");
    if (this.content.length > this.limit) {
      this.content = this.content.slice(this.content.length - this.limit);
    }
  }

  toString(): string {
    return this.content;
  }
}

export interface CommandTaskRunnerOptions {
  /** Agent executable. */
  readonly command: string;
  /** Argument template; every {@link PROMPT_PLACEHOLDER} is replaced by the prompt. */
  readonly args: readonly string[];
  /** Environment keys forwarded to the agent. */
  readonly allowedEnvKeys: readonly string[];
  /** Hard runtime limit; the worker receives SIGKILL once it elapses. */
  readonly timeoutMs?: number;
  readonly gateway?: ChildProcessGateway;
  readonly logger?: StructuredLogger;
  readonly now?: () => number;
  readonly outputTailChars?: number;
}

/** Expands the argument template for {@link prompt}. */
export function renderAgentArgs(template: readonly string[], prompt: string): string[] {
  return template.map((arg) => arg.split(PROMPT_PLACEHOLDER).join(prompt));
}

/**
 * {@link TaskRunner} launching the configured agent CLI through the hardened
 * child process gateway. The prompt only ever travels as an argument, never
 * through a shell.
 */
export class CommandTaskRunner implements TaskRunner {
  private readonly gateway: ChildProcessGateway;
  private readonly now: () => number;

  constructor(private readonly options: CommandTaskRunnerOptions) {
    this.gateway = options.gateway ?? createChildProcessGateway();
    this.now = options.now ?? Date.now;
  }

  start(spec: WorkerSpec): WorkerHandle {
    const startedAt = this.now();
    const logger = this.options.logger;
    const outputTail = new TailBuffer(this.options.outputTailChars ?? DEFAULT_OUTPUT_TAIL_CHARS);
    const errorTail = new TailBuffer(DEFAULT_ERROR_TAIL_CHARS);

    let spawned: SpawnedChildProcess;
    try {
      spawned = this.gateway.spawn({
        command: this.options.command,
        args: renderAgentArgs(this.options.args, spec.prompt),
        allowedEnvKeys: this.options.allowedEnvKeys,
        stdio: ["ignore", "pipe", "pipe"],
        ...(spec.workingDirectory !== undefined ? { cwd: spec.workingDirectory } : {}),
        ...(this.options.timeoutMs !== undefined ? { timeoutMs: this.options.timeoutMs } : {}),
      });
    } catch (error) {
      // Synchronous rejections (invalid command, env violation) surface as a failed exit.
      const message = error instanceof Error ? error.message : String(error);
      logger?.error("worker_spawn_rejected", { task_id: spec.taskId, message });
      return settledHandle({
        exitCode: null,
        signal: null,
        timedOut: false,
        spawnError: message,
        outputTail: "",
        errorTail: "",
        durationMs: 0,
      });
    }

    const child = spawned.child;
    child.stdout?.on("data", (chunk: Buffer) => outputTail.push(chunk));
    child.stderr?.on("data", (chunk: Buffer) => errorTail.push(chunk));

    let exited = false;
    const exit = new Promise<ExitInfo>((resolve) => {
      child.once("error", (error) => {
        if (exited) {
          return;
        }
        exited = true;
        spawned.dispose();
        logger?.error("worker_spawn_failed", { task_id: spec.taskId, message: error.message });
        resolve({
          exitCode: null,
          signal: null,
          timedOut: false,
          spawnError: error.message,
          outputTail: outputTail.toString(),
          errorTail: errorTail.toString(),
          durationMs: this.now() - startedAt,
        });
      });
      child.once("close", (code: number | null, signal: NodeJS.Signals | null) => {
        if (exited) {
          return;
        }
        exited = true;
        spawned.dispose();
        resolve({
          exitCode: code,
          signal,
          timedOut: spawned.timedOut(),
          outputTail: outputTail.toString(),
          errorTail: errorTail.toString(),
          durationMs: this.now() - startedAt,
        });
      });
    });
    logger?.info("worker_spawned", { task_id: spec.taskId, pid: child.pid ?? null });
    return new ChildWorkerHandle(child, exit, () => exited);
  }
}

class ChildWorkerHandle implements WorkerHandle {
  constructor(
    private readonly child: ChildProcess,
    private readonly exit: Promise<ExitInfo>,
    private readonly hasExited: () => boolean,
  ) {}

  get pid(): number | null {
    return this.child.pid ?? null;
  }

  isAlive(): boolean {
    return !this.hasExited() && this.child.exitCode === null && this.child.signalCode === null;
  }

  terminate(): void {
    this.send("SIGTERM");
  }

  kill(): void {
    this.send("SIGKILL");
  }

  wait(): Promise<ExitInfo> {
    return this.exit;
  }

  private send(signal: TerminationSignal): void {
    if (this.isAlive()) {
      this.child.kill(signal);
    }
  }
}

/** Handle for a worker that never started. */
function settledHandle(info: ExitInfo): WorkerHandle {
  const exit = Promise.resolve(info);
  return {
    pid: null,
    isAlive: () => false,
    terminate: () => undefined,
    kill: () => undefined,
    wait: () => exit,
  };
}
