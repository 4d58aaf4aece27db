/**
 * Hardened gateway responsible for spawning every external process the
 * supervisor relies on: agent workers, the `flock(1)` lock holder, `ps`
 * samples and `systemctl` calls. The factory enforces argument validation,
 * environment allow-listing and timeout propagation so callers interact with a
 * predictable API and tests can substitute the spawn implementation.
 */
import { spawn as nodeSpawn, type ChildProcess, type SpawnOptions } from "node:child_process";

import { runtimeClearTimeout, runtimeSetTimeout, type TimeoutHandle } from "../runtime/timers.js";

// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

/** Options accepted by {@link ChildProcessGateway.spawn}. */
export interface SpawnChildProcessOptions {
  /** Executable name or absolute path. Must not be empty. */
  readonly command: string;
  /** Ordered list of arguments forwarded as-is. */
  readonly args?: readonly string[];
  /** Optional working directory of the child process. */
  readonly cwd?: string;
  /**
   * Environment variables allowed to reach the child. Only these keys are
   * propagated from {@link inheritEnv} or {@link extraEnv}; `"*"` keeps the
   * whole inherited environment (used for operator commands run under a lock).
   */
  readonly allowedEnvKeys: readonly string[] | "*";
  /** Snapshot of environment variables to inherit (defaults to {@link process.env}). */
  readonly inheritEnv?: NodeJS.ProcessEnv;
  /** Explicit overrides (only allow-listed keys are accepted). */
  readonly extraEnv?: Record<string, string | undefined>;
  /** Spawn stdio configuration (defaults to `pipe`). */
  readonly stdio?: SpawnOptions["stdio"];
  /** Start the child as the leader of a new process group. */
  readonly detached?: boolean;
  /** Optional timeout in milliseconds after which the child receives SIGKILL. */
  readonly timeoutMs?: number;
}

/** Handle returned after spawning a child process. */
export interface SpawnedChildProcess {
  /** Underlying Node.js child process instance. */
  readonly child: ChildProcess;
  /** True once the timeout guard fired and killed the child. */
  timedOut(): boolean;
  /** Clears the timeout guard. Safe to call more than once. */
  dispose(): void;
}

/** Error raised when the requested command name is invalid. */
export class InvalidChildProcessCommandError extends Error {
  constructor(command: string) {
    super(`Child process command must be a non-empty string. Received: "${command}".`);
    this.name = "InvalidChildProcessCommandError";
  }
}

/** Error raised when an argument contains a NUL byte. */
export class InvalidChildProcessArgumentError extends TypeError {
  constructor(index: number) {
    super(`Child process argument at index ${index} contains a NUL byte.`);
    this.name = "InvalidChildProcessArgumentError";
  }
}

/** Error raised when an override attempts to inject a non-allow-listed key. */
export class ChildProcessEnvViolationError extends Error {
  constructor(key: string) {
    super(`Environment variable "${key}" is not allow-listed for the spawned child process.`);
    this.name = "ChildProcessEnvViolationError";
  }
}

/** Outcome of {@link runCommand}. */
export interface CommandResult {
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
  readonly stdout: string;
  readonly stderr: string;
  readonly timedOut: boolean;
}

/** Contract exposed by the child process gateway. */
export interface ChildProcessGateway {
  /** Spawns a child process enforcing argument sanitisation and environment allow-listing. */
  spawn(options: SpawnChildProcessOptions): SpawnedChildProcess;
}

/** Dependencies accepted by {@link createChildProcessGateway}. */
interface ChildProcessGatewayDeps {
  /** Concrete spawn implementation (defaults to Node.js {@link nodeSpawn}). */
  readonly spawnImpl?: typeof nodeSpawn;
}

/**
 * Factory returning the hardened child process gateway. Tests inject a
 * recording {@link spawnImpl} to observe the wiring without launching commands.
 */
export function createChildProcessGateway({
  spawnImpl = nodeSpawn,
}: ChildProcessGatewayDeps = {}): ChildProcessGateway {
  return {
    spawn(options: SpawnChildProcessOptions): SpawnedChildProcess {
      const command = options.command;
      if (command.trim().length === 0) {
        throw new InvalidChildProcessCommandError(command);
      }

      const args = normaliseArgs(options.args ?? []);
      const env = buildAllowListedEnv(
        options.allowedEnvKeys,
        options.inheritEnv ?? process.env,
        options.extraEnv ?? {},
      );

      const spawnOptions: SpawnOptions = {
        env,
        stdio: options.stdio ?? "pipe",
        shell: false,
        detached: options.detached ?? false,
        ...(options.cwd !== undefined ? { cwd: options.cwd } : {}),
      };

      const child = spawnImpl(command, [...args], spawnOptions);

      let timeoutHandle: TimeoutHandle | null = null;
      let timedOut = false;
      if (options.timeoutMs !== undefined) {
        timeoutHandle = runtimeSetTimeout(() => {
          timedOut = true;
          child.kill("SIGKILL");
        }, options.timeoutMs);
        timeoutHandle.unref?.();
      }

      /**
       * Node can emit both `error` and `close` for some failure modes, hence
       * the guard against double cleanup.
       */
      const settle = (): void => {
        if (timeoutHandle !== null) {
          runtimeClearTimeout(timeoutHandle);
          timeoutHandle = null;
        }
      };
      child.once("exit", settle);
      child.once("error", settle);

      return {
        child,
        timedOut: () => timedOut,
        dispose: settle,
      };
    },
  };
}

/**
 * Runs a short-lived command to completion and collects its output. Spawn
 * failures (missing binary) reject; non-zero exits resolve with the code.
 */
export function runCommand(
  gateway: ChildProcessGateway,
  options: Omit<SpawnChildProcessOptions, "stdio" | "detached">,
): Promise<CommandResult> {
  return new Promise<CommandResult>((resolve, reject) => {
    let handle: SpawnedChildProcess;
    try {
      handle = gateway.spawn({ ...options, stdio: ["ignore", "pipe", "pipe"] });
    } catch (error) {
      reject(error);
      return;
    }
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    handle.child.stdout?.on("data", (chunk: Buffer) => stdout.push(chunk));
    handle.child.stderr?.on("data", (chunk: Buffer) => stderr.push(chunk));
    handle.child.once("error", (error) => {
      handle.dispose();
      reject(error);
    });
    handle.child.once("close", (code: number | null, signal: NodeJS.Signals | null) => {
      handle.dispose();
      resolve({
        exitCode: code,
        signal,
        stdout: Buffer.concat(stdout).toString("utf8"),
        stderr: Buffer.concat(stderr).toString("utf8"),
        timedOut: handle.timedOut(),
      });
    });
  });
}

/** Rejects arguments carrying NUL bytes and returns a copy of the list. */
function normaliseArgs(args: readonly string[]): readonly string[] {
  return args.map((value, index) => {
    if (value.includes("\u0000")) {
      throw new InvalidChildProcessArgumentError(index);
    }
    return value;
  });
}

/** Produces a new environment object containing only allow-listed keys. */
function buildAllowListedEnv(
  allowedKeys: readonly string[] | "*",
  inheritEnv: NodeJS.ProcessEnv,
  extraEnv: Record<string, string | undefined>,
): NodeJS.ProcessEnv {
  if (allowedKeys === "*") {
    const env: NodeJS.ProcessEnv = { ...inheritEnv };
    for (const [key, value] of Object.entries(extraEnv)) {
      if (value === undefined) {
        delete env[key];
      } else {
        env[key] = value;
      }
    }
    return env;
  }

  const allowSet = new Set(allowedKeys);
  for (const key of Object.keys(extraEnv)) {
    if (!allowSet.has(key)) {
      throw new ChildProcessEnvViolationError(key);
    }
  }

  const env: NodeJS.ProcessEnv = {};
  for (const key of allowSet) {
    if (Object.prototype.hasOwnProperty.call(extraEnv, key)) {
      const value = extraEnv[key];
      if (value !== undefined) {
        env[key] = value;
      }
      continue;
    }
    const inheritedValue = inheritEnv[key];
    if (inheritedValue !== undefined) {
      env[key] = inheritedValue;
    }
  }
  return env;
}
