import { readFile, stat } from "node:fs/promises";
import { hostname } from "node:os";
import { join, resolve } from "node:path";
import { Readable } from "node:stream";

import { InvalidResourceError } from "../errors.js";
import {
  createChildProcessGateway,
  type ChildProcessGateway,
  type SpawnedChildProcess,
} from "../gateways/childProcess.js";
import type { StructuredLogger } from "../logger.js";
import { isMissingEntryError } from "../nodePrimitives.js";

// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

/** Exit code reported when the lock could not be acquired in time (GNU `timeout` convention). */
export const LOCK_TIMEOUT_EXIT_CODE = 124;

export const DEFAULT_LOCK_TIMEOUT_SEC = 120;

/** Lock file name inside the repository control directory. */
export const LOCK_FILE_NAME = ".repo-operations.lock";

const CONTROL_DIRECTORY = ".git";

/**
 * Shell prologue executed by `flock(1)` once the lock is held. It records the
 * holder metadata, signals acquisition on descriptor 3, closes that descriptor
 * so the wrapped command never inherits it, then replaces itself with the
 * command (so `$$` is the command's pid).
 */
const HOLDER_SCRIPT = [
  'printf \'%s:%s:%s:%s\\n\' "$$" "$SUPERVISOR_LOCK_HOST" "$(date -Iseconds)" "$SUPERVISOR_LOCK_COMMAND" > "$SUPERVISOR_LOCK_FILE"',
  "printf acquired >&3",
  "exec 3>&-",
  'exec "$@"',
].join("; ");

export type LockOutcome =
  | {
      readonly status: "completed";
      /** Exit code of the wrapped command, `null` when it died from a signal. */
      readonly exitCode: number | null;
      readonly signal: NodeJS.Signals | null;
      /** Captured output, only when `stdio` is `"pipe"`. */
      readonly stdout?: string;
      readonly stderr?: string;
    }
  | { readonly status: "timeout"; readonly exitCode: typeof LOCK_TIMEOUT_EXIT_CODE };

export interface WithLockOptions {
  /** Seconds to wait for the lock before giving up. */
  readonly timeoutSec?: number;
  /** `inherit` forwards the command's stdio to ours (CLI); `pipe` captures it. */
  readonly stdio?: "inherit" | "pipe";
  /**
   * Aborting terminates the whole holder process group, with the signal
   * given as abort reason (`SIGINT`, `SIGHUP`) or SIGTERM otherwise.
   */
  readonly signal?: AbortSignal;
  /** Working directory of the wrapped command (defaults to the repository root). */
  readonly cwd?: string;
  readonly logger?: StructuredLogger;
  readonly gateway?: ChildProcessGateway;
  /** Location of the `flock(1)` binary. */
  readonly flockBinary?: string;
  readonly hostname?: string;
  /** Sends a signal to a process group; overridable in tests. */
  readonly killGroup?: (pgid: number, signal: NodeJS.Signals) => void;
}

/**
 * Resolves {@link resourceId} (a repository root) to its lock file. Throws
 * {@link InvalidResourceError} when the control directory is missing.
 */
export async function resolveLockFile(resourceId: string): Promise<string> {
  const root = resolve(resourceId);
  const controlDirectory = join(root, CONTROL_DIRECTORY);
  try {
    const entry = await stat(controlDirectory);
    if (!entry.isDirectory()) {
      throw new InvalidResourceError(resourceId, controlDirectory);
    }
  } catch (error) {
    if (isMissingEntryError(error)) {
      throw new InvalidResourceError(resourceId, controlDirectory);
    }
    throw error;
  }
  return join(controlDirectory, LOCK_FILE_NAME);
}

/**
 * Returns the diagnostic line last written by a lock holder, or `null` when
 * the repository was never locked. The content is informational only.
 */
export async function readLockMetadata(resourceId: string): Promise<string | null> {
  const lockFile = await resolveLockFile(resourceId);
  try {
    const content = (await readFile(lockFile, "utf8")).trim();
    return content.length > 0 ? content : null;
  } catch (error) {
    if (isMissingEntryError(error)) {
      return null;
    }
    throw error;
  }
}

function abortKillSignal(signal: AbortSignal | undefined): NodeJS.Signals {
  const reason: unknown = signal?.reason;
  if (reason === "SIGINT" || reason === "SIGHUP") {
    return reason;
  }
  return "SIGTERM";
}

function defaultKillGroup(pgid: number, signal: NodeJS.Signals): void {
  process.kill(-pgid, signal);
}

/**
 * Runs {@link command} while holding the exclusive kernel lock of
 * {@link resourceId}.
 *
 * The lock is taken by `flock(1)` in a child process group, so the calling
 * event loop never blocks and release needs no cleanup code: the lock
 * descriptor belongs to that process tree and closes when it exits, crashes
 * or gets killed. Callers on the same resource serialize across processes and
 * across containers sharing the mount; distinct resources never contend.
 */
export async function withLock(
  resourceId: string,
  command: readonly string[],
  options: WithLockOptions = {},
): Promise<LockOutcome> {
  const [program] = command;
  if (program === undefined || program.trim().length === 0) {
    throw new TypeError("withLock requires a non-empty command");
  }
  const lockFile = await resolveLockFile(resourceId);
  const timeoutSec = Math.max(0, options.timeoutSec ?? DEFAULT_LOCK_TIMEOUT_SEC);
  const stdio = options.stdio ?? "pipe";
  const gateway = options.gateway ?? createChildProcessGateway();
  const killGroup = options.killGroup ?? defaultKillGroup;
  const logger = options.logger;
  const commandLine = command.join(" ");

  logger?.debug("repository_lock_waiting", { resource: resourceId, timeout_sec: timeoutSec });

  const handle: SpawnedChildProcess = gateway.spawn({
    command: options.flockBinary ?? "flock",
    args: [
      "--wait",
      String(timeoutSec),
      "--conflict-exit-code",
      String(LOCK_TIMEOUT_EXIT_CODE),
      lockFile,
      "sh",
      "-c",
      HOLDER_SCRIPT,
      "sh",
      ...command,
    ],
    cwd: options.cwd ?? resolve(resourceId),
    allowedEnvKeys: "*",
    extraEnv: {
      SUPERVISOR_LOCK_FILE: lockFile,
      SUPERVISOR_LOCK_HOST: options.hostname ?? hostname(),
      SUPERVISOR_LOCK_COMMAND: commandLine,
    },
    stdio: [stdio, stdio, stdio, "pipe"],
    detached: true,
  });
  const child = handle.child;

  return new Promise<LockOutcome>((resolvePromise, reject) => {
    let acquired = false;
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    const handshake = child.stdio[3];
    if (handshake instanceof Readable) {
      handshake.on("data", () => {
        if (!acquired) {
          acquired = true;
          logger?.info("repository_lock_acquired", { resource: resourceId, command: commandLine });
        }
      });
    }
    if (stdio === "pipe") {
      child.stdout?.on("data", (chunk: Buffer) => stdout.push(chunk));
      child.stderr?.on("data", (chunk: Buffer) => stderr.push(chunk));
    }

    const onAbort = (): void => {
      if (child.pid === undefined) {
        return;
      }
      const killSignal = abortKillSignal(options.signal);
      logger?.warn("repository_lock_aborted", { resource: resourceId, pid: child.pid, signal: killSignal });
      try {
        killGroup(child.pid, killSignal);
      } catch (error) {
        // ESRCH: the group already exited between the abort and the kill.
        logger?.debug("repository_lock_abort_kill_failed", { resource: resourceId, error });
      }
    };
    if (options.signal?.aborted) {
      onAbort();
    } else {
      options.signal?.addEventListener("abort", onAbort, { once: true });
    }

    child.once("error", (error) => {
      options.signal?.removeEventListener("abort", onAbort);
      handle.dispose();
      reject(error);
    });
    child.once("close", (code: number | null, signal: NodeJS.Signals | null) => {
      options.signal?.removeEventListener("abort", onAbort);
      handle.dispose();
      if (!acquired && code === LOCK_TIMEOUT_EXIT_CODE) {
        logger?.warn("repository_lock_timeout", { resource: resourceId, timeout_sec: timeoutSec });
        resolvePromise({ status: "timeout", exitCode: LOCK_TIMEOUT_EXIT_CODE });
        return;
      }
      if (!acquired) {
        logger?.error("repository_lock_not_acquired", { resource: resourceId, exit_code: code, signal });
      } else {
        logger?.info("repository_lock_released", { resource: resourceId, exit_code: code, signal });
      }
      resolvePromise({
        status: "completed",
        exitCode: code,
        signal,
        ...(stdio === "pipe"
          ? {
              stdout: Buffer.concat(stdout).toString("utf8"),
              stderr: Buffer.concat(stderr).toString("utf8"),
            }
          : {}),
      });
    });
  });
}
