#!/usr/bin/env node
import { spawn } from "node:child_process";
import { realpathSync } from "node:fs";
import { constants } from "node:os";
import { pathToFileURL } from "node:url";
import process from "node:process";

import { CliUsageError, parseCliArguments, USAGE, type CliCommand } from "./cliOptions.js";
import { loadSupervisorConfig, type SupervisorConfig } from "./config/supervisorConfig.js";
import { ProtectedModeFlag } from "./coordination/protectedModeFlag.js";
import { ConfigurationError, SupervisorError } from "./errors.js";
import { withLock, type LockOutcome } from "./locks/repositoryLock.js";
import { StructuredLogger } from "./logger.js";
import { describeError } from "./nodePrimitives.js";
import { serve } from "./server.js";
import { createSupervisorRuntime } from "./supervisor/runtime.js";

/** Exit status of invalid invocations (usage errors, invalid resources). */
export const EXIT_USAGE = 2;

/** Source of the termination signals the CLI reacts to. */
export interface SignalSource {
  once(event: NodeJS.Signals, listener: () => void): unknown;
  removeListener(event: NodeJS.Signals, listener: () => void): unknown;
}

export interface CliIo {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
  readonly env: NodeJS.ProcessEnv;
  readonly signals: SignalSource;
}

const DEFAULT_IO: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  env: process.env,
  signals: process,
};

const TERMINATION_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM", "SIGHUP"];

/**
 * Aborts the returned controller with the received signal name as reason on
 * the first termination signal. Call `release` once the work settled.
 */
function abortOnSignals(signals: SignalSource): { controller: AbortController; release: () => void } {
  const controller = new AbortController();
  const listeners = TERMINATION_SIGNALS.map((name) => {
    const listener = (): void => {
      controller.abort(name);
    };
    signals.once(name, listener);
    return { name, listener };
  });
  return {
    controller,
    release: () => {
      for (const { name, listener } of listeners) {
        signals.removeListener(name, listener);
      }
    },
  };
}

/** Runs {@link argv} as a child with inherited stdio and resolves its exit code. */
function runInherited(argv: readonly string[]): Promise<number> {
  const [command, ...args] = argv;
  if (command === undefined) {
    return Promise.resolve(EXIT_USAGE);
  }
  return new Promise<number>((resolve, reject) => {
    const child = spawn(command, args, { stdio: "inherit" });
    child.once("error", reject);
    child.once("close", (code, signal) => {
      resolve(code ?? (signal !== null ? 128 + signalNumber(signal) : 1));
    });
  });
}

/** Shell convention: a command killed by a signal exits with 128 + its number. */
function signalNumber(signal: NodeJS.Signals): number {
  return constants.signals[signal];
}

/**
 * Executes one CLI invocation and resolves the process exit code. Long-running
 * commands (`serve`, periodic `watchdog`) resolve once they are stopped.
 */
export async function runCli(argv: readonly string[], io: CliIo = DEFAULT_IO): Promise<number> {
  let parsed: CliCommand;
  let config: SupervisorConfig;
  try {
    parsed = parseCliArguments(argv);
    if (parsed.command === "help") {
      io.stdout(USAGE);
      return 0;
    }
    config = loadSupervisorConfig(io.env);
  } catch (error) {
    if (error instanceof CliUsageError) {
      io.stderr(`agent-supervisor: ${error.message}\n\n${USAGE}`);
      return EXIT_USAGE;
    }
    if (error instanceof ConfigurationError) {
      io.stderr(`agent-supervisor: ${error.message}\n${error.issues.map((issue) => `  - ${issue}\n`).join("")}`);
      return EXIT_USAGE;
    }
    throw error;
  }

  const logFile = parsed.command === "serve" && parsed.logFile !== null ? parsed.logFile : config.logFile;
  const logger = new StructuredLogger({ logFile });

  try {
    return await execute(parsed, config, logger, io);
  } catch (error) {
    if (error instanceof SupervisorError) {
      logger.error("cli_command_failed", { code: error.code, message: error.message });
      io.stderr(`agent-supervisor: ${error.message} (${error.code})\nhint: ${error.hint}\n`);
      return EXIT_USAGE;
    }
    throw error;
  } finally {
    await logger.flush();
  }
}

async function execute(
  parsed: CliCommand,
  config: SupervisorConfig,
  logger: StructuredLogger,
  io: CliIo,
): Promise<number> {
  switch (parsed.command) {
    case "help":
      io.stdout(USAGE);
      return 0;
    case "serve": {
      const runtime = createSupervisorRuntime(config, logger);
      await serve(runtime, { watchdog: parsed.watchdog });
      return 0;
    }
    case "watchdog": {
      const runtime = createSupervisorRuntime(config, logger);
      if (parsed.once) {
        const report = await runtime.watchdog.sweep();
        io.stdout(`${JSON.stringify(report, null, 2)}\n`);
        return report.checks.some((check) => check.status === "error") ? 1 : 0;
      }
      runtime.watchdog.start(parsed.intervalMs ?? config.watchdog.sweepIntervalMs);
      const { controller, release } = abortOnSignals(io.signals);
      await new Promise<void>((resolve) => {
        controller.signal.addEventListener("abort", () => resolve(), { once: true });
      });
      release();
      await runtime.watchdog.stop();
      return 0;
    }
    case "lock": {
      // The holder runs in its own process group; terminal signals reach it through the abort.
      const { controller, release } = abortOnSignals(io.signals);
      let outcome: LockOutcome;
      try {
        outcome = await withLock(parsed.repository, parsed.argv, {
          timeoutSec: parsed.timeoutSec ?? config.lock.timeoutSec,
          stdio: "inherit",
          signal: controller.signal,
          logger,
        });
      } finally {
        release();
      }
      if (outcome.status === "timeout") {
        io.stderr(`agent-supervisor: timed out waiting for the lock on ${parsed.repository}\n`);
        return outcome.exitCode;
      }
      if (outcome.exitCode !== null) {
        return outcome.exitCode;
      }
      return outcome.signal !== null ? 128 + signalNumber(outcome.signal) : 1;
    }
    case "protected": {
      const flag = new ProtectedModeFlag({ path: config.flag.path, staleAfterMs: config.flag.staleAfterMs, logger });
      if (parsed.action === "activate") {
        await flag.activate();
      } else if (parsed.action === "clear") {
        await flag.clear();
      }
      const state = await flag.inspect();
      io.stdout(`${JSON.stringify({ path: flag.path, ...state })}\n`);
      return 0;
    }
    case "protected-run": {
      const flag = new ProtectedModeFlag({ path: config.flag.path, staleAfterMs: config.flag.staleAfterMs, logger });
      const argv = parsed.argv;
      return flag.runProtected(() => runInherited(argv));
    }
  }
}

// npm links the bin through a symlink, hence the realpath.
const isMain = process.argv[1] ? pathToFileURL(realpathSync(process.argv[1])).href === import.meta.url : false;

if (isMain) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`agent-supervisor: ${describeError(error)}\n`);
      process.exitCode = 1;
    },
  );
}
