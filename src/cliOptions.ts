/**
 * Argument parsing for the `agent-supervisor` command line. Flags accept both
 * `--flag value` and `--flag=value`; everything after `--` belongs to the
 * wrapped command and is never interpreted.
 */

export type ProtectedAction = "activate" | "clear" | "status";

export type CliCommand =
  | { readonly command: "serve"; readonly watchdog: boolean; readonly logFile: string | null }
  | { readonly command: "watchdog"; readonly once: boolean; readonly intervalMs: number | null }
  | {
      readonly command: "lock";
      readonly repository: string;
      readonly timeoutSec: number | null;
      readonly argv: readonly string[];
    }
  | { readonly command: "protected"; readonly action: ProtectedAction }
  | { readonly command: "protected-run"; readonly argv: readonly string[] }
  | { readonly command: "help" };

/** Invalid invocation; the CLI prints the message and the usage, then exits 2. */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export const USAGE = `Usage: agent-supervisor <command> [options]

Commands:
  serve [--no-watchdog] [--log-file <path>]    Run the supervisor and expose its MCP tools over stdio
  watchdog [--once] [--interval-ms <n>]        Run watchdog sweeps (once, or periodically)
  lock <repo> [--timeout <sec>] -- <cmd...>    Run a command holding the repository lock
  protected <activate|clear|status>            Manage the protected-mode flag
  protected run -- <cmd...>                    Run a command in protected mode
`;

const FLAGS_WITH_VALUE = new Set(["--log-file", "--interval-ms", "--timeout"]);

interface SplitArguments {
  readonly positionals: string[];
  readonly flags: Map<string, string | true>;
  /** Arguments after `--`, `null` when no separator was given. */
  readonly passthrough: string[] | null;
}

function splitArguments(argv: readonly string[]): SplitArguments {
  const positionals: string[] = [];
  const flags = new Map<string, string | true>();
  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === undefined) {
      continue;
    }
    if (arg === "--") {
      return { positionals, flags, passthrough: argv.slice(index + 1) };
    }
    if (!arg.startsWith("--")) {
      positionals.push(arg);
      continue;
    }
    const separator = arg.indexOf("=");
    const flag = separator === -1 ? arg : arg.slice(0, separator);
    let value: string | undefined = separator === -1 ? undefined : arg.slice(separator + 1);
    if (FLAGS_WITH_VALUE.has(flag) && (value === undefined || value === "")) {
      const next = argv[index + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new CliUsageError(`${flag} requires a value`);
      }
      value = next;
      index += 1;
    }
    flags.set(flag, value ?? true);
  }
  return { positionals, flags, passthrough: null };
}

function parsePositiveInteger(raw: string | true | undefined, flag: string, allowZero = false): number {
  const value = typeof raw === "string" && /^\d+$/.test(raw.trim()) ? Number.parseInt(raw.trim(), 10) : Number.NaN;
  if (!Number.isSafeInteger(value) || value < (allowZero ? 0 : 1)) {
    throw new CliUsageError(`${flag} expects a ${allowZero ? "non-negative" : "positive"} integer`);
  }
  return value;
}

function rejectUnknownFlags(flags: Map<string, string | true>, allowed: readonly string[], command: string): void {
  for (const flag of flags.keys()) {
    if (!allowed.includes(flag)) {
      throw new CliUsageError(`unknown option ${flag} for ${command}`);
    }
  }
}

function requireCommand(passthrough: string[] | null, command: string): string[] {
  if (passthrough === null || passthrough.length === 0) {
    throw new CliUsageError(`${command} requires a command after --`);
  }
  return passthrough;
}

/** Parses `process.argv.slice(2)`. */
export function parseCliArguments(argv: readonly string[]): CliCommand {
  const { positionals, flags, passthrough } = splitArguments(argv);
  const [command, ...rest] = positionals;

  if (command === undefined || command === "help" || flags.has("--help")) {
    return { command: "help" };
  }

  switch (command) {
    case "serve": {
      rejectUnknownFlags(flags, ["--no-watchdog", "--log-file"], command);
      const logFile = flags.get("--log-file");
      return {
        command: "serve",
        watchdog: !flags.has("--no-watchdog"),
        logFile: typeof logFile === "string" ? logFile : null,
      };
    }
    case "watchdog": {
      rejectUnknownFlags(flags, ["--once", "--interval-ms"], command);
      return {
        command: "watchdog",
        once: flags.has("--once"),
        intervalMs: flags.has("--interval-ms") ? parsePositiveInteger(flags.get("--interval-ms"), "--interval-ms") : null,
      };
    }
    case "lock": {
      rejectUnknownFlags(flags, ["--timeout"], command);
      const [repository] = rest;
      if (repository === undefined) {
        throw new CliUsageError("lock requires a repository path");
      }
      return {
        command: "lock",
        repository,
        timeoutSec: flags.has("--timeout") ? parsePositiveInteger(flags.get("--timeout"), "--timeout", true) : null,
        argv: requireCommand(passthrough, "lock"),
      };
    }
    case "protected": {
      rejectUnknownFlags(flags, [], command);
      const [action] = rest;
      if (action === "run") {
        return { command: "protected-run", argv: requireCommand(passthrough, "protected run") };
      }
      if (action === "activate" || action === "clear" || action === "status") {
        return { command: "protected", action };
      }
      throw new CliUsageError("protected expects one of: activate, clear, status, run");
    }
    default:
      throw new CliUsageError(`unknown command ${command}`);
  }
}
