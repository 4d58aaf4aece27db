import { join } from "node:path";
import { tmpdir } from "node:os";

import { z } from "zod";

import { ConfigurationError } from "../errors.js";
import {
  readList,
  readOptionalInt,
  readOptionalNumber,
  readOptionalString,
  type EnvSource,
} from "./env.js";

/**
 * Fully resolved supervisor configuration. Every field has a default so an
 * empty environment yields a working setup.
 */
export interface SupervisorConfig {
  readonly worker: {
    readonly roleName: string;
    readonly pattern: RegExp;
    readonly user: string | null;
  };
  readonly admission: {
    readonly maxConcurrent: number;
    readonly minFreeGb: number;
    readonly backoffInitialMs: number;
    readonly backoffMaxMs: number;
  };
  readonly watchdog: {
    readonly maxWorkers: number;
    readonly sessionDirectory: string | null;
    readonly sessionPattern: string;
    readonly maxSessionFiles: number;
    readonly buildPattern: RegExp;
    readonly buildMaxSeconds: number;
    readonly buildProtectedMaxSeconds: number;
    readonly zombiePattern: RegExp;
    readonly criticalMemoryGb: number;
    readonly sweepIntervalMs: number;
    readonly actionLogPath: string;
  };
  readonly health: {
    readonly url: string;
    readonly timeoutMs: number;
    readonly recheckMs: number;
    readonly serviceName: string | null;
  };
  readonly flag: {
    readonly path: string;
    readonly staleAfterMs: number;
  };
  readonly lock: {
    readonly timeoutSec: number;
  };
  readonly agent: {
    readonly command: string;
    readonly args: readonly string[];
    readonly envKeys: readonly string[];
    readonly timeoutMs: number | null;
  };
  readonly tasks: {
    readonly directory: string;
  };
  readonly primaryPids: readonly number[];
  readonly notifyWebhookUrl: string | null;
  readonly logFile: string | null;
}

const STATE_ROOT = join(tmpdir(), "agent-supervisor");

const DEFAULT_AGENT_ENV_KEYS = ["PATH", "HOME", "LANG", "TERM", "USER"];

const positiveInt = z.number().int().positive();
const nonNegativeNumber = z.number().nonnegative();

/** Validation rules applied once the raw variables were read. */
const RawConfigSchema = z
  .object({
    workerPattern: z.string().min(1),
    workerUser: z.string().min(1).nullable(),
    maxConcurrent: positiveInt,
    minFreeGb: nonNegativeNumber,
    maxWorkers: positiveInt,
    sessionDirectory: z.string().min(1).nullable(),
    sessionPattern: z.string().min(1),
    maxSessionFiles: z.number().int().nonnegative(),
    buildPattern: z.string().min(1),
    buildMaxSeconds: positiveInt,
    buildProtectedMaxSeconds: positiveInt,
    zombiePattern: z.string().min(1),
    healthUrl: z.string().url(),
    healthTimeoutMs: positiveInt,
    healthRecheckMs: z.number().int().nonnegative(),
    serviceName: z.string().min(1).nullable(),
    criticalMemoryGb: nonNegativeNumber,
    sweepIntervalMs: z.number().int().min(1_000),
    flagFile: z.string().min(1),
    flagStaleMs: positiveInt,
    lockTimeoutSec: z.number().int().nonnegative(),
    actionLog: z.string().min(1),
    logFile: z.string().min(1).nullable(),
    taskDir: z.string().min(1),
    agentCommand: z.string().min(1),
    agentArgs: z.array(z.string()),
    agentEnvKeys: z.array(z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/)),
    agentTimeoutMs: positiveInt.nullable(),
    primaryPids: z.array(positiveInt),
    notifyWebhookUrl: z.string().url().nullable(),
    backoffInitialMs: positiveInt,
    backoffMaxMs: positiveInt,
  })
  .strict()
  .refine((raw) => raw.buildProtectedMaxSeconds >= raw.buildMaxSeconds, {
    message: "SUPERVISOR_BUILD_PROTECTED_MAX_SEC must not be lower than SUPERVISOR_BUILD_MAX_SEC",
    path: ["buildProtectedMaxSeconds"],
  })
  .refine((raw) => raw.backoffMaxMs >= raw.backoffInitialMs, {
    message: "SUPERVISOR_BACKOFF_MAX_MS must not be lower than SUPERVISOR_BACKOFF_INITIAL_MS",
    path: ["backoffMaxMs"],
  });

type RawConfig = z.infer<typeof RawConfigSchema>;

/**
 * Numeric variables are read strictly here: a set but unparsable value is a
 * configuration error rather than a silent fallback to the default.
 */
function strictInt(name: string, fallback: number, env: EnvSource, issues: string[]): number {
  const raw = readOptionalString(name, env);
  if (raw === undefined) {
    return fallback;
  }
  const value = readOptionalInt(name, undefined, env);
  if (value === undefined) {
    issues.push(`${name} must be an integer (received ${JSON.stringify(raw)})`);
    return fallback;
  }
  return value;
}

function strictNumber(name: string, fallback: number, env: EnvSource, issues: string[]): number {
  const raw = readOptionalString(name, env);
  if (raw === undefined) {
    return fallback;
  }
  const value = readOptionalNumber(name, undefined, env);
  if (value === undefined) {
    issues.push(`${name} must be a number (received ${JSON.stringify(raw)})`);
    return fallback;
  }
  return value;
}

function readJsonStringArray(name: string, fallback: readonly string[], env: EnvSource, issues: string[]): string[] {
  const raw = readOptionalString(name, env);
  if (raw === undefined) {
    return [...fallback];
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    issues.push(`${name} must be a JSON array of strings`);
    return [...fallback];
  }
  const result = z.array(z.string()).safeParse(parsed);
  if (!result.success) {
    issues.push(`${name} must be a JSON array of strings`);
    return [...fallback];
  }
  return result.data;
}

function compilePattern(name: string, source: string, issues: string[]): RegExp {
  try {
    return new RegExp(source);
  } catch (error) {
    issues.push(`${name} is not a valid regular expression: ${error instanceof Error ? error.message : String(error)}`);
    return /$^/;
  }
}

const VARIABLE_BY_FIELD: ReadonlyMap<string, string> = new Map(
  Object.entries({
    workerPattern: "SUPERVISOR_WORKER_PATTERN",
    workerUser: "SUPERVISOR_WORKER_USER",
    maxConcurrent: "SUPERVISOR_MAX_CONCURRENT",
    minFreeGb: "SUPERVISOR_MIN_FREE_GB",
    maxWorkers: "SUPERVISOR_MAX_WORKERS",
    sessionDirectory: "SUPERVISOR_SESSION_DIR",
    sessionPattern: "SUPERVISOR_SESSION_PATTERN",
    maxSessionFiles: "SUPERVISOR_MAX_SESSION_FILES",
    buildPattern: "SUPERVISOR_BUILD_PATTERN",
    buildMaxSeconds: "SUPERVISOR_BUILD_MAX_SEC",
    buildProtectedMaxSeconds: "SUPERVISOR_BUILD_PROTECTED_MAX_SEC",
    zombiePattern: "SUPERVISOR_ZOMBIE_PATTERN",
    healthUrl: "SUPERVISOR_HEALTH_URL",
    healthTimeoutMs: "SUPERVISOR_HEALTH_TIMEOUT_MS",
    healthRecheckMs: "SUPERVISOR_HEALTH_RECHECK_MS",
    serviceName: "SUPERVISOR_SERVICE_NAME",
    criticalMemoryGb: "SUPERVISOR_CRITICAL_MEMORY_GB",
    sweepIntervalMs: "SUPERVISOR_SWEEP_INTERVAL_MS",
    flagFile: "SUPERVISOR_FLAG_FILE",
    flagStaleMs: "SUPERVISOR_FLAG_STALE_MS",
    lockTimeoutSec: "SUPERVISOR_LOCK_TIMEOUT_SEC",
    actionLog: "SUPERVISOR_ACTION_LOG",
    logFile: "SUPERVISOR_LOG_FILE",
    taskDir: "SUPERVISOR_TASK_DIR",
    agentCommand: "SUPERVISOR_AGENT_COMMAND",
    agentArgs: "SUPERVISOR_AGENT_ARGS",
    agentEnvKeys: "SUPERVISOR_AGENT_ENV_KEYS",
    agentTimeoutMs: "SUPERVISOR_AGENT_TIMEOUT_MS",
    primaryPids: "SUPERVISOR_PRIMARY_PIDS",
    notifyWebhookUrl: "SUPERVISOR_NOTIFY_WEBHOOK_URL",
    backoffInitialMs: "SUPERVISOR_BACKOFF_INITIAL_MS",
    backoffMaxMs: "SUPERVISOR_BACKOFF_MAX_MS",
  } satisfies Record<keyof RawConfig, string>),
);

function readRawConfig(env: EnvSource, issues: string[]): RawConfig {
  const primaryPids: number[] = [];
  for (const entry of readList("SUPERVISOR_PRIMARY_PIDS", [], env)) {
    const pid = Number(entry);
    if (Number.isSafeInteger(pid) && pid > 0) {
      primaryPids.push(pid);
    } else {
      issues.push(`SUPERVISOR_PRIMARY_PIDS contains an invalid pid: ${JSON.stringify(entry)}`);
    }
  }
  const agentTimeoutMs = strictInt("SUPERVISOR_AGENT_TIMEOUT_MS", 0, env, issues);

  return {
    workerPattern: readOptionalString("SUPERVISOR_WORKER_PATTERN", env) ?? "^claude",
    workerUser: readOptionalString("SUPERVISOR_WORKER_USER", env) ?? null,
    maxConcurrent: strictInt("SUPERVISOR_MAX_CONCURRENT", 2, env, issues),
    minFreeGb: strictNumber("SUPERVISOR_MIN_FREE_GB", 4, env, issues),
    maxWorkers: strictInt("SUPERVISOR_MAX_WORKERS", 6, env, issues),
    sessionDirectory: readOptionalString("SUPERVISOR_SESSION_DIR", env) ?? null,
    sessionPattern: readOptionalString("SUPERVISOR_SESSION_PATTERN", env) ?? "*.jsonl",
    maxSessionFiles: strictInt("SUPERVISOR_MAX_SESSION_FILES", 20, env, issues),
    buildPattern: readOptionalString("SUPERVISOR_BUILD_PATTERN", env) ?? "npx tsc",
    buildMaxSeconds: strictInt("SUPERVISOR_BUILD_MAX_SEC", 300, env, issues),
    buildProtectedMaxSeconds: strictInt("SUPERVISOR_BUILD_PROTECTED_MAX_SEC", 600, env, issues),
    zombiePattern: readOptionalString("SUPERVISOR_ZOMBIE_PATTERN", env) ?? "\\bnode\\b",
    healthUrl: readOptionalString("SUPERVISOR_HEALTH_URL", env) ?? "http://localhost:3100/health",
    healthTimeoutMs: strictInt("SUPERVISOR_HEALTH_TIMEOUT_MS", 5_000, env, issues),
    healthRecheckMs: strictInt("SUPERVISOR_HEALTH_RECHECK_MS", 3_000, env, issues),
    serviceName: readOptionalString("SUPERVISOR_SERVICE_NAME", env) ?? null,
    criticalMemoryGb: strictNumber("SUPERVISOR_CRITICAL_MEMORY_GB", 2, env, issues),
    sweepIntervalMs: strictInt("SUPERVISOR_SWEEP_INTERVAL_MS", 60_000, env, issues),
    flagFile: readOptionalString("SUPERVISOR_FLAG_FILE", env) ?? join(STATE_ROOT, "protected-mode.flag"),
    flagStaleMs: strictInt("SUPERVISOR_FLAG_STALE_MS", 30 * 60_000, env, issues),
    lockTimeoutSec: strictInt("SUPERVISOR_LOCK_TIMEOUT_SEC", 120, env, issues),
    actionLog: readOptionalString("SUPERVISOR_ACTION_LOG", env) ?? join(STATE_ROOT, "watchdog-actions.jsonl"),
    logFile: readOptionalString("SUPERVISOR_LOG_FILE", env) ?? null,
    taskDir: readOptionalString("SUPERVISOR_TASK_DIR", env) ?? join(STATE_ROOT, "tasks"),
    agentCommand: readOptionalString("SUPERVISOR_AGENT_COMMAND", env) ?? "claude",
    agentArgs: readJsonStringArray("SUPERVISOR_AGENT_ARGS", ["--print", "{prompt}"], env, issues),
    agentEnvKeys: readList("SUPERVISOR_AGENT_ENV_KEYS", DEFAULT_AGENT_ENV_KEYS, env),
    agentTimeoutMs: agentTimeoutMs > 0 ? agentTimeoutMs : null,
    primaryPids,
    notifyWebhookUrl: readOptionalString("SUPERVISOR_NOTIFY_WEBHOOK_URL", env) ?? null,
    backoffInitialMs: strictInt("SUPERVISOR_BACKOFF_INITIAL_MS", 1_000, env, issues),
    backoffMaxMs: strictInt("SUPERVISOR_BACKOFF_MAX_MS", 30_000, env, issues),
  };
}

/**
 * Builds the supervisor configuration from `SUPERVISOR_*` variables. Every
 * problem found is collected and reported at once through a
 * {@link ConfigurationError}.
 */
export function loadSupervisorConfig(env: EnvSource = process.env): SupervisorConfig {
  const issues: string[] = [];
  const raw = readRawConfig(env, issues);
  const parsed = RawConfigSchema.safeParse(raw);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      const variable = VARIABLE_BY_FIELD.get(String(issue.path[0])) ?? issue.path.join(".");
      issues.push(`${variable}: ${issue.message}`);
    }
  }
  const workerPattern = compilePattern("SUPERVISOR_WORKER_PATTERN", raw.workerPattern, issues);
  const buildPattern = compilePattern("SUPERVISOR_BUILD_PATTERN", escapeLiteral(raw.buildPattern), issues);
  const zombiePattern = compilePattern("SUPERVISOR_ZOMBIE_PATTERN", raw.zombiePattern, issues);
  if (issues.length > 0) {
    throw new ConfigurationError(`invalid supervisor configuration (${issues.length} issue(s))`, issues);
  }

  return {
    worker: { roleName: "agent", pattern: workerPattern, user: raw.workerUser },
    admission: {
      maxConcurrent: raw.maxConcurrent,
      minFreeGb: raw.minFreeGb,
      backoffInitialMs: raw.backoffInitialMs,
      backoffMaxMs: raw.backoffMaxMs,
    },
    watchdog: {
      maxWorkers: raw.maxWorkers,
      sessionDirectory: raw.sessionDirectory,
      sessionPattern: raw.sessionPattern,
      maxSessionFiles: raw.maxSessionFiles,
      buildPattern,
      buildMaxSeconds: raw.buildMaxSeconds,
      buildProtectedMaxSeconds: raw.buildProtectedMaxSeconds,
      zombiePattern,
      criticalMemoryGb: raw.criticalMemoryGb,
      sweepIntervalMs: raw.sweepIntervalMs,
      actionLogPath: raw.actionLog,
    },
    health: {
      url: raw.healthUrl,
      timeoutMs: raw.healthTimeoutMs,
      recheckMs: raw.healthRecheckMs,
      serviceName: raw.serviceName,
    },
    flag: { path: raw.flagFile, staleAfterMs: raw.flagStaleMs },
    lock: { timeoutSec: raw.lockTimeoutSec },
    agent: {
      command: raw.agentCommand,
      args: raw.agentArgs,
      envKeys: raw.agentEnvKeys,
      timeoutMs: raw.agentTimeoutMs,
    },
    tasks: { directory: raw.taskDir },
    primaryPids: raw.primaryPids,
    notifyWebhookUrl: raw.notifyWebhookUrl,
    logFile: raw.logFile,
  };
}

/** The build pattern is a plain substring of the command line, not a regular expression. */
function escapeLiteral(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
