import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";
import { isMissingEntryError } from "./nodePrimitives.js";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

/** Default placeholder inserted when a secret value is redacted. */
const REDACTION_TOKEN = "[REDACTED]";

/** Accepted directives enabling custom secret redaction. */
const REDACTION_ENABLE_TOKENS = new Set(["on", "true", "yes", "1", "enable", "enabled"]);

/** Directives explicitly disabling secret redaction despite configured tokens. */
const REDACTION_DISABLE_TOKENS = new Set(["off", "false", "no", "0", "disable", "disabled"]);

/** Keys whose values are redacted when `SUPERVISOR_LOG_REDACT=on`. */
const SENSITIVE_KEYS = new Set([
  "authorization",
  "x-api-key",
  "api_key",
  "token",
  "access_token",
  "refresh_token",
  "webhook_url",
  "cookie",
]);

/**
 * Parses the `SUPERVISOR_LOG_REDACT` environment variable. Operators can both
 * toggle redaction and list extra substrings that must be scrubbed from
 * persisted entries, e.g. `"on,sk-"` or `"off"`. Providing patterns without an
 * explicit toggle enables redaction.
 */
export function parseRedactionDirectives(raw: string | undefined): {
  enabled: boolean;
  tokens: Array<string>;
} {
  if (!raw) {
    return { enabled: false, tokens: [] };
  }

  const directives = raw
    .split(",")
    .map((value) => value.trim())
    .filter((value) => value.length > 0);

  let enabled: boolean | undefined;
  const tokens: Array<string> = [];

  for (const directive of directives) {
    const normalised = directive.toLowerCase();
    if (REDACTION_DISABLE_TOKENS.has(normalised)) {
      enabled = false;
      continue;
    }
    if (REDACTION_ENABLE_TOKENS.has(normalised)) {
      enabled = true;
      continue;
    }
    tokens.push(directive);
  }

  return { enabled: enabled ?? tokens.length > 0, tokens: Array.from(new Set(tokens)) };
}

/** Default maximum size (in bytes) of the mirrored log file before rotation. */
const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024; // 5 MiB

/** Default number of log files retained during rotation (active included). */
const DEFAULT_MAX_FILE_COUNT = 5;

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
  /** Task identifier lifted from the payload so operators can grep per task. */
  task_id?: string;
  /** Watchdog check that produced the entry, when any. */
  check?: string;
}

export interface LoggerOptions {
  readonly logFile?: string | null;
  /** Maximum size in bytes before the active log file is rotated. */
  readonly maxFileSizeBytes?: number;
  /** Number of historical log files to retain (including the active one). */
  readonly maxFileCount?: number;
  /** Substrings or expressions scrubbed from string values before emission. */
  readonly redactSecrets?: Array<string | RegExp>;
  /**
   * Explicit toggle for structured payload redaction. When omitted the logger
   * follows {@link parseRedactionDirectives} applied to the environment.
   */
  readonly redactionEnabled?: boolean;
  /** Optional listener invoked every time an entry is emitted. */
  readonly onEntry?: (entry: LogEntry) => void;
  /** Receives each serialised line; defaults to stderr since stdout carries the MCP transport. */
  readonly sink?: (line: string) => void;
}

/**
 * Structured logger that emits JSON lines on stderr and optionally mirrors them
 * to a file. File writes are queued sequentially to guarantee ordering.
 */
export class StructuredLogger {
  private readonly logFile: string | undefined;
  private readonly maxFileSizeBytes: number;
  private readonly maxFileCount: number;
  private readonly redactSecrets: Array<string | RegExp>;
  private readonly entryListener: ((entry: LogEntry) => void) | undefined;
  private readonly redactionEnabled: boolean;
  private readonly sink: (line: string) => void;
  private writeQueue: Promise<void> = Promise.resolve();
  /** Avoids a `mkdir` per entry once the destination directory exists. */
  private logDirectoryReady = false;

  constructor(options: LoggerOptions = {}) {
    this.logFile = options.logFile ?? undefined;
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE;
    this.maxFileCount = Math.max(1, options.maxFileCount ?? DEFAULT_MAX_FILE_COUNT);
    const directives = parseRedactionDirectives(process.env.SUPERVISOR_LOG_REDACT);
    this.redactSecrets = [...new Set<string | RegExp>([...directives.tokens, ...(options.redactSecrets ?? [])])];
    this.entryListener = options.onEntry;
    this.redactionEnabled = options.redactionEnabled ?? directives.enabled;
    this.sink =
      options.sink ??
      ((line) => {
        process.stderr.write(line);
      });
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  /**
   * Waits for all pending log writes to be flushed. Tests rely on this helper
   * to assert the content of mirrored log files deterministically.
   */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    const safePayload = payload !== undefined ? this.redactStructuredValue(payload) : undefined;
    const correlation = extractCorrelation(safePayload);
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...correlation,
      ...(safePayload !== undefined ? { payload: safePayload } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    this.sink(line);
    this.entryListener?.(structuredClone(entry));

    const destination = this.logFile;
    if (!destination) {
      return;
    }
    this.writeQueue = this.writeQueue
      .then(async () => {
        try {
          await this.ensureLogDestination(destination);
          await this.rotateIfNeeded(destination, Buffer.byteLength(line, "utf8"));
          await appendFile(destination, line, "utf8");
        } catch (err) {
          reportInternalFailure("log_file_write_failed", err);
          // Allow future attempts to retry directory creation after a failure.
          this.logDirectoryReady = false;
        }
      })
      .catch(() => {
        // Errors already reported; reset queue to avoid unhandled rejections.
        this.writeQueue = Promise.resolve();
      });
  }

  private async ensureLogDestination(destination: string): Promise<void> {
    if (this.logDirectoryReady) {
      return;
    }
    await mkdir(dirname(destination), { recursive: true });
    this.logDirectoryReady = true;
  }

  /**
   * Rotates the active log file when appending the pending bytes would exceed
   * the configured size limit.
   */
  private async rotateIfNeeded(destination: string, pendingBytes: number): Promise<void> {
    let currentSize = 0;
    try {
      currentSize = (await stat(destination)).size;
    } catch (error) {
      if (isMissingEntryError(error)) {
        return;
      }
      throw error;
    }

    if (currentSize + pendingBytes <= this.maxFileSizeBytes) {
      return;
    }

    try {
      await this.performRotation(destination);
    } catch (error) {
      reportInternalFailure("log_file_rotation_failed", error);
    }
  }

  /** Shifts `file.N` to `file.N+1` and keeps at most {@link maxFileCount} files. */
  private async performRotation(destination: string): Promise<void> {
    const keep = this.maxFileCount;
    if (keep === 1) {
      await rm(destination, { force: true });
      return;
    }

    await rm(`${destination}.${keep - 1}`, { force: true });
    for (let index = keep - 2; index >= 1; index -= 1) {
      await renameIfPresent(`${destination}.${index}`, `${destination}.${index + 1}`);
    }
    await renameIfPresent(destination, `${destination}.1`);
  }

  private redactStructuredValue(value: unknown): unknown {
    if (!this.redactionEnabled) {
      return value;
    }
    return this.deepRedact(value);
  }

  private deepRedact(value: unknown): unknown {
    if (typeof value === "string") {
      return this.scrub(value);
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.deepRedact(item));
    }
    if (value && typeof value === "object") {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTION_TOKEN : this.deepRedact(entry);
      }
      return result;
    }
    return value;
  }

  private scrub(value: string): string {
    let sanitized = value;
    for (const pattern of this.redactSecrets) {
      if (typeof pattern === "string" && pattern.length > 0) {
        sanitized = sanitized.split(pattern).join(REDACTION_TOKEN);
      } else if (pattern instanceof RegExp) {
        sanitized = sanitized.replace(pattern, REDACTION_TOKEN);
      }
    }
    return sanitized;
  }
}

/** Lifts `task_id` and `check` from a payload to the top-level entry. */
function extractCorrelation(payload: unknown): Pick<LogEntry, "task_id" | "check"> {
  if (!payload || typeof payload !== "object" || Array.isArray(payload)) {
    return {};
  }
  const fields: Pick<LogEntry, "task_id" | "check"> = {};
  if ("task_id" in payload && typeof payload.task_id === "string") {
    fields.task_id = payload.task_id;
  }
  if ("check" in payload && typeof payload.check === "string") {
    fields.check = payload.check;
  }
  return fields;
}

async function renameIfPresent(source: string, target: string): Promise<void> {
  try {
    await rename(source, target);
  } catch (error) {
    if (!isMissingEntryError(error)) {
      throw error;
    }
  }
}

/** Reports logger failures on stderr since the logger cannot log about itself. */
function reportInternalFailure(message: string, error: unknown): void {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level: "error",
    message,
    payload: error instanceof Error ? { message: error.message } : { error: String(error) },
  };
  process.stderr.write(`${JSON.stringify(entry)}\n`);
}
