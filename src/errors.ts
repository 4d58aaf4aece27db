/**
 * Error taxonomy shared by the supervisor components. Each error exposes a
 * stable `code` surfaced to MCP clients and CLI users, plus an action-oriented
 * `hint` that tool wrappers can print verbatim.
 *
 * Expected steady-state conditions (admission denials, lock timeouts) are NOT
 * errors: they travel as structured outcomes. The classes below cover
 * programming mistakes and unusable inputs.
 */
export abstract class SupervisorError extends Error {
  abstract readonly code: string;
  abstract readonly hint: string;
  /** Structured metadata forwarded to loggers. */
  readonly details: Record<string, unknown>;

  protected constructor(message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }
}

/** The lock target does not look like a repository (control directory missing). */
export class InvalidResourceError extends SupervisorError {
  readonly code = "E-LOCK-INVALID-RESOURCE";
  readonly hint = "pass the root of a git checkout (the directory containing .git/)";

  constructor(readonly resourceId: string, readonly controlDirectory: string) {
    super(`${resourceId} is not a repository: ${controlDirectory} is missing`, {
      resource_id: resourceId,
      control_directory: controlDirectory,
    });
  }
}

/** A task with the same identifier is already registered. */
export class DuplicateTaskError extends SupervisorError {
  readonly code = "E-TASK-DUPLICATE";
  readonly hint = "omit the id to let the supervisor generate one, or pick a fresh id";

  constructor(readonly taskId: string) {
    super(`task ${taskId} is already registered`, { task_id: taskId });
  }
}

/** The registry holds no task with the requested identifier. */
export class UnknownTaskError extends SupervisorError {
  readonly code = "E-TASK-UNKNOWN";
  readonly hint = "check the id returned by agent_submit; acknowledged tasks leave the registry";

  constructor(readonly taskId: string) {
    super(`task ${taskId} is not registered`, { task_id: taskId });
  }
}

/** Acknowledgement requested before the task reached a terminal status. */
export class TaskNotTerminalError extends SupervisorError {
  readonly code = "E-TASK-NOT-TERMINAL";
  readonly hint = "poll the task until it completes, fails, times out or is cancelled";

  constructor(readonly taskId: string, readonly status: string) {
    super(`task ${taskId} is still ${status}`, { task_id: taskId, status });
  }
}

/** A resource probe could not sample the host. */
export class ProbeUnavailableError extends SupervisorError {
  readonly code = "E-PROBE-UNAVAILABLE";
  readonly hint = "ensure ps and /proc are available to the supervisor user";

  constructor(readonly probe: string, cause: unknown) {
    super(`probe ${probe} unavailable: ${cause instanceof Error ? cause.message : String(cause)}`, { probe });
    this.cause = cause;
  }
}

/** The environment or CLI produced an invalid configuration. */
export class ConfigurationError extends SupervisorError {
  readonly code = "E-CONFIG-INVALID";
  readonly hint = "fix the SUPERVISOR_* variables or CLI flags listed in the issues";

  constructor(message: string, readonly issues: readonly string[] = []) {
    super(message, { issues });
  }
}
