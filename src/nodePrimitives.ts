/**
 * Small runtime-dependent types shared by the probe, the watchdog and the
 * gateways. Keeping them in one place avoids sprinkling `NodeJS.*` lookups
 * across modules that only need a handful of names.
 */

/** POSIX signals the supervisor actually sends to worker processes. */
export type TerminationSignal = "SIGTERM" | "SIGKILL";

/**
 * Lightweight representation of an errno-flavoured error. Only the properties
 * inspected by the supervisor are listed.
 */
export interface ErrnoException extends Error {
  code?: string;
  errno?: number;
  path?: string;
  syscall?: string;
}

/** Narrows an unknown rejection to an {@link ErrnoException}. */
export function isErrnoException(error: unknown): error is ErrnoException {
  return error instanceof Error && "code" in error && typeof error.code === "string";
}

/** True when the error reports a missing file or directory. */
export function isMissingEntryError(error: unknown): boolean {
  return isErrnoException(error) && error.code === "ENOENT";
}

/** Renders any thrown value as a message suitable for structured logs. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
