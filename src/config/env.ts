/**
 * Helpers reading environment variables with consistent coercion rules. Every
 * reader accepts an optional environment record so configuration loaders can
 * be exercised against synthetic environments in tests.
 */

/** Environment snapshot consumed by the readers. */
export type EnvSource = Readonly<Record<string, string | undefined>>;

/** Normalises the raw value: trimmed, with blank strings treated as unset. */
function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

export interface NumberOptions {
  /** Minimum allowed value (inclusive). */
  readonly min?: number;
  /** Maximum allowed value (inclusive). */
  readonly max?: number;
}

function withinBounds(value: number, options: NumberOptions | undefined): boolean {
  // `Infinity` and `NaN` are rejected so callers never receive exotic literals.
  if (!Number.isFinite(value)) {
    return false;
  }
  if (options?.min !== undefined && value < options.min) {
    return false;
  }
  if (options?.max !== undefined && value > options.max) {
    return false;
  }
  return true;
}

/** Returns an optional integer when {@link name} contains a valid base-10 literal. */
export function readOptionalInt(
  name: string,
  options?: NumberOptions,
  env: EnvSource = process.env,
): number | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised || !/^[-+]?\d+$/.test(normalised)) {
    return undefined;
  }
  const value = Number.parseInt(normalised, 10);
  if (!Number.isSafeInteger(value)) {
    return undefined;
  }
  return withinBounds(value, options) ? value : undefined;
}

/** Returns an optional finite number when {@link name} parses cleanly. */
export function readOptionalNumber(
  name: string,
  options?: NumberOptions,
  env: EnvSource = process.env,
): number | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return undefined;
  }
  const value = Number(normalised);
  return withinBounds(value, options) ? value : undefined;
}

/** Returns the trimmed string when {@link name} is set to a non-empty value. */
export function readOptionalString(name: string, env: EnvSource = process.env): string | undefined {
  return normaliseEnvValue(env[name]);
}

/**
 * Reads a comma-separated list. Entries are trimmed and blanks dropped; an
 * unset variable yields the default.
 */
export function readList(name: string, defaultValue: readonly string[], env: EnvSource = process.env): string[] {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return [...defaultValue];
  }
  return normalised
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}
