import { delay } from "../runtime/timers.js";
import type { AdmissionDecision } from "./admissionController.js";

/** Retry policy callers apply after a denial. */
export interface BackoffPolicy {
  readonly initialDelayMs: number;
  readonly factor: number;
  readonly maxDelayMs: number;
  /** Total attempts before giving up; unlimited when omitted. */
  readonly maxAttempts?: number;
}

export const DEFAULT_BACKOFF_POLICY: BackoffPolicy = Object.freeze({
  initialDelayMs: 1_000,
  factor: 2,
  maxDelayMs: 30_000,
});

/**
 * Delay before retry number {@link attempt} (1-based): `initial * factor^(attempt-1)`
 * capped at `maxDelayMs`.
 */
export function computeBackoffDelay(attempt: number, policy: BackoffPolicy = DEFAULT_BACKOFF_POLICY): number {
  const exponent = Math.max(0, Math.floor(attempt) - 1);
  const raw = policy.initialDelayMs * policy.factor ** exponent;
  return Math.min(policy.maxDelayMs, Number.isFinite(raw) ? raw : policy.maxDelayMs);
}

export interface BackoffOptions {
  readonly policy?: BackoffPolicy;
  /** Aborting stops the loop before the next wait and rejects with `DelayAbortedError`. */
  readonly signal?: AbortSignal;
  /** Invoked after each denial with the attempt number and the upcoming delay. */
  readonly onDenied?: (decision: AdmissionDecision, attempt: number, nextDelayMs: number) => void;
  readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/** Final outcome of {@link requestAdmissionWithBackoff}. */
export interface BackoffResult {
  readonly decision: AdmissionDecision;
  readonly attempts: number;
}

/**
 * Repeats {@link request} until it is admitted, the attempt limit is reached
 * or the signal aborts. The last decision is returned as-is, denials
 * included.
 */
export async function requestAdmissionWithBackoff(
  request: () => Promise<AdmissionDecision>,
  options: BackoffOptions = {},
): Promise<BackoffResult> {
  const policy = options.policy ?? DEFAULT_BACKOFF_POLICY;
  const sleep = options.sleep ?? delay;
  let attempt = 0;
  for (;;) {
    attempt += 1;
    const decision = await request();
    if (decision.admitted) {
      return { decision, attempts: attempt };
    }
    if (policy.maxAttempts !== undefined && attempt >= policy.maxAttempts) {
      return { decision, attempts: attempt };
    }
    const wait = computeBackoffDelay(attempt, policy);
    options.onDenied?.(decision, attempt, wait);
    await sleep(wait, options.signal);
  }
}
