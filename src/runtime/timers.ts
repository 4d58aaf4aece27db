import {
  clearInterval as nodeClearInterval,
  clearTimeout as nodeClearTimeout,
  setInterval as nodeSetInterval,
  setTimeout as nodeSetTimeout,
} from "node:timers";

/** Handle returned by {@link runtimeSetTimeout}. */
export type TimeoutHandle = ReturnType<typeof nodeSetTimeout>;

/** Handle returned by {@link runtimeSetInterval}. */
export type IntervalHandle = ReturnType<typeof nodeSetInterval>;

const fallbackTimers = {
  setTimeout: nodeSetTimeout,
  clearTimeout: nodeClearTimeout,
  setInterval: nodeSetInterval,
  clearInterval: nodeClearInterval,
} as const;

/**
 * Retrieves the timer function currently exposed on {@link globalThis}. When
 * Sinon installs fake timers the overrides live there, so resolving lazily
 * keeps the watchdog cadence and the admission backoff under test control.
 */
function resolveTimer<K extends keyof typeof fallbackTimers>(key: K): (typeof fallbackTimers)[K] {
  const candidate = (globalThis as Record<string, unknown>)[key];
  if (typeof candidate === "function") {
    return candidate as (typeof fallbackTimers)[K];
  }
  return fallbackTimers[key];
}

export function runtimeSetTimeout(callback: () => void, ms: number): TimeoutHandle {
  return resolveTimer("setTimeout")(callback, ms);
}

export function runtimeClearTimeout(handle: TimeoutHandle): void {
  resolveTimer("clearTimeout")(handle);
}

export function runtimeSetInterval(callback: () => void, ms: number): IntervalHandle {
  return resolveTimer("setInterval")(callback, ms);
}

export function runtimeClearInterval(handle: IntervalHandle): void {
  resolveTimer("clearInterval")(handle);
}

/** Error raised by {@link delay} when its signal aborts the wait. */
export class DelayAbortedError extends Error {
  constructor() {
    super("delay aborted");
    this.name = "DelayAbortedError";
  }
}

/**
 * Waits for {@link ms} milliseconds using the runtime-aware timers. The wait
 * rejects with {@link DelayAbortedError} as soon as {@link signal} aborts.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new DelayAbortedError());
  }
  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      runtimeClearTimeout(handle);
      reject(new DelayAbortedError());
    };
    const handle = runtimeSetTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
