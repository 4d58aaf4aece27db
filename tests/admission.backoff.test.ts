import { describe, it } from "mocha";
import { expect } from "chai";

import type { AdmissionDecision } from "../src/admission/admissionController.js";
import { computeBackoffDelay, requestAdmissionWithBackoff, DEFAULT_BACKOFF_POLICY } from "../src/admission/backoff.js";
import { DelayAbortedError, delay } from "../src/runtime/timers.js";

const DENIED: AdmissionDecision = {
  admitted: false,
  reason: "ConcurrencyCeiling",
  detail: "2 agent worker(s) running, limit is 2",
  liveWorkers: 2,
};
const ADMITTED: AdmissionDecision = { admitted: true, liveWorkers: 1, freeMemoryGB: 8 };

/** Returns the scripted decisions in order, repeating the last one. */
function scripted(decisions: AdmissionDecision[]): () => Promise<AdmissionDecision> {
  let index = 0;
  return async () => {
    const decision = decisions[Math.min(index, decisions.length - 1)];
    index += 1;
    if (decision === undefined) {
      throw new Error("no scripted decision");
    }
    return decision;
  };
}

describe("admission/backoff", () => {
  it("doubles from one second and caps at thirty", () => {
    const delays = [1, 2, 3, 4, 5, 6, 7].map((attempt) => computeBackoffDelay(attempt, DEFAULT_BACKOFF_POLICY));

    expect(delays).to.deep.equal([1_000, 2_000, 4_000, 8_000, 16_000, 30_000, 30_000]);
  });

  it("stays capped for very large attempt numbers", () => {
    expect(computeBackoffDelay(5_000)).to.equal(30_000);
  });

  it("retries denials with the computed waits until admitted", async () => {
    const waits: number[] = [];
    const denials: number[] = [];

    const result = await requestAdmissionWithBackoff(scripted([DENIED, DENIED, DENIED, ADMITTED]), {
      sleep: async (ms) => {
        waits.push(ms);
      },
      onDenied: (_decision, attempt) => denials.push(attempt),
    });

    expect(result).to.deep.equal({ decision: ADMITTED, attempts: 4 });
    expect(waits).to.deep.equal([1_000, 2_000, 4_000]);
    expect(denials).to.deep.equal([1, 2, 3]);
  });

  it("returns the last denial once the attempt limit is reached", async () => {
    const waits: number[] = [];

    const result = await requestAdmissionWithBackoff(scripted([DENIED]), {
      policy: { ...DEFAULT_BACKOFF_POLICY, maxAttempts: 3 },
      sleep: async (ms) => {
        waits.push(ms);
      },
    });

    expect(result).to.deep.equal({ decision: DENIED, attempts: 3 });
    expect(waits).to.deep.equal([1_000, 2_000]);
  });

  it("rejects when the signal aborts during a wait", async () => {
    const controller = new AbortController();
    const pending = requestAdmissionWithBackoff(scripted([DENIED]), {
      policy: { initialDelayMs: 10_000, factor: 2, maxDelayMs: 10_000 },
      signal: controller.signal,
      sleep: delay,
    });
    setTimeout(() => controller.abort(), 10);

    try {
      await pending;
      expect.fail("expected the wait to be aborted");
    } catch (error) {
      expect(error).to.be.instanceOf(DelayAbortedError);
    }
  });
});
