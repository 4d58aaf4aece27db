import { describe, it, beforeEach } from "mocha";
import { expect } from "chai";

import { AdmissionController, DEFAULT_ADMISSION_LIMITS } from "../src/admission/admissionController.js";
import type { WorkerRole } from "../src/probe/resourceProbe.js";
import { FakeResourceProbe, snapshot } from "./helpers/fakeHost.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

const ROLE: WorkerRole = { name: "agent", commandPattern: /^claude/ };

describe("admission/AdmissionController", () => {
  let probe: FakeResourceProbe;
  let logger: RecordingLogger;
  let controller: AdmissionController;

  beforeEach(() => {
    probe = new FakeResourceProbe();
    logger = new RecordingLogger();
    controller = new AdmissionController({ probe, logger });
  });

  it("admits when both the ceiling and the memory floor allow it", async () => {
    probe.processes = [snapshot({ pid: 10 })];
    probe.freeGb = 8;

    const decision = await controller.requestAdmission(ROLE);

    expect(decision).to.deep.equal({ admitted: true, liveWorkers: 1, freeMemoryGB: 8 });
    expect(logger.messages()).to.deep.equal(["admission_granted"]);
  });

  it("denies at the concurrency ceiling before sampling memory", async () => {
    probe.processes = [snapshot({ pid: 10 }), snapshot({ pid: 11 })];
    probe.freeGb = 0.5;

    const decision = await controller.requestAdmission(ROLE, DEFAULT_ADMISSION_LIMITS);

    expect(decision).to.deep.equal({
      admitted: false,
      reason: "ConcurrencyCeiling",
      detail: "2 agent worker(s) running, limit is 2",
      liveWorkers: 2,
    });
    expect(probe.calls).to.equal(1);
  });

  it("denies when free memory is below the floor", async () => {
    probe.freeGb = 3;

    const decision = await controller.requestAdmission(ROLE, { maxConcurrent: 2, minFreeGb: 4 });

    expect(decision).to.deep.equal({
      admitted: false,
      reason: "InsufficientMemory",
      detail: "3.0 GB free, 4 GB required",
      liveWorkers: 0,
      freeMemoryGB: 3,
    });
    expect(logger.entries[0]).to.deep.equal({
      level: "warn",
      message: "admission_denied",
      payload: { role: "agent", reason: "InsufficientMemory", detail: "3.0 GB free, 4 GB required" },
    });
  });

  it("admits exactly at the memory floor", async () => {
    probe.freeGb = 4;

    const decision = await controller.requestAdmission(ROLE);

    expect(decision.admitted).to.equal(true);
  });

  it("counts tracked workers the host has not listed yet", async () => {
    probe.processes = [snapshot({ pid: 10 })];

    const decision = await controller.requestAdmission(ROLE, { maxConcurrent: 2, minFreeGb: 1 }, { trackedWorkers: 2 });

    expect(decision).to.include({ admitted: false, reason: "ConcurrencyCeiling", liveWorkers: 2 });
  });

  it("ignores workers of other users and defunct entries", async () => {
    probe.processes = [
      snapshot({ pid: 10, state: "Z" }),
      snapshot({ pid: 11, command: "node server.js" }),
      snapshot({ pid: 12 }),
    ];

    const decision = await controller.requestAdmission(ROLE);

    expect(decision).to.deep.equal({ admitted: true, liveWorkers: 1, freeMemoryGB: 16 });
  });

  it("denies when the probe fails", async () => {
    probe.failure = new Error("ps missing");

    const decision = await controller.requestAdmission(ROLE);

    expect(decision).to.deep.equal({
      admitted: false,
      reason: "ProbeUnavailable",
      detail: "worker census failed: ps missing",
    });
  });
});
