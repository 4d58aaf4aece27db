import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import { mkdtemp, readFile, rm, stat } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { DEFAULT_FLAG_STALE_MS, ProtectedModeFlag } from "../src/coordination/protectedModeFlag.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

/** Clock advanced explicitly by the test. */
class ManualClock {
  constructor(public current: number) {}

  now = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}

async function exists(file: string): Promise<boolean> {
  try {
    await stat(file);
    return true;
  } catch {
    return false;
  }
}

describe("coordination/protectedModeFlag", () => {
  let workspace: string;
  let flagPath: string;
  let clock: ManualClock;
  let logger: RecordingLogger;
  let flag: ProtectedModeFlag;

  beforeEach(async () => {
    workspace = await mkdtemp(path.join(tmpdir(), "flag-"));
    flagPath = path.join(workspace, "nested", "protected-mode.flag");
    clock = new ManualClock(Date.parse("2026-03-01T10:00:00.000Z"));
    logger = new RecordingLogger();
    flag = new ProtectedModeFlag({ path: flagPath, now: clock.now, logger });
  });

  afterEach(async () => {
    await rm(workspace, { recursive: true, force: true });
  });

  it("is inactive when no marker exists", async () => {
    expect(await flag.isActive()).to.equal(false);
    expect(await flag.inspect()).to.deep.equal({ present: false, ageMs: null, stale: false });
  });

  it("creates the marker with the activation time as mtime", async () => {
    await flag.activate();

    expect(await flag.isActive()).to.equal(true);
    expect(await flag.inspect()).to.deep.equal({ present: true, ageMs: 0, stale: false });
    expect(await readFile(flagPath, "utf8")).to.equal(`${process.pid} 2026-03-01T10:00:00.000Z\n`);
  });

  it("stays active within the staleness window", async () => {
    await flag.activate();
    clock.advance(DEFAULT_FLAG_STALE_MS - 60_000);

    expect(await flag.isActive()).to.equal(true);
  });

  it("removes a stale marker and reports it inactive", async () => {
    await flag.activate();
    clock.advance(DEFAULT_FLAG_STALE_MS);

    expect(await flag.inspect()).to.deep.equal({ present: true, ageMs: DEFAULT_FLAG_STALE_MS, stale: true });
    expect(await flag.isActive()).to.equal(false);
    expect(await exists(flagPath)).to.equal(false);
    expect(logger.messages("warn")).to.deep.equal(["protected_mode_flag_stale"]);
  });

  it("reports when an evaluation cleared a stale marker", async () => {
    await flag.activate();
    clock.advance(DEFAULT_FLAG_STALE_MS);

    expect(await flag.evaluate()).to.deep.equal({ active: false, clearedStale: true });
    expect(await flag.evaluate()).to.deep.equal({ active: false, clearedStale: false });
  });

  it("refreshes the timestamp on re-activation", async () => {
    await flag.activate();
    clock.advance(DEFAULT_FLAG_STALE_MS - 1_000);
    await flag.activate();
    clock.advance(10_000);

    expect(await flag.isActive()).to.equal(true);
  });

  it("clears idempotently", async () => {
    await flag.activate();
    await flag.clear();
    await flag.clear();

    expect(await exists(flagPath)).to.equal(false);
  });

  it("clears the marker after a protected job, even when it fails", async () => {
    const seen = await flag.runProtected(async () => flag.isActive());
    expect(seen).to.equal(true);
    expect(await exists(flagPath)).to.equal(false);

    try {
      await flag.runProtected(async () => {
        throw new Error("job failed");
      });
      expect.fail("expected the job error to propagate");
    } catch (error) {
      expect(error).to.have.property("message", "job failed");
    }
    expect(await exists(flagPath)).to.equal(false);
  });
});
