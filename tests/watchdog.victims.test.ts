import { describe, it } from "mocha";
import { expect } from "chai";

import {
  selectCeilingVictims,
  selectMemoryVictims,
  selectPrimaryPids,
  selectPrunableArtifacts,
  selectRunawayBuilds,
} from "../src/watchdog/victims.js";
import { snapshot } from "./helpers/fakeHost.js";

const WORKERS = [
  snapshot({ pid: 4, elapsedSeconds: 100 }),
  snapshot({ pid: 2, elapsedSeconds: 300 }),
  snapshot({ pid: 1, elapsedSeconds: 400 }),
  snapshot({ pid: 3, elapsedSeconds: 200 }),
];

describe("watchdog/victims", () => {
  describe("selectPrimaryPids", () => {
    it("keeps the designated pids that are live", () => {
      expect([...selectPrimaryPids(WORKERS, [3, 42])]).to.deep.equal([3]);
    });

    it("falls back to the oldest worker when no designated pid is live", () => {
      expect([...selectPrimaryPids(WORKERS, [42])]).to.deep.equal([1]);
    });

    it("breaks age ties with the lowest pid", () => {
      const tied = [snapshot({ pid: 9, elapsedSeconds: 50 }), snapshot({ pid: 6, elapsedSeconds: 50 })];
      expect([...selectPrimaryPids(tied, [])]).to.deep.equal([6]);
    });

    it("returns nothing without workers", () => {
      expect(selectPrimaryPids([], [1]).size).to.equal(0);
    });
  });

  describe("selectCeilingVictims", () => {
    it("picks exactly the excess, oldest non-primary first", () => {
      const victims = selectCeilingVictims(WORKERS, 2, new Set([1]));
      expect(victims.map((worker) => worker.pid)).to.deep.equal([2, 3]);
    });

    it("picks nothing at or below the ceiling", () => {
      expect(selectCeilingVictims(WORKERS, 4, new Set())).to.deep.equal([]);
      expect(selectCeilingVictims(WORKERS, 5, new Set())).to.deep.equal([]);
    });

    it("never selects primaries even when they are the only candidates", () => {
      const victims = selectCeilingVictims(WORKERS, 0, new Set([1, 2, 3]));
      expect(victims.map((worker) => worker.pid)).to.deep.equal([4]);
    });
  });

  it("selects every non-primary worker under memory pressure", () => {
    expect(selectMemoryVictims(WORKERS, new Set([1])).map((worker) => worker.pid)).to.deep.equal([2, 3, 4]);
  });

  it("selects builds strictly older than the limit", () => {
    const builds = [
      snapshot({ pid: 10, elapsedSeconds: 300, command: "npx tsc" }),
      snapshot({ pid: 11, elapsedSeconds: 301, command: "npx tsc" }),
      snapshot({ pid: 12, elapsedSeconds: 20, command: "npx tsc" }),
    ];
    expect(selectRunawayBuilds(builds, 300).map((build) => build.pid)).to.deep.equal([11]);
  });

  it("prunes the oldest N-K artifacts", () => {
    const artifacts = [1, 2, 3, 4, 5].map((index) => ({ path: `/sessions/${index}.jsonl`, modifiedAt: index }));

    expect(selectPrunableArtifacts(artifacts, 3).map((entry) => entry.path)).to.deep.equal([
      "/sessions/1.jsonl",
      "/sessions/2.jsonl",
    ]);
    expect(selectPrunableArtifacts(artifacts, 5)).to.deep.equal([]);
  });
});
