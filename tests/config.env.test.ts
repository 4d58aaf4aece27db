import { describe, it } from "mocha";
import { expect } from "chai";

import { readList, readOptionalInt, readOptionalNumber, readOptionalString } from "../src/config/env.js";

describe("config/env readers", () => {
  it("reads integers strictly and honours bounds", () => {
    const env = { N: " 42 ", F: "4.5", BIG: "9007199254740993", NEG: "-3" };

    expect(readOptionalInt("N", undefined, env)).to.equal(42);
    expect(readOptionalInt("F", undefined, env)).to.equal(undefined);
    expect(readOptionalInt("BIG", undefined, env)).to.equal(undefined);
    expect(readOptionalInt("NEG", undefined, env)).to.equal(-3);
    expect(readOptionalInt("NEG", { min: 0 }, env)).to.equal(undefined);
  });

  it("reads finite numbers", () => {
    const env = { F: "4.5", INF: "Infinity", TEXT: "four" };

    expect(readOptionalNumber("F", undefined, env)).to.equal(4.5);
    expect(readOptionalNumber("F", { max: 4 }, env)).to.equal(undefined);
    expect(readOptionalNumber("INF", undefined, env)).to.equal(undefined);
    expect(readOptionalNumber("TEXT", undefined, env)).to.equal(undefined);
  });

  it("treats blank strings as unset", () => {
    expect(readOptionalString("S", { S: "   " })).to.equal(undefined);
    expect(readOptionalString("S", { S: " /tmp/flag " })).to.equal("/tmp/flag");
  });

  it("splits comma separated lists", () => {
    expect(readList("L", ["x"], { L: " PATH , ,HOME" })).to.deep.equal(["PATH", "HOME"]);
    expect(readList("L", ["x"], {})).to.deep.equal(["x"]);
  });
});
