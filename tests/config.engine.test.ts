import { describe, it } from "mocha";
import { expect } from "chai";

import { DEFAULT_ENGINE_CONFIG, loadEngineConfig } from "../src/config/engine.js";
import { readBool, readEnum, readInt, readNumber } from "../src/config/env.js";

describe("engine configuration", () => {
  it("falls back to the defaults for an empty environment", () => {
    expect(loadEngineConfig({})).to.deep.equal(DEFAULT_ENGINE_CONFIG);
  });

  it("reads overrides from the environment", () => {
    const config = loadEngineConfig({
      NETWORK_DEFAULT_DEPTH: "2",
      NETWORK_MAX_DEPTH_CEILING: "4",
      NETWORK_CACHE_TTL_MS: "60000",
      NETWORK_SINGLE_FLIGHT: "off",
      NETWORK_WEIGHT_HALF_SATURATION: "2500.5",
      NETWORK_JOURNAL: " ./runs/network.jsonl ",
      NETWORK_LOG_LEVEL: "DEBUG",
      NETWORK_EAGER_DEPTH: "0",
    });
    expect(config).to.include({
      defaultDepth: 2,
      depthCeiling: 4,
      cacheTtlMs: 60_000,
      singleFlight: false,
      weightHalfSaturation: 2500.5,
      journalPath: "./runs/network.jsonl",
      logLevel: "debug",
      eagerDepthThreshold: 0,
    });
  });

  it("ignores values that cannot be interpreted", () => {
    const config = loadEngineConfig({
      NETWORK_DEFAULT_DEPTH: "three",
      NETWORK_MAX_DEPTH_CEILING: "40",
      NETWORK_CACHE_CAPACITY: "-1",
      NETWORK_SINGLE_FLIGHT: "maybe",
      NETWORK_LOG_LEVEL: "verbose",
    });
    expect(config).to.include({
      defaultDepth: 3,
      depthCeiling: 6,
      cacheCapacity: 1_024,
      singleFlight: true,
      logLevel: "info",
    });
  });

  it("fails when the default depth exceeds the ceiling", () => {
    expect(() => loadEngineConfig({ NETWORK_DEFAULT_DEPTH: "5", NETWORK_MAX_DEPTH_CEILING: "4" })).to.throw(
      "default depth must not exceed the depth ceiling",
    );
    expect(loadEngineConfig({}, { depthCeiling: 8, defaultDepth: 8 })).to.include({ depthCeiling: 8, defaultDepth: 8 });
  });
});

describe("environment readers", () => {
  it("treats blank values as unset", () => {
    expect(readInt("DEPTH", 3, undefined, { DEPTH: "   " })).to.equal(3);
    expect(readBool("FLAG", true, { FLAG: "" })).to.equal(true);
    expect(readNumber("RATIO", 0.5, undefined, { RATIO: "" })).to.equal(0.5);
  });

  it("enforces bounds and integer syntax", () => {
    expect(readInt("DEPTH", 3, { min: 1, max: 6 }, { DEPTH: "6" })).to.equal(6);
    expect(readInt("DEPTH", 3, { min: 1, max: 6 }, { DEPTH: "7" })).to.equal(3);
    expect(readInt("DEPTH", 3, undefined, { DEPTH: "2.5" })).to.equal(3);
    expect(readNumber("RATIO", 0.5, { min: 0, max: 1 }, { RATIO: "1.5" })).to.equal(0.5);
    expect(readEnum("MODE", ["fast", "safe"] as const, "safe", { MODE: "FAST" })).to.equal("fast");
  });
});
