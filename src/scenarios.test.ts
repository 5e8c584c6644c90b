/**
 * Tests for scenario expansion and resolution
 */

import { describe, it, expect } from "vitest";
import { declareTest } from "../test/utils.js";
import { parseRunConfig } from "./config.js";
import { ConfigError, DeclarationError } from "./errors.js";
import {
  DEFAULT_REGISTRY,
  activeScenarios,
  defineScenario,
  expandLabels,
  resolveScenarioRuns,
  runLabel,
} from "./scenarios.js";

const config = (scenarios: string[]) => parseRunConfig({ testsDir: "/tests", scenarios });

describe("expandLabels", () => {
  it("should expand aliases and report unknown labels", () => {
    const { scenarios, unknown } = expandLabels(["linter", "dist", "nope"]);

    expect([...scenarios]).toEqual(["vlt", "vltmt", "dist"]);
    expect(unknown).toEqual(["nope"]);
  });

  it("should treat object property names as unknown labels", () => {
    const { scenarios, unknown } = expandLabels(["constructor", "__proto__", "toString"]);

    expect([...scenarios]).toEqual([]);
    expect(unknown).toEqual(["constructor", "__proto__", "toString"]);
  });
});

describe("activeScenarios", () => {
  it("should reject unknown active labels", () => {
    expect(() => activeScenarios({ scenarios: ["vlt", "xyz"] })).toThrow(ConfigError);
    expect(() => activeScenarios({ scenarios: ["vlt", "xyz"] })).toThrow(
      "scenarios: unknown scenario label(s) xyz",
    );
  });
});

describe("defineScenario", () => {
  it("should append a scenario and extend aliases", () => {
    const registry = defineScenario(
      DEFAULT_REGISTRY,
      { name: "vltcov", description: "Coverage", usesToolchain: true, flags: () => ["--coverage"] },
      ["vlt_all"],
    );

    expect(registry.scenarios.map((s) => s.name)).toEqual(["dist", "vlt", "vltmt", "vltcov"]);
    expect(registry.aliases.vlt_all).toEqual(["vlt", "vltmt", "vltcov"]);
    expect(DEFAULT_REGISTRY.aliases.vlt_all).toEqual(["vlt", "vltmt"]);
  });

  it("should reject a duplicate scenario name", () => {
    expect(() =>
      defineScenario(DEFAULT_REGISTRY, {
        name: "vlt",
        description: "again",
        usesToolchain: true,
        flags: () => [],
      }),
    ).toThrow("Scenario 'vlt' is already defined");
  });
});

describe("resolveScenarioRuns", () => {
  const testCase = declareTest({
    scenarios: ["vlt_all"],
    compile: {},
    variants: [
      { name: "o0", flags: ["-O0"] },
      { name: "o3", flags: ["-O3"] },
    ],
  });

  it("should cross scenarios with variants in canonical order", () => {
    const runs = resolveScenarioRuns(testCase, config(["vltmt", "vlt"]));

    expect(runs.map(runLabel)).toEqual(["vlt/o0", "vlt/o3", "vltmt/o0", "vltmt/o3"]);
    expect(runs[2].scenarioFlags).toEqual(["--threads", "2"]);
    expect(runs[0].paths.objDir).toBe("/obj_dir/obj_vlt/t_x/o0");
    expect(runs[3].paths.objDir).toBe("/obj_dir/obj_vltmt/t_x/o3");
  });

  it("should only run the intersection of declared and active scenarios", () => {
    const runs = resolveScenarioRuns(testCase, config(["vltmt", "dist"]));
    expect(runs.map(runLabel)).toEqual(["vltmt/o0", "vltmt/o3"]);
  });

  it("should return no runs when the intersection is empty", () => {
    const distOnly = declareTest({ scenarios: ["dist"], lint: {} });
    expect(resolveScenarioRuns(distOnly, config(["vlt"]))).toEqual([]);
  });

  it("should mark the source-tree scenario as not using the toolchain", () => {
    const distOnly = declareTest({ scenarios: ["dist"], lint: {} });
    const [run] = resolveScenarioRuns(distOnly, config(["dist"]));

    expect(run.usesToolchain).toBe(false);
    expect(runLabel(run)).toBe("dist");
  });

  it("should return no runs for a skipped test", () => {
    const skipped = declareTest({ scenarios: ["vlt"], compile: {}, skip: "needs SystemC" });
    expect(resolveScenarioRuns(skipped, config(["vlt"]))).toEqual([]);
  });

  it("should reject unknown declared labels", () => {
    const bad = declareTest({ scenarios: ["vlt", "bogus"], compile: {} });
    expect(() => resolveScenarioRuns(bad, config(["vlt"]))).toThrow(DeclarationError);
    expect(() => resolveScenarioRuns(bad, config(["vlt"]))).toThrow(
      "Invalid test declaration /tests/t_x.json: unknown scenario label(s) bogus",
    );
  });
});
