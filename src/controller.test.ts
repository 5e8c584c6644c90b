/**
 * Tests for the test case controller
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { access, mkdir, rm, writeFile } from "fs/promises";
import { join } from "path";
import { createFakeInvoker, declareTest, makeScratchDir } from "../test/utils.js";
import { parseRunConfig, type RunConfig } from "./config.js";
import { TestCaseController, foldOutcome, runTestCase } from "./controller.js";
import type { ScenarioRunResult } from "./types.js";

const runResult = (overrides: Partial<ScenarioRunResult>): ScenarioRunResult => ({
  label: "vlt",
  scenario: "vlt",
  variant: "default",
  state: "DONE",
  status: "passed",
  stages: [],
  assertions: [],
  ...overrides,
});

describe("foldOutcome", () => {
  it("should skip a test without runs", () => {
    expect(foldOutcome([])).toEqual({ status: "SKIPPED", classification: "skip" });
  });

  it("should let an errored run beat a failed run", () => {
    const folded = foldOutcome([
      runResult({
        label: "vlt",
        status: "failed",
        classification: "assertion-mismatch",
        diagnostic: "x differs",
      }),
      runResult({
        label: "vltmt",
        status: "errored",
        classification: "infrastructure-error",
        diagnostic: "golden missing",
      }),
    ]);

    expect(folded).toEqual({
      status: "ERRORED",
      classification: "infrastructure-error",
      diagnostic: "vltmt: golden missing",
    });
  });

  it("should report the first failed run", () => {
    const folded = foldOutcome([
      runResult({ label: "vlt" }),
      runResult({
        label: "vltmt",
        status: "failed",
        classification: "unexpected-stage-failure",
        diagnostic: "compile: exit code 1",
      }),
    ]);

    expect(folded).toEqual({
      status: "FAILED",
      classification: "unexpected-stage-failure",
      diagnostic: "vltmt: compile: exit code 1",
    });
  });

  it("should mark a pass that relied on a declared failure", () => {
    expect(foldOutcome([runResult({ classification: "expected-failure" })])).toEqual({
      status: "PASSED",
      classification: "expected-failure",
    });
  });
});

describe("TestCaseController", () => {
  let dir: string;
  let testsDir: string;
  let config: RunConfig;

  const testCase = (decl: object) => declareTest(decl, join(testsDir, "t_x.json"));

  beforeEach(async () => {
    dir = await makeScratchDir("controller");
    testsDir = join(dir, "tests");
    await mkdir(testsDir);
    config = parseRunConfig({ testsDir, scenarios: ["vlt_all"], workers: 1 });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should pass when every scenario run passes", async () => {
    const { invoke, calls } = createFakeInvoker();
    const controller = new TestCaseController(
      testCase({ scenarios: ["vlt_all"], compile: {}, execute: {} }),
      config,
      { invoke },
    );

    const outcome = await controller.run();

    expect(outcome.status).toBe("PASSED");
    expect(outcome.name).toBe("t_x");
    expect(outcome.topFile).toBe(join(testsDir, "t_x.v"));
    expect(outcome.classification).toBeUndefined();
    expect(outcome.runs.map((r) => r.label)).toEqual(["vlt", "vltmt"]);
    expect(calls).toHaveLength(6);
    expect(controller.state).toBe("PASSED");
  });

  it("should classify a declared failure as an expected failure", async () => {
    const { invoke } = createFakeInvoker({ execute: { exitCode: 1 } });

    const outcome = await runTestCase(
      testCase({ scenarios: ["vlt"], compile: {}, execute: { fails: true } }),
      config,
      { invoke },
    );

    expect(outcome.status).toBe("PASSED");
    expect(outcome.classification).toBe("expected-failure");
    expect(outcome.runs[0].diagnostic).toBe("execute failed as declared");
  });

  it("should compare the activity summary of a program that aborts as declared", async () => {
    const saif = (date: string) =>
      `(SAIFILE (SAIFVERSION "2.0") (DATE "${date}") (DIVIDER / ) (TIMESCALE 1 ps) (DURATION 20)\n` +
      "  (INSTANCE top (NET (clk (T0 10) (T1 10) (TX 0) (TC 2)))))\n";
    await writeFile(join(testsDir, "t_x_saif.out"), saif("Mon Jan 6 2025"));
    const { invoke } = createFakeInvoker({
      execute: { exitCode: 134, stderr: "%Error: t_x.v:9: Verilog $stop\n", files: { "simx.saif": saif("Tue Jan 7 2025") } },
    });

    const outcome = await runTestCase(
      testCase({
        scenarios: ["vlt_all"],
        golden: "t_x_saif.out",
        flags: ["--cc --trace-saif"],
        compile: {},
        execute: { fails: true },
        assertions: [{ kind: "activity-equal", file: "{trace}" }],
      }),
      config,
      { invoke },
    );

    expect(outcome.status).toBe("PASSED");
    expect(outcome.classification).toBe("expected-failure");
    expect(outcome.runs.map((r) => r.assertions.map((a) => a.comparison.status))).toEqual([
      ["pass"],
      ["pass"],
    ]);
  });

  it("should fail on an unexpected stage failure", async () => {
    const { invoke } = createFakeInvoker({
      compile: { exitCode: 1, stderr: "%Error: t_x.v:4:2: Unsupported\n" },
    });

    const outcome = await runTestCase(testCase({ scenarios: ["vlt"], compile: {} }), config, {
      invoke,
    });

    expect(outcome).toMatchObject({
      status: "FAILED",
      classification: "unexpected-stage-failure",
      diagnostic: "vlt: compile: exit code 1 (%Error: t_x.v:4:2: Unsupported)",
    });
    expect(outcome.runs[0].state).toBe("ABORTED");
  });

  it("should run assertions against artifacts the stages produced", async () => {
    const { invoke } = createFakeInvoker({
      compile: { files: { "Vt__stats.txt": "Tables created   3\n" } },
    });

    const outcome = await runTestCase(
      testCase({
        scenarios: ["vlt"],
        compile: { build: false },
        assertions: [
          { kind: "pattern-extract", file: "{stats}", pattern: "Tables created\\s+(\\d+)", expected: 7 },
        ],
      }),
      config,
      { invoke },
    );

    const stats = join(dir, "obj_dir", "obj_vlt", "t_x", "Vt__stats.txt");
    expect(outcome).toMatchObject({
      status: "FAILED",
      classification: "assertion-mismatch",
      diagnostic: `vlt: ${stats}:1: capture group 1 is '3', expected '7' (line: Tables created   3)`,
    });
    expect(outcome.runs[0].assertions).toHaveLength(1);
  });

  it("should error when a golden reference is missing", async () => {
    const { invoke } = createFakeInvoker({ execute: { files: { "simx.vcd": "" } } });

    const outcome = await runTestCase(
      testCase({
        scenarios: ["vlt"],
        compile: {},
        execute: {},
        assertions: [{ kind: "waveform-equal", file: "{trace}" }],
      }),
      config,
      { invoke },
    );

    expect(outcome).toMatchObject({
      status: "ERRORED",
      classification: "infrastructure-error",
      diagnostic: `vlt: Golden reference missing: ${join(testsDir, "t_x.out")}`,
    });
  });

  it("should start every scenario run from an empty object directory", async () => {
    const objDir = join(dir, "obj_dir", "obj_vlt", "t_x");
    await mkdir(objDir, { recursive: true });
    await writeFile(join(objDir, "stale.txt"), "old");
    const { invoke } = createFakeInvoker();

    await runTestCase(testCase({ scenarios: ["vlt"], compile: {} }), config, { invoke });

    await expect(access(join(objDir, "stale.txt"))).rejects.toThrow();
  });

  it("should skip with the declared reason", async () => {
    const { invoke, calls } = createFakeInvoker();

    const outcome = await runTestCase(
      testCase({ scenarios: ["vlt"], compile: {}, skip: "needs a license" }),
      config,
      { invoke },
    );

    expect(outcome).toMatchObject({
      status: "SKIPPED",
      classification: "skip",
      diagnostic: "needs a license",
    });
    expect(calls).toEqual([]);
  });

  it("should skip when no declared scenario is active", async () => {
    const outcome = await runTestCase(testCase({ scenarios: ["dist"], lint: {} }), config);

    expect(outcome).toMatchObject({
      status: "SKIPPED",
      diagnostic: "no declared scenario is active in this run",
    });
    expect(outcome.runs).toEqual([]);
  });

  it("should error on an unknown declared scenario", async () => {
    const outcome = await runTestCase(testCase({ scenarios: ["vlt", "bogus"], compile: {} }), config);

    expect(outcome).toMatchObject({
      status: "ERRORED",
      classification: "infrastructure-error",
      diagnostic: `Invalid test declaration ${join(testsDir, "t_x.json")}: unknown scenario label(s) bogus`,
    });
  });

  it("should refuse to run twice", async () => {
    const { invoke } = createFakeInvoker();
    const controller = new TestCaseController(
      testCase({ scenarios: ["vlt"], compile: {} }),
      config,
      { invoke },
    );

    await controller.run();

    await expect(controller.run()).rejects.toThrow(
      "test t_x: illegal transition PASSED -> RUNNING",
    );
  });
});
