/**
 * Tests for the scheduler and report accumulation
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, rm } from "fs/promises";
import { join } from "path";
import { createFakeInvoker, declareTest, makeScratchDir } from "../test/utils.js";
import { parseRunConfig, type RunConfig } from "./config.js";
import { ReportAccumulator, runRegression } from "./scheduler.js";
import type { ToolchainInvoker } from "./toolchain/invoker.js";
import type { Outcome, TestCase } from "./types.js";

const outcome = (name: string, status: Outcome["status"], diagnostic?: string): Outcome => ({
  name,
  topFile: `/tests/${name}.v`,
  status,
  ...(diagnostic !== undefined ? { diagnostic } : {}),
  runs: [],
  durationMs: 0,
});

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("ReportAccumulator", () => {
  it("should count statuses and list non-passing tests sorted by name", () => {
    const accumulator = new ReportAccumulator(4);
    accumulator.record(outcome("t_c", "FAILED", "vlt: compile: exit code 1"));
    accumulator.record(outcome("t_a", "PASSED"));
    accumulator.record(outcome("t_b", "SKIPPED", "needs a license"));

    const report = accumulator.finish(false);

    expect(report.counts).toEqual({ PASSED: 1, FAILED: 1, SKIPPED: 1, ERRORED: 0 });
    expect(report.total).toBe(4);
    expect(report.outcomes.map((o) => o.name)).toEqual(["t_a", "t_b", "t_c"]);
    expect(report.nonPassing).toEqual([
      { name: "t_b", status: "SKIPPED", diagnostic: "needs a license" },
      { name: "t_c", status: "FAILED", diagnostic: "vlt: compile: exit code 1" },
    ]);
    expect(report.exitCode).toBe(1);
  });

  it("should exit zero when nothing failed or errored", () => {
    const accumulator = new ReportAccumulator(2);
    accumulator.record(outcome("t_a", "PASSED"));
    accumulator.record(outcome("t_b", "SKIPPED"));

    expect(accumulator.finish(false).exitCode).toBe(0);
  });

  it("should exit non-zero for a cancelled run", () => {
    const accumulator = new ReportAccumulator(2);
    accumulator.record(outcome("t_a", "PASSED"));

    const report = accumulator.finish(true, ["t_b"]);

    expect(report.cancelled).toBe(true);
    expect(report.notRun).toEqual(["t_b"]);
    expect(report.exitCode).toBe(1);
  });

  it("should reject a second outcome for the same test", () => {
    const accumulator = new ReportAccumulator(1);
    accumulator.record(outcome("t_a", "PASSED"));

    expect(() => accumulator.record(outcome("t_a", "FAILED"))).toThrow(
      "Outcome for 't_a' recorded twice",
    );
  });
});

describe("runRegression", () => {
  let dir: string;
  let testsDir: string;

  const config = (workers: number): RunConfig =>
    parseRunConfig({ testsDir, scenarios: ["vlt"], workers });

  const makeTests = (count: number): TestCase[] =>
    Array.from({ length: count }, (_, i) =>
      declareTest(
        i % 3 === 2
          ? { scenarios: ["vlt"], compile: { fails: true } }
          : { scenarios: ["vlt"], compile: { build: false } },
        join(testsDir, `t_${i}.json`),
      ),
    );

  beforeEach(async () => {
    dir = await makeScratchDir("scheduler");
    testsDir = join(dir, "tests");
    await mkdir(testsDir);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should never exceed the worker limit", async () => {
    const { invoke: fake } = createFakeInvoker();
    let active = 0;
    let peak = 0;
    const invoke: ToolchainInvoker = async (request) => {
      active++;
      peak = Math.max(peak, active);
      await delay(20);
      active--;
      return fake(request);
    };

    const report = await runRegression(makeTests(8), config(3), { invoke });

    expect(peak).toBeLessThanOrEqual(3);
    expect(peak).toBeGreaterThan(1);
    expect(report.total).toBe(8);
    expect(report.outcomes).toHaveLength(8);
  });

  it("should produce the same report at any worker count", async () => {
    const tests = makeTests(6);
    const summarize = (outcomes: Outcome[]) =>
      outcomes.map((o) => [o.name, o.status, o.classification, o.diagnostic]);

    const sequential = await runRegression(tests, config(1), {
      invoke: createFakeInvoker().invoke,
    });
    const parallel = await runRegression(tests, config(4), {
      invoke: createFakeInvoker().invoke,
    });

    expect(summarize(parallel.outcomes)).toEqual(summarize(sequential.outcomes));
    expect(parallel.counts).toEqual(sequential.counts);
    expect(sequential.counts).toEqual({ PASSED: 4, FAILED: 2, SKIPPED: 0, ERRORED: 0 });
    expect(sequential.nonPassing.map((e) => e.name)).toEqual(["t_2", "t_5"]);
  });

  it("should report declarations that failed to load as errored", async () => {
    const report = await runRegression(makeTests(1), config(1), {
      invoke: createFakeInvoker().invoke,
      failures: [
        {
          name: "t_bad",
          declarationPath: join(testsDir, "t_bad.json"),
          error: "Invalid test declaration: scenarios: Required",
        },
      ],
    });

    expect(report.total).toBe(2);
    expect(report.nonPassing).toEqual([
      {
        name: "t_bad",
        status: "ERRORED",
        classification: "infrastructure-error",
        diagnostic: "Invalid test declaration: scenarios: Required",
      },
    ]);
    expect(report.exitCode).toBe(1);
  });

  it("should report progress for every outcome", async () => {
    const progress: string[] = [];

    await runRegression(makeTests(3), config(2), {
      invoke: createFakeInvoker().invoke,
      onOutcome: (_outcome, completed, total) => progress.push(`${completed}/${total}`),
    });

    expect(progress).toEqual(["1/3", "2/3", "3/3"]);
  });

  it("should stop dispatching once cancelled", async () => {
    const controller = new AbortController();

    const report = await runRegression(makeTests(3), config(1), {
      invoke: createFakeInvoker().invoke,
      signal: controller.signal,
      onOutcome: () => controller.abort(),
    });

    expect(report.cancelled).toBe(true);
    expect(report.outcomes.map((o) => [o.name, o.status])).toEqual([["t_0", "PASSED"]]);
    expect(report.notRun).toEqual(["t_1", "t_2"]);
    expect(report.total).toBe(3);
    expect(report.exitCode).toBe(1);
  });

  it("should not count a test that finished after cancellation as passed", async () => {
    const controller = new AbortController();
    const { invoke: fake } = createFakeInvoker();
    const invoke: ToolchainInvoker = async (request) => {
      const result = await fake(request);
      controller.abort();
      return result;
    };

    const report = await runRegression(makeTests(2), config(1), {
      invoke,
      signal: controller.signal,
    });

    expect(report.outcomes).toHaveLength(1);
    expect(report.outcomes[0]).toMatchObject({
      name: "t_0",
      status: "ERRORED",
      classification: "infrastructure-error",
      diagnostic: "run cancelled",
    });
    expect(report.notRun).toEqual(["t_1"]);
  });
});
