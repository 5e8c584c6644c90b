/**
 * End-to-end regression runs against a stand-in toolchain.
 *
 * The toolchain is test/fixtures/toolchain/fake-toolchain.mjs run by the
 * current Node binary, so the whole path from declarations to the report
 * is exercised with real subprocesses.
 */

import path from "node:path";
import { mkdir, rm, writeFile } from "node:fs/promises";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { runTests } from "../../src/service.js";
import { isErrorResult } from "../../src/types.js";
import { makeScratchDir } from "../utils.js";

const TEST_DIR = path.dirname(new URL(import.meta.url).pathname);
const FAKE_TOOLCHAIN = path.join(TEST_DIR, "..", "fixtures", "toolchain", "fake-toolchain.mjs");

describe("regression run", () => {
  let dir: string;
  let testsDir: string;

  const addTest = async (name: string, decl: object, source: string, golden?: string) => {
    await writeFile(path.join(testsDir, `${name}.json`), JSON.stringify(decl, null, 2));
    await writeFile(path.join(testsDir, `${name}.v`), source);
    if (golden !== undefined) {
      await writeFile(path.join(testsDir, `${name}.out`), golden);
    }
  };

  const run = (scenarios: string[], patterns: string[] = []) =>
    runTests({
      testsDir,
      patterns,
      env: {},
      overrides: {
        scenarios,
        workers: 2,
        timeoutMs: 30000,
        workRoot: path.join(dir, "obj_dir"),
        toolchain: process.execPath,
        lintFlags: [FAKE_TOOLCHAIN, "--lint-only"],
        compileFlags: [FAKE_TOOLCHAIN, "--cc"],
        buildCommand: [process.execPath, FAKE_TOOLCHAIN, "--build", "{objDir}", "{prefix}"],
      },
    });

  beforeEach(async () => {
    dir = await makeScratchDir("regression");
    testsDir = path.join(dir, "tests");
    await mkdir(testsDir);

    await addTest(
      "t_pass",
      {
        scenarios: ["vlt_all"],
        compile: {},
        execute: {},
        assertions: [
          { kind: "pattern-extract", file: "{stats}", pattern: "Tables created\\s+(\\d+)", expected: 3 },
          { kind: "text-equal", file: "{objDir}/execute.log" },
        ],
      },
      "// TABLES=3\nmodule t; endmodule\n",
      "*-* All Finished *-*\n",
    );
    await addTest(
      "t_lint_bad",
      { scenarios: ["linter"], lint: { fails: true, expectFile: "{golden}" } },
      "SYNTAX_ERROR\n",
      "%Error: tests/t_lint_bad.v:1:1: syntax error\n",
    );
    await addTest(
      "t_stats",
      {
        scenarios: ["vlt"],
        compile: { build: false },
        assertions: [
          { kind: "pattern-extract", file: "{stats}", pattern: "Tables created\\s+(\\d+)", expected: 7 },
        ],
      },
      "// TABLES=3\n",
    );
    await addTest(
      "t_sim_abort",
      { scenarios: ["vlt"], compile: {}, execute: {} },
      "// SIM_FAIL\n",
    );
    await addTest(
      "t_dist",
      {
        scenarios: ["dist"],
        lint: {},
        assertions: [{ kind: "pattern-absent", file: "t_dist.v", pattern: "TODO" }],
      },
      "module t; endmodule\n",
    );
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should fold every test into the report", async () => {
    const report = await run(["vlt_all", "dist"]);

    if (isErrorResult(report)) throw new Error(report.error);
    expect(report.counts).toEqual({ PASSED: 3, FAILED: 2, SKIPPED: 0, ERRORED: 0 });
    expect(report.exitCode).toBe(1);

    const stats = path.join(dir, "obj_dir", "obj_vlt", "t_stats", "Vt__stats.txt");
    expect(report.nonPassing).toEqual([
      {
        name: "t_sim_abort",
        status: "FAILED",
        classification: "unexpected-stage-failure",
        diagnostic: "vlt: execute: exit code 1",
      },
      {
        name: "t_stats",
        status: "FAILED",
        classification: "assertion-mismatch",
        diagnostic: `vlt: ${stats}:3: capture group 1 is '3', expected '7' (line: Optimizations, Tables created   3)`,
      },
    ]);

    const byName = new Map(report.outcomes.map((o) => [o.name, o]));
    expect(byName.get("t_pass")?.runs.map((r) => r.label)).toEqual(["vlt", "vltmt"]);
    expect(byName.get("t_lint_bad")?.classification).toBe("expected-failure");
    expect(byName.get("t_dist")?.runs.map((r) => r.stages.length)).toEqual([0]);
  });

  it("should skip tests whose scenarios are not active", async () => {
    const report = await run(["vlt"], ["^t_(dist|pass)$"]);

    if (isErrorResult(report)) throw new Error(report.error);
    expect(report.outcomes.map((o) => [o.name, o.status])).toEqual([
      ["t_dist", "SKIPPED"],
      ["t_pass", "PASSED"],
    ]);
    expect(report.exitCode).toBe(0);
  });
});
