/**
 * Test utilities for comparator fixtures and test-case construction.
 */

import fs from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { z } from "zod";
import { compareActivityFiles } from "../src/comparators/saif.js";
import { compareWaveformFiles } from "../src/comparators/vcd.js";
import { parseDeclarationContent } from "../src/declarations/loader.js";
import type { InvocationRequest, ToolchainInvoker } from "../src/toolchain/invoker.js";
import type { ComparisonResult, StageName, StageResult, TestCase } from "../src/types.js";

const TEST_DIR = path.dirname(new URL(import.meta.url).pathname);
const FIXTURES_DIR = path.join(TEST_DIR, "fixtures");

export type Format = "vcd" | "saif";

export interface Fixture {
  name: string;
  path: string;
  format: Format;
  /** Produced trace */
  actual: string;
  /** Golden reference trace */
  golden: string;
}

/** Fixture file names, keyed by format. */
const FIXTURE_FILES: Record<Format, { actual: string; golden: string }> = {
  vcd: { actual: "simx.vcd", golden: "golden.vcd" },
  saif: { actual: "simx.saif", golden: "golden.saif" },
};

const ExpectationSchema = z.discriminatedUnion("status", [
  z.object({ status: z.literal("pass") }),
  z.object({
    status: z.literal("fail"),
    reason: z.enum(["no-match", "mismatch", "unexpected-match", "missing-artifact"]),
    message: z.string(),
  }),
  z.object({ status: z.literal("error"), message: z.string() }),
]);

/**
 * List all fixture directories for a given format.
 * Returns an empty array if no fixtures exist.
 */
export const listFixtures = async (format: Format): Promise<Fixture[]> => {
  const formatDir = path.join(FIXTURES_DIR, format);
  const files = FIXTURE_FILES[format];

  let entries;
  try {
    entries = await fs.readdir(formatDir, { withFileTypes: true });
  } catch {
    return [];
  }

  return entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort()
    .map((name) => {
      const dir = path.join(formatDir, name);
      return {
        name,
        path: dir,
        format,
        actual: path.join(dir, files.actual),
        golden: path.join(dir, files.golden),
      };
    });
};

/**
 * List all fixtures across all formats.
 */
export const listAllFixtures = async (): Promise<Fixture[]> => {
  const formats: Format[] = ["vcd", "saif"];
  const results = await Promise.all(formats.map(listFixtures));
  return results.flat();
};

/**
 * Load the expected comparison result for a fixture.
 * Returns null if `expect.json` doesn't exist.
 */
export const loadExpectation = async (fixture: Fixture): Promise<ComparisonResult | null> => {
  let content: string;
  try {
    content = await fs.readFile(path.join(fixture.path, "expect.json"), "utf-8");
  } catch {
    return null;
  }
  return ExpectationSchema.parse(JSON.parse(content));
};

/**
 * Save the expected comparison result for a fixture.
 */
export const saveExpectation = async (
  fixture: Fixture,
  result: ComparisonResult,
): Promise<void> => {
  const target = path.join(fixture.path, "expect.json");
  await fs.writeFile(target, JSON.stringify(result, null, 2) + "\n", "utf-8");
};

/**
 * Build a TestCase from an inline declaration object.
 */
export const declareTest = (decl: object, declarationPath = "/tests/t_x.json"): TestCase =>
  parseDeclarationContent(JSON.stringify(decl), declarationPath);

/**
 * Create a scratch directory under the OS temp dir.
 */
export const makeScratchDir = (prefix: string): Promise<string> =>
  fs.mkdtemp(path.join(tmpdir(), `${prefix}-`));

// =============================================================================
// Fake Toolchain
// =============================================================================

/**
 * Scripted behaviour of one stage. `files` are written into the stage's
 * working directory before it "exits".
 */
export interface StageStep {
  exitCode?: number;
  stdout?: string;
  stderr?: string;
  timedOut?: boolean;
  files?: Record<string, string>;
}

export type StageScript = Partial<Record<StageName, StageStep | Error>>;

/**
 * In-process stand-in for the toolchain. Records every request and answers
 * from the script; stages without a script entry exit 0.
 */
export const createFakeInvoker = (
  script: StageScript = {},
): { invoke: ToolchainInvoker; calls: InvocationRequest[] } => {
  const calls: InvocationRequest[] = [];

  const invoke: ToolchainInvoker = async (request) => {
    calls.push(request);
    const step = script[request.stage] ?? {};
    if (step instanceof Error) throw step;

    for (const [name, content] of Object.entries(step.files ?? {})) {
      await fs.writeFile(path.join(request.cwd, name), content, "utf-8");
    }

    const stdout = step.stdout ?? "";
    const stderr = step.stderr ?? "";
    if (request.logFile) {
      await fs.writeFile(request.logFile, stdout + stderr, "utf-8");
    }

    const timedOut = step.timedOut ?? false;
    const result: StageResult = {
      stage: request.stage,
      command: request.command,
      args: [...request.args],
      cwd: request.cwd,
      exitCode: timedOut ? null : step.exitCode ?? 0,
      signal: timedOut ? "SIGTERM" : null,
      timedOut,
      cancelled: request.signal?.aborted ?? false,
      stdout,
      stderr,
      durationMs: 1,
      artifacts: [],
    };
    if (request.logFile) result.logFile = request.logFile;
    return result;
  };

  return { invoke, calls };
};

// =============================================================================
// Fixture Comparison
// =============================================================================

/**
 * Compare a fixture's produced trace against its golden, with messages
 * labelled relative to the fixture directory.
 */
export const compareFixture = async (fixture: Fixture): Promise<ComparisonResult> => {
  const result =
    fixture.format === "vcd"
      ? await compareWaveformFiles(fixture.actual, fixture.golden)
      : await compareActivityFiles(fixture.actual, fixture.golden);
  if (result.status === "pass") return result;
  return { ...result, message: result.message.replaceAll(`${fixture.path}${path.sep}`, "") };
};
