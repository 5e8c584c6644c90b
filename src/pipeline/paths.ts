/**
 * Per-run path derivation and placeholder expansion.
 */

import path from "path";
import type { RunConfig } from "../config.js";
import { DEFAULT_VARIANT, type FlagVariant, type PathContext, type TestCase } from "../types.js";

/** Trace formats the toolchain can dump, keyed by the flag that selects them. */
const TRACE_FLAG_EXTENSIONS: ReadonlyArray<[flag: string, extension: string]> = [
  ["--trace-saif", "saif"],
  ["--trace-fst", "fst"],
];

/**
 * Split flag entries that hold several space-separated flags.
 */
export const splitFlags = (flags: readonly string[]): string[] =>
  flags.flatMap((entry) => entry.split(/\s+/)).filter((flag) => flag.length > 0);

/**
 * Trace file extension implied by a set of toolchain flags.
 */
export const traceExtension = (flags: readonly string[]): string => {
  for (const [flag, extension] of TRACE_FLAG_EXTENSIONS) {
    if (flags.includes(flag)) return extension;
  }
  return "vcd";
};

/**
 * All toolchain flags a test case declares for a variant, split.
 */
export const declaredFlags = (testCase: TestCase, variant: FlagVariant): string[] => {
  const stageFlags =
    testCase.plan.kind === "lint-only"
      ? testCase.plan.lint.flags
      : testCase.plan.compile.flags;
  return splitFlags([...testCase.flags, ...variant.flags, ...stageFlags]);
};

/**
 * Object directory for one ScenarioRun. Unique per (scenario, test, variant):
 * a named variant gets its own level below the test's directory, so no
 * combination of test and variant names can land on another run's directory.
 */
export const objDirFor = (
  workRoot: string,
  scenario: string,
  testName: string,
  variant: FlagVariant,
): string => {
  const testDir = path.join(workRoot, `obj_${scenario}`, testName);
  return variant.name === DEFAULT_VARIANT.name ? testDir : path.join(testDir, variant.name);
};

/**
 * Derive every path a ScenarioRun may reference.
 */
export const createPathContext = (
  testCase: TestCase,
  scenario: string,
  variant: FlagVariant,
  config: Pick<RunConfig, "workRoot" | "prefix">,
): PathContext => {
  const objDir = objDirFor(config.workRoot, scenario, testCase.name, variant);
  const extension = traceExtension(declaredFlags(testCase, variant));

  return {
    name: testCase.name,
    scenario,
    prefix: config.prefix,
    testsDir: testCase.testsDir,
    objDir,
    golden: testCase.golden,
    stats: path.join(objDir, `${config.prefix}__stats.txt`),
    trace: path.join(objDir, `simx.${extension}`),
    pli: testCase.pliFile,
  };
};

const PLACEHOLDER = /\{(name|scenario|prefix|testsDir|objDir|golden|stats|trace|pli)\}/g;

/**
 * Replace `{objDir}`-style placeholders with values from the context.
 * Unknown placeholders are left untouched.
 */
export const expandPlaceholders = (value: string, ctx: PathContext): string =>
  value.replace(PLACEHOLDER, (_match, key: keyof PathContext) => ctx[key]);

/**
 * Expand placeholders in a path and resolve it against the tests directory.
 */
export const resolveArtifactPath = (value: string, ctx: PathContext): string => {
  const expanded = expandPlaceholders(value, ctx);
  return path.isAbsolute(expanded) ? expanded : path.join(ctx.testsDir, expanded);
};
