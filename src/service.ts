/**
 * Regression Service
 *
 * Entry points shared by the CLI and the MCP server. Every function
 * returns its result or an ErrorResult; none throws for user errors.
 */

import path from "path";
import { loadRunConfig, type RunConfig, type RunConfigOverrides } from "./config.js";
import {
  createNameFilter,
  discoverTestCases,
  findDeclarationFiles,
  type DiscoveryResult,
} from "./declarations/discovery.js";
import { loadTestCase, testNameFromPath } from "./declarations/loader.js";
import { errorMessage } from "./errors.js";
import { createLogger, setVerbose } from "./log.js";
import { runRegression } from "./scheduler.js";
import { activeScenarios, DEFAULT_REGISTRY, type ScenarioRegistry } from "./scenarios.js";
import type { ToolchainInvoker } from "./toolchain/invoker.js";
import type { ErrorResult, Outcome, RegressionReport, TestListing } from "./types.js";

export * from "./types.js";
export { loadRunConfig, parseRunConfig, type RunConfig } from "./config.js";
export { runRegression, ReportAccumulator } from "./scheduler.js";
export { runTestCase, TestCaseController } from "./controller.js";
export { DEFAULT_REGISTRY, defineScenario, resolveScenarioRuns } from "./scenarios.js";
export type { ScenarioRegistry, ScenarioDefinition } from "./scenarios.js";
export { invokeToolchain, classifyStage } from "./toolchain/invoker.js";

const log = createLogger();

// =============================================================================
// Path Normalization
// =============================================================================

/**
 * Normalize a directory path to POSIX separators. Agents often send
 * Windows-style paths regardless of platform.
 */
const normalizePath = (inputPath: string): string =>
  path.normalize(inputPath.replace(/\\/g, "/"));

/**
 * Compile test-name patterns, reporting the first invalid one.
 */
const checkPatterns = (patterns: readonly string[]): ErrorResult | null => {
  for (const pattern of patterns) {
    try {
      new RegExp(pattern);
    } catch {
      return { error: `Invalid regex pattern '${pattern}'` };
    }
  }
  return null;
};

// =============================================================================
// Listing
// =============================================================================

/**
 * List the test declarations in a tests directory, optionally filtered by
 * a test-name regex. Invalid declarations are listed with an `error`.
 */
export const listTests = async (
  testsDir?: string,
  pattern?: string,
): Promise<TestListing | ErrorResult> => {
  const patterns = pattern ? [pattern] : [];
  const invalid = checkPatterns(patterns);
  if (invalid) return invalid;

  let config: RunConfig;
  try {
    config = await loadRunConfig(testsDir ? { testsDir: normalizePath(testsDir) } : {});
  } catch (error) {
    return { error: errorMessage(error) };
  }

  let files: string[];
  try {
    files = await findDeclarationFiles(config.testsDir);
  } catch (error) {
    return { error: `Cannot read tests directory ${config.testsDir}: ${errorMessage(error)}` };
  }

  const matches = createNameFilter(patterns);
  const tests: TestListing["tests"] = [];

  for (const file of files) {
    const name = testNameFromPath(file);
    if (!matches(name)) continue;
    try {
      const testCase = await loadTestCase(file);
      tests.push({
        name,
        scenarios: testCase.scenarios,
        pipeline: testCase.plan.kind,
        variants: testCase.variants.map((variant) => variant.name),
        ...(testCase.skip !== undefined ? { skip: testCase.skip } : {}),
      });
    } catch (error) {
      tests.push({
        name,
        scenarios: [],
        pipeline: "lint-only",
        variants: [],
        error: errorMessage(error),
      });
    }
  }

  return { testsDir: config.testsDir, tests };
};

// =============================================================================
// Running
// =============================================================================

export interface RunTestsOptions {
  testsDir?: string;
  /** Test-name regexes; empty runs every declaration */
  patterns?: readonly string[];
  overrides?: RunConfigOverrides;
  env?: Record<string, string | undefined>;
  signal?: AbortSignal;
  invoke?: ToolchainInvoker;
  registry?: ScenarioRegistry;
  onOutcome?: (outcome: Outcome, completed: number, total: number) => void;
}

/**
 * Discover the selected tests and run them to a RegressionReport.
 */
export const runTests = async (
  options: RunTestsOptions = {},
): Promise<RegressionReport | ErrorResult> => {
  const patterns = options.patterns ?? [];
  const invalid = checkPatterns(patterns);
  if (invalid) return invalid;

  let config: RunConfig;
  try {
    config = await loadRunConfig({
      ...(options.testsDir ? { testsDir: normalizePath(options.testsDir) } : {}),
      ...(options.overrides ? { overrides: options.overrides } : {}),
      ...(options.env ? { env: options.env } : {}),
    });
  } catch (error) {
    return { error: errorMessage(error) };
  }

  if (config.verbose) setVerbose(true);

  try {
    activeScenarios(config, options.registry ?? DEFAULT_REGISTRY);
  } catch (error) {
    return { error: errorMessage(error) };
  }

  let discovered: DiscoveryResult;
  try {
    discovered = await discoverTestCases(config.testsDir, patterns);
  } catch (error) {
    return { error: `Cannot read tests directory ${config.testsDir}: ${errorMessage(error)}` };
  }

  const { testCases, failures } = discovered;
  if (testCases.length === 0 && failures.length === 0) {
    return { error: `No tests found in ${config.testsDir}` };
  }

  log.info(
    `${testCases.length + failures.length} test(s), scenarios ${config.scenarios.join(",")}, ` +
      `${config.workers} worker(s)`,
  );

  try {
    return await runRegression(testCases, config, {
      failures,
      signal: options.signal,
      invoke: options.invoke,
      registry: options.registry,
      onOutcome: options.onOutcome,
    });
  } catch (error) {
    return { error: errorMessage(error) };
  }
};
