/**
 * CLI argument parsing and the --version and --help commands.
 */

import { parseArgs } from "node:util";
import type { RunConfigOverrides } from "../config.js";
import type { ErrorResult } from "../types.js";
import { BINARY_NAME, VERSION } from "../version.js";

export type CliCommand = "run" | "mcp" | "help" | "version";

export interface CliOptions {
  command: CliCommand;
  testsDir?: string;
  /** Test-name regexes from positional arguments */
  patterns: string[];
  overrides: RunConfigOverrides;
  /** Print the report as JSON instead of the text summary */
  json: boolean;
}

const parsePositiveInt = (flag: string, value: string): number | ErrorResult => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    return { error: `${flag} expects a positive integer, got '${value}'` };
  }
  return parsed;
};

const parseRaw = (argv: readonly string[]) =>
  parseArgs({
    args: [...argv],
    allowPositionals: true,
    strict: true,
    options: {
      version: { type: "boolean", short: "v" },
      help: { type: "boolean", short: "h" },
      mcp: { type: "boolean" },
      json: { type: "boolean" },
      "tests-dir": { type: "string", short: "d" },
      "work-root": { type: "string" },
      toolchain: { type: "string" },
      scenarios: { type: "string", short: "s" },
      jobs: { type: "string", short: "j" },
      timeout: { type: "string" },
      "update-golden": { type: "boolean" },
      verbose: { type: "boolean" },
    },
  });

/**
 * Parse command-line arguments (without the node and script entries).
 */
export const parseCliArgs = (argv: readonly string[]): CliOptions | ErrorResult => {
  let parsed: ReturnType<typeof parseRaw>;
  try {
    parsed = parseRaw(argv);
  } catch (error) {
    return { error: error instanceof Error ? error.message : String(error) };
  }

  const { values, positionals } = parsed;
  const overrides: RunConfigOverrides = {};

  if (values["work-root"] !== undefined) overrides.workRoot = values["work-root"];
  if (values.toolchain !== undefined) overrides.toolchain = values.toolchain;
  if (values.scenarios !== undefined) {
    overrides.scenarios = values.scenarios
      .split(",")
      .map((label) => label.trim())
      .filter((label) => label.length > 0);
  }
  if (values.jobs !== undefined) {
    const jobs = parsePositiveInt("--jobs", values.jobs);
    if (typeof jobs !== "number") return jobs;
    overrides.workers = jobs;
  }
  if (values.timeout !== undefined) {
    const timeout = parsePositiveInt("--timeout", values.timeout);
    if (typeof timeout !== "number") return timeout;
    overrides.timeoutMs = timeout;
  }
  if (values["update-golden"]) overrides.updateGolden = true;
  if (values.verbose) overrides.verbose = true;

  const command: CliCommand = values.version
    ? "version"
    : values.help
      ? "help"
      : values.mcp
        ? "mcp"
        : "run";

  return {
    command,
    ...(values["tests-dir"] !== undefined ? { testsDir: values["tests-dir"] } : {}),
    patterns: positionals,
    overrides,
    json: values.json ?? false,
  };
};

/**
 * Print version information.
 */
export const printVersion = (): void => {
  console.log(`${BINARY_NAME} v${VERSION}`);
};

/**
 * Print help message.
 */
export const printHelp = (): void => {
  console.log(
    `
${BINARY_NAME} v${VERSION}

Regression runner for an HDL compiler/simulator toolchain.

USAGE:
  ${BINARY_NAME} [OPTIONS] [TEST_NAME_REGEX...]

OPTIONS:
  --tests-dir, -d <dir>    Directory holding test declarations (*.json)
  --scenarios, -s <list>   Active scenario labels, comma separated (default: vlt)
  --jobs, -j <n>           Concurrent tests (default: available CPUs)
  --timeout <ms>           Per-stage timeout in milliseconds (default: 600000)
  --toolchain <path>       Compiler/simulator binary (default: verilator)
  --work-root <dir>        Root for per-run object directories
  --update-golden          Overwrite text goldens with produced output
  --json                   Print the report as JSON
  --verbose                Log every command and state transition
  --mcp                    Run as an MCP server on stdio
  --version, -v            Print version and exit
  --help, -h               Show this help message

SCENARIOS:
  dist, vlt, vltmt; aliases vlt_all, linter, simulator

ENVIRONMENT:
  HDL_REGRESS_TESTS_DIR        Default tests directory
  HDL_REGRESS_WORK_ROOT        Default object directory root
  HDL_REGRESS_TOOLCHAIN        Toolchain binary
  VERILATOR_ROOT               Toolchain install (uses bin/verilator)
  HDL_REGRESS_SCENARIOS        Active scenario labels
  HDL_REGRESS_JOBS             Concurrent tests
  HDL_REGRESS_TIMEOUT_MS       Per-stage timeout
  HDL_REGRESS_UPDATE_GOLDEN=1  Overwrite text goldens
  HDL_REGRESS_VERBOSE=1        Debug logging

EXIT STATUS:
  0 when no test FAILED or ERRORED, 1 otherwise
`.trim(),
  );
};
