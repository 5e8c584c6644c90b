/**
 * Run configuration.
 *
 * Built once per run from (lowest to highest precedence) defaults, the
 * optional `hdl-regress.config.json` in the tests directory, environment
 * variables, and explicit overrides. The result is frozen and passed
 * explicitly to every component.
 */

import { readFile } from "fs/promises";
import { availableParallelism } from "os";
import path from "path";
import { z } from "zod";
import { CONFIG_FILE_NAME } from "./declarations/discovery.js";
import { ConfigError, errorMessage, formatIssues } from "./errors.js";
import { deepFreeze } from "./immutable.js";

// =============================================================================
// Schema
// =============================================================================

const DEFAULT_TIMEOUT_MS = 10 * 60 * 1000;

const RunConfigObjectSchema = z
  .object({
    /** Directory holding declarations, sources and golden files */
    testsDir: z.string().min(1),
    /** Root for per-run object directories (default: <testsDir>/../obj_dir) */
    workRoot: z.string().min(1).optional(),
    /** Compiler/simulator binary */
    toolchain: z.string().min(1).default("verilator"),
    /** Base flags for a lint-only invocation */
    lintFlags: z.array(z.string()).default(["--lint-only"]),
    /** Base flags for a compile invocation */
    compileFlags: z.array(z.string()).default(["--cc"]),
    /** Flag that names the artifact output directory */
    outputDirFlag: z.string().min(1).default("--Mdir"),
    /** Flag that names the generated model prefix */
    prefixFlag: z.string().min(1).default("--prefix"),
    /** Model prefix; also the name of the built program */
    prefix: z.string().min(1).default("Vt"),
    /** Native build command run after compile; placeholders allowed */
    buildCommand: z
      .array(z.string())
      .min(1)
      .default(["make", "-C", "{objDir}", "-f", "{prefix}.mk", "{prefix}"]),
    /** Active scenario labels (aliases allowed) */
    scenarios: z.array(z.string().min(1)).min(1).default(["vlt"]),
    workers: z.number().int().positive().default(availableParallelism()),
    timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
    /** Thread count the multi-threaded scenario passes to the toolchain */
    threads: z.number().int().min(2).default(2),
    /** Overwrite text goldens with the produced output */
    updateGolden: z.boolean().default(false),
    /** Lines matching any of these are dropped before text comparison */
    logIgnorePatterns: z
      .array(z.string())
      .default(["^- V e r i l a t i o n", "^- Verilator:"]),
    verbose: z.boolean().default(false),
    /** Extra environment for every subprocess */
    env: z.record(z.string()).default({}),
  })
  .strict();

export const RunConfigSchema = RunConfigObjectSchema.transform((config) => {
  const testsDir = path.resolve(config.testsDir);
  const workRoot = config.workRoot
    ? path.resolve(testsDir, config.workRoot)
    : path.resolve(testsDir, "..", "obj_dir");
  return { ...config, testsDir, workRoot };
});

export type RunConfig = Readonly<z.output<typeof RunConfigSchema>>;

export type RunConfigInput = z.input<typeof RunConfigObjectSchema>;

export type RunConfigOverrides = Partial<RunConfigInput>;

// =============================================================================
// Sources
// =============================================================================

type Env = Record<string, string | undefined>;

const splitList = (value: string): string[] =>
  value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

/**
 * Read configuration values from environment variables.
 */
export const readEnvConfig = (env: Env): RunConfigOverrides => {
  const config: RunConfigOverrides = {};

  if (env.HDL_REGRESS_TESTS_DIR) config.testsDir = env.HDL_REGRESS_TESTS_DIR;
  if (env.HDL_REGRESS_WORK_ROOT) config.workRoot = env.HDL_REGRESS_WORK_ROOT;

  if (env.HDL_REGRESS_TOOLCHAIN) {
    config.toolchain = env.HDL_REGRESS_TOOLCHAIN;
  } else if (env.VERILATOR_ROOT) {
    config.toolchain = path.join(env.VERILATOR_ROOT, "bin", "verilator");
  }

  if (env.HDL_REGRESS_SCENARIOS) config.scenarios = splitList(env.HDL_REGRESS_SCENARIOS);
  if (env.HDL_REGRESS_JOBS) config.workers = Number(env.HDL_REGRESS_JOBS);
  if (env.HDL_REGRESS_TIMEOUT_MS) config.timeoutMs = Number(env.HDL_REGRESS_TIMEOUT_MS);
  if (env.HDL_REGRESS_UPDATE_GOLDEN === "1") config.updateGolden = true;
  if (env.HDL_REGRESS_VERBOSE === "1") config.verbose = true;

  return config;
};

/**
 * Read `hdl-regress.config.json` from the tests directory.
 * Returns an empty object if the file does not exist.
 */
export const readConfigFile = async (testsDir: string): Promise<Record<string, unknown>> => {
  const configPath = path.join(testsDir, CONFIG_FILE_NAME);

  let content: string;
  try {
    content = await readFile(configPath, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return {};
    }
    throw new ConfigError(`cannot read ${configPath}: ${errorMessage(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`${configPath} is not valid JSON: ${errorMessage(error)}`);
  }

  const object = z.record(z.unknown()).safeParse(parsed);
  if (!object.success) {
    throw new ConfigError(`${configPath} must contain a JSON object`);
  }
  return object.data;
};

/**
 * Validate a merged configuration object (pure function for testing).
 */
export const parseRunConfig = (input: unknown): RunConfig => {
  const parsed = RunConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error.issues));
  }
  return deepFreeze(parsed.data);
};

export interface LoadRunConfigOptions {
  testsDir?: string;
  overrides?: RunConfigOverrides;
  env?: Env;
}

/**
 * Build the run configuration from all sources.
 */
export const loadRunConfig = async (
  options: LoadRunConfigOptions = {},
): Promise<RunConfig> => {
  const env = options.env ?? process.env;
  const envConfig = readEnvConfig(env);
  const testsDir =
    options.overrides?.testsDir ?? options.testsDir ?? envConfig.testsDir;

  if (!testsDir) {
    throw new ConfigError(
      "testsDir: no tests directory given (pass one or set HDL_REGRESS_TESTS_DIR)",
    );
  }

  const fileConfig = await readConfigFile(path.resolve(testsDir));

  return parseRunConfig({
    ...fileConfig,
    ...envConfig,
    ...options.overrides,
    testsDir,
  });
};
