/**
 * Command construction for pipeline stages.
 */

import path from "path";
import type { RunConfig } from "../config.js";
import type { ExecuteStageSpec, ScenarioRun, StageName, StageSpec } from "../types.js";
import { expandPlaceholders, splitFlags } from "./paths.js";

export type CommandConfig = Pick<
  RunConfig,
  "toolchain" | "lintFlags" | "compileFlags" | "outputDirFlag" | "prefixFlag" | "buildCommand"
>;

/**
 * A fully materialized stage invocation.
 */
export interface StageCommand {
  stage: StageName;
  command: string;
  args: string[];
  cwd: string;
  logFile: string;
}

export const stageLogFile = (run: ScenarioRun, stage: StageName): string =>
  path.join(run.paths.objDir, `${stage}.log`);

const expandAll = (values: readonly string[], run: ScenarioRun): string[] =>
  splitFlags(values).map((value) => expandPlaceholders(value, run.paths));

/**
 * Toolchain argv for a lint or compile stage:
 * base flags, scenario flags, common flags, variant flags, stage flags,
 * then output directory, prefix and the top source.
 */
export const toolchainCommand = (
  run: ScenarioRun,
  stage: "lint" | "compile",
  spec: StageSpec,
  config: CommandConfig,
): StageCommand => {
  const base = stage === "lint" ? config.lintFlags : config.compileFlags;
  const flags = expandAll(
    [...base, ...run.scenarioFlags, ...run.testCase.flags, ...run.variant.flags, ...spec.flags],
    run,
  );

  return {
    stage,
    command: config.toolchain,
    args: [
      ...flags,
      config.outputDirFlag,
      run.paths.objDir,
      config.prefixFlag,
      run.paths.prefix,
      run.testCase.topFile,
    ],
    cwd: run.paths.objDir,
    logFile: stageLogFile(run, stage),
  };
};

/**
 * Native build of the generated model (e.g. make on the generated makefile).
 */
export const buildCommand = (run: ScenarioRun, config: CommandConfig): StageCommand => {
  const [command, ...args] = config.buildCommand.map((value) =>
    expandPlaceholders(value, run.paths),
  );
  return {
    stage: "build",
    command,
    args,
    cwd: run.paths.objDir,
    logFile: stageLogFile(run, "build"),
  };
};

/**
 * Run the built program `<objDir>/<prefix>` with the declared arguments.
 */
export const executeCommand = (run: ScenarioRun, spec: ExecuteStageSpec): StageCommand => ({
  stage: "execute",
  command: path.join(run.paths.objDir, run.paths.prefix),
  args: expandAll(spec.args, run),
  cwd: run.paths.objDir,
  logFile: stageLogFile(run, "execute"),
});
