/**
 * Pipeline Stage Sequencer
 *
 * Drives one ScenarioRun through its stages:
 *
 *   PENDING -> LINTING -> DONE | ABORTED
 *   PENDING -> COMPILING -> (EXECUTING ->) DONE | ABORTED
 *
 * A stage runs only if the previous one passed. A declared failure ends
 * the pipeline in DONE; anything unexpected ends it in ABORTED.
 */

import type { RunConfig } from "../config.js";
import { InvalidTransitionError, ToolchainSpawnError, errorMessage } from "../errors.js";
import { compareTextFiles } from "../comparators/text.js";
import { createLogger } from "../log.js";
import { invokeToolchain, classifyStage, type ToolchainInvoker } from "../toolchain/invoker.js";
import type {
  FailureClass,
  PipelineState,
  ScenarioRun,
  StageOutcome,
  StageSpec,
} from "../types.js";
import { resolveArtifactPath } from "./paths.js";
import {
  buildCommand,
  executeCommand,
  toolchainCommand,
  type CommandConfig,
  type StageCommand,
} from "./commands.js";
import { runLabel } from "../scenarios.js";

const log = createLogger("pipeline");

export type SequencerConfig = CommandConfig &
  Pick<RunConfig, "timeoutMs" | "env" | "updateGolden" | "logIgnorePatterns">;

export interface SequencerOptions {
  invoke?: ToolchainInvoker;
  signal?: AbortSignal;
}

export interface PipelineFailure {
  classification: FailureClass;
  diagnostic: string;
}

export interface PipelineResult {
  state: "DONE" | "ABORTED";
  stages: StageOutcome[];
  /** Set when the pipeline ended ABORTED */
  failure?: PipelineFailure;
  /** Stage whose declared failure ended the pipeline */
  expectedFailure?: StageOutcome;
}

const TRANSITIONS: Readonly<Record<PipelineState, readonly PipelineState[]>> = {
  PENDING: ["LINTING", "COMPILING", "DONE", "ABORTED"],
  LINTING: ["DONE", "ABORTED"],
  COMPILING: ["EXECUTING", "DONE", "ABORTED"],
  EXECUTING: ["DONE", "ABORTED"],
  DONE: [],
  ABORTED: [],
};

const ERROR_LINE = /%Error|\berror\b/i;

/**
 * One-line description of why a stage did not meet its expectation.
 */
export const describeStageFailure = (outcome: StageOutcome, timeoutMs: number): string => {
  const { result, verdict } = outcome;
  const stage = result.stage;

  if (verdict === "cancelled") return `${stage}: run cancelled`;
  if (verdict === "timeout") return `${stage}: timed out after ${timeoutMs} ms`;
  if (result.exitCode === 0) return `${stage}: expected failure did not occur (exit code 0)`;

  const status =
    result.exitCode === null
      ? `killed by ${result.signal ?? "signal"}`
      : `exit code ${result.exitCode}`;

  const lines = `${result.stdout}\n${result.stderr}`
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  const stderrLines = result.stderr
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  const detail = lines.find((line) => ERROR_LINE.test(line)) ?? stderrLines[stderrLines.length - 1];

  return detail ? `${stage}: ${status} (${detail})` : `${stage}: ${status}`;
};

/**
 * Pipeline state machine for one ScenarioRun.
 */
export class PipelineSequencer {
  private current: PipelineState = "PENDING";
  private readonly stages: StageOutcome[] = [];
  private readonly invoke: ToolchainInvoker;
  private readonly signal?: AbortSignal;
  private readonly label: string;

  constructor(
    private readonly run: ScenarioRun,
    private readonly config: SequencerConfig,
    options: SequencerOptions = {},
  ) {
    this.invoke = options.invoke ?? invokeToolchain;
    this.signal = options.signal;
    this.label = `${run.testCase.name} ${runLabel(run)}`;
  }

  get state(): PipelineState {
    return this.current;
  }

  private transition(to: PipelineState): void {
    if (!TRANSITIONS[this.current].includes(to)) {
      throw new InvalidTransitionError("pipeline", this.current, to);
    }
    log.debug(`${this.label}: ${this.current} -> ${to}`);
    this.current = to;
  }

  private done(expectedFailure?: StageOutcome): PipelineResult {
    this.transition("DONE");
    return {
      state: "DONE",
      stages: [...this.stages],
      ...(expectedFailure ? { expectedFailure } : {}),
    };
  }

  private abort(failure: PipelineFailure): PipelineResult {
    this.transition("ABORTED");
    return { state: "ABORTED", stages: [...this.stages], failure };
  }

  /**
   * Run one invocation, classify it and check its log against the declared
   * expectFile. Returns the failure that ends the pipeline, if any.
   */
  private async runStage(
    command: StageCommand,
    spec: Pick<StageSpec, "fails" | "expectFile">,
  ): Promise<{ outcome: StageOutcome; failure?: PipelineFailure }> {
    const result = await this.invoke({
      stage: command.stage,
      command: command.command,
      args: command.args,
      cwd: command.cwd,
      timeoutMs: this.config.timeoutMs,
      env: this.config.env,
      signal: this.signal,
      logFile: command.logFile,
      artifactDir: this.run.paths.objDir,
    });

    const verdict = classifyStage(result, spec.fails);
    const outcome: StageOutcome = { result, verdict };
    this.stages.push(outcome);

    if (verdict === "cancelled") {
      return {
        outcome,
        failure: { classification: "infrastructure-error", diagnostic: "run cancelled" },
      };
    }
    if (verdict === "unexpected-failure" || verdict === "timeout") {
      return {
        outcome,
        failure: {
          classification: "unexpected-stage-failure",
          diagnostic: describeStageFailure(outcome, this.config.timeoutMs),
        },
      };
    }

    if (spec.expectFile !== undefined) {
      const check = await compareTextFiles(
        result.logFile ?? command.logFile,
        resolveArtifactPath(spec.expectFile, this.run.paths),
        {
          testsDir: this.run.paths.testsDir,
          ignorePatterns: this.config.logIgnorePatterns,
          updateGolden: this.config.updateGolden,
        },
      );
      outcome.expectCheck = check;
      if (check.status === "error") {
        return {
          outcome,
          failure: { classification: "infrastructure-error", diagnostic: check.message },
        };
      }
      if (check.status === "fail") {
        return {
          outcome,
          failure: { classification: "assertion-mismatch", diagnostic: check.message },
        };
      }
    }

    return { outcome };
  }

  /**
   * Run the pipeline to completion. Never throws for stage or spawn
   * failures; those end the pipeline in ABORTED.
   */
  async execute(): Promise<PipelineResult> {
    if (this.current !== "PENDING") {
      throw new InvalidTransitionError("pipeline", this.current, "PENDING");
    }
    if (!this.run.usesToolchain) {
      return this.done();
    }

    try {
      return await this.runPlan();
    } catch (error) {
      if (error instanceof InvalidTransitionError) throw error;
      const diagnostic =
        error instanceof ToolchainSpawnError
          ? error.message
          : `${this.current.toLowerCase()}: ${errorMessage(error)}`;
      return this.abort({ classification: "infrastructure-error", diagnostic });
    }
  }

  private async runPlan(): Promise<PipelineResult> {
    const plan = this.run.testCase.plan;

    if (plan.kind === "lint-only") {
      this.transition("LINTING");
      const lint = await this.runStage(
        toolchainCommand(this.run, "lint", plan.lint, this.config),
        plan.lint,
      );
      if (lint.failure) return this.abort(lint.failure);
      return this.done(lint.outcome.verdict === "expected-failure" ? lint.outcome : undefined);
    }

    this.transition("COMPILING");
    const compile = await this.runStage(
      toolchainCommand(this.run, "compile", plan.compile, this.config),
      plan.compile,
    );
    if (compile.failure) return this.abort(compile.failure);
    if (compile.outcome.verdict === "expected-failure") return this.done(compile.outcome);

    if (plan.compile.build) {
      const build = await this.runStage(buildCommand(this.run, this.config), { fails: false });
      if (build.failure) return this.abort(build.failure);
    }

    if (!plan.execute) return this.done();

    this.transition("EXECUTING");
    const execute = await this.runStage(executeCommand(this.run, plan.execute), plan.execute);
    if (execute.failure) return this.abort(execute.failure);
    return this.done(execute.outcome.verdict === "expected-failure" ? execute.outcome : undefined);
  }
}

/**
 * Run the pipeline for one ScenarioRun.
 */
export const runPipeline = (
  run: ScenarioRun,
  config: SequencerConfig,
  options: SequencerOptions = {},
): Promise<PipelineResult> => new PipelineSequencer(run, config, options).execute();
