/**
 * Test Case Controller
 *
 * Owns one TestCase's lifecycle:
 *
 *   NOT_STARTED -> RUNNING -> PASSED | FAILED | SKIPPED | ERRORED
 *
 * ScenarioRuns execute sequentially in resolved order. Assertions run only
 * for pipelines that reached DONE.
 */

import { mkdir, rm } from "fs/promises";
import { runAssertions } from "./comparators/index.js";
import type { RunConfig } from "./config.js";
import { InvalidTransitionError, errorMessage } from "./errors.js";
import { createLogger } from "./log.js";
import { runPipeline, type PipelineFailure, type PipelineResult } from "./pipeline/sequencer.js";
import {
  DEFAULT_REGISTRY,
  resolveScenarioRuns,
  runLabel,
  type ScenarioRegistry,
} from "./scenarios.js";
import type { ToolchainInvoker } from "./toolchain/invoker.js";
import type {
  AssertionResult,
  Outcome,
  OutcomeStatus,
  ScenarioRun,
  ScenarioRunResult,
  TestCase,
} from "./types.js";

const log = createLogger("controller");

export type ControllerState = "NOT_STARTED" | "RUNNING" | OutcomeStatus;

const TRANSITIONS: Readonly<Record<ControllerState, readonly ControllerState[]>> = {
  NOT_STARTED: ["RUNNING"],
  RUNNING: ["PASSED", "FAILED", "SKIPPED", "ERRORED"],
  PASSED: [],
  FAILED: [],
  SKIPPED: [],
  ERRORED: [],
};

export interface ControllerOptions {
  invoke?: ToolchainInvoker;
  signal?: AbortSignal;
  registry?: ScenarioRegistry;
}

// =============================================================================
// Folding
// =============================================================================

/**
 * Fold ScenarioRun results into a TestCase status (pure function for
 * testing). Any errored run gives ERRORED, else any failed run gives
 * FAILED, else PASSED. No runs means SKIPPED.
 */
export const foldOutcome = (
  runs: readonly ScenarioRunResult[],
): Pick<Outcome, "status" | "classification" | "diagnostic"> => {
  if (runs.length === 0) {
    return { status: "SKIPPED", classification: "skip" };
  }

  const errored = runs.find((run) => run.status === "errored");
  if (errored) {
    return {
      status: "ERRORED",
      classification: errored.classification,
      diagnostic: `${errored.label}: ${errored.diagnostic ?? "infrastructure error"}`,
    };
  }

  const failed = runs.find((run) => run.status === "failed");
  if (failed) {
    return {
      status: "FAILED",
      classification: failed.classification,
      diagnostic: `${failed.label}: ${failed.diagnostic ?? "failed"}`,
    };
  }

  const expected = runs.some((run) => run.classification === "expected-failure");
  return expected ? { status: "PASSED", classification: "expected-failure" } : { status: "PASSED" };
};

const assertionFailure = (
  assertions: readonly AssertionResult[],
): Pick<ScenarioRunResult, "status" | "classification" | "diagnostic"> | null => {
  for (const { comparison } of assertions) {
    if (comparison.status === "error") {
      return {
        status: "errored",
        classification: "infrastructure-error",
        diagnostic: comparison.message,
      };
    }
    if (comparison.status === "fail") {
      return {
        status: "failed",
        classification: "assertion-mismatch",
        diagnostic: comparison.message,
      };
    }
  }
  return null;
};

// =============================================================================
// Controller
// =============================================================================

export class TestCaseController {
  private current: ControllerState = "NOT_STARTED";
  private readonly registry: ScenarioRegistry;

  constructor(
    readonly testCase: TestCase,
    private readonly config: RunConfig,
    private readonly options: ControllerOptions = {},
  ) {
    this.registry = options.registry ?? DEFAULT_REGISTRY;
  }

  get state(): ControllerState {
    return this.current;
  }

  private transition(to: ControllerState): void {
    if (!TRANSITIONS[this.current].includes(to)) {
      throw new InvalidTransitionError(`test ${this.testCase.name}`, this.current, to);
    }
    this.current = to;
  }

  private outcome(
    status: OutcomeStatus,
    fields: Pick<Outcome, "classification" | "diagnostic">,
    runs: ScenarioRunResult[],
    startTime: number,
  ): Outcome {
    this.transition(status);
    return {
      name: this.testCase.name,
      topFile: this.testCase.topFile,
      status,
      ...(fields.classification ? { classification: fields.classification } : {}),
      ...(fields.diagnostic !== undefined ? { diagnostic: fields.diagnostic } : {}),
      runs,
      durationMs: Date.now() - startTime,
    };
  }

  /**
   * Run every ScenarioRun of the test and fold the results into an Outcome.
   * Never rejects for test-level faults; those become ERRORED outcomes.
   */
  async run(): Promise<Outcome> {
    const startTime = Date.now();
    this.transition("RUNNING");

    let scenarioRuns: ScenarioRun[];
    try {
      scenarioRuns = resolveScenarioRuns(this.testCase, this.config, this.registry);
    } catch (error) {
      return this.outcome(
        "ERRORED",
        { classification: "infrastructure-error", diagnostic: errorMessage(error) },
        [],
        startTime,
      );
    }

    if (scenarioRuns.length === 0) {
      const diagnostic = this.testCase.skip ?? "no declared scenario is active in this run";
      return this.outcome("SKIPPED", { classification: "skip", diagnostic }, [], startTime);
    }

    const results: ScenarioRunResult[] = [];
    for (const scenarioRun of scenarioRuns) {
      const result = await this.runScenario(scenarioRun);
      results.push(result);
      log.debug(`${this.testCase.name} ${result.label}: ${result.status}`);
    }

    const folded = foldOutcome(results);
    return this.outcome(folded.status, folded, results, startTime);
  }

  private async runScenario(run: ScenarioRun): Promise<ScenarioRunResult> {
    const identity = {
      label: runLabel(run),
      scenario: run.scenario,
      variant: run.variant.name,
    };

    try {
      await rm(run.paths.objDir, { recursive: true, force: true });
      await mkdir(run.paths.objDir, { recursive: true });
    } catch (error) {
      return {
        ...identity,
        state: "ABORTED",
        status: "errored",
        stages: [],
        assertions: [],
        classification: "infrastructure-error",
        diagnostic: `cannot prepare ${run.paths.objDir}: ${errorMessage(error)}`,
      };
    }

    const pipeline: PipelineResult = await runPipeline(run, this.config, {
      invoke: this.options.invoke,
      signal: this.options.signal,
    });

    if (pipeline.state === "ABORTED") {
      const failure: PipelineFailure = pipeline.failure ?? {
        classification: "infrastructure-error",
        diagnostic: "pipeline aborted",
      };
      const failed =
        failure.classification === "unexpected-stage-failure" ||
        failure.classification === "assertion-mismatch";
      return {
        ...identity,
        state: pipeline.state,
        status: failed ? "failed" : "errored",
        stages: pipeline.stages,
        assertions: [],
        classification: failure.classification,
        diagnostic: failure.diagnostic,
      };
    }

    const assertions = await runAssertions(this.testCase.assertions, run.paths, this.config);
    const failure = assertionFailure(assertions);
    if (failure) {
      return { ...identity, state: pipeline.state, stages: pipeline.stages, assertions, ...failure };
    }

    const passed: ScenarioRunResult = {
      ...identity,
      state: pipeline.state,
      status: "passed",
      stages: pipeline.stages,
      assertions,
    };
    if (pipeline.expectedFailure) {
      passed.classification = "expected-failure";
      passed.diagnostic = `${pipeline.expectedFailure.result.stage} failed as declared`;
    }
    return passed;
  }
}

/**
 * Run one TestCase to its Outcome.
 */
export const runTestCase = (
  testCase: TestCase,
  config: RunConfig,
  options: ControllerOptions = {},
): Promise<Outcome> => new TestCaseController(testCase, config, options).run();
