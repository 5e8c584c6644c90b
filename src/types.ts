/**
 * TypeScript type definitions for regression declarations, pipeline runs
 * and aggregate reports
 */

import type { TestDeclaration } from "./declarations/schemas.js";

// =============================================================================
// Test Cases
// =============================================================================

/** Stages a pipeline can run, in execution order. */
export type StageName = "lint" | "compile" | "build" | "execute";

/**
 * Declared expectation for one pipeline stage.
 * `fails` inverts the exit-code semantics of the stage.
 */
export interface StageSpec {
  flags: readonly string[];
  fails: boolean;
  /** Golden log the stage output must match (after canonicalization) */
  expectFile?: string;
}

export interface CompileStageSpec extends StageSpec {
  /** Run the native build command after a successful toolchain compile */
  build: boolean;
}

export interface ExecuteStageSpec extends StageSpec {
  /** Arguments passed to the produced program (`flags` are unused here) */
  args: readonly string[];
}

/**
 * Pipeline plan for a test case (discriminated union by kind).
 */
export type PipelinePlan =
  | { kind: "lint-only"; lint: StageSpec }
  | { kind: "compile"; compile: CompileStageSpec; execute?: ExecuteStageSpec };

/**
 * A named group of additional toolchain flags. Every variant of a test is
 * run as its own ScenarioRun.
 */
export interface FlagVariant {
  name: string;
  flags: readonly string[];
}

/** Variant used when a declaration lists none. */
export const DEFAULT_VARIANT: FlagVariant = Object.freeze({
  name: "default",
  flags: Object.freeze([]),
});

/**
 * Post-run assertion (closed tagged set, one comparator per kind).
 * Paths may contain placeholders such as `{objDir}` or `{golden}`.
 */
export type AssertionSpec =
  | {
      kind: "pattern-extract";
      file: string;
      pattern: string;
      group: number;
      expected?: string;
    }
  | { kind: "pattern-absent"; file: string; pattern: string }
  | { kind: "text-equal"; file: string; golden: string }
  | { kind: "waveform-equal"; file: string; golden: string }
  | { kind: "activity-equal"; file: string; golden: string };

export type AssertionKind = AssertionSpec["kind"];

/**
 * One regression test, loaded from a declaration file. Frozen after load.
 */
export interface TestCase {
  /** Declaration file stem, e.g. "t_trace_abort" */
  readonly name: string;
  /** Absolute path of the declaration file */
  readonly declarationPath: string;
  /** Directory relative paths in the declaration resolve against */
  readonly testsDir: string;
  /** Absolute path of the HDL top source */
  readonly topFile: string;
  /** Absolute path of the golden reference */
  readonly golden: string;
  /** Absolute path of the optional C++ harness file */
  readonly pliFile: string;
  readonly scenarios: readonly string[];
  readonly flags: readonly string[];
  readonly variants: readonly FlagVariant[];
  readonly plan: PipelinePlan;
  readonly assertions: readonly AssertionSpec[];
  readonly skip?: string;
}

/** Raw declaration re-exported for consumers that validate files. */
export type { TestDeclaration };

// =============================================================================
// Scenario Runs
// =============================================================================

/**
 * Paths and names derived for one ScenarioRun. Placeholders in flags and
 * assertions expand from these values.
 */
export interface PathContext {
  name: string;
  scenario: string;
  prefix: string;
  testsDir: string;
  objDir: string;
  golden: string;
  stats: string;
  trace: string;
  pli: string;
}

/**
 * One concrete (test case, scenario, variant) tuple to execute.
 */
export interface ScenarioRun {
  readonly testCase: TestCase;
  readonly scenario: string;
  readonly variant: FlagVariant;
  /** Flags contributed by the scenario itself (e.g. --threads for vltmt) */
  readonly scenarioFlags: readonly string[];
  /** False when the scenario only runs assertions (no pipeline stages) */
  readonly usesToolchain: boolean;
  readonly paths: PathContext;
}

/**
 * Captured result of one toolchain (or build, or program) invocation.
 */
export interface StageResult {
  stage: StageName;
  command: string;
  args: string[];
  cwd: string;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
  cancelled: boolean;
  stdout: string;
  stderr: string;
  durationMs: number;
  /** Files present in the object directory after the stage */
  artifacts: string[];
  /** Stage log (stdout then stderr), when one was written */
  logFile?: string;
}

export type StageVerdict =
  | "passed"
  | "expected-failure"
  | "unexpected-failure"
  | "timeout"
  | "cancelled";

export interface StageOutcome {
  result: StageResult;
  verdict: StageVerdict;
  /** Present when the stage output was checked against a golden log */
  expectCheck?: ComparisonResult;
}

export type PipelineState =
  | "PENDING"
  | "LINTING"
  | "COMPILING"
  | "EXECUTING"
  | "DONE"
  | "ABORTED";

// =============================================================================
// Comparison
// =============================================================================

export type ComparisonFailureReason =
  | "no-match"
  | "mismatch"
  | "unexpected-match"
  | "missing-artifact";

/**
 * Result of one artifact comparison. `error` is an infrastructure fault
 * (golden reference missing or unreadable), never a content divergence.
 */
export type ComparisonResult =
  | { status: "pass" }
  | { status: "fail"; reason: ComparisonFailureReason; message: string }
  | { status: "error"; message: string };

export interface AssertionResult {
  assertion: AssertionSpec;
  comparison: ComparisonResult;
}

// =============================================================================
// Outcomes and Reports
// =============================================================================

/**
 * Error taxonomy shared by runs, outcomes and the report.
 */
export type FailureClass =
  | "skip"
  | "expected-failure"
  | "unexpected-stage-failure"
  | "assertion-mismatch"
  | "infrastructure-error";

export type ScenarioRunStatus = "passed" | "failed" | "errored";

export interface ScenarioRunResult {
  /** "<scenario>" or "<scenario>/<variant>" */
  label: string;
  scenario: string;
  variant: string;
  state: PipelineState;
  status: ScenarioRunStatus;
  stages: StageOutcome[];
  assertions: AssertionResult[];
  /** Set when status is not "passed", or when a declared failure occurred */
  classification?: FailureClass;
  diagnostic?: string;
}

export type OutcomeStatus = "PASSED" | "FAILED" | "SKIPPED" | "ERRORED";

/**
 * Rolled-up verdict for one TestCase.
 */
export interface Outcome {
  name: string;
  topFile: string;
  status: OutcomeStatus;
  classification?: FailureClass;
  diagnostic?: string;
  runs: ScenarioRunResult[];
  durationMs: number;
}

/**
 * Entry in the report for a TestCase that did not pass.
 */
export interface NonPassingEntry {
  name: string;
  status: Exclude<OutcomeStatus, "PASSED">;
  classification?: FailureClass;
  diagnostic?: string;
}

/**
 * Final aggregate report for a run.
 */
export interface RegressionReport {
  counts: Record<OutcomeStatus, number>;
  total: number;
  nonPassing: NonPassingEntry[];
  outcomes: Outcome[];
  cancelled: boolean;
  /** Tests that were never dispatched because the run was cancelled */
  notRun: string[];
  durationMs: number;
  exitCode: 0 | 1;
}

// =============================================================================
// Service Results
// =============================================================================

/**
 * Error result structure
 */
export interface ErrorResult {
  error: string;
}

/**
 * Type guard to check if result is an error
 */
export const isErrorResult = (result: unknown): result is ErrorResult =>
  typeof result === "object" &&
  result !== null &&
  "error" in result &&
  typeof result.error === "string";

/**
 * Test listing returned by list_tests.
 */
export interface TestListing {
  testsDir: string;
  tests: Array<{
    name: string;
    scenarios: readonly string[];
    pipeline: PipelinePlan["kind"];
    variants: string[];
    skip?: string;
    error?: string;
  }>;
}
