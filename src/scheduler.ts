/**
 * Scheduler / Aggregator
 *
 * Runs TestCase controllers under a bounded pool of async workers and
 * folds their outcomes into a RegressionReport. Outcomes reach the report
 * only through the ReportAccumulator.
 */

import { compareStrings } from "./compare.js";
import type { RunConfig } from "./config.js";
import { runTestCase } from "./controller.js";
import type { DeclarationFailure } from "./declarations/discovery.js";
import { createLogger } from "./log.js";
import type { ScenarioRegistry } from "./scenarios.js";
import type { ToolchainInvoker } from "./toolchain/invoker.js";
import type {
  NonPassingEntry,
  Outcome,
  OutcomeStatus,
  RegressionReport,
  TestCase,
} from "./types.js";

const log = createLogger("scheduler");

export const CANCELLED_DIAGNOSTIC = "run cancelled";

export interface RegressionOptions {
  signal?: AbortSignal;
  invoke?: ToolchainInvoker;
  registry?: ScenarioRegistry;
  /** Declarations that failed to load; each is reported ERRORED */
  failures?: readonly DeclarationFailure[];
  /** Called once per finished TestCase, in completion order */
  onOutcome?: (outcome: Outcome, completed: number, total: number) => void;
}

// =============================================================================
// Accumulation
// =============================================================================

/**
 * Single accumulation point for outcomes. Each TestCase name is recorded
 * at most once.
 */
export class ReportAccumulator {
  private readonly outcomes = new Map<string, Outcome>();
  private readonly startTime = Date.now();

  constructor(private readonly expected: number) {}

  get size(): number {
    return this.outcomes.size;
  }

  record(outcome: Outcome): void {
    if (this.outcomes.has(outcome.name)) {
      throw new Error(`Outcome for '${outcome.name}' recorded twice`);
    }
    this.outcomes.set(outcome.name, outcome);
  }

  has(name: string): boolean {
    return this.outcomes.has(name);
  }

  /**
   * Build the final report. `notRun` lists tests never dispatched.
   */
  finish(cancelled: boolean, notRun: readonly string[] = []): RegressionReport {
    const outcomes = [...this.outcomes.values()].sort((a, b) => compareStrings(a.name, b.name));

    const counts: Record<OutcomeStatus, number> = { PASSED: 0, FAILED: 0, SKIPPED: 0, ERRORED: 0 };
    const nonPassing: NonPassingEntry[] = [];

    for (const outcome of outcomes) {
      counts[outcome.status]++;
      if (outcome.status === "PASSED") continue;
      nonPassing.push({
        name: outcome.name,
        status: outcome.status,
        ...(outcome.classification ? { classification: outcome.classification } : {}),
        ...(outcome.diagnostic !== undefined ? { diagnostic: outcome.diagnostic } : {}),
      });
    }

    const failed = counts.FAILED > 0 || counts.ERRORED > 0;

    return {
      counts,
      total: Math.max(this.expected, outcomes.length),
      nonPassing,
      outcomes,
      cancelled,
      notRun: [...notRun].sort(compareStrings),
      durationMs: Date.now() - this.startTime,
      exitCode: failed || cancelled ? 1 : 0,
    };
  }
}

const declarationOutcome = (failure: DeclarationFailure): Outcome => ({
  name: failure.name,
  topFile: failure.declarationPath,
  status: "ERRORED",
  classification: "infrastructure-error",
  diagnostic: failure.error,
  runs: [],
  durationMs: 0,
});

/**
 * An outcome that finished after cancellation never counts as a pass.
 */
const cancelledOutcome = (outcome: Outcome): Outcome =>
  outcome.status === "SKIPPED"
    ? outcome
    : {
        ...outcome,
        status: "ERRORED",
        classification: "infrastructure-error",
        diagnostic: CANCELLED_DIAGNOSTIC,
      };

// =============================================================================
// Scheduling
// =============================================================================

/**
 * Run every TestCase with at most `config.workers` running at once.
 */
export const runRegression = async (
  testCases: readonly TestCase[],
  config: RunConfig,
  options: RegressionOptions = {},
): Promise<RegressionReport> => {
  const failures = options.failures ?? [];
  const total = testCases.length + failures.length;
  const accumulator = new ReportAccumulator(total);
  const signal = options.signal;

  const record = (outcome: Outcome): void => {
    accumulator.record(outcome);
    const completed = accumulator.size;
    const detail = outcome.diagnostic ? ` (${outcome.diagnostic})` : "";
    const line = `${completed}/${total} ${outcome.name} ${outcome.status}${detail}`;
    if (outcome.status === "FAILED" || outcome.status === "ERRORED") {
      log.warn(line);
    } else {
      log.info(line);
    }
    options.onOutcome?.(outcome, completed, total);
  };

  failures.forEach((failure) => record(declarationOutcome(failure)));

  const queue = [...testCases];
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < queue.length && !signal?.aborted) {
      const testCase = queue[next++];
      const outcome = await runTestCase(testCase, config, {
        invoke: options.invoke,
        signal,
        registry: options.registry,
      });
      record(signal?.aborted ? cancelledOutcome(outcome) : outcome);
    }
  };

  const workerCount = Math.max(1, Math.min(config.workers, queue.length));
  log.debug(`running ${queue.length} test(s) on ${workerCount} worker(s)`);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  const cancelled = signal?.aborted ?? false;
  const notRun = queue.filter((tc) => !accumulator.has(tc.name)).map((tc) => tc.name);
  if (cancelled) {
    log.warn(`run cancelled; ${notRun.length} test(s) not run`);
  }

  return accumulator.finish(cancelled, notRun);
};
