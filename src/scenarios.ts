/**
 * Scenario vocabulary and resolution.
 *
 * A test declares the scenario labels it applies under; the run selects
 * the active labels. Both sides are alias-expanded and intersected, then
 * crossed with the test's flag variants to give the ScenarioRuns.
 */

import type { RunConfig } from "./config.js";
import { ConfigError, DeclarationError } from "./errors.js";
import { createPathContext } from "./pipeline/paths.js";
import type { ScenarioRun, TestCase } from "./types.js";

// =============================================================================
// Registry
// =============================================================================

export interface ScenarioDefinition {
  name: string;
  description: string;
  /** False for scenarios that only run assertions over the source tree */
  usesToolchain: boolean;
  /** Extra toolchain flags this scenario contributes */
  flags: (config: Pick<RunConfig, "threads">) => string[];
}

export interface ScenarioRegistry {
  /** Concrete scenarios, in canonical execution order */
  scenarios: readonly ScenarioDefinition[];
  /** Alias label -> concrete scenario names */
  aliases: Readonly<Record<string, readonly string[]>>;
}

export const DEFAULT_SCENARIOS: readonly ScenarioDefinition[] = [
  {
    name: "dist",
    description: "Source-tree checks without invoking the toolchain",
    usesToolchain: false,
    flags: () => [],
  },
  {
    name: "vlt",
    description: "Single-threaded compile and simulate",
    usesToolchain: true,
    flags: () => [],
  },
  {
    name: "vltmt",
    description: "Multi-threaded compile and simulate",
    usesToolchain: true,
    flags: (config) => ["--threads", String(config.threads)],
  },
];

export const DEFAULT_REGISTRY: ScenarioRegistry = {
  scenarios: DEFAULT_SCENARIOS,
  aliases: {
    vlt_all: ["vlt", "vltmt"],
    linter: ["vlt", "vltmt"],
    simulator: ["vlt", "vltmt"],
  },
};

/**
 * Return a registry with an additional concrete scenario (appended to the
 * canonical order) and optional aliases that include it.
 */
export const defineScenario = (
  registry: ScenarioRegistry,
  scenario: ScenarioDefinition,
  aliases: readonly string[] = [],
): ScenarioRegistry => {
  if (registry.scenarios.some((s) => s.name === scenario.name)) {
    throw new Error(`Scenario '${scenario.name}' is already defined`);
  }
  const merged: Record<string, readonly string[]> = { ...registry.aliases };
  for (const alias of aliases) {
    merged[alias] = [...(Object.hasOwn(merged, alias) ? merged[alias] : []), scenario.name];
  }
  return { scenarios: [...registry.scenarios, scenario], aliases: merged };
};

export const findScenario = (
  registry: ScenarioRegistry,
  name: string,
): ScenarioDefinition | undefined => registry.scenarios.find((s) => s.name === name);

/**
 * Expand labels (concrete names or aliases) to concrete scenario names.
 * Unknown labels are returned separately.
 */
export const expandLabels = (
  labels: readonly string[],
  registry: ScenarioRegistry = DEFAULT_REGISTRY,
): { scenarios: Set<string>; unknown: string[] } => {
  const scenarios = new Set<string>();
  const unknown: string[] = [];

  for (const label of labels) {
    if (Object.hasOwn(registry.aliases, label)) {
      registry.aliases[label].forEach((name) => scenarios.add(name));
    } else if (findScenario(registry, label)) {
      scenarios.add(label);
    } else {
      unknown.push(label);
    }
  }

  return { scenarios, unknown };
};

/**
 * Expand the run's active labels, rejecting unknown ones.
 */
export const activeScenarios = (
  config: Pick<RunConfig, "scenarios">,
  registry: ScenarioRegistry = DEFAULT_REGISTRY,
): Set<string> => {
  const { scenarios, unknown } = expandLabels(config.scenarios, registry);
  if (unknown.length > 0) {
    throw new ConfigError(`scenarios: unknown scenario label(s) ${unknown.join(", ")}`);
  }
  return scenarios;
};

// =============================================================================
// Resolution
// =============================================================================

/**
 * Resolve a test case into the ScenarioRuns to execute under this run.
 * An empty result means the test is skipped and no subprocess is started.
 *
 * Order is canonical scenario order, then declared variant order, so logs
 * are reproducible.
 */
export const resolveScenarioRuns = (
  testCase: TestCase,
  config: Pick<RunConfig, "scenarios" | "threads" | "workRoot" | "prefix">,
  registry: ScenarioRegistry = DEFAULT_REGISTRY,
): ScenarioRun[] => {
  const declared = expandLabels(testCase.scenarios, registry);
  if (declared.unknown.length > 0) {
    throw new DeclarationError(
      testCase.declarationPath,
      `unknown scenario label(s) ${declared.unknown.join(", ")}`,
    );
  }

  if (testCase.skip !== undefined) {
    return [];
  }

  const active = activeScenarios(config, registry);
  const runs: ScenarioRun[] = [];

  for (const scenario of registry.scenarios) {
    if (!declared.scenarios.has(scenario.name) || !active.has(scenario.name)) {
      continue;
    }
    for (const variant of testCase.variants) {
      runs.push({
        testCase,
        scenario: scenario.name,
        variant,
        scenarioFlags: scenario.flags(config),
        usesToolchain: scenario.usesToolchain,
        paths: createPathContext(testCase, scenario.name, variant, config),
      });
    }
  }

  return runs;
};

/**
 * Human-readable label for a ScenarioRun ("vlt" or "vlt/o3").
 */
export const runLabel = (run: Pick<ScenarioRun, "scenario" | "variant">): string =>
  run.variant.name === "default" ? run.scenario : `${run.scenario}/${run.variant.name}`;
