/**
 * Artifact Comparator
 *
 * One handler per assertion kind (closed set). Assertion paths are
 * expanded against the ScenarioRun's PathContext before comparison.
 */

import type { RunConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import { resolveArtifactPath } from "../pipeline/paths.js";
import type {
  AssertionKind,
  AssertionResult,
  AssertionSpec,
  ComparisonResult,
  PathContext,
} from "../types.js";
import { comparePatternAbsent, comparePatternExtract } from "./pattern.js";
import { compareActivityFiles } from "./saif.js";
import { compareTextFiles } from "./text.js";
import { compareWaveformFiles } from "./vcd.js";

export { extractPattern, checkPatternAbsent, findFirstMatch } from "./pattern.js";
export { canonicalizeText, compareTextLines, compareTextFiles } from "./text.js";
export { parseVcd, parseVcdContent, type WaveformTrace } from "./vcd-parser.js";
export { compareWaveforms, compareWaveformFiles } from "./vcd.js";
export { parseSaif, parseSaifContent, type ActivityTrace } from "./saif-parser.js";
export { compareActivity, compareActivityFiles } from "./saif.js";

export type ComparatorConfig = Pick<RunConfig, "updateGolden" | "logIgnorePatterns">;

export const ASSERTION_KINDS: readonly AssertionKind[] = [
  "pattern-extract",
  "pattern-absent",
  "text-equal",
  "waveform-equal",
  "activity-equal",
];

/**
 * Run one assertion against the artifacts of a ScenarioRun.
 */
export const runAssertion = async (
  assertion: AssertionSpec,
  paths: PathContext,
  config: ComparatorConfig,
): Promise<ComparisonResult> => {
  const file = resolveArtifactPath(assertion.file, paths);

  try {
    switch (assertion.kind) {
      case "pattern-extract":
        return await comparePatternExtract(
          file,
          assertion.pattern,
          assertion.group,
          assertion.expected,
        );
      case "pattern-absent":
        return await comparePatternAbsent(file, assertion.pattern);
      case "text-equal":
        return await compareTextFiles(file, resolveArtifactPath(assertion.golden, paths), {
          testsDir: paths.testsDir,
          ignorePatterns: config.logIgnorePatterns,
          updateGolden: config.updateGolden,
        });
      case "waveform-equal":
        return await compareWaveformFiles(file, resolveArtifactPath(assertion.golden, paths));
      case "activity-equal":
        return await compareActivityFiles(file, resolveArtifactPath(assertion.golden, paths));
      default: {
        const unhandled: never = assertion;
        return { status: "error", message: `Unsupported assertion ${JSON.stringify(unhandled)}` };
      }
    }
  } catch (error) {
    return { status: "error", message: `${assertion.kind} on ${file}: ${errorMessage(error)}` };
  }
};

/**
 * Run assertions in declaration order, stopping at the first that does not
 * pass. Results for assertions that ran are returned.
 */
export const runAssertions = async (
  assertions: readonly AssertionSpec[],
  paths: PathContext,
  config: ComparatorConfig,
): Promise<AssertionResult[]> => {
  const results: AssertionResult[] = [];
  for (const assertion of assertions) {
    const comparison = await runAssertion(assertion, paths, config);
    results.push({ assertion, comparison });
    if (comparison.status !== "pass") break;
  }
  return results;
};
