/**
 * Switching-activity comparator (`activity-equal`).
 *
 * Compares the semantic header fields and the complete per-signal counter
 * set of two SAIF files. Tool metadata (DATE, VENDOR, PROGRAM_NAME,
 * VERSION) is ignored; ordering of nets and counters is irrelevant; any
 * numeric difference fails.
 */

import { compareStrings } from "../compare.js";
import { errorMessage } from "../errors.js";
import type { ComparisonResult } from "../types.js";
import { PASS, readArtifact, readGolden } from "./artifacts.js";
import {
  parseSaifContent,
  SEMANTIC_HEADER_FIELDS,
  type ActivityTrace,
  type SaifSignal,
} from "./saif-parser.js";

const mismatch = (message: string): ComparisonResult => ({
  status: "fail",
  reason: "mismatch",
  message,
});

const signalKey = (signal: SaifSignal): string => `${signal.section} ${signal.path}`;

const describeSignal = (signal: SaifSignal): string =>
  signal.section === "net" ? signal.path : `${signal.path} (port)`;

const diffCounters = (actual: SaifSignal, golden: SaifSignal): string | null => {
  const names = [
    ...new Set([...Object.keys(actual.counters), ...Object.keys(golden.counters)]),
  ].sort(compareStrings);

  for (const name of names) {
    const act = actual.counters[name];
    const gold = golden.counters[name];
    if (act === gold) continue;
    if (act === undefined) return `${describeSignal(golden)}: missing counter ${name} (expected ${gold})`;
    if (gold === undefined) return `${describeSignal(actual)}: unexpected counter ${name}=${act}`;
    return `${describeSignal(actual)}: ${name} expected ${gold}, got ${act}`;
  }
  return null;
};

/**
 * Compare two canonical activity traces (pure function for testing).
 */
export const compareActivity = (
  actual: ActivityTrace,
  golden: ActivityTrace,
  label: string,
): ComparisonResult => {
  for (const field of SEMANTIC_HEADER_FIELDS) {
    const act = actual.header[field];
    const gold = golden.header[field];
    if (act !== gold) {
      return mismatch(`${label}: header ${field} expected ${gold ?? "(none)"}, got ${act ?? "(none)"}`);
    }
  }

  let a = 0;
  let g = 0;
  while (a < actual.signals.length || g < golden.signals.length) {
    const act = actual.signals[a];
    const gold = golden.signals[g];
    if (!act) return mismatch(`${label}: missing signal ${describeSignal(gold)}`);
    if (!gold) return mismatch(`${label}: extra signal ${describeSignal(act)}`);

    const order = compareStrings(signalKey(act), signalKey(gold));
    if (order > 0) return mismatch(`${label}: missing signal ${describeSignal(gold)}`);
    if (order < 0) return mismatch(`${label}: extra signal ${describeSignal(act)}`);

    const counterDiff = diffCounters(act, gold);
    if (counterDiff) return mismatch(`${label}: ${counterDiff}`);
    a++;
    g++;
  }

  return PASS;
};

/**
 * Compare a produced SAIF file against its golden reference.
 */
export const compareActivityFiles = async (
  filePath: string,
  goldenPath: string,
): Promise<ComparisonResult> => {
  const golden = await readGolden(goldenPath);
  if (!golden.ok) return golden.result;

  let goldenTrace: ActivityTrace;
  try {
    goldenTrace = parseSaifContent(golden.content);
  } catch (error) {
    return { status: "error", message: `Golden ${goldenPath}: ${errorMessage(error)}` };
  }

  const actual = await readArtifact(filePath);
  if (!actual.ok) return actual.result;

  let actualTrace: ActivityTrace;
  try {
    actualTrace = parseSaifContent(actual.content);
  } catch (error) {
    return mismatch(`${filePath}: ${errorMessage(error)}`);
  }

  return compareActivity(actualTrace, goldenTrace, filePath);
};
