/**
 * Waveform trace comparator (`waveform-equal`).
 *
 * Both traces are parsed into the canonical model of vcd-parser.ts, then
 * compared in a fixed order: timescale, signal hierarchy, then value
 * changes time step by time step. Only the first divergence is reported.
 */

import { compareStrings } from "../compare.js";
import { errorMessage } from "../errors.js";
import type { ComparisonResult } from "../types.js";
import { PASS, readArtifact, readGolden } from "./artifacts.js";
import {
  parseVcdContent,
  type VcdChange,
  type VcdSignal,
  type WaveformTrace,
} from "./vcd-parser.js";

const mismatch = (message: string): ComparisonResult => ({
  status: "fail",
  reason: "mismatch",
  message,
});

const describeSignal = (signal: VcdSignal): string =>
  `${signal.type}[${signal.width}]`;

/**
 * First difference between two sorted signal lists, or null.
 */
const diffSignals = (
  actual: readonly VcdSignal[],
  golden: readonly VcdSignal[],
): string | null => {
  let a = 0;
  let g = 0;
  while (a < actual.length || g < golden.length) {
    const act = actual[a];
    const gold = golden[g];
    if (!act) return `missing signal ${gold.path}`;
    if (!gold) return `extra signal ${act.path}`;

    const order = compareStrings(act.path, gold.path);
    if (order > 0) return `missing signal ${gold.path}`;
    if (order < 0) return `extra signal ${act.path}`;

    if (act.type !== gold.type || act.width !== gold.width) {
      return `signal ${act.path}: expected ${describeSignal(gold)}, got ${describeSignal(act)}`;
    }
    a++;
    g++;
  }
  return null;
};

/**
 * First difference between the change lists of one time step, or null.
 */
const diffChanges = (
  time: string,
  actual: readonly VcdChange[],
  golden: readonly VcdChange[],
): string | null => {
  const length = Math.max(actual.length, golden.length);
  for (let i = 0; i < length; i++) {
    const act = actual[i];
    const gold = golden[i];
    if (!act) return `at #${time}: missing change ${gold.signal}=${gold.value}`;
    if (!gold) return `at #${time}: unexpected change ${act.signal}=${act.value}`;

    const order = compareStrings(act.signal, gold.signal);
    if (order > 0) return `at #${time}: missing change ${gold.signal}=${gold.value}`;
    if (order < 0) return `at #${time}: unexpected change ${act.signal}=${act.value}`;
    if (act.value !== gold.value) {
      return `at #${time}: signal ${act.signal} expected ${gold.value}, got ${act.value}`;
    }
  }
  return null;
};

/**
 * Compare two canonical traces (pure function for testing).
 */
export const compareWaveforms = (
  actual: WaveformTrace,
  golden: WaveformTrace,
  label: string,
): ComparisonResult => {
  if (actual.timescale !== golden.timescale) {
    return mismatch(
      `${label}: timescale expected ${golden.timescale ?? "(none)"}, got ${actual.timescale ?? "(none)"}`,
    );
  }

  const signalDiff = diffSignals(actual.signals, golden.signals);
  if (signalDiff) return mismatch(`${label}: ${signalDiff}`);

  const steps = Math.max(actual.timesteps.length, golden.timesteps.length);
  for (let i = 0; i < steps; i++) {
    const act = actual.timesteps[i];
    const gold = golden.timesteps[i];
    if (!act) {
      return mismatch(`${label}: trace ends early, golden continues at #${gold.time}`);
    }
    if (!gold) {
      return mismatch(`${label}: extra time step #${act.time} beyond end of golden`);
    }
    if (act.time !== gold.time) {
      return mismatch(`${label}: time step ${i + 1} expected #${gold.time}, got #${act.time}`);
    }
    const changeDiff = diffChanges(act.time, act.changes, gold.changes);
    if (changeDiff) return mismatch(`${label}: ${changeDiff}`);
  }

  return PASS;
};

/**
 * Compare a produced VCD against its golden reference.
 */
export const compareWaveformFiles = async (
  filePath: string,
  goldenPath: string,
): Promise<ComparisonResult> => {
  const golden = await readGolden(goldenPath);
  if (!golden.ok) return golden.result;

  let goldenTrace: WaveformTrace;
  try {
    goldenTrace = parseVcdContent(golden.content);
  } catch (error) {
    return { status: "error", message: `Golden ${goldenPath}: ${errorMessage(error)}` };
  }

  const actual = await readArtifact(filePath);
  if (!actual.ok) return actual.result;

  let actualTrace: WaveformTrace;
  try {
    actualTrace = parseVcdContent(actual.content);
  } catch (error) {
    return mismatch(`${filePath}: ${errorMessage(error)}`);
  }

  return compareWaveforms(actualTrace, goldenTrace, filePath);
};
