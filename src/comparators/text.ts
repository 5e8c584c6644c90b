/**
 * Text golden comparator (`text-equal`).
 *
 * Logs and other text artifacts are compared line by line after
 * canonicalization:
 * - CRLF becomes LF, trailing whitespace is stripped
 * - the absolute tests directory is rewritten to `<basename>/`
 * - lines matching any ignore pattern are dropped
 * - trailing blank lines are dropped
 */

import { mkdir, writeFile } from "fs/promises";
import path from "path";
import { errorMessage } from "../errors.js";
import type { ComparisonResult } from "../types.js";
import { PASS, readArtifact, readGolden } from "./artifacts.js";

export interface TextCanonicalOptions {
  testsDir?: string;
  ignorePatterns?: readonly string[];
}

export interface TextCompareOptions extends TextCanonicalOptions {
  /** Overwrite the golden with the canonical actual text and pass */
  updateGolden?: boolean;
}

const escapeRegExp = (value: string): string =>
  value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/**
 * Canonicalize text into comparable lines (pure function for testing).
 */
export const canonicalizeText = (
  content: string,
  options: TextCanonicalOptions = {},
): string[] => {
  const ignore = (options.ignorePatterns ?? []).map((p) => new RegExp(p));
  const dirPrefix = options.testsDir
    ? new RegExp(escapeRegExp(path.resolve(options.testsDir) + path.sep), "g")
    : null;
  const dirReplacement = options.testsDir ? `${path.basename(options.testsDir)}/` : "";

  const lines = content
    .replace(/\r\n/g, "\n")
    .split("\n")
    .map((line) => (dirPrefix ? line.replace(dirPrefix, dirReplacement) : line))
    .map((line) => line.trimEnd())
    .filter((line) => !ignore.some((re) => re.test(line)));

  while (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
};

/**
 * Compare canonical lines and report the first difference
 * (pure function for testing).
 */
export const compareTextLines = (
  actual: readonly string[],
  golden: readonly string[],
  label: string,
): ComparisonResult => {
  const length = Math.max(actual.length, golden.length);
  for (let i = 0; i < length; i++) {
    const a = actual[i];
    const g = golden[i];
    if (a === g) continue;

    const lineNo = i + 1;
    if (a === undefined) {
      return {
        status: "fail",
        reason: "mismatch",
        message: `${label}:${lineNo}: output ends early, golden continues with '${g}'`,
      };
    }
    if (g === undefined) {
      return {
        status: "fail",
        reason: "mismatch",
        message: `${label}:${lineNo}: extra output line '${a}' beyond end of golden`,
      };
    }
    return {
      status: "fail",
      reason: "mismatch",
      message: `${label}:${lineNo}: expected '${g}', got '${a}'`,
    };
  }
  return PASS;
};

/**
 * Compare a text artifact against its golden reference.
 */
export const compareTextFiles = async (
  filePath: string,
  goldenPath: string,
  options: TextCompareOptions = {},
): Promise<ComparisonResult> => {
  const actual = await readArtifact(filePath);
  if (!actual.ok) return actual.result;

  const actualLines = canonicalizeText(actual.content, options);

  if (options.updateGolden) {
    try {
      await mkdir(path.dirname(goldenPath), { recursive: true });
      const text = actualLines.length > 0 ? actualLines.join("\n") + "\n" : "";
      await writeFile(goldenPath, text, "utf-8");
    } catch (error) {
      return {
        status: "error",
        message: `Cannot update golden reference ${goldenPath}: ${errorMessage(error)}`,
      };
    }
    return PASS;
  }

  const golden = await readGolden(goldenPath);
  if (!golden.ok) return golden.result;

  return compareTextLines(actualLines, canonicalizeText(golden.content, options), filePath);
};
