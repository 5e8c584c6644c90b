/**
 * Text pattern comparators.
 *
 * `pattern-extract` searches an artifact for a regular expression and
 * optionally checks one capture group against an expected literal.
 * `pattern-absent` asserts that a regular expression never matches.
 * Patterns are compiled with the multiline flag so `^` and `$` anchor to
 * lines.
 */

import type { ComparisonResult } from "../types.js";
import { PASS, readArtifact } from "./artifacts.js";

export interface MatchLocation {
  /** 1-based line number of the match start */
  line: number;
  /** Full text of that line, trimmed */
  text: string;
  groups: Array<string | undefined>;
}

/**
 * Find the first match of a pattern and the line it starts on.
 */
export const findFirstMatch = (content: string, pattern: string): MatchLocation | null => {
  const match = new RegExp(pattern, "m").exec(content);
  if (!match) return null;

  const before = content.slice(0, match.index);
  const line = before.split("\n").length;
  const lineStart = before.lastIndexOf("\n") + 1;
  const lineEnd = content.indexOf("\n", match.index);
  const text = content.slice(lineStart, lineEnd === -1 ? undefined : lineEnd).trim();

  return { line, text, groups: [...match] };
};

/**
 * Check a pattern (and optionally a capture group) against content
 * (pure function for testing).
 */
export const extractPattern = (
  content: string,
  label: string,
  pattern: string,
  group: number,
  expected?: string,
): ComparisonResult => {
  const found = findFirstMatch(content, pattern);
  if (!found) {
    return {
      status: "fail",
      reason: "no-match",
      message: `${label}: pattern /${pattern}/ not found`,
    };
  }

  if (expected === undefined) return PASS;

  const actual = found.groups[group];
  if (actual === undefined) {
    return {
      status: "fail",
      reason: "no-match",
      message: `${label}:${found.line}: capture group ${group} missing in match of /${pattern}/ (line: ${found.text})`,
    };
  }

  if (actual !== expected) {
    return {
      status: "fail",
      reason: "mismatch",
      message: `${label}:${found.line}: capture group ${group} is '${actual}', expected '${expected}' (line: ${found.text})`,
    };
  }

  return PASS;
};

/**
 * Check that a pattern does not occur in content (pure function for testing).
 */
export const checkPatternAbsent = (
  content: string,
  label: string,
  pattern: string,
): ComparisonResult => {
  const found = findFirstMatch(content, pattern);
  if (!found) return PASS;
  return {
    status: "fail",
    reason: "unexpected-match",
    message: `${label}:${found.line}: unexpected match of /${pattern}/ (line: ${found.text})`,
  };
};

/**
 * Read an artifact and run a pattern extraction on it.
 */
export const comparePatternExtract = async (
  filePath: string,
  pattern: string,
  group: number,
  expected?: string,
): Promise<ComparisonResult> => {
  const read = await readArtifact(filePath);
  if (!read.ok) return read.result;
  return extractPattern(read.content, filePath, pattern, group, expected);
};

/**
 * Read an artifact and check that a pattern does not occur in it.
 */
export const comparePatternAbsent = async (
  filePath: string,
  pattern: string,
): Promise<ComparisonResult> => {
  const read = await readArtifact(filePath);
  if (!read.ok) return read.result;
  return checkPatternAbsent(read.content, filePath, pattern);
};
