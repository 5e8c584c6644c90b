/**
 * Test declaration discovery.
 * Finds `t_<name>.json` declarations in a tests directory and loads them.
 *
 * The tests directory is flat: every declaration sits next to its HDL
 * sources and golden files, and the file stem is the test identity.
 */

import { readdir } from "fs/promises";
import path from "path";
import type { TestCase } from "../types.js";
import { DECLARATION_EXTENSION, loadTestCase, testNameFromPath } from "./loader.js";

/** Run configuration file that lives beside the declarations. */
export const CONFIG_FILE_NAME = "hdl-regress.config.json";

/** Every test name starts with this; other JSON files are data. */
export const TEST_NAME_PREFIX = "t_";

/**
 * Declaration that could not be loaded.
 */
export interface DeclarationFailure {
  name: string;
  declarationPath: string;
  error: string;
}

export interface DiscoveryResult {
  testCases: TestCase[];
  failures: DeclarationFailure[];
}

/**
 * Check whether a file name looks like a test declaration.
 */
export const isDeclarationFile = (fileName: string): boolean =>
  fileName.startsWith(TEST_NAME_PREFIX) &&
  path.extname(fileName).toLowerCase() === DECLARATION_EXTENSION;

/**
 * Build a name filter from regex patterns. An empty list matches everything.
 */
export const createNameFilter = (patterns: readonly string[]): ((name: string) => boolean) => {
  if (patterns.length === 0) return () => true;
  const regexes = patterns.map((p) => new RegExp(p));
  return (name) => regexes.some((re) => re.test(name));
};

/**
 * List declaration file paths in a tests directory, sorted by name.
 */
export const findDeclarationFiles = async (testsDir: string): Promise<string[]> => {
  const entries = await readdir(testsDir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && isDeclarationFile(entry.name))
    .map((entry) => path.join(testsDir, entry.name))
    .sort((a, b) => a.localeCompare(b));
};

/**
 * Discover and load all declarations whose test name matches one of the
 * given patterns. Invalid declarations are reported, not thrown.
 */
export const discoverTestCases = async (
  testsDir: string,
  patterns: readonly string[] = [],
): Promise<DiscoveryResult> => {
  const matches = createNameFilter(patterns);
  const files = (await findDeclarationFiles(testsDir)).filter((file) =>
    matches(testNameFromPath(file)),
  );

  const loaded = await Promise.all(
    files.map(async (file): Promise<{ testCase: TestCase } | { failure: DeclarationFailure }> => {
      try {
        return { testCase: await loadTestCase(file) };
      } catch (error) {
        return {
          failure: {
            name: testNameFromPath(file),
            declarationPath: file,
            error: error instanceof Error ? error.message : String(error),
          },
        };
      }
    }),
  );

  const testCases: TestCase[] = [];
  const failures: DeclarationFailure[] = [];
  for (const entry of loaded) {
    if ("testCase" in entry) {
      testCases.push(entry.testCase);
    } else {
      failures.push(entry.failure);
    }
  }

  return { testCases, failures };
};
