/**
 * Loader for `<name>.json` test declarations.
 * Validates with zod and converts to the frozen TestCase model.
 */

import { readFile } from "fs/promises";
import path from "path";
import { DeclarationError, formatIssues } from "../errors.js";
import { deepFreeze } from "../immutable.js";
import {
  DEFAULT_VARIANT,
  type PipelinePlan,
  type TestCase,
} from "../types.js";
import { TestDeclarationSchema, type TestDeclaration } from "./schemas.js";

export const DECLARATION_EXTENSION = ".json";

/**
 * Test name for a declaration path: the file stem.
 */
export const testNameFromPath = (declarationPath: string): string =>
  path.basename(declarationPath, path.extname(declarationPath));

/**
 * Resolve a declared path against the tests directory. Paths that start
 * with a placeholder are left for expansion at run time.
 */
const resolveDeclared = (testsDir: string, declared: string): string =>
  declared.startsWith("{") || path.isAbsolute(declared)
    ? declared
    : path.join(testsDir, declared);

const buildPlan = (
  decl: TestDeclaration,
  declarationPath: string,
): PipelinePlan => {
  if (decl.lint) {
    return { kind: "lint-only", lint: { ...decl.lint } };
  }
  if (decl.compile) {
    return {
      kind: "compile",
      compile: { ...decl.compile },
      execute: decl.execute ? { ...decl.execute, flags: [] } : undefined,
    };
  }
  // Unreachable after schema validation; kept for type narrowing
  throw new DeclarationError(declarationPath, "no lint or compile stage");
};

/**
 * Convert a validated declaration to a TestCase (pure function for testing).
 */
export const toTestCase = (
  decl: TestDeclaration,
  declarationPath: string,
): TestCase => {
  const absolutePath = path.resolve(declarationPath);
  const testsDir = path.dirname(absolutePath);
  const name = testNameFromPath(absolutePath);

  const testCase: TestCase = {
    name,
    declarationPath: absolutePath,
    testsDir,
    topFile: resolveDeclared(testsDir, decl.top ?? `${name}.v`),
    golden: resolveDeclared(testsDir, decl.golden ?? `${name}.out`),
    pliFile: resolveDeclared(testsDir, decl.pli ?? `${name}.cpp`),
    scenarios: [...new Set(decl.scenarios)],
    flags: decl.flags,
    variants: decl.variants.length > 0 ? decl.variants : [DEFAULT_VARIANT],
    plan: buildPlan(decl, absolutePath),
    assertions: decl.assertions,
    ...(decl.skip !== undefined ? { skip: decl.skip } : {}),
  };

  return deepFreeze(testCase);
};

/**
 * Parse declaration file content (pure function for testing).
 */
export const parseDeclarationContent = (
  content: string,
  declarationPath: string,
): TestCase => {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new DeclarationError(declarationPath, `malformed JSON (${detail})`);
  }

  const parsed = TestDeclarationSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DeclarationError(declarationPath, formatIssues(parsed.error.issues));
  }

  return toTestCase(parsed.data, declarationPath);
};

/**
 * Load a declaration file from disk.
 */
export const loadTestCase = async (declarationPath: string): Promise<TestCase> => {
  let content: string;
  try {
    content = await readFile(declarationPath, "utf-8");
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new DeclarationError(declarationPath, detail);
  }
  return parseDeclarationContent(content, declarationPath);
};
