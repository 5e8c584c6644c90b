/**
 * Artifact and golden file reading shared by all comparators.
 *
 * A produced artifact that does not exist is a content failure (the
 * toolchain did not produce it); a golden reference that does not exist
 * is an infrastructure error.
 */

import { readFile } from "fs/promises";
import { errorMessage } from "../errors.js";
import type { ComparisonResult } from "../types.js";

export type ReadResult =
  | { ok: true; content: string }
  | { ok: false; result: ComparisonResult };

const isMissing = (error: unknown): boolean =>
  error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR");

/**
 * Read a produced artifact.
 */
export const readArtifact = async (filePath: string): Promise<ReadResult> => {
  try {
    return { ok: true, content: await readFile(filePath, "utf-8") };
  } catch (error) {
    if (isMissing(error)) {
      return {
        ok: false,
        result: {
          status: "fail",
          reason: "missing-artifact",
          message: `Expected artifact was not produced: ${filePath}`,
        },
      };
    }
    return {
      ok: false,
      result: { status: "error", message: `Cannot read ${filePath}: ${errorMessage(error)}` },
    };
  }
};

/**
 * Read a golden reference.
 */
export const readGolden = async (filePath: string): Promise<ReadResult> => {
  try {
    return { ok: true, content: await readFile(filePath, "utf-8") };
  } catch (error) {
    const message = isMissing(error)
      ? `Golden reference missing: ${filePath}`
      : `Cannot read golden reference ${filePath}: ${errorMessage(error)}`;
    return { ok: false, result: { status: "error", message } };
  }
};

export const PASS: ComparisonResult = { status: "pass" };
