/**
 * Error classes raised by the regression engine.
 * Outer surfaces convert these to ErrorResult objects.
 */

import type { ZodIssue } from "zod";

/**
 * Format zod issues as "path: message" lines.
 */
export const formatIssues = (issues: readonly ZodIssue[]): string =>
  issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${where}: ${issue.message}`;
    })
    .join("; ");

/** A test declaration file is unreadable or invalid. */
export class DeclarationError extends Error {
  constructor(
    readonly declarationPath: string,
    detail: string,
  ) {
    super(`Invalid test declaration ${declarationPath}: ${detail}`);
    this.name = "DeclarationError";
  }
}

/** Run configuration failed validation. */
export class ConfigError extends Error {
  constructor(detail: string) {
    super(`Invalid run configuration: ${detail}`);
    this.name = "ConfigError";
  }
}

/** The toolchain (or built program) could not be started at all. */
export class ToolchainSpawnError extends Error {
  constructor(
    readonly command: string,
    readonly code: string | undefined,
    message: string,
  ) {
    super(`Failed to start ${command}: ${message}`);
    this.name = "ToolchainSpawnError";
  }
}

/** A trace artifact could not be parsed. */
export class TraceParseError extends Error {
  constructor(
    readonly format: "vcd" | "saif",
    readonly line: number,
    detail: string,
  ) {
    super(`${format.toUpperCase()} parse error at line ${line}: ${detail}`);
    this.name = "TraceParseError";
  }
}

/** A state machine was asked to make a transition it does not allow. */
export class InvalidTransitionError extends Error {
  constructor(
    readonly machine: string,
    readonly from: string,
    readonly to: string,
  ) {
    super(`${machine}: illegal transition ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
  }
}

/**
 * Extract a message from an unknown thrown value.
 */
export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
