/**
 * Toolchain Invoker
 *
 * Runs the compiler/simulator (or the native build, or the produced
 * program) as a subprocess without a shell, captures its output and
 * enforces a timeout. Spawn failures are infrastructure errors and are
 * thrown; every process that started yields a StageResult.
 *
 * POSIX only: each process leads its own process group.
 */

import { spawn, type ChildProcess } from "child_process";
import { readdir, writeFile } from "fs/promises";
import path from "path";
import { ToolchainSpawnError } from "../errors.js";
import { createLogger } from "../log.js";
import type { StageName, StageResult, StageVerdict } from "../types.js";

const log = createLogger("invoker");

/** Time between SIGTERM and SIGKILL when terminating a process. */
export const KILL_GRACE_MS = 2000;

export interface InvocationRequest {
  stage: StageName;
  command: string;
  args: readonly string[];
  cwd: string;
  timeoutMs: number;
  env?: Readonly<Record<string, string>>;
  signal?: AbortSignal;
  /** Where to write stdout followed by stderr */
  logFile?: string;
  /** Directory whose files are reported as the stage's artifacts */
  artifactDir?: string;
  killGraceMs?: number;
}

/**
 * Function that runs one stage. The sequencer depends on this type so
 * tests can substitute an in-process fake.
 */
export type ToolchainInvoker = (request: InvocationRequest) => Promise<StageResult>;

// =============================================================================
// Process Helpers
// =============================================================================

const hasExited = (child: ChildProcess): boolean =>
  child.exitCode !== null || child.signalCode !== null;

/**
 * Signal the child's whole process group (the toolchain forks make and
 * compilers), falling back to the child alone. The group is signalled even
 * after the child exited: a descendant still holding stdout keeps `close`
 * from firing.
 */
const killTree = (child: ChildProcess, signal: NodeJS.Signals): void => {
  if (child.pid !== undefined) {
    try {
      process.kill(-child.pid, signal);
      return;
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ESRCH") {
        return;
      }
      log.debug(`process group kill failed for ${child.pid}: ${String(error)}`);
    }
  }
  if (!hasExited(child)) child.kill(signal);
};

/**
 * Recursively list files under a directory. Missing directories yield [].
 */
export const listArtifacts = async (dir: string): Promise<string[]> => {
  const results: string[] = [];

  const walk = async (current: string): Promise<void> => {
    let entries;
    try {
      entries = await readdir(current, { withFileTypes: true });
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return;
      }
      throw error;
    }
    for (const entry of entries) {
      const fullPath = path.join(current, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
      } else if (entry.isFile()) {
        results.push(fullPath);
      }
    }
  };

  await walk(dir);
  return results.sort();
};

// =============================================================================
// Invocation
// =============================================================================

interface ProcessExit {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  cancelled: boolean;
}

const runProcess = (request: InvocationRequest): Promise<ProcessExit> =>
  new Promise((resolve, reject) => {
    const graceMs = request.killGraceMs ?? KILL_GRACE_MS;
    const child = spawn(request.command, [...request.args], {
      cwd: request.cwd,
      env: { ...process.env, ...request.env },
      stdio: ["ignore", "pipe", "pipe"],
      detached: true,
    });

    let stdout = "";
    let stderr = "";
    let timedOut = false;
    let cancelled = false;
    let settled = false;
    let killTimer: NodeJS.Timeout | undefined;

    child.stdout?.setEncoding("utf-8");
    child.stderr?.setEncoding("utf-8");
    child.stdout?.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr?.on("data", (chunk: string) => {
      stderr += chunk;
    });

    const terminate = (): void => {
      killTree(child, "SIGTERM");
      killTimer = setTimeout(() => killTree(child, "SIGKILL"), graceMs);
    };

    const timeoutTimer = setTimeout(() => {
      timedOut = true;
      terminate();
    }, request.timeoutMs);

    const onAbort = (): void => {
      cancelled = true;
      terminate();
    };
    request.signal?.addEventListener("abort", onAbort, { once: true });

    const cleanup = (): void => {
      settled = true;
      clearTimeout(timeoutTimer);
      if (killTimer) clearTimeout(killTimer);
      request.signal?.removeEventListener("abort", onAbort);
    };

    child.on("error", (error: NodeJS.ErrnoException) => {
      if (settled) return;
      cleanup();
      killTree(child, "SIGKILL");
      reject(new ToolchainSpawnError(request.command, error.code, error.message));
    });

    child.on("close", (exitCode, signal) => {
      if (settled) return;
      cleanup();
      resolve({ exitCode, signal, stdout, stderr, timedOut, cancelled });
    });
  });

/**
 * Run one stage and return its StageResult.
 * Throws ToolchainSpawnError when the process cannot be started.
 */
export const invokeToolchain: ToolchainInvoker = async (request) => {
  const startTime = Date.now();
  log.debug(`${request.stage}: ${request.command} ${request.args.join(" ")}`);

  const exit: ProcessExit = request.signal?.aborted
    ? { exitCode: null, signal: null, stdout: "", stderr: "", timedOut: false, cancelled: true }
    : await runProcess(request);

  const durationMs = Date.now() - startTime;

  if (request.logFile) {
    await writeFile(request.logFile, exit.stdout + exit.stderr, "utf-8");
  }

  const artifacts = request.artifactDir ? await listArtifacts(request.artifactDir) : [];

  return {
    stage: request.stage,
    command: request.command,
    args: [...request.args],
    cwd: request.cwd,
    exitCode: exit.exitCode,
    signal: exit.signal,
    timedOut: exit.timedOut,
    cancelled: exit.cancelled,
    stdout: exit.stdout,
    stderr: exit.stderr,
    durationMs,
    artifacts,
    ...(request.logFile ? { logFile: request.logFile } : {}),
  };
};

// =============================================================================
// Classification
// =============================================================================

/**
 * Classify a stage result against its declared expectation.
 *
 * - exit 0, success expected      -> passed
 * - exit != 0, success expected   -> unexpected-failure
 * - exit != 0, failure expected   -> expected-failure
 * - exit 0, failure expected      -> unexpected-failure
 * - timeout or cancellation always win, whatever was expected.
 */
export const classifyStage = (result: StageResult, expectFail: boolean): StageVerdict => {
  if (result.cancelled) return "cancelled";
  if (result.timedOut) return "timeout";
  const succeeded = result.exitCode === 0;
  if (expectFail) {
    return succeeded ? "unexpected-failure" : "expected-failure";
  }
  return succeeded ? "passed" : "unexpected-failure";
};
