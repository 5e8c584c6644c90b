#!/usr/bin/env node

/**
 * hdl-regress entry point
 *
 * Run with: npx tsx src/index.ts [options] [test-name-regex...]
 * Or after build: node dist/src/index.js
 *
 * CLI flags:
 *   --version, -v    Print version and exit
 *   --help, -h       Show help
 *   --mcp            Run as an MCP server on stdio
 *   --json           Print the report as JSON
 *
 * Exits 0 when no test FAILED or ERRORED. Ctrl-C cancels the run,
 * terminates running toolchain processes and still prints the report.
 */

import { parseCliArgs, printHelp, printVersion } from "./cli/commands.js";
import { formatReport } from "./cli/report.js";
import { createLogger } from "./log.js";
import { runServer } from "./server.js";
import { isErrorResult, runTests } from "./service.js";

const log = createLogger();

const main = async (): Promise<number> => {
  const options = parseCliArgs(process.argv.slice(2));
  if (isErrorResult(options)) {
    log.error(options.error);
    printHelp();
    return 2;
  }

  if (options.command === "version") {
    printVersion();
    return 0;
  }

  if (options.command === "help") {
    printHelp();
    return 0;
  }

  if (options.command === "mcp") {
    await runServer();
    return 0;
  }

  const controller = new AbortController();
  const onInterrupt = (): void => {
    if (controller.signal.aborted) {
      log.warn("second interrupt, exiting");
      process.exit(130);
    }
    log.warn("interrupt received, cancelling run");
    controller.abort();
  };
  process.on("SIGINT", onInterrupt);

  try {
    const report = await runTests({
      ...(options.testsDir ? { testsDir: options.testsDir } : {}),
      patterns: options.patterns,
      overrides: options.overrides,
      signal: controller.signal,
    });

    if (isErrorResult(report)) {
      log.error(report.error);
      return 2;
    }

    console.log(options.json ? JSON.stringify(report, null, 2) : formatReport(report));
    return report.exitCode;
  } finally {
    process.off("SIGINT", onInterrupt);
  }
};

main().then(
  (code) => {
    if (code !== 0) process.exitCode = code;
  },
  (error: unknown) => {
    log.error(`fatal: ${error instanceof Error ? (error.stack ?? error.message) : String(error)}`);
    process.exit(1);
  },
);
