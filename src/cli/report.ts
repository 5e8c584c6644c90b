/**
 * Plain-text rendering of a RegressionReport.
 */

import type { RegressionReport } from "../types.js";

const formatDuration = (ms: number): string =>
  ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(1)}s`;

/**
 * Render the summary printed at the end of a CLI run (pure function for
 * testing). Non-passing tests are listed one per line, sorted by name.
 */
export const formatReport = (report: RegressionReport): string => {
  const { counts } = report;
  const lines: string[] = [];

  if (report.nonPassing.length > 0) {
    lines.push("Non-passing tests:");
    for (const entry of report.nonPassing) {
      const kind = entry.classification ? ` [${entry.classification}]` : "";
      const detail = entry.diagnostic ? `: ${entry.diagnostic}` : "";
      lines.push(`  ${entry.status.padEnd(7)} ${entry.name}${kind}${detail}`);
    }
    lines.push("");
  }

  if (report.cancelled) {
    lines.push(`Run cancelled; ${report.notRun.length} test(s) not run`);
  }

  lines.push(
    `==SUMMARY: Passed ${counts.PASSED}  Failed ${counts.FAILED}  ` +
      `Skipped ${counts.SKIPPED}  Errored ${counts.ERRORED}  ` +
      `Total ${report.total}  Time ${formatDuration(report.durationMs)}`,
  );
  lines.push(report.exitCode === 0 ? "==PASSED" : "==FAILED");

  return lines.join("\n");
};
