/**
 * Summary Module
 * End-of-run report: row counts, Confluence transfers, recorded issues
 */

import chalk from "chalk";
import type { BatchResult, Issue, RunContext, TransferStats } from "../types";

const OFFSET = "    ";

function seconds(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

function describeIssue(issue: Issue): string {
  const where = issue.row !== undefined ? `row ${issue.row}  ` : "";
  return `${where}${issue.type}/${issue.reason}  ${issue.path}`;
}

/**
 * Summary lines without trailing newlines, ready for console.log
 */
export function formatSummary(
  result: BatchResult,
  stats: TransferStats,
  verbose = false,
): string[] {
  const status =
    result.failedRows > 0
      ? chalk.red("FINISHED WITH FAILURES")
      : result.stoppedEarly
        ? chalk.yellow("STOPPED")
        : chalk.green("FINISHED");

  const lines = [`${OFFSET}${status}  ${result.totalRows} row(s) in ${seconds(stats.duration)}`];

  const counts = [
    chalk.green(`${result.succeededRows} rendered`),
    chalk.cyan(`${result.publishedRows} published`),
  ];
  if (result.failedRows > 0) counts.push(chalk.red(`${result.failedRows} failed`));
  if (result.malformedRows > 0) counts.push(chalk.yellow(`${result.malformedRows} malformed`));
  lines.push(`${OFFSET}Rows:        ${counts.join(", ")}`);

  if (stats.fetchedFiles > 0 || stats.publishedFiles > 0) {
    lines.push(
      `${OFFSET}Confluence:  ${stats.fetchedFiles} downloaded, ${stats.publishedFiles} uploaded`,
    );
  }

  if (result.stoppedEarly) {
    lines.push(`${OFFSET}${chalk.yellow("Stopped by the operator before the end of the batch file")}`);
  }

  if (stats.issues.length > 0) {
    const hint = verbose ? "" : chalk.dim(" (--verbose lists them)");
    lines.push(`${OFFSET}Issues:      ${stats.issues.length} recorded${hint}`);

    if (verbose) {
      for (const issue of stats.issues) {
        lines.push(`${OFFSET}  ${describeIssue(issue)}`);
        if (issue.details) lines.push(`${OFFSET}    ${chalk.dim(issue.details)}`);
      }
    }
  }

  return lines;
}

export function summary(ctx: RunContext, result: BatchResult): void {
  const lines = formatSummary(result, ctx.tracker.getStats(), ctx.verbose);
  console.log(["", ...lines, ""].join("\n"));
}
