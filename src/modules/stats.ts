/**
 * Stats Module
 * Displays the run summary and the issues collected by the tracker
 */

import chalk from "chalk";
import type { FetchContext } from "../types";
import type { FetchStats, Issue, IssueReason } from "../utils";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = (seconds % 60).toFixed(0);
  return `${minutes}m ${remainingSeconds}s`;
}

function progressBar(
  current: number,
  total: number,
  width: number = 24,
): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = current / total;
  const filled = Math.round(width * percentage);
  const empty = width - filled;
  const percentText = `${Math.round(percentage * 100)}%`;

  return `${chalk.green("━".repeat(filled))}${chalk.dim("━".repeat(empty))} ${chalk.dim(percentText)}`;
}

function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

const REASON_LABELS: Record<IssueReason, string> = {
  "no-results": "No results",
  "missing-id": "Missing id",
  auth: "Auth failed",
  search: "Search failed",
  download: "Download failed",
  asset: "Asset fetch failed",
  "unexpected-response": "Unexpected response",
  timeout: "Timed out",
  network: "Network error",
  "write-error": "Write failed",
};

// ============================================================================
// Main Stats Display
// ============================================================================

/**
 * Display the run summary, ending with the one-line tally
 */
export function stats(ctx: FetchContext): FetchStats {
  const { config, tracker, logger } = ctx;
  const summary = tracker.getStats();

  const statusIcon =
    summary.errored > 0
      ? chalk.red("✖")
      : summary.missed > 0
        ? chalk.yellow("◆")
        : chalk.green("✔");

  console.log("");
  console.log(
    `  ${statusIcon} ${chalk.bold("Fetch Complete")} ${chalk.dim("·")} ${chalk.dim(formatDuration(summary.duration))}`,
  );

  displayIconsSection(summary);
  displayIssuesSection(summary.issues, logger.isEnabled("debug"));

  console.log("");
  console.log(
    `  Done. ${summary.succeeded} succeeded, ${summary.failed} failed (${summary.missed} missed, ${summary.errored} errors). Output: ${config.download.output}`,
  );

  return summary;
}

// ============================================================================
// Section Displays
// ============================================================================

function displayIconsSection(summary: FetchStats): void {
  console.log(sectionHeader("Icons"));
  console.log(`   ${progressBar(summary.succeeded, summary.totalItems)}`);

  console.log(
    statRow(chalk.green("◉"), "Downloaded", summary.succeeded, chalk.green),
  );

  if (summary.missed > 0) {
    console.log(
      statRow(chalk.yellow("◉"), "Missed", summary.missed, chalk.yellow),
    );
  }

  if (summary.errored > 0) {
    console.log(statRow(chalk.red("◉"), "Failed", summary.errored, chalk.red));
  }
}

function displayIssuesSection(issues: Issue[], verbose: boolean): void {
  if (issues.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.red("Issues")));

  const byReason = new Map<IssueReason, Issue[]>();
  for (const issue of issues) {
    const group = byReason.get(issue.reason) ?? [];
    group.push(issue);
    byReason.set(issue.reason, group);
  }

  for (const [reason, group] of byReason) {
    console.log(
      statRow(chalk.red("✖"), REASON_LABELS[reason], group.length, chalk.red),
    );

    const shown = verbose ? group : group.slice(0, 5);
    for (const issue of shown) {
      console.log(`      ${chalk.dim("·")} ${issue.label}`);
      if (verbose) {
        console.log(`        ${chalk.dim(issue.details)}`);
      }
    }
    if (shown.length < group.length) {
      console.log(`      ${chalk.dim(`  +${group.length - shown.length} more`)}`);
    }
  }
}
