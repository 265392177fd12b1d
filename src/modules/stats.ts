/**
 * Stats Module
 * Displays processing statistics and issues
 */

import chalk from "chalk";
import { mkdir } from "fs/promises";
import type { Tracker } from "../utils";
import type {
  ProcessingStats,
  PipelineContext,
  ConversionIssue,
} from "../types";

// Warnings listed per file in verbose mode
const MAX_WARNINGS_PER_FILE = 5;

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

/**
 * Progress bar with percentage
 */
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

  const filledBar = chalk.green("━".repeat(filled));
  const emptyBar = chalk.dim("━".repeat(empty));

  return `${filledBar}${emptyBar} ${chalk.dim(percentText)}`;
}

/**
 * Format a stat row with icon, label and value
 */
function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

/**
 * Section header
 */
function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

// ============================================================================
// Main Stats Display
// ============================================================================

/**
 * Export stats to JSON and display processing statistics to console
 */
export async function stats(ctx: PipelineContext): Promise<void> {
  const { config, tracker, verbose, dryRun } = ctx;

  if (!dryRun) {
    await mkdir(config.output, { recursive: true });
    await tracker.exportStats(config.output);
  }

  const stats = tracker.getStats();
  const hasWarnings = stats.warnings > 0;
  const hasErrors = stats.failedFiles > 0;

  // Blank line for separation
  console.log("");

  // Main summary header with status indicator
  const statusIcon = hasErrors
    ? chalk.red("✖")
    : hasWarnings
      ? chalk.yellow("◆")
      : chalk.green("✔");

  const title = dryRun ? "Dry Run Complete" : "Conversion Complete";
  console.log(
    `  ${statusIcon} ${chalk.bold(title)} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
  );

  displayFilesSection(stats);
  displaySnippetsSection(stats);
  displayWarningsSection(tracker, verbose);
  displayErrorsSection(tracker, verbose);

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayFilesSection(stats: ProcessingStats): void {
  console.log(sectionHeader("Files"));

  const bar = progressBar(stats.successfulFiles, stats.totalFiles);
  console.log(`   ${bar}`);

  console.log(
    statRow(chalk.green("◉"), "Converted", stats.successfulFiles, chalk.green),
  );

  if (stats.failedFiles > 0) {
    console.log(
      statRow(chalk.red("◉"), "Failed", stats.failedFiles, chalk.red),
    );
  }
}

function displaySnippetsSection(stats: ProcessingStats): void {
  if (stats.definedSnippets === 0 && stats.knownSnippets === 0) {
    return; // Skip if no snippets
  }

  console.log(sectionHeader("Snippets"));

  console.log(
    statRow(chalk.green("◉"), "Defined", stats.definedSnippets, chalk.green),
  );

  if (stats.knownSnippets > 0) {
    console.log(
      statRow(chalk.cyan("◉"), "Already known", stats.knownSnippets, chalk.cyan),
    );
  }
}

function displayWarningsSection(tracker: Tracker, verbose?: boolean): void {
  const warnings = tracker.getConversionIssues();
  if (warnings.length === 0) {
    return;
  }

  const byFile = new Map<string, ConversionIssue[]>();
  for (const warning of warnings) {
    const list = byFile.get(warning.path) ?? [];
    list.push(warning);
    byFile.set(warning.path, list);
  }

  console.log(sectionHeader(chalk.yellow("Warnings")));
  console.log(
    statRow(
      chalk.yellow("◆"),
      "Conversion",
      `${warnings.length} in ${byFile.size} files`,
      chalk.yellow,
    ),
  );

  if (!verbose) {
    return;
  }

  for (const [path, issues] of byFile) {
    console.log(`      ${chalk.dim("·")} ${path}`);
    for (const issue of issues.slice(0, MAX_WARNINGS_PER_FILE)) {
      console.log(`        ${chalk.dim(issue.message)}`);
    }
    if (issues.length > MAX_WARNINGS_PER_FILE) {
      console.log(
        `        ${chalk.dim(`+${issues.length - MAX_WARNINGS_PER_FILE} more`)}`,
      );
    }
  }
}

function displayErrorsSection(tracker: Tracker, verbose?: boolean): void {
  const fileIssues = tracker.getFileIssues();
  const resourceIssues = tracker.getResourceIssues();

  if (fileIssues.length === 0 && resourceIssues.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.red("Errors")));

  // File issues
  if (fileIssues.length > 0) {
    console.log(
      statRow(chalk.red("✖"), "Files failed", fileIssues.length, chalk.red),
    );
    if (verbose) {
      for (const issue of fileIssues) {
        console.log(`      ${chalk.dim("·")} ${issue.path}`);
        if (issue.details) {
          console.log(`        ${chalk.dim(issue.details)}`);
        }
      }
    }
  }

  // Resource issues
  if (resourceIssues.length > 0) {
    console.log(
      statRow(
        chalk.yellow("✖"),
        "Resources failed",
        resourceIssues.length,
        chalk.yellow,
      ),
    );
    if (verbose) {
      for (const issue of resourceIssues) {
        console.log(`      ${chalk.dim("·")} ${issue.path}`);
        if (issue.details) {
          console.log(`        ${chalk.dim(issue.details)}`);
        }
      }
    }
  }
}
