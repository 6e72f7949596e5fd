/**
 * Stats Module
 * Displays the build report and exports it as JSON
 */

import chalk from "chalk";
import path from "node:path";
import { mkdir, writeFile } from "fs/promises";
import type { BuildReport, StageResult } from "../types";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Whole seconds past a minute, one decimal below it
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const total = Math.round(ms / 1000);
  const seconds = String(total % 60).padStart(2, "0");
  return `${Math.floor(total / 60)}m ${seconds}s`;
}

/**
 * Green share for processed files, red for failures (never rounded away)
 */
function failureBar(processed: number, failed: number, width: number = 24): string {
  const total = processed + failed;
  if (total === 0) return chalk.dim("·".repeat(width));

  const bad = failed === 0 ? 0 : Math.max(1, Math.round((width * failed) / total));
  const bar = chalk.green("█".repeat(width - bad)) + chalk.red("█".repeat(bad));
  return `${bar} ${chalk.dim(`${processed}/${total}`)}`;
}

function row(icon: string, label: string, value: string, note?: string): string {
  const line = `   ${icon} ${chalk.dim(label.padEnd(16))} ${value}`;
  return note ? `${line} ${chalk.dim(note)}` : line;
}

function heading(title: string): void {
  console.log(`\n  ${chalk.bold(title)}`);
}

/**
 * Symlinks seen by every stage, listed once
 */
export function uniqueSymlinks(report: BuildReport): string[] {
  const links = new Set<string>();
  for (const stage of report.stages) {
    for (const link of stage.symlinks) {
      links.add(link);
    }
  }
  return [...links].sort();
}

// ============================================================================
// Main Stats Display
// ============================================================================

export async function stats(
  report: BuildReport,
  options: { verbose?: boolean; exportPath?: string } = {},
): Promise<void> {
  if (options.exportPath) {
    await exportReport(report, options.exportPath);
  }

  const statusIcon = report.failed > 0 ? chalk.red("✖") : chalk.green("✔");
  const title = report.failed > 0 ? "Build Failed" : "Build Complete";

  console.log("");
  console.log(
    `  ${statusIcon} ${chalk.bold(title)} ${chalk.dim("·")} ${chalk.dim(formatDuration(report.durationMs))}`,
  );
  console.log(`  ${chalk.dim(report.sourceRoot)} ${chalk.dim("→")} ${chalk.dim(report.destRoot)}`);

  displayFilesSection(report);
  displayStagesSection(report.stages);
  displayIssuesSection(report, options.verbose);

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayFilesSection(report: BuildReport): void {
  heading("Files");
  console.log(`   ${failureBar(report.processed, report.failed)}`);
  console.log(row(chalk.green("◉"), "Processed", chalk.green(String(report.processed))));

  if (report.failed > 0) {
    console.log(row(chalk.red("◉"), "Failed", chalk.red(String(report.failed))));
  }
}

function displayStagesSection(stages: StageResult[]): void {
  if (stages.length === 0) return;

  heading("Stages");

  for (const stage of stages) {
    const failures = stage.failed.length + stage.walkErrors.length;
    const value =
      failures > 0
        ? chalk.red(`${stage.processed} ok, ${failures} failed`)
        : `${stage.processed} ok`;

    console.log(
      row(failures > 0 ? chalk.red("◉") : chalk.green("◉"), stage.name, value, formatDuration(stage.durationMs)),
    );
  }
}

function displayIssuesSection(report: BuildReport, verbose?: boolean): void {
  const failures = report.stages.flatMap((stage) =>
    stage.failed.map((failure) => ({ stage: stage.name, failure })),
  );
  const unreadable = new Map<string, string>();
  for (const stage of report.stages) {
    for (const error of stage.walkErrors) {
      unreadable.set(error.path, error.message);
    }
  }
  const symlinks = uniqueSymlinks(report);

  if (failures.length > 0 || unreadable.size > 0) {
    heading(chalk.red("Errors"));

    for (const { stage, failure } of failures) {
      console.log(`      ${chalk.dim("·")} ${failure.entry.absolutePath} ${chalk.dim(`(${stage})`)}`);
      console.log(`        ${chalk.dim(`${failure.error.reason}: ${failure.error.message}`)}`);
    }

    for (const [directory, message] of [...unreadable].sort(([a], [b]) => a.localeCompare(b))) {
      console.log(`      ${chalk.dim("·")} ${directory} ${chalk.dim("(unreadable)")}`);
      console.log(`        ${chalk.dim(message)}`);
    }
  }

  if (symlinks.length > 0) {
    console.log(row(chalk.yellow("◆"), "Symlinks skipped", chalk.yellow(String(symlinks.length))));
    if (verbose) {
      for (const link of symlinks) {
        console.log(`      ${chalk.dim("·")} ${link}`);
      }
    }
  }
}

// ============================================================================
// Export
// ============================================================================

/**
 * Serializable form of the report; errors become { reason, details }
 */
export function reportToJson(report: BuildReport) {
  return {
    summary: {
      sourceRoot: report.sourceRoot,
      destRoot: report.destRoot,
      processed: report.processed,
      failed: report.failed,
      duration: report.durationMs,
    },
    stages: report.stages.map((stage) => ({
      name: stage.name,
      operation: stage.operation,
      processed: stage.processed,
      skipped: stage.skipped,
      duration: stage.durationMs,
      failed: stage.failed.map(({ entry, error }) => ({
        path: entry.absolutePath,
        reason: error.reason,
        details: error.message,
      })),
      unreadable: stage.walkErrors.map((error) => ({
        path: error.path,
        reason: error.reason,
        details: error.message,
      })),
    })),
    symlinks: uniqueSymlinks(report),
  };
}

export async function exportReport(report: BuildReport, outputPath: string): Promise<void> {
  await mkdir(path.dirname(outputPath), { recursive: true });
  await writeFile(outputPath, JSON.stringify(reportToJson(report), null, 2), "utf-8");
}
