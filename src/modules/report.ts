/**
 * Report Module
 * Prints the aggregation report after a conversion
 */

import chalk from "chalk";
import type { AggregationReport, FailureEntry } from "../types";

const METER_CELLS = 30;
const COLLAPSED_FAILURES = 5;

// ============================================================================
// Formatting Helpers
// ============================================================================

export function formatElapsed(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;

  const seconds = Math.round(ms / 1000);
  if (seconds < 60) return `${(ms / 1000).toFixed(1)}s`;
  return `${Math.floor(seconds / 60)}m ${seconds % 60}s`;
}

/**
 * One line per failed slide: 1-based position, file, stage and reason
 *
 * @example
 * formatFailure({ index: 1, slide: "page2.html", stage: "render", reason: "timeout", details: "" })
 * // "#2 page2.html (render: timeout)"
 */
export function formatFailure(failure: FailureEntry): string {
  return `#${failure.index + 1} ${failure.slide} (${failure.stage}: ${failure.reason})`;
}

/**
 * A cell per slide (scaled past METER_CELLS): green converted, red failed
 */
function slideMeter({ succeeded, total }: AggregationReport): string {
  const cells = Math.min(total, METER_CELLS);
  const converted = total === 0 ? 0 : Math.round((succeeded / total) * cells);

  return `${chalk.green("■".repeat(converted))}${chalk.red("■".repeat(cells - converted))} ${chalk.dim(`${succeeded}/${total}`)}`;
}

function row(label: string, value: string | number, color = chalk.white): string {
  return `   ${chalk.dim(label.padEnd(10))} ${color(String(value))}`;
}

// ============================================================================
// Main Report Display
// ============================================================================

export interface ReportOptions {
  outputPath?: string; // Omitted when nothing was written
  verbose?: boolean;
}

export function report(
  summary: AggregationReport,
  options: ReportOptions = {},
): void {
  const failed = summary.failures.length;
  const status =
    summary.succeeded === 0
      ? chalk.red("✖ Conversion Failed")
      : failed > 0
        ? chalk.yellow("◆ Converted with failures")
        : chalk.green("✔ Conversion Complete");

  console.log("");
  console.log(
    `  ${chalk.bold(status)} ${chalk.dim(`· ${formatElapsed(summary.duration)}`)}`,
  );
  console.log(`   ${slideMeter(summary)}`);
  if (options.outputPath) {
    console.log(row("Output", options.outputPath, chalk.cyan));
  }

  displayFailures(summary.failures, options.verbose);
  console.log("");
}

function displayFailures(
  failures: readonly FailureEntry[],
  verbose?: boolean,
): void {
  if (failures.length === 0) return;

  console.log(row("Failed", failures.length, chalk.red));

  const shown = verbose ? failures : failures.slice(0, COLLAPSED_FAILURES);
  for (const failure of shown) {
    console.log(`      ${chalk.dim("·")} ${formatFailure(failure)}`);
    if (verbose && failure.details) {
      console.log(`        ${chalk.dim(failure.details)}`);
    }
  }
  if (shown.length < failures.length) {
    console.log(
      chalk.dim(`        +${failures.length - shown.length} more (use --verbose)`),
    );
  }
}
