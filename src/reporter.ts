/**
 * Report generator for snapshot comparisons
 */

import * as core from "@actions/core";
import chalk from "chalk";
import * as fs from "fs";
import * as path from "path";
import { formatValue } from "./diff.js";
import { log } from "./logger.js";
import { isFailedComparison, totalDifferences } from "./summary.js";
import type { ComparisonResult, DiffResult } from "./types.js";

export interface ReportFiles {
  jsonPath: string;
  markdownPath: string;
}

/**
 * Escape a cell for a markdown table
 */
function cell(text: string): string {
  return text.replace(/\|/g, "\\|").replace(/\n/g, " ");
}

/**
 * Generate markdown report
 */
export function generateMarkdownReport(result: ComparisonResult, generatedAt: Date = new Date()): string {
  const lines: string[] = [];
  const { summary } = result;

  lines.push("# Snapshot Comparison Report");
  lines.push("");
  lines.push(`**Generated:** ${generatedAt.toISOString()}`);
  lines.push(`**Current:** ${summary.current_file}`);
  lines.push(`**Baseline:** ${summary.baseline_file}`);
  lines.push("");

  if (isFailedComparison(result)) {
    lines.push("## ❌ Comparison Failed");
    lines.push("");
    lines.push(result.summary.error);
    lines.push("");
    return lines.join("\n");
  }

  lines.push("## Summary");
  lines.push("");
  lines.push(`| Metric | Value |`);
  lines.push(`|--------|-------|`);
  lines.push(`| Added | ${summary.total_added} |`);
  lines.push(`| Removed | ${summary.total_removed} |`);
  lines.push(`| Changed | ${summary.total_changed} |`);
  lines.push("");

  if (totalDifferences(result) === 0) {
    lines.push("## ✅ No Differences");
    lines.push("");
    lines.push("The current snapshot matches the baseline.");
    lines.push("");
    return lines.join("\n");
  }

  lines.push("## ⚠️ Differences Detected");
  lines.push("");
  appendEntries(lines, "Added", result.added);
  appendEntries(lines, "Removed", result.removed);

  const changed = Object.entries(result.changed);
  if (changed.length > 0) {
    lines.push(`### Changed (${changed.length})`);
    lines.push("");
    lines.push("| Path | From | To |");
    lines.push("|------|------|----|");
    for (const [entryPath, { from, to }] of changed) {
      lines.push(`| \`${cell(entryPath)}\` | ${cell(formatValue(from))} | ${cell(formatValue(to))} |`);
    }
    lines.push("");
  }

  return lines.join("\n");
}

function appendEntries(lines: string[], title: string, entries: DiffResult["added"]): void {
  const rows = Object.entries(entries);
  if (rows.length === 0) return;

  lines.push(`### ${title} (${rows.length})`);
  lines.push("");
  lines.push("| Path | Value |");
  lines.push("|------|-------|");
  for (const [entryPath, value] of rows) {
    lines.push(`| \`${cell(entryPath)}\` | ${cell(formatValue(value))} |`);
  }
  lines.push("");
}

/**
 * Render a diff for the terminal: `+` added, `-` removed, `~` changed
 */
export function renderTextReport(result: ComparisonResult, options: { color?: boolean } = {}): string {
  const paint = new chalk.Instance({ level: options.color ? 1 : 0 });
  const lines: string[] = [];
  const { summary } = result;

  lines.push(paint.bold(`Comparing ${summary.current_file} against ${summary.baseline_file}`));

  if (isFailedComparison(result)) {
    lines.push(paint.red(`error: ${result.summary.error}`));
    return lines.join("\n");
  }

  for (const [entryPath, value] of Object.entries(result.added)) {
    lines.push(paint.green(`+ ${entryPath}: ${formatValue(value)}`));
  }
  for (const [entryPath, value] of Object.entries(result.removed)) {
    lines.push(paint.red(`- ${entryPath}: ${formatValue(value)}`));
  }
  for (const [entryPath, { from, to }] of Object.entries(result.changed)) {
    lines.push(paint.yellow(`~ ${entryPath}: ${formatValue(from)} -> ${formatValue(to)}`));
  }

  lines.push(
    `${summary.total_added} added, ${summary.total_removed} removed, ${summary.total_changed} changed`
  );
  return lines.join("\n");
}

/**
 * Save report to files and set outputs
 */
export function saveReport(result: ComparisonResult, markdown: string, outputDir: string): ReportFiles {
  const reportDir = path.join(outputDir, "snapshot-report");
  fs.mkdirSync(reportDir, { recursive: true });

  const jsonPath = path.join(reportDir, "snapshot-diff.json");
  fs.writeFileSync(jsonPath, JSON.stringify(result, null, 2));
  log.info(`📄 JSON report saved to: ${jsonPath}`);

  const markdownPath = path.join(reportDir, "SNAPSHOT_DIFF.md");
  fs.writeFileSync(markdownPath, markdown);
  log.info(`📄 Markdown report saved to: ${markdownPath}`);

  return { jsonPath, markdownPath };
}

/**
 * Publish the result as step outputs
 */
export function setReportOutputs(result: ComparisonResult, files: ReportFiles): void {
  const failed = isFailedComparison(result);
  const differences = totalDifferences(result);
  const status = failed ? "error" : differences > 0 ? "differences" : "identical";

  core.setOutput("status", status);
  core.setOutput("report_path", files.markdownPath);
  core.setOutput("json_report_path", files.jsonPath);
  core.setOutput("has_differences", differences > 0);
  core.setOutput("total_added", result.summary.total_added);
  core.setOutput("total_removed", result.summary.total_removed);
  core.setOutput("total_changed", result.summary.total_changed);
}
