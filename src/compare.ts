/**
 * Comparison of two snapshot files
 *
 * Nothing thrown while loading escapes from here: failures come back as a
 * result whose categories each hold a single `error` entry.
 */

import { diffSnapshots } from "./diff.js";
import { SnapshotError, errorMessage } from "./errors.js";
import { flattenToRecord } from "./flatten.js";
import { detectFormat, loadSnapshotFile } from "./loaders.js";
import { log } from "./logger.js";
import { failedComparison, summarizeDiff } from "./summary.js";
import type {
  ComparisonResult,
  DiffResult,
  DiffStrategy,
  Snapshot,
  SnapshotFormat,
  SnapshotSources,
} from "./types.js";

export interface CompareOptions {
  /** Defaults to "auto": nested for same-format files, flat across formats */
  strategy?: DiffStrategy;
}

export function resolveStrategy(
  strategy: DiffStrategy,
  currentFormat: SnapshotFormat,
  baselineFormat: SnapshotFormat
): "nested" | "flat" {
  if (strategy !== "auto") return strategy;
  return currentFormat === baselineFormat ? "nested" : "flat";
}

/**
 * Diff two in-memory snapshots, baseline first
 */
export function compareSnapshots(
  baseline: Snapshot,
  current: Snapshot,
  sources: SnapshotSources,
  strategy: "nested" | "flat" = "nested"
): DiffResult {
  const diffs =
    strategy === "flat"
      ? diffSnapshots(flattenToRecord(baseline), flattenToRecord(current))
      : diffSnapshots(baseline, current);
  return summarizeDiff(diffs, sources);
}

/**
 * Compare the snapshot at `currentPath` against the one at `baselinePath`
 */
export function compareSnapshotFiles(
  currentPath: string,
  baselinePath: string,
  options: CompareOptions = {}
): ComparisonResult {
  const sources: SnapshotSources = { current: currentPath, baseline: baselinePath };

  try {
    const currentFormat = detectFormat(currentPath);
    const baselineFormat = detectFormat(baselinePath);

    const current = loadSnapshotFile(currentPath, currentFormat);
    const baseline = loadSnapshotFile(baselinePath, baselineFormat);

    const strategy = resolveStrategy(options.strategy ?? "auto", currentFormat, baselineFormat);
    log.debug(`Comparing ${currentPath} against ${baselinePath} (${strategy})`);

    return compareSnapshots(baseline.snapshot, current.snapshot, sources, strategy);
  } catch (error) {
    const message =
      error instanceof SnapshotError ? error.message : `Comparison failed: ${errorMessage(error)}`;
    log.warning(message);
    return failedComparison(message, sources);
  }
}
