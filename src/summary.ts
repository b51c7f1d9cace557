/**
 * Summary builder for diff results
 */

import type {
  ComparisonResult,
  DiffCategories,
  DiffResult,
  FailedComparison,
  SnapshotSources,
} from "./types.js";

/**
 * Attach counts and provenance to a diff. The category maps are passed through untouched.
 */
export function summarizeDiff(diffs: DiffCategories, sources: SnapshotSources): DiffResult {
  return {
    added: diffs.added,
    removed: diffs.removed,
    changed: diffs.changed,
    summary: {
      total_added: Object.keys(diffs.added).length,
      total_removed: Object.keys(diffs.removed).length,
      total_changed: Object.keys(diffs.changed).length,
      current_file: sources.current,
      baseline_file: sources.baseline,
    },
  };
}

/**
 * A failed comparison keeps the same four keys, with an error entry in each category
 */
export function failedComparison(message: string, sources: SnapshotSources): FailedComparison {
  return {
    added: { error: message },
    removed: { error: message },
    changed: { error: message },
    summary: {
      total_added: 0,
      total_removed: 0,
      total_changed: 0,
      current_file: sources.current,
      baseline_file: sources.baseline,
      error: message,
    },
  };
}

export function isFailedComparison(result: ComparisonResult): result is FailedComparison {
  return "error" in result.summary;
}

export function totalDifferences(result: ComparisonResult): number {
  const { total_added, total_removed, total_changed } = result.summary;
  return total_added + total_removed + total_changed;
}
