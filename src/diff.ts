/**
 * Core diffing logic for snapshots
 *
 * Pure functions for comparing loaded snapshots - no I/O side effects.
 */

import { collectLeaves, joinPath } from "./flatten.js";
import { assignEntries, isNodeMap, nodesEqual, setEntry } from "./snapshot.js";
import type { DiffCategories, NodeMap, NodeValue } from "./types.js";

export function emptyCategories(): DiffCategories {
  return { added: {}, removed: {}, changed: {} };
}

/**
 * Compare two snapshots. Keys missing on one side are expanded to their
 * leaves; keys holding maps on both sides are recursed into; anything else
 * that differs (including reordered sequences) is a single change.
 *
 * Different shapes can spell the same path (`{a: {b: 1}}` and `{"a.b": 1}`),
 * so each path ends up in at most one category: a path both removed and added
 * becomes a change, or nothing when the values agree.
 */
export function diffSnapshots(older: NodeMap, newer: NodeMap, prefix: string = ""): DiffCategories {
  const diffs = emptyCategories();
  diffMaps(older, newer, prefix, diffs);
  return reconcilePaths(diffs);
}

function diffMaps(older: NodeMap, newer: NodeMap, prefix: string, diffs: DiffCategories): void {
  for (const key of Object.keys(older)) {
    const currentPath = joinPath(prefix, key);
    const olderValue = older[key];

    if (!Object.hasOwn(newer, key)) {
      assignEntries(diffs.removed, collectLeaves(olderValue, currentPath, false));
      continue;
    }

    const newerValue = newer[key];
    if (isNodeMap(olderValue) && isNodeMap(newerValue)) {
      diffMaps(olderValue, newerValue, currentPath, diffs);
    } else if (!nodesEqual(olderValue, newerValue)) {
      setEntry(diffs.changed, currentPath, { from: olderValue, to: newerValue });
    }
  }

  for (const key of Object.keys(newer)) {
    if (!Object.hasOwn(older, key)) {
      assignEntries(diffs.added, collectLeaves(newer[key], joinPath(prefix, key), false));
    }
  }
}

/**
 * A path already recorded as changed keeps that entry; a path both removed
 * and added is paired up.
 */
function reconcilePaths(diffs: DiffCategories): DiffCategories {
  for (const path of Object.keys(diffs.changed)) {
    delete diffs.added[path];
    delete diffs.removed[path];
  }

  for (const path of Object.keys(diffs.removed)) {
    if (!Object.hasOwn(diffs.added, path)) continue;

    const from = diffs.removed[path];
    const to = diffs.added[path];
    delete diffs.removed[path];
    delete diffs.added[path];
    if (!nodesEqual(from, to)) {
      setEntry(diffs.changed, path, { from, to });
    }
  }

  return diffs;
}

export function hasDifferences(diffs: DiffCategories): boolean {
  return (
    Object.keys(diffs.added).length > 0 ||
    Object.keys(diffs.removed).length > 0 ||
    Object.keys(diffs.changed).length > 0
  );
}

/**
 * Format a value for display in diff output
 */
export function formatValue(value: NodeValue): string {
  if (value === null) return "null";

  if (typeof value === "string") {
    if (value.length > 100) {
      return JSON.stringify(value.slice(0, 100) + "...");
    }
    return JSON.stringify(value);
  }

  if (typeof value === "object") {
    const json = JSON.stringify(value);
    if (json.length > 200) {
      return json.slice(0, 200) + "...";
    }
    return json;
  }

  return String(value);
}
