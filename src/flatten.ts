/**
 * Flattening of nested snapshots into path -> string entries
 *
 * The same walk backs tabular export, the flat diff strategy and the leaf
 * expansion of added/removed subtrees, so every path is built the same way.
 */

import { assertNever, classifyNode, setEntry } from "./snapshot.js";
import type { FlatEntry, NodeValue, ScalarValue } from "./types.js";

export const ROOT_SCALAR_KEY = "value";

export interface LeafVisitor {
  scalar(path: string, value: ScalarValue): void;
  /** Called for `{}` and `[]`; flatten ignores them */
  emptyContainer?(path: string, value: NodeValue): void;
}

/**
 * Append a map key to a path. Keys that already carry an index (`[0].size`)
 * are joined without a dot.
 */
export function joinPath(prefix: string, key: string): string {
  if (!prefix) return key;
  return key.startsWith("[") ? `${prefix}${key}` : `${prefix}.${key}`;
}

export function indexPath(prefix: string, index: number): string {
  return `${prefix}[${index}]`;
}

export function stringifyScalar(value: ScalarValue): string {
  if (value === null) return "";
  if (typeof value === "boolean") return value ? "true" : "false";
  return String(value);
}

/**
 * Depth-first walk over every leaf in insertion order. Only a root that is
 * itself a leaf falls back to ROOT_SCALAR_KEY for its path; a map key of ""
 * keeps the empty path.
 */
export function walkLeaves(
  value: NodeValue,
  prefix: string,
  visitor: LeafVisitor,
  isRoot: boolean = prefix === ""
): void {
  const node = classifyNode(value);
  const leafPath = isRoot && prefix === "" ? ROOT_SCALAR_KEY : prefix;

  switch (node.kind) {
    case "map": {
      const keys = Object.keys(node.value);
      if (keys.length === 0) {
        visitor.emptyContainer?.(leafPath, node.value);
        return;
      }
      for (const key of keys) {
        walkLeaves(node.value[key], joinPath(prefix, key), visitor, false);
      }
      return;
    }
    case "sequence":
      if (node.value.length === 0) {
        visitor.emptyContainer?.(leafPath, node.value);
        return;
      }
      node.value.forEach((item, index) => walkLeaves(item, indexPath(prefix, index), visitor, false));
      return;
    case "scalar":
      visitor.scalar(leafPath, node.value);
      return;
    default:
      assertNever(node);
  }
}

export function flatten(value: NodeValue, prefix: string = ""): FlatEntry[] {
  const entries: FlatEntry[] = [];
  walkLeaves(value, prefix, {
    scalar: (path, scalar) => entries.push({ path, value: stringifyScalar(scalar) }),
  });
  return entries;
}

export function flattenToRecord(value: NodeValue, prefix: string = ""): Record<string, string> {
  const record: Record<string, string> = {};
  for (const { path, value: text } of flatten(value, prefix)) {
    setEntry(record, path, text);
  }
  return record;
}

/**
 * Leaves with their native values; empty containers count as leaves.
 * Pass `isRoot: false` when `prefix` is the path of a map entry, even an empty one.
 */
export function collectLeaves(
  value: NodeValue,
  prefix: string = "",
  isRoot: boolean = prefix === ""
): Record<string, NodeValue> {
  const leaves: Record<string, NodeValue> = {};
  walkLeaves(
    value,
    prefix,
    {
      scalar: (path, scalar) => setEntry(leaves, path, scalar),
      emptyContainer: (path, container) => setEntry(leaves, path, container),
    },
    isRoot
  );
  return leaves;
}
