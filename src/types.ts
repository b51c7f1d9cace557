/**
 * Type definitions for snapshot-diff
 */

export type ScalarValue = string | number | boolean | null;

export interface NodeMap {
  [key: string]: NodeValue;
}

export type NodeValue = ScalarValue | NodeMap | NodeValue[];

/**
 * A snapshot is always a map at the root: component name -> component value
 */
export type Snapshot = NodeMap;

export interface FlatEntry {
  path: string;
  value: string;
}

export type SnapshotFormat = "tree" | "tabular";

export type DiffStrategy = "auto" | "nested" | "flat";

export interface ValueChange {
  from: NodeValue;
  to: NodeValue;
}

export interface DiffCategories {
  added: Record<string, NodeValue>;
  removed: Record<string, NodeValue>;
  changed: Record<string, ValueChange>;
}

export interface SnapshotSources {
  current: string;
  baseline: string;
}

export interface DiffSummary {
  total_added: number;
  total_removed: number;
  total_changed: number;
  current_file: string;
  baseline_file: string;
}

export interface DiffResult extends DiffCategories {
  summary: DiffSummary;
}

export interface ErrorEntry {
  error: string;
}

export interface FailedComparison {
  added: ErrorEntry;
  removed: ErrorEntry;
  changed: ErrorEntry;
  summary: DiffSummary & { error: string };
}

export type ComparisonResult = DiffResult | FailedComparison;

/**
 * One row of the Component,Property,Value tabular form
 */
export interface TabularRow {
  component: string;
  property: string;
  value: string;
}

export interface ActionInputs {
  currentPath: string;
  baselinePath: string;
  strategy: DiffStrategy;
  outputDir: string;
  failOnDifferences: boolean;
}
