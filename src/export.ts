/**
 * Export of snapshots to JSON or Component,Property,Value tables
 */

import * as fs from "fs";
import * as path from "path";
import { formatCsv } from "./csv.js";
import { flatten } from "./flatten.js";
import { log } from "./logger.js";
import type { NodeValue, SnapshotFormat, TabularRow } from "./types.js";

export const TABULAR_HEADER = ["Component", "Property", "Value"];

export interface ExportOptions {
  format: SnapshotFormat;
  outDir?: string;
  now?: Date;
}

/**
 * Split a flattened path into its component and the rest of the path.
 * `Disk[0].size` -> ["Disk", "[0].size"], `CPU.cores` -> ["CPU", "cores"]
 */
export function splitComponent(flatPath: string): [string, string] {
  const match = /^([^.[]+)(.*)$/.exec(flatPath);
  if (!match) {
    return [flatPath, ""];
  }
  const rest = match[2].startsWith(".") ? match[2].slice(1) : match[2];
  return [match[1], rest];
}

/**
 * Rows use the same flatten rule as comparison, so loading the table back and
 * flattening it gives the original path set
 */
export function snapshotToRows(snapshot: NodeValue): TabularRow[] {
  return flatten(snapshot).map(({ path: flatPath, value }) => {
    const [component, property] = splitComponent(flatPath);
    return { component, property, value };
  });
}

export function formatTabular(rows: TabularRow[]): string {
  return formatCsv([TABULAR_HEADER, ...rows.map((row) => [row.component, row.property, row.value])]);
}

export function formatTree(snapshot: NodeValue): string {
  return JSON.stringify(snapshot, null, 2) + "\n";
}

export function serializeSnapshot(snapshot: NodeValue, format: SnapshotFormat): string {
  return format === "tabular" ? formatTabular(snapshotToRows(snapshot)) : formatTree(snapshot);
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * snapshot_export_<YYYY-MM-DD>_<HH-MM-SS>.<json|csv>, in local time
 */
export function exportFileName(format: SnapshotFormat, now: Date = new Date()): string {
  const day = `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}-${pad(now.getMinutes())}-${pad(now.getSeconds())}`;
  const extension = format === "tabular" ? "csv" : "json";
  return `snapshot_export_${day}_${time}.${extension}`;
}

/**
 * Write a snapshot to a new timestamped file. Existing files are never overwritten.
 */
export function exportSnapshot(snapshot: NodeValue, options: ExportOptions): string {
  const outDir = options.outDir ?? process.cwd();
  fs.mkdirSync(outDir, { recursive: true });

  const filePath = path.join(outDir, exportFileName(options.format, options.now));
  fs.writeFileSync(filePath, serializeSnapshot(snapshot, options.format), { flag: "wx" });

  log.info(`📄 Snapshot exported to: ${filePath}`);
  return filePath;
}
