/**
 * Snapshot loaders
 *
 * Both formats load into the same nested-map shape. Each format tries a
 * structured read first and falls back to a flat one when the input does not
 * have the expected shape.
 */

import * as fs from "fs";
import * as path from "path";
import { parseCsv } from "./csv.js";
import { FileAccessError, MalformedInputError, UnsupportedFormatError, errorMessage } from "./errors.js";
import { collectLeaves } from "./flatten.js";
import { isNodeMap, setEntry, toNodeValue } from "./snapshot.js";
import { log } from "./logger.js";
import type { NodeValue, Snapshot, SnapshotFormat, TabularRow } from "./types.js";

const FORMAT_BY_EXTENSION: Record<string, SnapshotFormat> = {
  ".json": "tree",
  ".csv": "tabular",
};

const PROPERTY_COLUMNS = ["property", "metric", "sensor", "key"];

export interface LoadedSnapshot {
  format: SnapshotFormat;
  snapshot: Snapshot;
}

export type RawTabularRow = Partial<TabularRow> & { row?: number };

/**
 * Select the loader for a file by its extension
 */
export function detectFormat(filePath: string): SnapshotFormat {
  const extension = path.extname(filePath).toLowerCase();
  const format = FORMAT_BY_EXTENSION[extension];
  if (!format) {
    throw new UnsupportedFormatError(extension);
  }
  return format;
}

// ---------------------------------------------------------------------------
// Tree format
// ---------------------------------------------------------------------------

export function tryStructuredTreeLoad(value: NodeValue): Snapshot | null {
  return isNodeMap(value) ? value : null;
}

/**
 * Arrays and scalars at the root become a one-level map of their leaves
 */
export function fallbackFlattenTreeLoad(value: NodeValue): Snapshot {
  return collectLeaves(value);
}

export function loadTree(text: string, source: string = "<tree>"): Snapshot {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new MalformedInputError(source, `invalid JSON (${errorMessage(error)})`, { cause: error });
  }

  const value = toNodeValue(parsed);
  const structured = tryStructuredTreeLoad(value);
  if (structured) {
    return structured;
  }

  log.debug(`${source}: root is not an object, loading its flattened leaves`);
  return fallbackFlattenTreeLoad(value);
}

// ---------------------------------------------------------------------------
// Tabular format
// ---------------------------------------------------------------------------

/**
 * Group rows into {component: {property: value}}. A blank property stores
 * the value on the component itself.
 */
export function rowsToSnapshot(rows: RawTabularRow[], source: string = "<rows>"): Snapshot {
  const snapshot: Snapshot = {};

  rows.forEach((raw, index) => {
    const row = raw.row ?? index + 1;
    const { component, property } = raw;
    const value = raw.value ?? "";

    if (component === undefined || component.trim() === "") {
      throw new MalformedInputError(source, "row is missing the Component field", { row });
    }
    if (property === undefined) {
      throw new MalformedInputError(source, "row is missing the Property field", { row });
    }

    const existing = Object.hasOwn(snapshot, component) ? snapshot[component] : undefined;

    if (property.trim() === "") {
      if (existing !== undefined && isNodeMap(existing)) {
        throw new MalformedInputError(
          source,
          `component "${component}" has both a value and properties`,
          { row }
        );
      }
      setEntry(snapshot, component, value);
      return;
    }

    if (existing === undefined) {
      const properties: Snapshot = {};
      setEntry(properties, property, value);
      setEntry(snapshot, component, properties);
    } else if (isNodeMap(existing)) {
      setEntry(existing, property, value);
    } else {
      throw new MalformedInputError(
        source,
        `component "${component}" has both a value and properties`,
        { row }
      );
    }
  });

  return snapshot;
}

function columnIndex(header: string[], names: string[]): number {
  const normalized = header.map((cell) => cell.trim().toLowerCase());
  for (const name of names) {
    const index = normalized.indexOf(name);
    if (index >= 0) return index;
  }
  return -1;
}

/**
 * Component/Property/Value tables (Metric or Sensor may stand in for Property).
 * Returns null when the header has some other shape.
 */
export function tryStructuredTabularLoad(records: string[][], source: string = "<tabular>"): Snapshot | null {
  const [header = [], ...body] = records;
  const componentIndex = columnIndex(header, ["component"]);
  const propertyIndex = columnIndex(header, PROPERTY_COLUMNS);
  const valueIndex = columnIndex(header, ["value"]);

  if (componentIndex < 0 || propertyIndex < 0 || valueIndex < 0) {
    return null;
  }

  const rows: RawTabularRow[] = body.map((record, index) => ({
    component: record[componentIndex],
    property: record[propertyIndex],
    value: record[valueIndex],
    row: index + 2,
  }));

  return rowsToSnapshot(rows, source);
}

/**
 * Key/Value tables load as {key: value}; anything else loads each record as
 * row_<n>: {column: cell}
 */
export function fallbackFlattenTabularLoad(records: string[][], source: string = "<tabular>"): Snapshot {
  const [header = [], ...body] = records;
  const snapshot: Snapshot = {};
  const keyIndex = columnIndex(header, ["key"]);
  const valueIndex = columnIndex(header, ["value"]);

  if (keyIndex >= 0 && valueIndex >= 0) {
    body.forEach((record, index) => {
      const key = record[keyIndex];
      if (key === undefined || key.trim() === "") {
        throw new MalformedInputError(source, "row is missing the Key field", { row: index + 2 });
      }
      setEntry(snapshot, key, record[valueIndex] ?? "");
    });
    return snapshot;
  }

  const columns = header.map((cell) => cell.trim());
  body.forEach((record, index) => {
    const entry: Record<string, string> = {};
    columns.forEach((column, columnIdx) => {
      setEntry(entry, column, record[columnIdx] ?? "");
    });
    setEntry(snapshot, `row_${index}`, entry);
  });
  return snapshot;
}

export function loadTabular(text: string, source: string = "<tabular>"): Snapshot {
  const records = parseCsv(text);
  if (records.length === 0) {
    return {};
  }

  const structured = tryStructuredTabularLoad(records, source);
  if (structured) {
    return structured;
  }

  log.debug(`${source}: no Component/Property/Value header, loading rows as flat entries`);
  return fallbackFlattenTabularLoad(records, source);
}

// ---------------------------------------------------------------------------
// Files
// ---------------------------------------------------------------------------

export function parseSnapshot(text: string, format: SnapshotFormat, source: string): Snapshot {
  switch (format) {
    case "tree":
      return loadTree(text, source);
    case "tabular":
      return loadTabular(text, source);
  }
}

export function readSnapshotText(filePath: string): string {
  try {
    return fs.readFileSync(filePath, "utf8");
  } catch (error) {
    throw new FileAccessError(filePath, error);
  }
}

/**
 * Read and parse one snapshot file. The file is fully read before parsing.
 */
export function loadSnapshotFile(filePath: string, format: SnapshotFormat = detectFormat(filePath)): LoadedSnapshot {
  const text = readSnapshotText(filePath);
  log.debug(`Loaded ${filePath} (${format}, ${text.length} bytes)`);
  return { format, snapshot: parseSnapshot(text, format, filePath) };
}
