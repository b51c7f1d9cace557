/**
 * snapshot-diff: compare system snapshots across JSON and CSV
 */

export * from "./types.js";
export { classifyNode, isNodeMap, nodesEqual, toNodeValue } from "./snapshot.js";
export type { ClassifiedNode } from "./snapshot.js";
export {
  SnapshotError,
  UnsupportedFormatError,
  MalformedInputError,
  FileAccessError,
} from "./errors.js";
export { flatten, flattenToRecord, collectLeaves, joinPath, stringifyScalar } from "./flatten.js";
export {
  detectFormat,
  loadTree,
  loadTabular,
  rowsToSnapshot,
  loadSnapshotFile,
  tryStructuredTreeLoad,
  fallbackFlattenTreeLoad,
  tryStructuredTabularLoad,
  fallbackFlattenTabularLoad,
} from "./loaders.js";
export { diffSnapshots, hasDifferences, formatValue } from "./diff.js";
export { summarizeDiff, failedComparison, isFailedComparison, totalDifferences } from "./summary.js";
export { compareSnapshots, compareSnapshotFiles } from "./compare.js";
export type { CompareOptions } from "./compare.js";
export { snapshotToRows, formatTabular, serializeSnapshot, exportSnapshot, exportFileName } from "./export.js";
export { collectSystemSnapshot } from "./collector.js";
export { generateMarkdownReport, renderTextReport, saveReport } from "./reporter.js";
export { setLogger, getLogger, ConsoleLogger, QuietLogger, ActionsLogger, MemoryLogger } from "./logger.js";
export type { Logger } from "./logger.js";
