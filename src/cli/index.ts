/**
 * snapshot-diff command line interface
 */

import chalk from "chalk";
import { Command, Option } from "commander";
import * as fs from "fs";
import * as path from "path";
import { collectSystemSnapshot } from "../collector.js";
import { compareSnapshotFiles } from "../compare.js";
import { errorMessage } from "../errors.js";
import { exportSnapshot, formatTabular, serializeSnapshot, snapshotToRows } from "../export.js";
import { flatten } from "../flatten.js";
import { loadSnapshotFile } from "../loaders.js";
import { ConsoleLogger, QuietLogger, log, setLogger } from "../logger.js";
import { generateMarkdownReport, renderTextReport, saveReport } from "../reporter.js";
import { isFailedComparison, totalDifferences } from "../summary.js";
import type { DiffStrategy, Snapshot, SnapshotFormat } from "../types.js";

export const EXIT_OK = 0;
export const EXIT_DIFFERENCES = 1;
export const EXIT_FAILURE = 2;

export interface CliIO {
  write(text: string): void;
  setExitCode(code: number): void;
}

const processIO: CliIO = {
  write: (text) => {
    process.stdout.write(text);
  },
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

interface GlobalOptions {
  verbose?: boolean;
  quiet?: boolean;
  color: boolean;
}

interface CompareCommandOptions {
  strategy: DiffStrategy;
  json?: boolean;
  report?: string;
  failOnDiff?: boolean;
}

interface FlattenCommandOptions {
  csv?: boolean;
}

interface ExportCommandOptions {
  format: "json" | "csv";
  out?: string;
  stdout?: boolean;
}

function readVersion(): string {
  try {
    const packageJson: unknown = JSON.parse(
      fs.readFileSync(path.join(__dirname, "..", "..", "package.json"), "utf8")
    );
    if (typeof packageJson === "object" && packageJson !== null && "version" in packageJson) {
      return String(packageJson.version);
    }
  } catch (error) {
    log.debug(`Could not read package version: ${errorMessage(error)}`);
  }
  return "0.0.0";
}

function toSnapshotFormat(format: ExportCommandOptions["format"]): SnapshotFormat {
  return format === "csv" ? "tabular" : "tree";
}

/**
 * Create the CLI program
 */
export function createProgram(io: CliIO = processIO): Command {
  const program = new Command();

  program
    .name("snapshot-diff")
    .description("Compare and export system snapshots stored as JSON or CSV")
    .version(readVersion())
    .option("-v, --verbose", "Enable debug output")
    .option("-q, --quiet", "Only print errors")
    .option("--no-color", "Disable colored output");

  program.hook("preAction", () => {
    const globals = program.opts<GlobalOptions>();
    setLogger(
      globals.quiet ? new QuietLogger() : new ConsoleLogger({ verbose: globals.verbose, color: globals.color })
    );
  });

  const useColor = () => program.opts<GlobalOptions>().color && chalk.level > 0;

  program
    .command("compare")
    .description("Compare a current snapshot against a baseline")
    .argument("<current>", "current snapshot (.json or .csv)")
    .argument("<baseline>", "baseline snapshot (.json or .csv)")
    .addOption(
      new Option("-s, --strategy <strategy>", "how to line up the two snapshots")
        .choices(["auto", "nested", "flat"])
        .default("auto")
    )
    .option("--json", "Print the result as JSON")
    .option("-r, --report <dir>", "Also write JSON and markdown reports into <dir>/snapshot-report")
    .option("--fail-on-diff", "Exit with code 1 when the snapshots differ")
    .action((current: string, baseline: string, options: CompareCommandOptions) => {
      const result = compareSnapshotFiles(current, baseline, { strategy: options.strategy });

      io.write(
        options.json
          ? JSON.stringify(result, null, 2) + "\n"
          : renderTextReport(result, { color: useColor() }) + "\n"
      );

      if (options.report) {
        saveReport(result, generateMarkdownReport(result), options.report);
      }

      if (isFailedComparison(result)) {
        io.setExitCode(EXIT_FAILURE);
      } else if (options.failOnDiff && totalDifferences(result) > 0) {
        io.setExitCode(EXIT_DIFFERENCES);
      } else {
        io.setExitCode(EXIT_OK);
      }
    });

  program
    .command("flatten")
    .description("Print every leaf of a snapshot as a path and a string value")
    .argument("<file>", "snapshot (.json or .csv)")
    .option("--csv", "Print Component,Property,Value rows instead of path=value lines")
    .action((file: string, options: FlattenCommandOptions) => {
      try {
        const { snapshot } = loadSnapshotFile(file);
        if (options.csv) {
          io.write(formatTabular(snapshotToRows(snapshot)));
        } else {
          io.write(flatten(snapshot).map(({ path: entryPath, value }) => `${entryPath}=${value}\n`).join(""));
        }
        io.setExitCode(EXIT_OK);
      } catch (error) {
        log.error(errorMessage(error));
        io.setExitCode(EXIT_FAILURE);
      }
    });

  program
    .command("export")
    .description("Export a snapshot file, or a live snapshot of this machine, as JSON or CSV")
    .argument("[file]", "snapshot to convert; omit to collect a live snapshot")
    .addOption(new Option("-f, --format <format>", "output format").choices(["json", "csv"]).default("json"))
    .option("-o, --out <dir>", "directory for the export file (default: current directory)")
    .option("--stdout", "Print instead of writing a file")
    .action((file: string | undefined, options: ExportCommandOptions) => {
      try {
        const snapshot: Snapshot = file ? loadSnapshotFile(file).snapshot : collectSystemSnapshot();
        const format = toSnapshotFormat(options.format);

        if (options.stdout) {
          io.write(serializeSnapshot(snapshot, format));
        } else {
          exportSnapshot(snapshot, { format, outDir: options.out });
        }
        io.setExitCode(EXIT_OK);
      } catch (error) {
        log.error(`Export failed: ${errorMessage(error)}`);
        io.setExitCode(EXIT_FAILURE);
      }
    });

  return program;
}
