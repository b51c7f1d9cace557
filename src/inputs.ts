/**
 * Action inputs
 */

import * as core from "@actions/core";
import { log } from "./logger.js";
import type { ActionInputs, DiffStrategy } from "./types.js";

const STRATEGIES: readonly DiffStrategy[] = ["auto", "nested", "flat"];

function isStrategy(value: string): value is DiffStrategy {
  return STRATEGIES.some((strategy) => strategy === value);
}

/**
 * Parse the diff strategy, falling back to "auto" for empty or unknown values
 */
export function parseStrategy(input: string | undefined): DiffStrategy {
  const value = (input ?? "").trim().toLowerCase();
  if (!value) {
    return "auto";
  }
  if (isStrategy(value)) {
    return value;
  }
  log.warning(`Unknown strategy "${input}", using "auto" (expected one of: ${STRATEGIES.join(", ")})`);
  return "auto";
}

/**
 * Parse a boolean input; accepts true/false, yes/no, on/off and 1/0
 */
export function parseBoolean(input: string | undefined, defaultValue: boolean): boolean {
  const value = (input ?? "").trim().toLowerCase();
  if (["true", "yes", "on", "1"].includes(value)) return true;
  if (["false", "no", "off", "0"].includes(value)) return false;
  if (value) {
    log.warning(`Invalid boolean "${input}", using ${defaultValue}`);
  }
  return defaultValue;
}

export function getActionInputs(): ActionInputs {
  return {
    currentPath: core.getInput("current", { required: true }),
    baselinePath: core.getInput("baseline", { required: true }),
    strategy: parseStrategy(core.getInput("strategy")),
    outputDir: core.getInput("output_dir") || process.cwd(),
    failOnDifferences: parseBoolean(core.getInput("fail_on_differences"), false),
  };
}
