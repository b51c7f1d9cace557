/**
 * Logger abstraction - works in both CLI and GitHub Actions contexts
 */

import * as core from "@actions/core";
import chalk from "chalk";

export interface Logger {
  info(message: string): void;
  warning(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

/**
 * GitHub Actions logger - wraps @actions/core
 */
export class ActionsLogger implements Logger {
  info(message: string): void {
    core.info(message);
  }

  warning(message: string): void {
    core.warning(message);
  }

  error(message: string): void {
    core.error(message);
  }

  debug(message: string): void {
    core.debug(message);
  }
}

export interface ConsoleLoggerOptions {
  verbose?: boolean;
  color?: boolean;
}

/**
 * Console logger for CLI usage. Everything goes to stderr so that
 * `--json` output on stdout stays parseable.
 */
export class ConsoleLogger implements Logger {
  private verbose: boolean;
  private paint: chalk.Chalk;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.paint = new chalk.Instance({ level: options.color === false ? 0 : chalk.level });
  }

  info(message: string): void {
    console.error(message);
  }

  warning(message: string): void {
    console.error(this.paint.yellow(`⚠️  ${message}`));
  }

  error(message: string): void {
    console.error(this.paint.red(`❌ ${message}`));
  }

  debug(message: string): void {
    if (this.verbose) {
      console.error(this.paint.dim(`🔍 ${message}`));
    }
  }
}

/**
 * Quiet logger - only outputs errors
 */
export class QuietLogger implements Logger {
  info(_message: string): void {}
  warning(_message: string): void {}
  error(message: string): void {
    console.error(message);
  }
  debug(_message: string): void {}
}

/**
 * Keeps messages in memory; used by tests and by callers that render logs themselves
 */
export class MemoryLogger implements Logger {
  readonly entries: Array<{ level: keyof Logger; message: string }> = [];

  info(message: string): void {
    this.entries.push({ level: "info", message });
  }
  warning(message: string): void {
    this.entries.push({ level: "warning", message });
  }
  error(message: string): void {
    this.entries.push({ level: "error", message });
  }
  debug(message: string): void {
    this.entries.push({ level: "debug", message });
  }

  messages(level: keyof Logger): string[] {
    return this.entries.filter((entry) => entry.level === level).map((entry) => entry.message);
  }
}

let currentLogger: Logger = new ConsoleLogger();

export function setLogger(logger: Logger): void {
  currentLogger = logger;
}

export function getLogger(): Logger {
  return currentLogger;
}

// Convenience exports that use the current logger
export const log = {
  info: (message: string) => currentLogger.info(message),
  warning: (message: string) => currentLogger.warning(message),
  error: (message: string) => currentLogger.error(message),
  debug: (message: string) => currentLogger.debug(message),
};
