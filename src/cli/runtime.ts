/**
 * Process-level plumbing shared by both executables: exit codes, logging
 * setup from flags and config, and the top-level error handler.
 *
 * @module
 */

import chalk from "chalk";
import { MissingDocsError, isWitDocsError } from "../core/errors.js";
import { createLogger, setLogLevel } from "../utils/logger.js";
import type { WitDocsConfig } from "../utils/validation.js";

const logger = createLogger("cli");

export const EXIT_FAILURE = 1;
/** The component has no package-docs section */
export const EXIT_NO_DOCS = 2;

/**
 * Writes command output. Defaults to stdout; tests pass a collector.
 */
export type OutputSink = (text: string) => void;

export const stdoutSink: OutputSink = (text) => {
  process.stdout.write(text);
};

export const stderrSink: OutputSink = (text) => {
  process.stderr.write(text);
};

/**
 * Apply the configured log level, letting --debug win
 */
export function applyLogLevel(config: WitDocsConfig, debug: boolean | undefined): void {
  if (debug) {
    setLogLevel("debug");
  } else if (config.logLevel) {
    setLogLevel(config.logLevel);
  }
}

/**
 * Exit code for an error that reached the top of a command
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof MissingDocsError ? EXIT_NO_DOCS : EXIT_FAILURE;
}

/**
 * Report an error on stderr and exit
 */
export function handleError(error: unknown): never {
  if (error instanceof MissingDocsError) {
    process.stderr.write(`${error.message}\n`);
  } else if (isWitDocsError(error)) {
    logger.debug({ err: error.toJSON() }, "Command failed");
    process.stderr.write(chalk.red(`Error: ${error.message}\n`));
  } else if (error instanceof Error) {
    logger.error({ err: error }, "Unexpected error");
    process.stderr.write(chalk.red(`Error: ${error.message}\n`));
    if (process.env.DEBUG) {
      process.stderr.write(chalk.dim(`${error.stack ?? ""}\n`));
    }
  } else {
    logger.error({ error }, "Unknown error occurred");
    process.stderr.write(chalk.red("An unexpected error occurred\n"));
  }
  process.exit(exitCodeFor(error));
}
