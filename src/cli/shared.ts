/**
 * Helpers shared by every command
 */

import chalk from "chalk";
import type { Ora } from "ora";
import {
  AggregateFailure,
  CancellationError,
  InputError,
  Logger,
  errorMessage,
  loadConfig,
} from "../utils";
import type { ConversionConfig } from "../types";

export const EXIT_FAILURE = 1;
export const EXIT_CANCELLED = 130;

interface CliConfigOptions {
  config?: string;
  verbose?: boolean;
}

/**
 * Load configuration (default → user → custom) and the logger it asks for
 * Unreadable user/custom files are reported and skipped
 */
export async function loadCliConfig(
  options: CliConfigOptions,
): Promise<{ config: ConversionConfig; logger: Logger }> {
  const { config, errors } = await loadConfig(options.config);
  const logger = new Logger(options.verbose ? "debug" : config.logging.level);

  for (const err of errors) {
    logger.warn(`Ignoring config file ${err.path}: ${errorMessage(err.error)}`);
  }

  return { config, logger };
}

export function printInitHint(error: unknown): void {
  if (error instanceof InputError && error.kind === "no-input") {
    console.error(
      chalk.dim(`  Run "slideforge init <count>" to create placeholder slides`),
    );
  }
}

export function exitCodeFor(error: unknown): number {
  return error instanceof CancellationError ? EXIT_CANCELLED : EXIT_FAILURE;
}

/**
 * Print a command failure and return the exit code to use
 */
export function reportFailure(
  error: unknown,
  spinner: Ora,
  fallbackText: string,
): number {
  if (error instanceof CancellationError) {
    spinner.warn(error.message);
  } else if (error instanceof InputError) {
    spinner.fail(error.message);
  } else if (error instanceof AggregateFailure) {
    spinner.fail(error.message);
  } else {
    spinner.fail(fallbackText);
    console.error(error);
  }
  return exitCodeFor(error);
}
