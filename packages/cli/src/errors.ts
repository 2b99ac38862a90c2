/**
 * @module @wasmrig/cli/errors
 * Error reporting and exit-code mapping
 */

import { BuildError, ConfigurationError, FAILURE_EXIT_CODE, FatalAbortError, getLogger } from '@wasmrig/core';
import type { Logger } from '@wasmrig/core';

/**
 * Map an error to the process exit code.
 * Returns undefined for errors that are not expected outcomes of a command;
 * those are left to crash the process.
 */
export function mapErrorToExitCode(error: unknown): number | undefined {
  if (error instanceof FatalAbortError) {
    return error.exitCode;
  }
  if (error instanceof ConfigurationError || error instanceof BuildError) {
    return FAILURE_EXIT_CODE;
  }
  return undefined;
}

/**
 * Print a mapped error. A FatalAbortError has already been reported where
 * it was raised.
 */
export function printError(error: unknown, logger: Logger = getLogger('cli')): void {
  if (error instanceof FatalAbortError || !(error instanceof Error)) {
    return;
  }

  logger.error(error.message);
  if (error instanceof ConfigurationError && error.details) {
    logger.debug('error details', error.details);
  }
}
