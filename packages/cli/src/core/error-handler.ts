/**
 * Error Handler - User-friendly error messages and exit codes
 */

import { AppError, ConfigurationError, NotFoundError, ValidationError } from '@rebalancer/utils';
import { logger } from '../logger.js';

/** Bad input: arguments, config or data files */
export const EXIT_USAGE = 2;
export const EXIT_FAILURE = 1;

/**
 * Format error for user display
 */
export function formatError(error: unknown): string {
  const available = error instanceof NotFoundError ? error.context?.available : undefined;
  if (error instanceof NotFoundError && Array.isArray(available)) {
    return `${error.message}. Available: ${available.join(', ')}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'An unexpected error occurred';
}

export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigurationError || error instanceof ValidationError || error instanceof NotFoundError) {
    return EXIT_USAGE;
  }
  return EXIT_FAILURE;
}

/**
 * Log error with full context (for debugging)
 */
export function logError(error: unknown, context?: Record<string, unknown>): void {
  if (error instanceof AppError) {
    logger.error('CLI error', error, { code: error.code, ...error.context, ...context });
  } else {
    logger.error('CLI error', error, context);
  }
}

/**
 * Handle and format error for CLI output
 */
export function handleError(error: unknown, context?: Record<string, unknown>): string {
  logError(error, context);
  return formatError(error);
}

/**
 * Print the error and exit
 */
export function die(error: unknown): never {
  process.stderr.write(`Error: ${handleError(error)}\n`);
  process.exit(exitCodeFor(error));
}
