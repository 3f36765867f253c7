/**
 * @rebalancer/utils - Shared utilities package
 *
 * Exports only logging and error primitives. Domain types live in @rebalancer/core.
 */

export { logger, Logger, LogLevel, winstonLogger, createLogger } from './logger.js';
export type { LogContext } from './logger.js';

export { createPackageLogger, LogHelpers } from './logging/index.js';

export * from './errors.js';
