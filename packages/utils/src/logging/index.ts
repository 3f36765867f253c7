/**
 * Package-aware Logging
 * =====================
 *
 * Usage:
 * ```typescript
 * import { createPackageLogger } from '@rebalancer/utils';
 *
 * const logger = createPackageLogger('@rebalancer/simulation');
 * logger.info('Rebalance complete', { date: '2023-04-03' });
 * ```
 */

import { Logger, createLogger } from '../logger.js';
import type { LogContext } from '../logger.js';

const packageLoggers = new Map<string, Logger>();

/**
 * Create or retrieve a package-specific logger
 */
export function createPackageLogger(packageName: string): Logger {
  const existing = packageLoggers.get(packageName);
  if (existing) {
    return existing;
  }

  const packageLogger = createLogger(packageName);
  packageLoggers.set(packageName, packageLogger);
  return packageLogger;
}

/**
 * Structured log helpers for recurring backtest events
 */
export class LogHelpers {
  static trade(
    logger: Logger,
    action: 'buy' | 'sell',
    code: string,
    shares: number,
    price: number,
    context?: LogContext
  ): void {
    logger.debug(`Trade ${action}`, { code, shares, price, ...context });
  }

  static rejectedTrade(
    logger: Logger,
    action: 'buy' | 'sell',
    code: string,
    reason: string,
    context?: LogContext
  ): void {
    logger.warn('Trade rejected', { action, code, reason, ...context });
  }
}
