/**
 * @rebalancer/simulation - Periodic Rebalancing Backtester
 * =======================================================
 *
 * ## Architecture
 *
 * - **indicators/**: Causal technical indicators and per-date snapshots
 * - **strategies/**: Qualify/score strategies, selection and rankings
 * - **ledger/**: Cash, positions, trade log and transaction costs
 * - **scheduler/**: Rebalance calendar and the run loop
 * - **metrics/**: Performance metrics, trade statistics and rating
 * - **data/**: In-memory market data and history validation
 *
 * ## Quick Start
 *
 * ```typescript
 * import {
 *   Backtester,
 *   InMemoryMarketData,
 *   computeMetrics,
 *   getStrategy,
 *   parseBacktestConfig,
 * } from '@rebalancer/simulation';
 *
 * const config = parseBacktestConfig({ frequency: 'M' });
 * const backtester = new Backtester(new InMemoryMarketData(instruments), config);
 * const result = await backtester.run({
 *   startDate: '2023-01-01',
 *   endDate: '2023-12-31',
 *   strategy: getStrategy('momentum'),
 * });
 * const metrics = computeMetrics(result, config);
 * ```
 */

export * from './config.js';
export * from './indicators/index.js';
export * from './strategies/index.js';
export * from './ledger/index.js';
export * from './scheduler/index.js';
export * from './metrics/index.js';
export * from './data/index.js';
export { logger } from './logger.js';
