/**
 * Backtest Run Handler
 *
 * Loads config and market data, runs one strategy over the date range and
 * reports metrics, trade statistics, rating and benchmark comparison.
 *
 * Pure handler - no console.log, no process.exit, no try/catch.
 */

import type { MarketDataPort, RebalanceFrequency } from '@rebalancer/core';
import {
  Backtester,
  compareWithBenchmark,
  computeMetrics,
  getStrategy,
  parseBacktestConfig,
  rateStrategy,
  summarizeTrades,
  type BenchmarkComparison,
  type PerformanceMetrics,
  type StrategyRating,
  type TradeStatistics,
} from '@rebalancer/simulation';
import type { BacktestRunArgs } from '../../command-defs/backtest.js';
import { loadConfig } from '../../core/config-loader.js';
import { CsvMarketData } from '../../data/csv-market-data.js';
import { logger } from '../../logger.js';

export interface BacktestReport {
  strategy: string;
  strategyId: string;
  startDate: string;
  endDate: string;
  frequency: RebalanceFrequency;
  metrics: PerformanceMetrics;
  trades: TradeStatistics;
  rating: StrategyRating;
  benchmark: BenchmarkComparison;
  finalCash: number;
  finalPositions: Record<string, number>;
}

export interface RunBacktestDeps {
  /** Replaces the CSV files named by `data` and `universe` */
  marketData?: MarketDataPort;
}

export async function runBacktestHandler(args: BacktestRunArgs, deps: RunBacktestDeps = {}): Promise<BacktestReport> {
  const config = await loadConfig(args.config, parseBacktestConfig, {
    frequency: args.frequency,
    initialCapital: args.capital,
    maxPositions: args.maxPositions,
  });
  const strategy = getStrategy(args.strategy, args.params);
  const marketData = deps.marketData ?? new CsvMarketData({ dataDir: args.data, universePath: args.universe });

  const result = await new Backtester(marketData, config).run({
    startDate: args.from,
    endDate: args.to,
    strategy,
  });

  const metrics = computeMetrics(result, {
    initialCapital: config.initialCapital,
    frequency: result.frequency,
    riskFreeRate: config.riskFreeRate,
  });

  logger.info('Backtest command finished', {
    strategy: result.strategyId,
    totalReturn: metrics.totalReturn,
    trades: result.trades.length,
  });

  return {
    strategy: result.strategy,
    strategyId: result.strategyId,
    startDate: result.startDate,
    endDate: result.endDate,
    frequency: result.frequency,
    metrics,
    trades: summarizeTrades(result.trades),
    rating: rateStrategy(metrics),
    benchmark: compareWithBenchmark(metrics, args.benchmark),
    finalCash: result.finalCash,
    finalPositions: result.finalPositions,
  };
}
