/**
 * @rebalancer/cli
 *
 * `rebalancer backtest run` and `rebalancer strategies list` over CSV price files.
 */

export { createProgram } from './program.js';
export { registerBacktestCommands } from './commands/backtest.js';
export { registerStrategyCommands } from './commands/strategies.js';
export { runBacktestHandler } from './handlers/backtest/run-backtest.js';
export type { BacktestReport, RunBacktestDeps } from './handlers/backtest/run-backtest.js';
export { listStrategiesHandler } from './handlers/strategies/list-strategies.js';
export type { StrategyListing } from './handlers/strategies/list-strategies.js';
export { backtestRunSchema, strategyListSchema } from './command-defs/backtest.js';
export type { BacktestRunArgs, BacktestRunInput, StrategyListArgs } from './command-defs/backtest.js';
export { CsvMarketData, parseCsv, rowToBar } from './data/csv-market-data.js';
export type { CsvMarketDataOptions, CsvRow } from './data/csv-market-data.js';
export { loadConfig, readConfigFile, deepMerge, detectConfigFormat } from './core/config-loader.js';
export { formatBacktestReport, formatStrategyList, formatTable, formatJSON } from './core/output-formatter.js';
export { formatError, exitCodeFor, handleError, die } from './core/error-handler.js';
export type { CliIO, OutputFormat } from './types/index.js';
