/**
 * Backtest Commands
 */

import type { Command } from 'commander';
import { backtestRunSchema } from '../command-defs/backtest.js';
import { coerceJson, coerceNumber } from '../core/coerce.js';
import { defineCommand } from '../core/defineCommand.js';
import { formatBacktestReport } from '../core/output-formatter.js';
import { runBacktestHandler, type RunBacktestDeps } from '../handlers/backtest/run-backtest.js';
import type { CliIO } from '../types/index.js';

export function registerBacktestCommands(program: Command, io: CliIO, deps: RunBacktestDeps = {}): void {
  if (program.commands.find((cmd) => cmd.name() === 'backtest')) {
    return;
  }

  const backtestCmd = program.command('backtest').description('Periodic rebalancing backtests');

  const runCmd = backtestCmd
    .command('run')
    .description('Run one strategy over a date range')
    .requiredOption('--data <dir>', 'Directory of <code>.csv price files (date,open,high,low,close,volume)')
    .requiredOption('--universe <file>', 'Universe CSV (code,name)')
    .requiredOption('--strategy <id>', 'Strategy id (see `strategies list`)')
    .requiredOption('--from <date>', 'Start date (YYYY-MM-DD)')
    .requiredOption('--to <date>', 'End date (YYYY-MM-DD)')
    .option('--frequency <freq>', 'Rebalance frequency: M, Q or Y')
    .option('--config <file>', 'Backtest config (YAML or JSON)')
    .option('--params <json>', 'Strategy parameter overrides as JSON')
    .option('--capital <number>', 'Initial capital')
    .option('--max-positions <number>', 'Maximum holdings after a rebalance')
    .option('--benchmark <number>', 'Benchmark annual return, e.g. 0.08')
    .option('--format <format>', 'Output format: json or table', 'table');

  defineCommand(runCmd, {
    schema: backtestRunSchema,
    coerce: (raw) => ({
      ...raw,
      params: coerceJson(raw.params, 'params'),
      capital: coerceNumber(raw.capital, 'capital'),
      maxPositions: coerceNumber(raw.maxPositions, 'max-positions'),
      benchmark: coerceNumber(raw.benchmark, 'benchmark'),
    }),
    handler: (args) => runBacktestHandler(args, deps),
    format: (report, args) => formatBacktestReport(report, args.format),
    io,
  });
}
