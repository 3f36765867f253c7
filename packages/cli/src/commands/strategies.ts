import type { Command } from 'commander';
import { strategyListSchema } from '../command-defs/backtest.js';
import { defineCommand } from '../core/defineCommand.js';
import { formatStrategyList } from '../core/output-formatter.js';
import { listStrategiesHandler } from '../handlers/strategies/list-strategies.js';
import type { CliIO } from '../types/index.js';

export function registerStrategyCommands(program: Command, io: CliIO): void {
  const strategiesCmd = program.command('strategies').description('Built-in stock-selection strategies');

  const listCmd = strategiesCmd
    .command('list')
    .description('List strategies with their default rules')
    .option('--format <format>', 'Output format: json or table', 'table');

  defineCommand(listCmd, {
    schema: strategyListSchema,
    handler: () => listStrategiesHandler(),
    format: (strategies, args) => formatStrategyList(strategies, args.format),
    io,
  });
}
