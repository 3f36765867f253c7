import { Command } from 'commander';
import { registerBacktestCommands } from './commands/backtest.js';
import { registerStrategyCommands } from './commands/strategies.js';
import type { RunBacktestDeps } from './handlers/backtest/run-backtest.js';
import type { CliIO } from './types/index.js';

export function createProgram(io: CliIO, deps: RunBacktestDeps = {}): Command {
  const program = new Command();
  program
    .name('rebalancer')
    .description('Backtest periodically rebalanced equity portfolios')
    .version('0.1.0');

  registerBacktestCommands(program, io, deps);
  registerStrategyCommands(program, io);

  return program;
}
