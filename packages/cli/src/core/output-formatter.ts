/**
 * Output Formatter - JSON and table formats
 */

import type { BacktestReport } from '../handlers/backtest/run-backtest.js';
import type { StrategyListing } from '../handlers/strategies/list-strategies.js';
import type { OutputFormat } from '../types/index.js';

export type TableRow = Readonly<Record<string, unknown>>;

/**
 * Format output as JSON
 */
export function formatJSON(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Convert a value to a displayable string, handling nested objects
 */
function valueToString(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Format rows as a simple table. Columns default to the first row's keys.
 */
export function formatTable(rows: readonly TableRow[], columns?: readonly string[]): string {
  if (rows.length === 0) {
    return 'No data to display';
  }

  const cols = columns ?? Object.keys(rows[0]);
  const cells = rows.map((row) => cols.map((col) => valueToString(row[col])));
  const widths = cols.map((col, i) => Math.max(col.length, ...cells.map((line) => line[i].length)));

  const lines: string[] = [];
  lines.push(cols.map((col, i) => col.padEnd(widths[i])).join(' | '));
  lines.push(widths.map((w) => '-'.repeat(w)).join('-|-'));
  for (const line of cells) {
    lines.push(line.map((cell, i) => cell.padEnd(widths[i])).join(' | '));
  }

  // Trailing padding on the last column carries no information
  return lines.map((line) => line.trimEnd()).join('\n');
}

export function formatPercent(value: number): string {
  return `${(value * 100).toFixed(2)}%`;
}

export function formatAmount(value: number): string {
  return value.toFixed(2);
}

export function formatRatio(value: number): string {
  return value.toFixed(3);
}

function section(title: string, rows: readonly TableRow[]): string {
  return `=== ${title} ===\n${formatTable(rows)}`;
}

/**
 * Human-readable backtest report: performance, trades, rating, holdings
 */
export function formatBacktestTable(report: BacktestReport): string {
  const { metrics, trades, rating, benchmark } = report;

  const performance = [
    { metric: 'Initial value', value: formatAmount(metrics.initialValue) },
    { metric: 'Final value', value: formatAmount(metrics.finalValue) },
    { metric: 'Total return', value: formatPercent(metrics.totalReturn) },
    { metric: 'Annual return', value: formatPercent(metrics.annualReturn) },
    { metric: 'Max drawdown', value: formatPercent(metrics.maxDrawdown) },
    { metric: 'Volatility', value: formatPercent(metrics.volatility) },
    { metric: 'Sharpe ratio', value: formatRatio(metrics.sharpeRatio) },
    { metric: 'Information ratio', value: formatRatio(metrics.informationRatio) },
    { metric: 'Win rate', value: formatPercent(metrics.winRate) },
    { metric: 'Max losing streak', value: metrics.maxLosingStreak },
    { metric: 'Periods', value: metrics.periods },
  ];

  const tradeRows = [
    { metric: 'Trades', value: trades.totalTrades },
    { metric: 'Buys', value: trades.buyCount },
    { metric: 'Sells', value: trades.sellCount },
    { metric: 'Total cost', value: formatAmount(trades.totalCost) },
    { metric: 'Average buy', value: formatAmount(trades.averageBuyAmount) },
    { metric: 'Average sell', value: formatAmount(trades.averageSellAmount) },
  ];

  const ratingRows = [
    { metric: 'Score', value: `${rating.score} (${rating.label})` },
    { metric: 'Benchmark annual return', value: formatPercent(benchmark.benchmarkAnnualReturn) },
    { metric: 'Excess return', value: formatPercent(benchmark.excessReturn) },
  ];

  const holdings = Object.entries(report.finalPositions).map(([code, shares]) => ({ code, shares }));

  return [
    `${report.strategy} (${report.strategyId}) ${report.startDate} to ${report.endDate}, frequency ${report.frequency}`,
    section('Performance', performance),
    section('Trades', tradeRows),
    section('Rating', ratingRows),
    section('Final holdings', holdings),
    `Final cash: ${formatAmount(report.finalCash)}`,
  ].join('\n\n');
}

export function formatBacktestReport(report: BacktestReport, format: OutputFormat): string {
  return format === 'json' ? formatJSON(report) : formatBacktestTable(report);
}

export function formatStrategyList(strategies: readonly StrategyListing[], format: OutputFormat): string {
  if (format === 'json') {
    return formatJSON(strategies);
  }
  return strategies.map((s) => `${s.id}\n${s.description}`).join('\n\n');
}
