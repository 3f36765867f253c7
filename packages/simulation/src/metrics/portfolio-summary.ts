import type { BacktestResult } from '../scheduler/backtester.js';

export interface PortfolioSummary {
  initialValue: number;
  /** Value at the last snapshot, or the initial value when there is none */
  finalValue: number;
  totalReturn: number;
  totalTrades: number;
  finalPositions: number;
  finalCash: number;
}

export function summarizePortfolio(result: BacktestResult, initialCapital: number): PortfolioSummary {
  const last = result.snapshots.length > 0 ? result.snapshots[result.snapshots.length - 1] : undefined;
  const finalValue = last ? last.value : initialCapital;
  return {
    initialValue: initialCapital,
    finalValue,
    totalReturn: initialCapital > 0 ? (finalValue - initialCapital) / initialCapital : 0,
    totalTrades: result.trades.length,
    finalPositions: Object.keys(result.finalPositions).length,
    finalCash: result.finalCash,
  };
}
