/**
 * Performance Metrics
 * ===================
 * Return, risk and consistency measures over a run's snapshot history.
 *
 * Period returns are the relative changes between consecutive snapshots, so
 * the sampling period is the rebalance frequency.
 */

import { daysBetween, PERIODS_PER_YEAR, type PortfolioSnapshot, type RebalanceFrequency } from '@rebalancer/core';
import { meanOf, sampleStdOf } from '../indicators/rolling.js';
import type { BacktestResult } from '../scheduler/backtester.js';

/** Dispersion at or below this counts as zero variance */
const ZERO_VARIANCE = 1e-12;

export interface MetricsOptions {
  initialCapital: number;
  frequency: RebalanceFrequency;
  /** Annual rate; converted to a per-period rate for excess returns */
  riskFreeRate: number;
}

export interface PerformanceMetrics {
  strategy: string;
  initialValue: number;
  /** Value at the last snapshot */
  finalValue: number;
  totalReturn: number;
  annualReturn: number;
  /** Most negative peak-to-trough decline, ≤ 0 */
  maxDrawdown: number;
  winRate: number;
  sharpeRatio: number;
  informationRatio: number;
  volatility: number;
  maxLosingStreak: number;
  tradeCount: number;
  /** Calendar days from the first to the last snapshot */
  days: number;
  periods: number;
}

export function periodReturns(snapshots: readonly PortfolioSnapshot[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < snapshots.length; i++) {
    const prev = snapshots[i - 1].value;
    returns.push(prev === 0 ? 0 : snapshots[i].value / prev - 1);
  }
  return returns;
}

export function annualizeReturn(totalReturn: number, days: number): number {
  if (days <= 0) {
    return 0;
  }
  if (totalReturn <= -1) {
    return -1;
  }
  return Math.pow(1 + totalReturn, 365 / days) - 1;
}

export function maxDrawdown(values: readonly number[]): number {
  let peak = -Infinity;
  let worst = 0;
  for (const value of values) {
    peak = Math.max(peak, value);
    if (peak > 0) {
      worst = Math.min(worst, (value - peak) / peak);
    }
  }
  return worst;
}

export function longestLosingStreak(returns: readonly number[]): number {
  let longest = 0;
  let current = 0;
  for (const r of returns) {
    current = r < 0 ? current + 1 : 0;
    longest = Math.max(longest, current);
  }
  return longest;
}

/**
 * mean / std × √n; 0 with fewer than two observations or zero variance
 */
export function scaledRatio(series: readonly number[]): number {
  if (series.length < 2) {
    return 0;
  }
  const std = sampleStdOf(series);
  if (std <= ZERO_VARIANCE) {
    return 0;
  }
  return (meanOf(series) / std) * Math.sqrt(series.length);
}

export function sharpeRatio(returns: readonly number[], riskFreeRate: number, periodsPerYear: number): number {
  const periodRiskFree = riskFreeRate / periodsPerYear;
  return scaledRatio(returns.map((r) => r - periodRiskFree));
}

export function computeMetrics(result: BacktestResult, options: MetricsOptions): PerformanceMetrics {
  const { snapshots } = result;
  const initialValue = options.initialCapital;
  const last = snapshots.length > 0 ? snapshots[snapshots.length - 1] : undefined;
  const finalValue = last ? last.value : initialValue;
  const totalReturn = initialValue > 0 ? (finalValue - initialValue) / initialValue : 0;
  const days = last ? daysBetween(snapshots[0].date, last.date) : 0;

  const returns = periodReturns(snapshots);
  const periodsPerYear = PERIODS_PER_YEAR[options.frequency];

  return {
    strategy: result.strategy,
    initialValue,
    finalValue,
    totalReturn,
    annualReturn: annualizeReturn(totalReturn, days),
    maxDrawdown: maxDrawdown(snapshots.map((s) => s.value)),
    winRate: returns.length > 0 ? returns.filter((r) => r > 0).length / returns.length : 0,
    sharpeRatio: sharpeRatio(returns, options.riskFreeRate, periodsPerYear),
    informationRatio: scaledRatio(returns),
    volatility: returns.length > 1 ? sampleStdOf(returns) * Math.sqrt(periodsPerYear) : 0,
    maxLosingStreak: longestLosingStreak(returns),
    tradeCount: result.trades.length,
    days,
    periods: returns.length,
  };
}
