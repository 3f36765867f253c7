/**
 * Strategy rating
 * ===============
 * Collapses the headline metrics into a 0–100 score and a label.
 */

import type { PerformanceMetrics } from './performance-metrics.js';

export type StrategyRatingLabel = 'excellent' | 'good' | 'average' | 'fair' | 'poor' | 'needs-work';

export interface StrategyRating {
  score: number;
  label: StrategyRatingLabel;
  breakdown: {
    annualReturn: number;
    drawdown: number;
    sharpe: number;
    winRate: number;
    stability: number;
  };
}

/** [exclusive lower bound, points], checked in order */
type Band = readonly [number, number];

const ANNUAL_RETURN_BANDS: readonly Band[] = [
  [0.2, 30],
  [0.15, 25],
  [0.1, 20],
  [0.05, 15],
  [0, 10],
];

/** [exclusive upper bound on |drawdown|, points] */
const DRAWDOWN_BANDS: readonly Band[] = [
  [0.05, 25],
  [0.1, 20],
  [0.15, 15],
  [0.2, 10],
  [0.3, 5],
];

const SHARPE_BANDS: readonly Band[] = [
  [2, 20],
  [1.5, 15],
  [1, 10],
  [0.5, 5],
];

const WIN_RATE_BANDS: readonly Band[] = [
  [0.6, 15],
  [0.55, 12],
  [0.5, 10],
  [0.45, 7],
  [0.4, 5],
];

/** [inclusive upper bound on the losing streak, points] */
const STREAK_BANDS: readonly Band[] = [
  [2, 10],
  [3, 8],
  [5, 5],
  [7, 3],
];

const LABELS: ReadonlyArray<readonly [number, StrategyRatingLabel]> = [
  [85, 'excellent'],
  [70, 'good'],
  [55, 'average'],
  [40, 'fair'],
  [25, 'poor'],
];

function pointsAbove(value: number, bands: readonly Band[]): number {
  return bands.find(([threshold]) => value > threshold)?.[1] ?? 0;
}

function pointsBelow(value: number, bands: readonly Band[]): number {
  return bands.find(([threshold]) => value < threshold)?.[1] ?? 0;
}

function pointsAtMost(value: number, bands: readonly Band[]): number {
  return bands.find(([threshold]) => value <= threshold)?.[1] ?? 0;
}

export function ratingLabel(score: number): StrategyRatingLabel {
  return LABELS.find(([min]) => score >= min)?.[1] ?? 'needs-work';
}

export function rateStrategy(
  metrics: Pick<PerformanceMetrics, 'annualReturn' | 'maxDrawdown' | 'sharpeRatio' | 'winRate' | 'maxLosingStreak'>
): StrategyRating {
  const breakdown = {
    annualReturn: pointsAbove(metrics.annualReturn, ANNUAL_RETURN_BANDS),
    drawdown: pointsBelow(Math.abs(metrics.maxDrawdown), DRAWDOWN_BANDS),
    sharpe: pointsAbove(metrics.sharpeRatio, SHARPE_BANDS),
    winRate: pointsAbove(metrics.winRate, WIN_RATE_BANDS),
    stability: pointsAtMost(metrics.maxLosingStreak, STREAK_BANDS),
  };
  const score =
    breakdown.annualReturn + breakdown.drawdown + breakdown.sharpe + breakdown.winRate + breakdown.stability;
  return { score, label: ratingLabel(score), breakdown };
}
