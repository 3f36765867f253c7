/**
 * Moving Average Indicators
 * =========================
 * SMA and span-based EMA calculations.
 */

import { rollingMean } from './rolling.js';

/**
 * Simple moving average of the `period` values ending at `index`
 */
export function calculateSMA(values: readonly number[], period: number, index: number): number | null {
  return rollingMean(values, period, index);
}

/**
 * Exponential moving average series with smoothing α = 2 / (span + 1).
 *
 * Bias-adjusted: each point is the exponentially weighted mean of every value
 * seen so far, so the series is defined from the first value and the point at
 * `i` depends only on `values[0..i]`.
 */
export function calculateEMASeries(values: readonly number[], span: number): number[] {
  const decay = 1 - 2 / (span + 1);
  const out: number[] = new Array<number>(values.length);
  let weightedSum = 0;
  let weightTotal = 0;
  for (let i = 0; i < values.length; i++) {
    weightedSum = values[i] + decay * weightedSum;
    weightTotal = 1 + decay * weightTotal;
    out[i] = weightedSum / weightTotal;
  }
  return out;
}

/**
 * Check if price is above moving average
 */
export function isPriceAboveMA(price: number, ma: number | null): boolean {
  return ma !== null && price > ma;
}

/**
 * Moving averages stacked fastest-first in strictly descending order (bullish alignment)
 */
export function isBullishAlignment(mas: readonly (number | null)[]): boolean {
  for (let i = 0; i < mas.length; i++) {
    const current = mas[i];
    if (current === null) return false;
    const next = i + 1 < mas.length ? mas[i + 1] : undefined;
    if (next === null) return false;
    if (next !== undefined && !(current > next)) return false;
  }
  return true;
}
