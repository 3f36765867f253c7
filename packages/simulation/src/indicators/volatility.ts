/**
 * Volatility, true range and range position
 */

import type { PriceBar } from '@rebalancer/core';
import { rollingMax, rollingMean, rollingMin, rollingStd } from './rolling.js';

/**
 * Simple returns; element `i` is the change from bar `i` to bar `i + 1`
 */
export function simpleReturns(closes: readonly number[]): number[] {
  const out: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    out.push(closes[i] / closes[i - 1] - 1);
  }
  return out;
}

/**
 * Annualized volatility: sample std of the last `window` daily returns × √annualization
 */
export function calculateVolatility(
  closes: readonly number[],
  window: number,
  index: number,
  annualization: number
): number | null {
  if (index < window) {
    return null;
  }
  const returns = simpleReturns(closes.slice(index - window, index + 1));
  const std = rollingStd(returns, window, returns.length - 1);
  return std === null ? null : std * Math.sqrt(annualization);
}

/**
 * True range of every bar; the first bar has no previous close and uses high − low
 */
export function trueRanges(bars: readonly PriceBar[]): number[] {
  return bars.map((bar, i) => {
    const hl = bar.high - bar.low;
    if (i === 0) return hl;
    const prevClose = bars[i - 1].close;
    return Math.max(hl, Math.abs(bar.high - prevClose), Math.abs(bar.low - prevClose));
  });
}

export function calculateATR(bars: readonly PriceBar[], period: number, index: number): number | null {
  return rollingMean(trueRanges(bars.slice(0, index + 1)), period, index);
}

/**
 * Where the close sits within the high/low range of the window, 0..1
 */
export function calculatePricePosition(bars: readonly PriceBar[], window: number, index: number): number | null {
  const highs = bars.map((b) => b.high);
  const lows = bars.map((b) => b.low);
  const high = rollingMax(highs, window, index);
  const low = rollingMin(lows, window, index);
  if (high === null || low === null) {
    return null;
  }
  const range = high - low;
  if (range <= 0) {
    return null;
  }
  return (bars[index].close - low) / range;
}

export interface RangeExtremes {
  high: number;
  low: number;
}

/**
 * Highest high and lowest low over the window (52-week range with a 252-bar window)
 */
export function calculateRangeExtremes(
  bars: readonly PriceBar[],
  window: number,
  index: number
): RangeExtremes | null {
  const high = rollingMax(
    bars.map((b) => b.high),
    window,
    index
  );
  const low = rollingMin(
    bars.map((b) => b.low),
    window,
    index
  );
  return high === null || low === null ? null : { high, low };
}
