/**
 * MACD Indicator
 * ===============
 * Moving Average Convergence Divergence calculation.
 */

import { calculateEMASeries } from './moving-averages.js';

export interface MACDData {
  macd: number;
  signal: number;
  histogram: number;
}

/**
 * MACD line, signal line and histogram at `index`.
 *
 * Only `closes[0..index]` is read, so the result is the same whether or not
 * later values are present.
 */
export function calculateMACD(
  closes: readonly number[],
  index: number,
  fastSpan: number,
  slowSpan: number,
  signalSpan: number
): MACDData | null {
  if (index < 0 || index >= closes.length) {
    return null;
  }

  const prefix = closes.slice(0, index + 1);
  const fast = calculateEMASeries(prefix, fastSpan);
  const slow = calculateEMASeries(prefix, slowSpan);
  const macdLine = prefix.map((_, i) => fast[i] - slow[i]);
  const signalLine = calculateEMASeries(macdLine, signalSpan);

  const macd = macdLine[index];
  const signal = signalLine[index];
  return { macd, signal, histogram: macd - signal };
}
