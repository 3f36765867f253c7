/**
 * Bollinger Bands
 */

import { rollingMean, rollingStd } from './rolling.js';

export interface BollingerBands {
  upper: number;
  middle: number;
  lower: number;
  /** (close − lower) / (upper − lower); null when the band has no width */
  position: number | null;
}

/** Widths at or below this fraction of the middle band count as zero */
const MIN_RELATIVE_WIDTH = 1e-10;

export function calculateBollingerBands(
  closes: readonly number[],
  period: number,
  stdDevs: number,
  index: number
): BollingerBands | null {
  const middle = rollingMean(closes, period, index);
  const std = rollingStd(closes, period, index);
  if (middle === null || std === null) {
    return null;
  }

  const upper = middle + stdDevs * std;
  const lower = middle - stdDevs * std;
  const width = upper - lower;
  const position =
    width <= MIN_RELATIVE_WIDTH * Math.max(1, Math.abs(middle))
      ? null
      : (closes[index] - lower) / width;

  return { upper, middle, lower, position };
}
