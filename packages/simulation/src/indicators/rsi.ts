/**
 * RSI Indicator
 * =============
 * Relative Strength Index over simple averages of gains and losses.
 */

/**
 * RSI at `index` from the `period` close-to-close changes ending there.
 *
 * Needs `period + 1` values. When the average loss is zero the RSI is 100,
 * including the flat case where there are no gains either.
 */
export function calculateRSI(closes: readonly number[], period: number, index: number): number | null {
  if (period < 1 || index < period) {
    return null;
  }

  let gainSum = 0;
  let lossSum = 0;
  for (let i = index - period + 1; i <= index; i++) {
    const change = closes[i] - closes[i - 1];
    if (change > 0) {
      gainSum += change;
    } else {
      lossSum -= change;
    }
  }

  const avgGain = gainSum / period;
  const avgLoss = lossSum / period;

  if (avgLoss === 0) {
    return 100;
  }

  const rs = avgGain / avgLoss;
  return 100 - 100 / (1 + rs);
}
