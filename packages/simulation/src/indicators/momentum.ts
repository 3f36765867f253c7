/**
 * Momentum and rate of change
 */

/**
 * Relative change from `period` bars back: close / close[-period] − 1
 */
export function calculateMomentum(closes: readonly number[], period: number, index: number): number | null {
  if (period < 1 || index < period) {
    return null;
  }
  const base = closes[index - period];
  if (base <= 0) {
    return null;
  }
  return closes[index] / base - 1;
}

/**
 * Rate of change in percent
 */
export function calculateROC(closes: readonly number[], period: number, index: number): number | null {
  const momentum = calculateMomentum(closes, period, index);
  return momentum === null ? null : momentum * 100;
}
