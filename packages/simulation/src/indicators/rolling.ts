/**
 * Trailing-window statistics.
 *
 * Every function reads `values[index - window + 1 .. index]` and nothing after
 * `index`. Returns null when the window does not fit.
 */

export function windowFits(index: number, window: number): boolean {
  return window >= 1 && index >= window - 1;
}

export function rollingMean(values: readonly number[], window: number, index: number): number | null {
  if (!windowFits(index, window)) {
    return null;
  }
  let sum = 0;
  for (let i = index - window + 1; i <= index; i++) {
    sum += values[i];
  }
  return sum / window;
}

/**
 * Sample standard deviation (n − 1 denominator)
 */
export function rollingStd(values: readonly number[], window: number, index: number): number | null {
  if (window < 2) {
    return null;
  }
  const mean = rollingMean(values, window, index);
  if (mean === null) {
    return null;
  }
  let sumSq = 0;
  for (let i = index - window + 1; i <= index; i++) {
    const d = values[i] - mean;
    sumSq += d * d;
  }
  return Math.sqrt(sumSq / (window - 1));
}

export function rollingMax(values: readonly number[], window: number, index: number): number | null {
  if (!windowFits(index, window)) {
    return null;
  }
  let max = -Infinity;
  for (let i = index - window + 1; i <= index; i++) {
    if (values[i] > max) max = values[i];
  }
  return max;
}

export function rollingMin(values: readonly number[], window: number, index: number): number | null {
  if (!windowFits(index, window)) {
    return null;
  }
  let min = Infinity;
  for (let i = index - window + 1; i <= index; i++) {
    if (values[i] < min) min = values[i];
  }
  return min;
}

/**
 * Mean and sample standard deviation of a whole series
 */
export function meanOf(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function sampleStdOf(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const mean = meanOf(values);
  const sumSq = values.reduce((sum, v) => sum + (v - mean) * (v - mean), 0);
  return Math.sqrt(sumSq / (values.length - 1));
}
