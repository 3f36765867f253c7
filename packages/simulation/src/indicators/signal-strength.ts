import { getIndicator, type IndicatorSnapshot } from './base.js';

/**
 * Composite 0–100 reading of how constructive the technical picture is.
 *
 * Missing inputs fall back to neutral readings: RSI 50, momentum 0, MACD
 * histogram 0, band position 0.5, volume ratio 1.
 */
export function signalStrength(snapshot: IndicatorSnapshot): number {
  const rsi = getIndicator(snapshot, 'rsi') ?? 50;
  const m5 = getIndicator(snapshot, 'momentum5d') ?? 0;
  const m20 = getIndicator(snapshot, 'momentum20d') ?? 0;
  const hist = getIndicator(snapshot, 'macdHist') ?? 0;
  const bbPosition = getIndicator(snapshot, 'bbPosition') ?? 0.5;
  const volumeRatio = getIndicator(snapshot, 'volumeRatio') ?? 1;

  let strength = 0;

  if (rsi >= 30 && rsi <= 70) {
    strength += 20 * (1 - Math.abs(rsi - 50) / 20);
  }

  if (m5 > 0 && m20 > 0) {
    strength += 30;
  } else if (m5 > 0 || m20 > 0) {
    strength += 15;
  }

  if (hist > 0) {
    strength += 25;
  }

  if (bbPosition >= 0.2 && bbPosition <= 0.8) {
    strength += 15;
  }

  if (volumeRatio > 1) {
    strength += 10;
  }

  return Math.min(100, Math.max(0, strength));
}
