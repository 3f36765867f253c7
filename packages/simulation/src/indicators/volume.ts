/**
 * Volume Indicators
 * =================
 */

import type { PriceBar } from '@rebalancer/core';
import { rollingMean } from './rolling.js';

export interface VolumeProfile {
  volumeMa: number;
  /** Last volume over its average; null when the average is zero */
  volumeRatio: number | null;
}

export function calculateVolumeProfile(
  volumes: readonly number[],
  window: number,
  index: number
): VolumeProfile | null {
  const volumeMa = rollingMean(volumes, window, index);
  if (volumeMa === null) {
    return null;
  }
  return {
    volumeMa,
    volumeRatio: volumeMa === 0 ? null : volumes[index] / volumeMa,
  };
}

/**
 * On-balance volume over `bars[0..index]`, starting from zero
 */
export function calculateOBV(bars: readonly PriceBar[], index: number): number {
  let obv = 0;
  for (let i = 1; i <= index && i < bars.length; i++) {
    const change = bars[i].close - bars[i - 1].close;
    obv += bars[i].volume * Math.sign(change);
  }
  return obv;
}

/**
 * Volume-price trend: cumulative volume × percent change of close
 */
export function calculateVPT(bars: readonly PriceBar[], index: number): number {
  let vpt = 0;
  for (let i = 1; i <= index && i < bars.length; i++) {
    const prev = bars[i - 1].close;
    vpt += (bars[i].volume * (bars[i].close - prev)) / prev;
  }
  return vpt;
}
