/**
 * Indicator snapshot
 * ==================
 *
 * Builds every configured signal for one instrument as of one date. The
 * history is cut to bars dated on or before `asOf` before anything is
 * computed, so bars after that date can never influence the result.
 */

import { barsOnOrBefore, type IsoDate, type PriceBar } from '@rebalancer/core';
import type { IndicatorConfig } from '../config.js';
import { finiteOrNull, maKey, momentumKey, type SnapshotResult } from './base.js';
import { calculateBollingerBands } from './bollinger.js';
import { calculateMACD } from './macd.js';
import { calculateMomentum, calculateROC } from './momentum.js';
import { calculateSMA } from './moving-averages.js';
import { calculateRSI } from './rsi.js';
import {
  calculateATR,
  calculatePricePosition,
  calculateRangeExtremes,
  calculateVolatility,
} from './volatility.js';
import { calculateOBV, calculateVolumeProfile, calculateVPT } from './volume.js';

export function computeIndicatorSnapshot(
  bars: readonly PriceBar[],
  asOf: IsoDate,
  config: IndicatorConfig
): SnapshotResult {
  const prefix = barsOnOrBefore(bars, asOf);
  if (prefix.length === 0 || prefix.length < config.lookbackDays) {
    return {
      ok: false,
      reason: 'insufficient_history',
      available: prefix.length,
      required: config.lookbackDays,
    };
  }

  const index = prefix.length - 1;
  const closes = prefix.map((b) => b.close);
  const volumes = prefix.map((b) => b.volume);
  const values: Record<string, number | null> = {};

  values.price = closes[index];

  for (const period of config.maPeriods) {
    values[maKey(period)] = calculateSMA(closes, period, index);
  }

  values.rsi = calculateRSI(closes, config.rsiPeriod, index);

  for (const period of config.momentumPeriods) {
    values[momentumKey(period)] = calculateMomentum(closes, period, index);
  }
  values.roc = calculateROC(closes, config.rocPeriod, index);

  const macd = calculateMACD(closes, index, config.macdFast, config.macdSlow, config.macdSignal);
  values.macd = macd?.macd ?? null;
  values.macdSignal = macd?.signal ?? null;
  values.macdHist = macd?.histogram ?? null;

  const bands = calculateBollingerBands(closes, config.bbPeriod, config.bbStdDev, index);
  values.bbUpper = bands?.upper ?? null;
  values.bbMiddle = bands?.middle ?? null;
  values.bbLower = bands?.lower ?? null;
  values.bbPosition = bands?.position ?? null;

  values.volatility = calculateVolatility(closes, config.volatilityWindow, index, config.tradingDaysPerYear);
  values.atr = calculateATR(prefix, config.atrPeriod, index);

  const volume = calculateVolumeProfile(volumes, config.volumeWindow, index);
  values.volumeMa = volume?.volumeMa ?? null;
  values.volumeRatio = volume?.volumeRatio ?? null;

  values.pricePosition = calculatePricePosition(prefix, config.pricePositionWindow, index);

  const extremes = calculateRangeExtremes(prefix, config.yearWindow, index);
  values.high52w = extremes?.high ?? null;
  values.low52w = extremes?.low ?? null;

  values.obv = calculateOBV(prefix, index);
  values.vpt = calculateVPT(prefix, index);

  for (const key of Object.keys(values)) {
    values[key] = finiteOrNull(values[key]);
  }

  return {
    ok: true,
    snapshot: {
      asOf,
      lastBarDate: prefix[index].date,
      barCount: prefix.length,
      values,
    },
  };
}
