/**
 * Momentum Strategy
 * =================
 * Trend followers: rising moving-average stack, healthy RSI, MACD above its
 * signal line, price in the middle of its Bollinger band.
 */

import { z } from 'zod';
import { requireIndicators } from '../indicators/base.js';
import { isBullishAlignment, isPriceAboveMA } from '../indicators/moving-averages.js';
import { defineStrategy, inRange, parseStrategyParams } from './define.js';
import type { Strategy } from './types.js';

export const MomentumParamsSchema = z.object({
  minRsi: z.number().default(20),
  maxRsi: z.number().default(75),
  minMomentum5d: z.number().default(-0.05),
  minMomentum20d: z.number().default(-0.15),
  maxVolatility: z.number().default(0.5),
  minVolumeRatio: z.number().default(0.5),
  minPricePosition: z.number().default(0.3),
  minBbPosition: z.number().default(0.2),
  maxBbPosition: z.number().default(0.8),
  weights: z
    .object({
      momentum5d: z.number().default(20),
      momentum10d: z.number().default(15),
      momentum20d: z.number().default(5),
      /** Applied to price / ma20 − 1 */
      relativeStrength: z.number().default(25),
      /** Applied to 80 − |rsi − 50| */
      rsi: z.number().default(0.3),
      macdHist: z.number().default(100),
      pricePosition: z.number().default(10),
    })
    .default({}),
});

export type MomentumParams = z.infer<typeof MomentumParamsSchema>;
export type MomentumParamsInput = z.input<typeof MomentumParamsSchema>;

const QUALIFY_FIELDS = [
  'price',
  'ma5',
  'ma10',
  'ma20',
  'ma60',
  'rsi',
  'momentum5d',
  'momentum20d',
  'macd',
  'macdSignal',
  'macdHist',
  'bbPosition',
  'volatility',
  'volumeRatio',
  'pricePosition',
];

const SCORE_FIELDS = ['momentum5d', 'momentum10d', 'momentum20d', 'price', 'ma20', 'rsi', 'macdHist', 'pricePosition'];

export function createMomentumStrategy(input: MomentumParamsInput = {}): Strategy<MomentumParams> {
  return defineStrategy({
    id: 'momentum',
    name: 'Momentum',
    params: parseStrategyParams(MomentumParamsSchema, input, 'momentum'),
    qualify: (snapshot, p) => {
      const values = requireIndicators(snapshot, QUALIFY_FIELDS);
      if (!values) return false;
      const [price, ma5, ma10, ma20, ma60, rsi, m5, m20, macd, macdSignal, macdHist, bb, vol, volumeRatio, pp] =
        values;
      return (
        isPriceAboveMA(price, ma20) &&
        isBullishAlignment([ma5, ma10, ma20, ma60]) &&
        inRange(rsi, p.minRsi, p.maxRsi) &&
        m5 > p.minMomentum5d &&
        m20 > p.minMomentum20d &&
        macd > macdSignal &&
        macdHist > 0 &&
        inRange(bb, p.minBbPosition, p.maxBbPosition) &&
        vol < p.maxVolatility &&
        volumeRatio > p.minVolumeRatio &&
        pp > p.minPricePosition
      );
    },
    score: (snapshot, p) => {
      const values = requireIndicators(snapshot, SCORE_FIELDS);
      if (!values) return null;
      const [m5, m10, m20, price, ma20, rsi, macdHist, pp] = values;
      const w = p.weights;
      return (
        m5 * w.momentum5d +
        m10 * w.momentum10d +
        m20 * w.momentum20d +
        (price / ma20 - 1) * w.relativeStrength +
        (80 - Math.abs(rsi - 50)) * w.rsi +
        macdHist * w.macdHist +
        pp * w.pricePosition
      );
    },
    describe: (p) =>
      [
        'Momentum: follow established uptrends',
        `  trend: price > ma20, ma5 > ma10 > ma20 > ma60`,
        `  RSI in [${p.minRsi}, ${p.maxRsi}]`,
        `  momentum5d > ${p.minMomentum5d}, momentum20d > ${p.minMomentum20d}`,
        `  MACD above signal with positive histogram`,
        `  Bollinger position in [${p.minBbPosition}, ${p.maxBbPosition}]`,
        `  volatility < ${p.maxVolatility}, volume ratio > ${p.minVolumeRatio}, price position > ${p.minPricePosition}`,
      ].join('\n'),
  });
}
