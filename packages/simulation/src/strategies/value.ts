/**
 * Value Strategy
 * ==============
 * Prefers names trading low in their recent range while still above the
 * long moving average.
 */

import { z } from 'zod';
import { requireIndicators } from '../indicators/base.js';
import { defineStrategy, inRange, parseStrategyParams } from './define.js';
import type { Strategy } from './types.js';

export const ValueParamsSchema = z.object({
  maxRsi: z.number().default(70),
  minPricePosition: z.number().default(0.1),
  maxPricePosition: z.number().default(0.6),
  minBbPosition: z.number().default(0.1),
  maxBbPosition: z.number().default(0.5),
  maxVolatility: z.number().default(0.4),
  minVolumeRatio: z.number().default(0.3),
  weights: z
    .object({
      pricePosition: z.number().default(30),
      bbPosition: z.number().default(20),
      /** Applied to max(0, rsiCeiling − rsi) */
      rsi: z.number().default(0.5),
      rsiCeiling: z.number().default(70),
      volatility: z.number().default(10),
      /** Applied to price / ma60 − 1 */
      trend: z.number().default(15),
      volumeRatio: z.number().default(10),
    })
    .default({}),
});

export type ValueParams = z.infer<typeof ValueParamsSchema>;
export type ValueParamsInput = z.input<typeof ValueParamsSchema>;

const FIELDS = ['pricePosition', 'rsi', 'bbPosition', 'price', 'ma60', 'volatility', 'volumeRatio'];

export function createValueStrategy(input: ValueParamsInput = {}): Strategy<ValueParams> {
  return defineStrategy({
    id: 'value',
    name: 'Value',
    params: parseStrategyParams(ValueParamsSchema, input, 'value'),
    qualify: (snapshot, p) => {
      const values = requireIndicators(snapshot, FIELDS);
      if (!values) return false;
      const [pp, rsi, bb, price, ma60, vol, volumeRatio] = values;
      return (
        inRange(pp, p.minPricePosition, p.maxPricePosition) &&
        rsi <= p.maxRsi &&
        inRange(bb, p.minBbPosition, p.maxBbPosition) &&
        price > ma60 &&
        vol <= p.maxVolatility &&
        volumeRatio > p.minVolumeRatio
      );
    },
    score: (snapshot, p) => {
      const values = requireIndicators(snapshot, FIELDS);
      if (!values) return null;
      const [pp, rsi, bb, price, ma60, vol, volumeRatio] = values;
      const w = p.weights;
      return (
        (1 - pp) * w.pricePosition +
        (1 - bb) * w.bbPosition +
        Math.max(0, w.rsiCeiling - rsi) * w.rsi +
        (1 - vol) * w.volatility +
        (price / ma60 - 1) * w.trend +
        volumeRatio * w.volumeRatio
      );
    },
    describe: (p) =>
      [
        'Value: cheap within the recent range, long trend intact',
        `  price position in [${p.minPricePosition}, ${p.maxPricePosition}]`,
        `  RSI <= ${p.maxRsi}`,
        `  Bollinger position in [${p.minBbPosition}, ${p.maxBbPosition}]`,
        `  price > ma60, volatility <= ${p.maxVolatility}, volume ratio > ${p.minVolumeRatio}`,
      ].join('\n'),
  });
}
