/**
 * Growth Strategy
 * ===============
 * Multi-factor: strong medium and long momentum confirmed by volume,
 * price high in its range.
 */

import { z } from 'zod';
import { getIndicator, requireIndicators, type IndicatorSnapshot } from '../indicators/base.js';
import { isBullishAlignment, isPriceAboveMA } from '../indicators/moving-averages.js';
import { parseStrategyParams, inRange } from './define.js';
import { clampScore, createMultiFactorStrategy, linearRamp } from './multi-factor.js';
import type { Factor, Strategy } from './types.js';

export const GrowthParamsSchema = z.object({
  minMomentum20d: z.number().default(0.05),
  minMomentum60d: z.number().default(0.1),
  minRsi: z.number().default(45),
  maxRsi: z.number().default(80),
  minVolumeRatio: z.number().default(1.2),
  minPricePosition: z.number().default(0.4),
  maxVolatility: z.number().default(0.6),
  weights: z
    .object({
      momentum20d: z.number().min(0).default(0.3),
      momentum60d: z.number().min(0).default(0.25),
      rsi: z.number().min(0).default(0.2),
      volumeRatio: z.number().min(0).default(0.15),
      pricePosition: z.number().min(0).default(0.1),
    })
    .default({}),
  /** Points per unit of 20-day momentum (0.5 scores 100) */
  momentum20dScale: z.number().default(200),
  /** Points per unit of 60-day momentum (1.0 scores 100) */
  momentum60dScale: z.number().default(100),
  /** RSI scores 0 below the floor and rises linearly to 100 at the peak */
  rsiFloor: z.number().default(50),
  rsiPeak: z.number().default(80),
  /** Points lost per RSI point above the peak */
  rsiPenalty: z.number().default(5),
  /** Points per unit of volume ratio above 1 (2× volume scores 100) */
  volumeRatioScale: z.number().default(50),
});

export type GrowthParams = z.infer<typeof GrowthParamsSchema>;
export type GrowthParamsInput = z.input<typeof GrowthParamsSchema>;

const QUALIFY_FIELDS = [
  'momentum20d',
  'momentum60d',
  'rsi',
  'volumeRatio',
  'pricePosition',
  'price',
  'ma20',
  'ma60',
  'macdHist',
  'volatility',
];

function scoreWith(name: string, weight: number, fn: (value: number) => number): Factor {
  return {
    weight,
    score: (snapshot: IndicatorSnapshot) => {
      const value = getIndicator(snapshot, name);
      return value === null ? null : fn(value);
    },
  };
}

export function growthRsiScore(rsi: number, p: Pick<GrowthParams, 'rsiFloor' | 'rsiPeak' | 'rsiPenalty'>): number {
  if (rsi < p.rsiFloor) return 0;
  if (rsi > p.rsiPeak) return Math.max(0, 100 - (rsi - p.rsiPeak) * p.rsiPenalty);
  return linearRamp(rsi, p.rsiFloor, p.rsiPeak);
}

export function createGrowthStrategy(input: GrowthParamsInput = {}): Strategy<GrowthParams> {
  return createMultiFactorStrategy({
    id: 'growth',
    name: 'Growth',
    params: parseStrategyParams(GrowthParamsSchema, input, 'growth'),
    factors: (p) => ({
      momentum20d: scoreWith('momentum20d', p.weights.momentum20d, (m) => clampScore(m * p.momentum20dScale)),
      momentum60d: scoreWith('momentum60d', p.weights.momentum60d, (m) => clampScore(m * p.momentum60dScale)),
      rsi: scoreWith('rsi', p.weights.rsi, (rsi) => growthRsiScore(rsi, p)),
      volumeRatio: scoreWith('volumeRatio', p.weights.volumeRatio, (r) => clampScore((r - 1) * p.volumeRatioScale)),
      pricePosition: scoreWith('pricePosition', p.weights.pricePosition, (pp) => pp * 100),
    }),
    qualify: (snapshot, p) => {
      const values = requireIndicators(snapshot, QUALIFY_FIELDS);
      if (!values) return false;
      const [m20, m60, rsi, volumeRatio, pp, price, ma20, ma60, macdHist, vol] = values;
      return (
        m20 >= p.minMomentum20d &&
        m60 >= p.minMomentum60d &&
        inRange(rsi, p.minRsi, p.maxRsi) &&
        volumeRatio >= p.minVolumeRatio &&
        pp >= p.minPricePosition &&
        isPriceAboveMA(price, ma20) &&
        isBullishAlignment([ma20, ma60]) &&
        macdHist > 0 &&
        vol <= p.maxVolatility
      );
    },
    describe: (p) =>
      [
        'Growth: strong momentum confirmed by volume',
        `  momentum20d >= ${p.minMomentum20d}, momentum60d >= ${p.minMomentum60d}`,
        `  RSI in [${p.minRsi}, ${p.maxRsi}], volume ratio >= ${p.minVolumeRatio}`,
        `  price position >= ${p.minPricePosition}, price > ma20 > ma60, MACD histogram > 0`,
        `  volatility <= ${p.maxVolatility}`,
        `  weights: ${Object.entries(p.weights)
          .map(([k, v]) => `${k} ${v}`)
          .join(', ')}`,
      ].join('\n'),
  });
}
