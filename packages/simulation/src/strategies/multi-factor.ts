/**
 * Multi-factor strategies
 *
 * The composite score is the weight-normalised sum of factor scores:
 * Σ wᵢ·sᵢ / Σ wᵢ, or 0 when the weights sum to zero.
 */

import type { IndicatorSnapshot } from '../indicators/base.js';
import { defineStrategy } from './define.js';
import type { Factor, Strategy } from './types.js';

export interface MultiFactorDefinition<P extends object> {
  id: string;
  name: string;
  params: P;
  factors: (params: Readonly<P>) => Readonly<Record<string, Factor>>;
  qualify: (snapshot: IndicatorSnapshot, params: Readonly<P>) => boolean;
  describe?: (params: Readonly<P>) => string;
}

export function clampScore(value: number, min: number = 0, max: number = 100): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * 0 at `floor`, 100 at `ceiling`, linear in between and clamped outside
 */
export function linearRamp(value: number, floor: number, ceiling: number): number {
  if (ceiling === floor) {
    return value >= ceiling ? 100 : 0;
  }
  return clampScore(((value - floor) / (ceiling - floor)) * 100);
}

/**
 * Weighted composite of factor scores; null when any factor is not computable
 */
export function compositeScore(factors: Readonly<Record<string, Factor>>, snapshot: IndicatorSnapshot): number | null {
  let total = 0;
  let totalWeight = 0;
  for (const factor of Object.values(factors)) {
    const score = factor.score(snapshot);
    if (score === null) {
      return null;
    }
    total += score * factor.weight;
    totalWeight += factor.weight;
  }
  return totalWeight > 0 ? total / totalWeight : 0;
}

export function createMultiFactorStrategy<P extends object>(definition: MultiFactorDefinition<P>): Strategy<P> {
  const factorsFor = definition.factors;
  return defineStrategy({
    id: definition.id,
    name: definition.name,
    params: definition.params,
    qualify: definition.qualify,
    score: (snapshot, params) => compositeScore(factorsFor(params), snapshot),
    describe: definition.describe,
  });
}
