import { NotFoundError } from '@rebalancer/utils';
import { parseStrategyParams } from './define.js';
import { createGrowthStrategy, GrowthParamsSchema } from './growth.js';
import { createMomentumStrategy, MomentumParamsSchema } from './momentum.js';
import type { Strategy } from './types.js';
import { createValueStrategy, ValueParamsSchema } from './value.js';

type StrategyFactory = (params: unknown) => Strategy;

const factories = new Map<string, StrategyFactory>([
  ['momentum', (params) => createMomentumStrategy(parseStrategyParams(MomentumParamsSchema, params, 'momentum'))],
  ['value', (params) => createValueStrategy(parseStrategyParams(ValueParamsSchema, params, 'value'))],
  ['growth', (params) => createGrowthStrategy(parseStrategyParams(GrowthParamsSchema, params, 'growth'))],
]);

export function listStrategies(): string[] {
  return [...factories.keys()];
}

/**
 * Resolve a built-in strategy by id
 *
 * @throws NotFoundError for an unknown id
 * @throws ConfigurationError when the parameters do not validate
 */
export function getStrategy(id: string, params?: unknown): Strategy {
  const factory = factories.get(id);
  if (!factory) {
    throw new NotFoundError('Strategy', id, { available: listStrategies() });
  }
  return factory(params);
}
