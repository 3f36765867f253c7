import type { z } from 'zod';
import { ConfigurationError } from '@rebalancer/utils';
import type { IndicatorSnapshot } from '../indicators/base.js';
import type { Strategy } from './types.js';

export interface StrategyDefinition<P extends object> {
  id: string;
  name: string;
  params: P;
  qualify: (snapshot: IndicatorSnapshot, params: Readonly<P>) => boolean;
  score: (snapshot: IndicatorSnapshot, params: Readonly<P>) => number | null;
  describe?: (params: Readonly<P>) => string;
}

/**
 * Build a strategy from a pair of pure functions over (snapshot, params).
 *
 * A score that is not a finite number is reported as null.
 */
export function defineStrategy<P extends object>(definition: StrategyDefinition<P>): Strategy<P> {
  const params: Readonly<P> = Object.freeze({ ...definition.params });
  const describe = definition.describe;
  return {
    id: definition.id,
    name: definition.name,
    params,
    qualify: (snapshot) => definition.qualify(snapshot, params),
    score: (snapshot) => {
      const value = definition.score(snapshot, params);
      return value !== null && Number.isFinite(value) ? value : null;
    },
    describe: () => (describe ? describe(params) : definition.name),
  };
}

/**
 * Validate strategy parameters against their schema, filling defaults
 *
 * @throws ConfigurationError naming the first offending parameter
 */
export function parseStrategyParams<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  strategyId: string
): z.output<S> {
  const result = schema.safeParse(input ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const configKey = `strategy.${strategyId}.${issue.path.join('.')}`;
    throw new ConfigurationError(`Invalid parameters for strategy '${strategyId}': ${issue.message}`, configKey);
  }
  return result.data;
}

export function inRange(value: number, min: number, max: number): boolean {
  return value >= min && value <= max;
}
