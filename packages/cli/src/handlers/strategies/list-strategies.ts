import { getStrategy, listStrategies } from '@rebalancer/simulation';

export interface StrategyListing {
  id: string;
  name: string;
  description: string;
}

/**
 * Built-in strategies with their default parameters described
 */
export function listStrategiesHandler(): StrategyListing[] {
  return listStrategies().map((id) => {
    const strategy = getStrategy(id);
    return { id, name: strategy.name, description: strategy.describe() };
  });
}
