/**
 * Trading Costs
 * =============
 * Commission with a flat floor on both sides, stamp tax on sells only.
 */

import type { TradeAction } from '@rebalancer/core';
import type { CostConfig } from '../config.js';

/**
 * Commission for a trade of the given notional: max(amount × rate, minimum)
 */
export function calculateCommission(amount: number, config: CostConfig): number {
  return Math.max(amount * config.commissionRate, config.minCommission);
}

export function calculateStampTax(amount: number, action: TradeAction, config: CostConfig): number {
  return action === 'sell' ? amount * config.stampTaxRate : 0;
}

/**
 * Total cost charged on a trade of the given notional
 */
export function calculateTradingCost(amount: number, action: TradeAction, config: CostConfig): number {
  return calculateCommission(amount, config) + calculateStampTax(amount, action, config);
}

/**
 * Cost of buying then selling the same notional
 */
export function roundTripCost(amount: number, config: CostConfig): number {
  return calculateTradingCost(amount, 'buy', config) + calculateTradingCost(amount, 'sell', config);
}
