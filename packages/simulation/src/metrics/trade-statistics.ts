import type { Trade } from '@rebalancer/core';
import { meanOf } from '../indicators/rolling.js';

export interface TradeStatistics {
  totalTrades: number;
  buyCount: number;
  sellCount: number;
  /** Commission and stamp tax across all trades */
  totalCost: number;
  /** Mean notional per buy, 0 without buys */
  averageBuyAmount: number;
  averageSellAmount: number;
}

export function summarizeTrades(trades: readonly Trade[]): TradeStatistics {
  const buys = trades.filter((t) => t.action === 'buy');
  const sells = trades.filter((t) => t.action === 'sell');
  return {
    totalTrades: trades.length,
    buyCount: buys.length,
    sellCount: sells.length,
    totalCost: trades.reduce((sum, t) => sum + t.cost, 0),
    averageBuyAmount: meanOf(buys.map((t) => t.shares * t.price)),
    averageSellAmount: meanOf(sells.map((t) => t.shares * t.price)),
  };
}
