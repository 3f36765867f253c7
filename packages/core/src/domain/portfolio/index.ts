/**
 * Portfolio domain: trades, snapshots, rebalance cadence
 */

import { z } from 'zod';
import type { IsoDate } from '../../time/dates.js';

export const TradeActionSchema = z.enum(['buy', 'sell']);
export type TradeAction = z.infer<typeof TradeActionSchema>;

/**
 * Rebalance cadence, anchored to period starts: month, quarter, year
 */
export const RebalanceFrequencySchema = z.enum(['M', 'Q', 'Y']);
export type RebalanceFrequency = z.infer<typeof RebalanceFrequencySchema>;

export const PERIODS_PER_YEAR: Readonly<Record<RebalanceFrequency, number>> = {
  M: 12,
  Q: 4,
  Y: 1,
};

export interface Trade {
  readonly date: IsoDate;
  readonly action: TradeAction;
  readonly code: string;
  readonly shares: number;
  readonly price: number;
  /** Commission plus stamp tax */
  readonly cost: number;
}

/**
 * Portfolio state recorded once per rebalance date
 */
export interface PortfolioSnapshot {
  readonly date: IsoDate;
  readonly value: number;
  readonly cash: number;
  /** Number of instruments held */
  readonly positions: number;
  /** code → shares after the rebalance */
  readonly holdings: Readonly<Record<string, number>>;
}
