/**
 * Ledger
 * ======
 * Cash, positions and the append-only trade log for one backtest run.
 */

import type { IsoDate, Trade, TradeAction } from '@rebalancer/core';
import { LogHelpers } from '@rebalancer/utils';
import type { CostConfig } from '../config.js';
import { logger } from '../logger.js';
import { calculateTradingCost } from './fees.js';

export type TradeRejectionReason = 'insufficient_cash' | 'insufficient_shares' | 'invalid_shares' | 'invalid_price';

export type TradeResult = { ok: true; trade: Trade } | { ok: false; reason: TradeRejectionReason };

/**
 * Latest known close for `code` on or before `date`
 */
export type PriceLookup = (code: string, date: IsoDate) => number | null;

export interface LedgerOptions {
  initialCapital: number;
  costs: CostConfig;
  lotSize: number;
}

/**
 * Invariants: cash never goes negative, no position is negative, every
 * recorded trade is a positive multiple of the lot size. A rejected trade
 * leaves the ledger untouched.
 */
export class Ledger {
  private cash: number;
  private readonly positions = new Map<string, number>();
  private readonly trades: Trade[] = [];
  private readonly costs: CostConfig;
  private readonly lotSize: number;

  constructor(options: LedgerOptions) {
    this.cash = options.initialCapital;
    this.costs = options.costs;
    this.lotSize = options.lotSize;
  }

  getCash(): number {
    return this.cash;
  }

  getShares(code: string): number {
    return this.positions.get(code) ?? 0;
  }

  /**
   * Codes currently held, in the order they were first bought
   */
  getHeldCodes(): string[] {
    return [...this.positions.keys()];
  }

  getPositions(): Record<string, number> {
    return Object.fromEntries(this.positions);
  }

  getTrades(): readonly Trade[] {
    return this.trades;
  }

  execute(action: TradeAction, code: string, price: number, shares: number, date: IsoDate): TradeResult {
    const rejection = this.check(action, code, price, shares);
    if (rejection) {
      LogHelpers.rejectedTrade(logger, action, code, rejection, { date, shares, price, cash: this.cash });
      return { ok: false, reason: rejection };
    }

    const amount = shares * price;
    const cost = calculateTradingCost(amount, action, this.costs);

    if (action === 'buy') {
      this.cash -= amount + cost;
      this.positions.set(code, this.getShares(code) + shares);
    } else {
      this.cash += amount - cost;
      const remaining = this.getShares(code) - shares;
      if (remaining === 0) {
        this.positions.delete(code);
      } else {
        this.positions.set(code, remaining);
      }
    }

    const trade: Trade = { date, action, code, shares, price, cost };
    this.trades.push(trade);
    LogHelpers.trade(logger, action, code, shares, price, { date, cost });
    return { ok: true, trade };
  }

  /**
   * Cash plus every position marked at its latest close on or before `date`.
   * A position without a price contributes nothing.
   */
  valuation(date: IsoDate, lookup: PriceLookup): number {
    let total = this.cash;
    for (const [code, shares] of this.positions) {
      const price = lookup(code, date);
      if (price === null) {
        logger.warn('No price for held position; valued at zero', { code, date, shares });
        continue;
      }
      total += shares * price;
    }
    return total;
  }

  private check(action: TradeAction, code: string, price: number, shares: number): TradeRejectionReason | null {
    if (!Number.isFinite(price) || price <= 0) {
      return 'invalid_price';
    }
    if (!Number.isInteger(shares) || shares <= 0 || shares % this.lotSize !== 0) {
      return 'invalid_shares';
    }
    const amount = shares * price;
    const cost = calculateTradingCost(amount, action, this.costs);
    if (action === 'buy') {
      return amount + cost <= this.cash ? null : 'insufficient_cash';
    }
    if (this.getShares(code) < shares) {
      return 'insufficient_shares';
    }
    // A sell below the commission floor nets a negative amount
    return this.cash + amount - cost >= 0 ? null : 'insufficient_cash';
  }
}
