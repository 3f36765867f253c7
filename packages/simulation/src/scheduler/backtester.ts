/**
 * Backtester
 * ==========
 *
 * Drives one run: loads the universe and every price history once, then
 * walks the rebalance calendar strictly in order. On each date it values the
 * book, asks the strategy for candidates, sells what dropped out, tops up
 * what was selected, and records a snapshot.
 */

import type {
  InstrumentDescriptor,
  IsoDate,
  MarketDataPort,
  PortfolioSnapshot,
  PriceBar,
  RebalanceFrequency,
  Trade,
} from '@rebalancer/core';
import { parseBacktestConfig, type BacktestConfig } from '../config.js';
import { Ledger } from '../ledger/ledger.js';
import { logger } from '../logger.js';
import { selectCandidates, type Candidate } from '../strategies/selection.js';
import type { Strategy } from '../strategies/types.js';
import { PriceBook } from './price-book.js';
import { generateRebalanceDates } from './rebalance-dates.js';

export interface BacktestRequest {
  startDate: IsoDate;
  endDate: IsoDate;
  /** Defaults to the configured frequency */
  frequency?: RebalanceFrequency;
  strategy: Strategy;
}

export interface BacktestResult {
  /** Strategy display name */
  strategy: string;
  strategyId: string;
  startDate: IsoDate;
  endDate: IsoDate;
  frequency: RebalanceFrequency;
  snapshots: PortfolioSnapshot[];
  trades: Trade[];
  /** Valuation at the end date */
  finalValue: number;
  finalCash: number;
  finalPositions: Record<string, number>;
}

export class Backtester {
  private readonly config: BacktestConfig;

  /**
   * @throws ConfigurationError when the settings fail validation, even if
   * they were parsed once and then modified
   */
  constructor(
    private readonly dataPort: MarketDataPort,
    config: BacktestConfig
  ) {
    this.config = parseBacktestConfig(config);
  }

  async run(request: BacktestRequest): Promise<BacktestResult> {
    const frequency = request.frequency ?? this.config.frequency;
    const dates = generateRebalanceDates(request.startDate, request.endDate, frequency);
    const { strategy } = request;

    logger.info('Backtest starting', {
      strategy: strategy.id,
      startDate: request.startDate,
      endDate: request.endDate,
      frequency,
      rebalanceCount: dates.length,
    });

    const prices = await this.loadPriceBook();
    const ledger = new Ledger({
      initialCapital: this.config.initialCapital,
      costs: this.config.costs,
      lotSize: this.config.lotSize,
    });

    const snapshots: PortfolioSnapshot[] = [];
    for (const date of dates) {
      snapshots.push(this.rebalance(date, strategy, ledger, prices));
    }

    const finalValue = ledger.valuation(request.endDate, (code, date) => prices.latestClose(code, date));

    logger.info('Backtest complete', {
      strategy: strategy.id,
      rebalances: snapshots.length,
      trades: ledger.getTrades().length,
      finalValue,
    });

    return {
      strategy: strategy.name,
      strategyId: strategy.id,
      startDate: request.startDate,
      endDate: request.endDate,
      frequency,
      snapshots,
      trades: [...ledger.getTrades()],
      finalValue,
      finalCash: ledger.getCash(),
      finalPositions: ledger.getPositions(),
    };
  }

  /**
   * Universe first, then every history concurrently; joined before any date is processed
   */
  async loadPriceBook(): Promise<PriceBook> {
    const universe: readonly InstrumentDescriptor[] = await this.dataPort.getUniverse();
    const histories = await Promise.all(
      universe.map(async (instrument): Promise<[string, readonly PriceBar[]]> => [
        instrument.code,
        await this.dataPort.getPriceHistory(instrument.code),
      ])
    );
    logger.debug('Price histories loaded', { instruments: universe.length });
    return new PriceBook(universe, new Map(histories));
  }

  rebalance(date: IsoDate, strategy: Strategy, ledger: Ledger, prices: PriceBook): PortfolioSnapshot {
    const lookup = (code: string, on: IsoDate): number | null => prices.latestClose(code, on);
    const valueBefore = ledger.valuation(date, lookup);
    const selected = selectCandidates(date, strategy, prices.view(), this.config);

    if (selected.length === 0) {
      logger.info('No candidates selected; holdings unchanged', { date, strategy: strategy.id });
      return this.snapshot(date, ledger, valueBefore);
    }

    this.sellDropped(date, selected, ledger, prices);
    this.buySelected(date, selected, ledger, valueBefore);

    const snapshot = this.snapshot(date, ledger, ledger.valuation(date, lookup));
    logger.info('Rebalanced', {
      date,
      strategy: strategy.id,
      selected: selected.map((c) => c.code),
      value: snapshot.value,
      cash: snapshot.cash,
      positions: snapshot.positions,
    });
    return snapshot;
  }

  private sellDropped(date: IsoDate, selected: readonly Candidate[], ledger: Ledger, prices: PriceBook): void {
    const keep = new Set(selected.map((c) => c.code));
    for (const code of ledger.getHeldCodes()) {
      if (keep.has(code)) {
        continue;
      }
      const price = prices.latestClose(code, date);
      if (price === null) {
        logger.warn('No price to sell dropped position; kept', { date, code });
        continue;
      }
      ledger.execute('sell', code, price, ledger.getShares(code), date);
    }
  }

  /**
   * Equal-weight target per name; only the shortfall is bought, holdings above
   * target are left alone
   */
  private buySelected(date: IsoDate, selected: readonly Candidate[], ledger: Ledger, portfolioValue: number): void {
    const { lotSize, cashReserve } = this.config;
    const targetValue = (portfolioValue * (1 - cashReserve)) / selected.length;

    for (const candidate of selected) {
      const targetShares = Math.floor(targetValue / (candidate.price * lotSize)) * lotSize;
      const shortfall = targetShares - ledger.getShares(candidate.code);
      if (shortfall > 0) {
        ledger.execute('buy', candidate.code, candidate.price, shortfall, date);
      }
    }
  }

  private snapshot(date: IsoDate, ledger: Ledger, value: number): PortfolioSnapshot {
    const holdings = ledger.getPositions();
    return {
      date,
      value,
      cash: ledger.getCash(),
      positions: Object.keys(holdings).length,
      holdings,
    };
  }
}
