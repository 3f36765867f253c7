/**
 * In-memory market data
 * =====================
 * MarketDataPort over data already held in memory. Histories are validated
 * once on construction.
 */

import type { InstrumentDescriptor, MarketDataPort, PriceBar } from '@rebalancer/core';
import { validatePriceHistory } from './validation.js';

export interface InMemoryInstrument extends InstrumentDescriptor {
  bars: readonly unknown[];
}

export class InMemoryMarketData implements MarketDataPort {
  readonly name = 'in-memory';
  private readonly universe: readonly InstrumentDescriptor[];
  private readonly histories: ReadonlyMap<string, readonly PriceBar[]>;

  constructor(instruments: readonly InMemoryInstrument[]) {
    this.universe = instruments.map(({ code, name, attributes }) =>
      attributes === undefined ? { code, name } : { code, name, attributes }
    );
    this.histories = new Map(instruments.map((i) => [i.code, validatePriceHistory(i.code, i.bars)]));
  }

  async getUniverse(): Promise<readonly InstrumentDescriptor[]> {
    return this.universe;
  }

  /**
   * Empty for an unknown code
   */
  async getPriceHistory(code: string): Promise<readonly PriceBar[]> {
    return this.histories.get(code) ?? [];
  }
}
