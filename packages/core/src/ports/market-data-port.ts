/**
 * Market Data Port
 *
 * Port interface for the data-access collaborator. The simulation depends on this
 * port, never on a concrete source (files, databases, vendor APIs).
 */

import type { InstrumentDescriptor, PriceBar } from '../domain/market/index.js';

export interface MarketDataPort {
  /**
   * Instrument universe, in the order selection ties are broken
   */
  getUniverse(): Promise<readonly InstrumentDescriptor[]>;

  /**
   * Full daily history for an instrument, strictly increasing by date.
   * Empty for unknown codes.
   */
  getPriceHistory(code: string): Promise<readonly PriceBar[]>;
}
