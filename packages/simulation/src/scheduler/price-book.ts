import { latestCloseOnOrBefore, type InstrumentDescriptor, type IsoDate, type PriceBar } from '@rebalancer/core';

/**
 * Read-only price histories for one run, keyed by instrument code
 */
export class PriceBook {
  private readonly histories: ReadonlyMap<string, readonly PriceBar[]>;

  constructor(
    readonly universe: readonly InstrumentDescriptor[],
    histories: ReadonlyMap<string, readonly PriceBar[]>
  ) {
    this.histories = histories;
  }

  history(code: string): readonly PriceBar[] {
    return this.histories.get(code) ?? [];
  }

  latestClose(code: string, date: IsoDate): number | null {
    return latestCloseOnOrBefore(this.history(code), date);
  }

  /**
   * Selection and ranking read this shape
   */
  view(): { universe: readonly InstrumentDescriptor[]; histories: ReadonlyMap<string, readonly PriceBar[]> } {
    return { universe: this.universe, histories: this.histories };
  }
}
