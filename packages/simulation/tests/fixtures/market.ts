import { DateTime } from 'luxon';
import type { InstrumentDescriptor, MarketDataPort, PriceBar } from '@rebalancer/core';
import type { IndicatorSnapshot } from '../../src/indicators/base.js';

export function addDays(date: string, days: number): string {
  return DateTime.fromISO(date, { zone: 'utc' }).plus({ days }).toFormat('yyyy-MM-dd');
}

/**
 * One bar per calendar day from `start`; high/low straddle the close by 1%
 */
export function makeBars(
  closes: readonly number[],
  start: string = '2022-01-01',
  volume: number | readonly number[] = 1_000
): PriceBar[] {
  return closes.map((close, i) => ({
    date: addDays(start, i),
    open: close,
    high: close * 1.01,
    low: close * 0.99,
    close,
    volume: typeof volume === 'number' ? volume : volume[i],
  }));
}

/**
 * Bars with a fixed close from `start` through `end` inclusive
 */
export function flatBars(close: number, start: string, end: string): PriceBar[] {
  const days = DateTime.fromISO(end, { zone: 'utc' }).diff(DateTime.fromISO(start, { zone: 'utc' }), 'days').days;
  return makeBars(
    Array.from({ length: Math.round(days) + 1 }, () => close),
    start
  );
}

export function snapshotOf(values: Record<string, number | null>, asOf: string = '2023-01-02'): IndicatorSnapshot {
  return { asOf, lastBarDate: asOf, barCount: 100, values };
}

/**
 * Port over fixed data that counts how often it is asked
 */
export class FakeMarketData implements MarketDataPort {
  universeCalls = 0;
  historyCalls = 0;

  constructor(
    private readonly universe: readonly InstrumentDescriptor[],
    private readonly histories: Record<string, readonly PriceBar[]>
  ) {}

  async getUniverse(): Promise<readonly InstrumentDescriptor[]> {
    this.universeCalls++;
    return this.universe;
  }

  async getPriceHistory(code: string): Promise<readonly PriceBar[]> {
    this.historyCalls++;
    return this.histories[code] ?? [];
  }
}
