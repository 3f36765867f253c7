/**
 * Future Scramble Test
 * ====================
 *
 * Replacing every bar after the end date with noise must not change a run:
 * selections, trades, snapshots and final valuation all depend only on data
 * dated on or before each rebalance date. Likewise, ending a run on any of
 * its rebalance dates reproduces the full run up to that date.
 */

import { describe, it, expect } from 'vitest';
import type { InstrumentDescriptor, PriceBar } from '@rebalancer/core';
import { parseBacktestConfig } from '../../src/config.js';
import { getIndicator } from '../../src/indicators/base.js';
import { Backtester } from '../../src/scheduler/backtester.js';
import { defineStrategy } from '../../src/strategies/define.js';
import { createGrowthStrategy } from '../../src/strategies/growth.js';
import { createMomentumStrategy } from '../../src/strategies/momentum.js';
import { createValueStrategy } from '../../src/strategies/value.js';
import { FakeMarketData, makeBars } from '../fixtures/market.js';

/** Deterministic uniform [0, 1) generator */
function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1_664_525) + 1_013_904_223) >>> 0;
    return state / 4_294_967_296;
  };
}

function randomWalk(random: () => number, length: number, start: number, drift: number): number[] {
  const closes: number[] = [];
  let price = start;
  for (let i = 0; i < length; i++) {
    price = Math.max(1, price * (1 + drift + (random() - 0.5) * 0.04));
    closes.push(price);
  }
  return closes;
}

const START = '2022-01-01';
const HISTORY_DAYS = 540;
const END_DATE = '2023-04-30';

const universe: InstrumentDescriptor[] = Array.from({ length: 8 }, (_, i) => ({
  code: `S${i}`,
  name: `Stock ${i}`,
}));

function buildHistories(seed: number): Record<string, PriceBar[]> {
  const random = seededRandom(seed);
  const out: Record<string, PriceBar[]> = {};
  universe.forEach((instrument, i) => {
    const closes = randomWalk(random, HISTORY_DAYS, 10 + i * 5, (i - 3) * 0.001);
    const volumes = closes.map(() => 1_000 + Math.floor(random() * 2_000));
    out[instrument.code] = makeBars(closes, START, volumes);
  });
  return out;
}

function scrambleAfter(histories: Record<string, PriceBar[]>, date: string, seed: number): Record<string, PriceBar[]> {
  const random = seededRandom(seed);
  const out: Record<string, PriceBar[]> = {};
  for (const [code, bars] of Object.entries(histories)) {
    out[code] = bars.map((bar) => {
      if (bar.date <= date) return bar;
      const close = 1 + random() * 500;
      return { ...bar, open: close, high: close * 1.05, low: close * 0.95, close, volume: Math.floor(random() * 1e6) };
    });
  }
  return out;
}

describe('Future scramble determinism', () => {
  const config = parseBacktestConfig({ frequency: 'M' });
  const histories = buildHistories(42);
  const scrambled = scrambleAfter(histories, END_DATE, 7);

  const strategies = [createMomentumStrategy(), createValueStrategy(), createGrowthStrategy()];

  for (const strategy of strategies) {
    it(`${strategy.id}: results ignore bars after the end date`, async () => {
      const request = { startDate: '2022-07-01', endDate: END_DATE, strategy };
      const original = await new Backtester(new FakeMarketData(universe, histories), config).run(request);
      const noisy = await new Backtester(new FakeMarketData(universe, scrambled), config).run(request);

      expect(noisy).toEqual(original);
    });
  }

  it('repeated runs are identical', async () => {
    const strategy = createMomentumStrategy({ minRsi: 0, maxRsi: 100 });
    const request = { startDate: '2022-07-01', endDate: END_DATE, strategy };
    const first = await new Backtester(new FakeMarketData(universe, histories), config).run(request);
    const second = await new Backtester(new FakeMarketData(universe, histories), config).run(request);
    expect(second).toEqual(first);
  });
});

describe('Truncated runs', () => {
  const config = parseBacktestConfig({ frequency: 'M', maxPositions: 3 });
  const histories = buildHistories(42);

  const risingMomentum = defineStrategy({
    id: 'rising',
    name: 'Rising',
    params: {},
    qualify: (s) => (getIndicator(s, 'momentum20d') ?? 0) > 0,
    score: (s) => getIndicator(s, 'momentum20d'),
  });

  const strategies = [risingMomentum, createMomentumStrategy(), createValueStrategy(), createGrowthStrategy()];

  for (const strategy of strategies) {
    it(`${strategy.id}: ending on a rebalance date replays the full run up to it`, async () => {
      const full = await new Backtester(new FakeMarketData(universe, histories), config).run({
        startDate: '2022-07-01',
        endDate: END_DATE,
        strategy,
      });

      for (const { date } of full.snapshots) {
        const truncated = await new Backtester(new FakeMarketData(universe, histories), config).run({
          startDate: '2022-07-01',
          endDate: date,
          strategy,
        });

        expect(truncated.snapshots).toEqual(full.snapshots.filter((s) => s.date <= date));
        expect(truncated.trades).toEqual(full.trades.filter((t) => t.date <= date));
      }
    });
  }

  it('the indicator-driven run trades', async () => {
    const full = await new Backtester(new FakeMarketData(universe, histories), config).run({
      startDate: '2022-07-01',
      endDate: END_DATE,
      strategy: risingMomentum,
    });

    expect(full.snapshots).toHaveLength(10);
    expect(full.trades.length).toBeGreaterThan(0);
  });
});
