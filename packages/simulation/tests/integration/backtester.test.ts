import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@rebalancer/utils';
import { parseBacktestConfig } from '../../src/config.js';
import { getIndicator } from '../../src/indicators/base.js';
import { computeMetrics } from '../../src/metrics/performance-metrics.js';
import { Backtester } from '../../src/scheduler/backtester.js';
import { defineStrategy } from '../../src/strategies/define.js';
import { FakeMarketData, flatBars } from '../fixtures/market.js';

const config = parseBacktestConfig({
  minDataDays: 5,
  indicators: { lookbackDays: 5 },
  frequency: 'M',
});

const always = defineStrategy({
  id: 'always',
  name: 'Always',
  params: {},
  qualify: () => true,
  score: () => 1,
});

const never = defineStrategy({
  id: 'never',
  name: 'Never',
  params: {},
  qualify: () => false,
  score: () => null,
});

/** AAA at 10.00 through January, 11.00 from February; BBB at 50.00 throughout */
function twoInstrumentMarket(): FakeMarketData {
  return new FakeMarketData(
    [
      { code: 'AAA', name: 'Alpha' },
      { code: 'BBB', name: 'Bravo' },
    ],
    {
      AAA: [...flatBars(10, '2022-12-01', '2023-01-31'), ...flatBars(11, '2023-02-01', '2023-03-31')],
      BBB: flatBars(50, '2022-12-01', '2023-03-31'),
    }
  );
}

/** AAA (price 10) in January, BBB (price 50) from February */
const rotating = defineStrategy({
  id: 'rotating',
  name: 'Rotating',
  params: {},
  qualify: (s) => getIndicator(s, 'price') === (s.asOf < '2023-02-01' ? 10 : 50),
  score: () => 1,
});

describe('Backtester', () => {
  it('buys 90,000 shares at 10.00 with 1,000,000 capital', async () => {
    const port = new FakeMarketData([{ code: 'AAA', name: 'Alpha' }], { AAA: flatBars(10, '2022-12-01', '2023-01-31') });
    const result = await new Backtester(port, config).run({
      startDate: '2023-01-01',
      endDate: '2023-01-31',
      strategy: always,
    });

    expect(result.trades).toHaveLength(1);
    expect(result.trades[0]).toMatchObject({ date: '2023-01-01', action: 'buy', code: 'AAA', shares: 90_000, price: 10 });
    expect(result.finalCash).toBeCloseTo(99_730, 6);
    expect(result.finalPositions).toEqual({ AAA: 90_000 });
    expect(result.snapshots).toHaveLength(1);
    expect(result.snapshots[0].value).toBeCloseTo(999_730, 6);
    expect(result.snapshots[0].holdings).toEqual({ AAA: 90_000 });
    expect(result.finalValue).toBeCloseTo(999_730, 6);
  });

  it('sells dropped holdings before buying new selections', async () => {
    const result = await new Backtester(twoInstrumentMarket(), config).run({
      startDate: '2023-01-01',
      endDate: '2023-02-28',
      strategy: rotating,
    });

    expect(result.trades.map((t) => `${t.date} ${t.action} ${t.code} ${t.shares}`)).toEqual([
      '2023-01-01 buy AAA 90000',
      '2023-02-01 sell AAA 90000',
      '2023-02-01 buy BBB 19600',
    ]);
    expect(result.trades[1].cost).toBeCloseTo(1_287, 6);
    // 99,730 + 988,713 from the sale, less 980,000 + 294 for the buy
    expect(result.finalCash).toBeCloseTo(108_149, 6);
    expect(result.finalPositions).toEqual({ BBB: 19_600 });
    expect(result.snapshots.map((s) => s.date)).toEqual(['2023-01-01', '2023-02-01']);
    expect(result.snapshots[1].value).toBeCloseTo(1_088_149, 6);
  });

  it('records an unchanged snapshot when nothing is selected', async () => {
    const result = await new Backtester(twoInstrumentMarket(), config).run({
      startDate: '2023-01-01',
      endDate: '2023-03-31',
      strategy: never,
    });

    expect(result.trades).toEqual([]);
    expect(result.snapshots).toEqual([
      { date: '2023-01-01', value: 1_000_000, cash: 1_000_000, positions: 0, holdings: {} },
      { date: '2023-02-01', value: 1_000_000, cash: 1_000_000, positions: 0, holdings: {} },
      { date: '2023-03-01', value: 1_000_000, cash: 1_000_000, positions: 0, holdings: {} },
    ]);
  });

  it('carries holdings forward through an empty selection', async () => {
    const januaryOnly = defineStrategy({
      id: 'january-only',
      name: 'January only',
      params: {},
      qualify: (s) => s.asOf < '2023-02-01' && getIndicator(s, 'price') === 10,
      score: () => 1,
    });
    const result = await new Backtester(twoInstrumentMarket(), config).run({
      startDate: '2023-01-01',
      endDate: '2023-02-28',
      strategy: januaryOnly,
    });

    expect(result.trades).toHaveLength(1);
    const [, february] = result.snapshots;
    expect(february.holdings).toEqual({ AAA: 90_000 });
    expect(february.cash).toBeCloseTo(99_730, 6);
    expect(february.value).toBeCloseTo(99_730 + 990_000, 6);
  });

  it('tops up without trimming a position that stays selected', async () => {
    const result = await new Backtester(twoInstrumentMarket(), config).run({
      startDate: '2023-01-01',
      endDate: '2023-03-31',
      strategy: defineStrategy({
        id: 'aaa',
        name: 'AAA',
        params: {},
        qualify: (s) => (getIndicator(s, 'price') ?? 0) < 20,
        score: () => 1,
      }),
    });

    // February target is 0.9 × 1,089,730 / 11 → 89,100 shares, below the 90,000 held
    expect(result.trades).toHaveLength(1);
    expect(result.finalPositions).toEqual({ AAA: 90_000 });
  });

  it('loads the universe and each history exactly once', async () => {
    const port = twoInstrumentMarket();
    await new Backtester(port, config).run({ startDate: '2023-01-01', endDate: '2023-03-31', strategy: always });
    expect(port.universeCalls).toBe(1);
    expect(port.historyCalls).toBe(2);
  });

  it('rejects an end date before the start date before loading data', async () => {
    const port = twoInstrumentMarket();
    await expect(
      new Backtester(port, config).run({ startDate: '2023-03-01', endDate: '2023-01-01', strategy: always })
    ).rejects.toBeInstanceOf(ConfigurationError);
    expect(port.universeCalls).toBe(0);
  });

  it('revalidates settings that were modified after parsing', () => {
    const port = twoInstrumentMarket();
    expect(() => new Backtester(port, { ...config, initialCapital: 0 })).toThrow(ConfigurationError);
    expect(() => new Backtester(port, { ...config, initialCapital: -1_000 })).toThrow(
      'Invalid backtest configuration: initialCapital'
    );
    expect(() => new Backtester(port, { ...config, maxPositions: 0 })).toThrow(ConfigurationError);
    expect(() => new Backtester(port, { ...config, costs: { ...config.costs, minCommission: -5 } })).toThrow(
      'Invalid backtest configuration: costs.minCommission'
    );
    expect(port.universeCalls).toBe(0);
  });

  it('feeds metrics that are stable across calls', async () => {
    const result = await new Backtester(twoInstrumentMarket(), config).run({
      startDate: '2023-01-01',
      endDate: '2023-03-31',
      strategy: rotating,
    });
    const first = computeMetrics(result, config);
    expect(computeMetrics(result, config)).toEqual(first);
    expect(first.tradeCount).toBe(3);
    expect(first.periods).toBe(2);
  });
});
