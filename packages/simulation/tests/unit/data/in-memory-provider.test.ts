import { describe, it, expect } from 'vitest';
import { ValidationError } from '@rebalancer/utils';
import { InMemoryMarketData } from '../../../src/data/in-memory-provider.js';
import { auditDataQuality, validatePriceHistory } from '../../../src/data/validation.js';
import { makeBars } from '../../fixtures/market.js';

describe('validatePriceHistory', () => {
  it('accepts a strictly increasing history', () => {
    const bars = makeBars([10, 11, 12], '2023-01-02');
    expect(validatePriceHistory('AAA', bars)).toEqual(bars);
  });

  it('rejects duplicate dates', () => {
    const [first] = makeBars([10], '2023-01-02');
    expect(() => validatePriceHistory('AAA', [first, { ...first, close: 11 }])).toThrow(
      'Duplicate date 2023-01-02 in price history for AAA'
    );
  });

  it('rejects out-of-order dates', () => {
    const bars = makeBars([10, 11], '2023-01-02');
    expect(() => validatePriceHistory('AAA', [bars[1], bars[0]])).toThrow(ValidationError);
  });

  it('rejects non-positive closes and malformed rows', () => {
    const [bar] = makeBars([10], '2023-01-02');
    expect(() => validatePriceHistory('AAA', [{ ...bar, close: 0 }])).toThrow(ValidationError);
    expect(() => validatePriceHistory('AAA', [{ ...bar, date: '02/01/2023' }])).toThrow(/row 0/);
    expect(() => validatePriceHistory('AAA', [{ ...bar, volume: Number.NaN }])).toThrow(ValidationError);
  });
});

describe('auditDataQuality', () => {
  it('reports missing and empty histories', () => {
    const universe = [
      { code: 'AAA', name: 'Alpha' },
      { code: 'BBB', name: 'Bravo' },
      { code: 'CCC', name: 'Charlie' },
    ];
    const histories = new Map([
      ['AAA', makeBars([10], '2023-01-02')],
      ['BBB', []],
    ]);
    expect(auditDataQuality(universe, histories)).toEqual([
      { code: 'BBB', issue: 'empty_history' },
      { code: 'CCC', issue: 'missing_history' },
    ]);
  });
});

describe('InMemoryMarketData', () => {
  const provider = new InMemoryMarketData([
    { code: 'AAA', name: 'Alpha', attributes: { sector: 'tech' }, bars: makeBars([10, 11], '2023-01-02') },
    { code: 'BBB', name: 'Bravo', bars: [] },
  ]);

  it('returns the universe in order', async () => {
    await expect(provider.getUniverse()).resolves.toEqual([
      { code: 'AAA', name: 'Alpha', attributes: { sector: 'tech' } },
      { code: 'BBB', name: 'Bravo' },
    ]);
  });

  it('returns histories and an empty series for unknown codes', async () => {
    await expect(provider.getPriceHistory('AAA')).resolves.toHaveLength(2);
    await expect(provider.getPriceHistory('ZZZ')).resolves.toEqual([]);
  });

  it('validates histories on construction', () => {
    const [bar] = makeBars([10], '2023-01-02');
    expect(() => new InMemoryMarketData([{ code: 'AAA', name: 'Alpha', bars: [bar, bar] }])).toThrow(ValidationError);
  });
});

