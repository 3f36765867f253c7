import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { ValidationError } from '@rebalancer/utils';
import { CsvMarketData, parseCsv, rowToBar } from '../../../src/data/csv-market-data.js';
import { makeTempDir, writeCsvMarket } from '../../fixtures/csv-market.js';

let dir: string;

beforeEach(() => {
  dir = makeTempDir();
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

const AAA_BARS = [
  { date: '2023-01-02', open: 10, high: 10.5, low: 9.8, close: 10.2, volume: 1500 },
  { date: '2023-01-03', open: 10.2, high: 10.4, low: 10, close: 10.3, volume: 900 },
];

describe('parseCsv', () => {
  it('keys rows by header and trims cells', async () => {
    await expect(parseCsv('code, name\nAAA , Alpha\n\nBBB,Beta\n')).resolves.toEqual([
      { code: 'AAA', name: 'Alpha' },
      { code: 'BBB', name: 'Beta' },
    ]);
  });
});

describe('rowToBar', () => {
  it('turns blank cells into NaN', () => {
    expect(rowToBar({ date: '2023-01-02', open: '1', high: '2', low: '0.5', close: '', volume: '10' })).toEqual({
      date: '2023-01-02',
      open: 1,
      high: 2,
      low: 0.5,
      close: Number.NaN,
      volume: 10,
    });
  });
});

describe('CsvMarketData', () => {
  it('reads the universe in file order', async () => {
    const files = writeCsvMarket(
      [
        { code: 'BBB', name: 'Beta', bars: [] },
        { code: 'AAA', name: 'Alpha', bars: AAA_BARS },
      ],
      dir
    );
    const data = new CsvMarketData({ dataDir: files.dataDir, universePath: files.universePath });

    await expect(data.getUniverse()).resolves.toEqual([
      { code: 'BBB', name: 'Beta' },
      { code: 'AAA', name: 'Alpha' },
    ]);
  });

  it('defaults a blank name to the code', async () => {
    const universePath = join(dir, 'universe.csv');
    writeFileSync(universePath, 'code,name\nAAA,\n');
    const data = new CsvMarketData({ dataDir: dir, universePath });

    await expect(data.getUniverse()).resolves.toEqual([{ code: 'AAA', name: 'AAA' }]);
  });

  it('rejects duplicate and missing codes', async () => {
    const universePath = join(dir, 'universe.csv');
    writeFileSync(universePath, 'code,name\nAAA,Alpha\nAAA,Again\n');
    await expect(new CsvMarketData({ dataDir: dir, universePath }).getUniverse()).rejects.toThrow(
      `Duplicate code AAA in universe file ${universePath}`
    );

    writeFileSync(universePath, 'code,name\n,Nameless\n');
    await expect(new CsvMarketData({ dataDir: dir, universePath }).getUniverse()).rejects.toThrow(
      `Missing code in universe file ${universePath} at row 0`
    );
  });

  it('fails with a ValidationError when the universe file is missing', async () => {
    const data = new CsvMarketData({ dataDir: dir, universePath: join(dir, 'nope.csv') });
    await expect(data.getUniverse()).rejects.toBeInstanceOf(ValidationError);
  });

  it('parses a price history into bars', async () => {
    const files = writeCsvMarket([{ code: 'AAA', name: 'Alpha', bars: AAA_BARS }], dir);
    const data = new CsvMarketData({ dataDir: files.dataDir, universePath: files.universePath });

    await expect(data.getPriceHistory('AAA')).resolves.toEqual(AAA_BARS);
  });

  it('returns an empty history when the price file is absent', async () => {
    const files = writeCsvMarket([], dir);
    const data = new CsvMarketData({ dataDir: files.dataDir, universePath: files.universePath });

    await expect(data.getPriceHistory('ZZZ')).resolves.toEqual([]);
  });

  it('names the instrument and row of a malformed bar', async () => {
    writeFileSync(
      join(dir, 'AAA.csv'),
      'date,open,high,low,close,volume\n2023-01-02,10,10.5,9.8,10.2,1500\n2023-01-03,10,10.5,9.8,,1500\n'
    );
    const data = new CsvMarketData({ dataDir: dir, universePath: join(dir, 'universe.csv') });

    await expect(data.getPriceHistory('AAA')).rejects.toThrow('Invalid price bar for AAA at row 1: close');
  });

  it('rejects an unordered history', async () => {
    writeFileSync(
      join(dir, 'AAA.csv'),
      'date,open,high,low,close,volume\n2023-01-03,10,10.5,9.8,10.2,1500\n2023-01-02,10,10.5,9.8,10.1,1500\n'
    );
    const data = new CsvMarketData({ dataDir: dir, universePath: join(dir, 'universe.csv') });

    await expect(data.getPriceHistory('AAA')).rejects.toThrow('Price history for AAA is out of order at 2023-01-02');
  });
});
