/**
 * Property Tests for Indicator Causality
 * ======================================
 *
 * Critical Invariants:
 * 1. A snapshot as of D is unchanged by appending bars dated after D
 * 2. Every value is finite or null, never NaN
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import type { PriceBar } from '@rebalancer/core';
import { parseIndicatorConfig } from '../../src/config.js';
import { computeIndicatorSnapshot } from '../../src/indicators/snapshot.js';
import { addDays } from '../fixtures/market.js';

const config = parseIndicatorConfig({ lookbackDays: 30 });

const barArb = fc.record({
  close: fc.double({ min: 1, max: 1_000, noNaN: true }),
  up: fc.double({ min: 0, max: 0.1, noNaN: true }),
  down: fc.double({ min: 0, max: 0.1, noNaN: true }),
  volume: fc.integer({ min: 0, max: 1_000_000 }),
});

function toBars(rows: ReadonlyArray<{ close: number; up: number; down: number; volume: number }>, start: string): PriceBar[] {
  return rows.map((row, i) => ({
    date: addDays(start, i),
    open: row.close,
    high: row.close * (1 + row.up),
    low: row.close * (1 - row.down),
    close: row.close,
    volume: row.volume,
  }));
}

describe('Indicator causality - Property Tests', () => {
  it('appending future bars does not change a past snapshot', () => {
    fc.assert(
      fc.property(
        fc.array(barArb, { minLength: 30, maxLength: 90 }),
        fc.array(barArb, { minLength: 1, maxLength: 30 }),
        (pastRows, futureRows) => {
          const past = toBars(pastRows, '2022-01-01');
          const future = toBars(futureRows, addDays('2022-01-01', past.length));
          const asOf = past[past.length - 1].date;

          const before = computeIndicatorSnapshot(past, asOf, config);
          const after = computeIndicatorSnapshot([...past, ...future], asOf, config);
          expect(after).toEqual(before);
        }
      ),
      { numRuns: 100 }
    );
  });

  it('never produces NaN or infinite values', () => {
    fc.assert(
      fc.property(fc.array(barArb, { minLength: 30, maxLength: 90 }), (rows) => {
        const bars = toBars(rows, '2022-01-01');
        const result = computeIndicatorSnapshot(bars, bars[bars.length - 1].date, config);
        if (!result.ok) return false;
        return Object.values(result.snapshot.values).every((v) => v === null || Number.isFinite(v));
      }),
      { numRuns: 100 }
    );
  });
});
