import { describe, it, expect } from 'vitest';
import { calculateEMASeries, calculateSMA, isBullishAlignment, isPriceAboveMA } from '../../../src/indicators/moving-averages.js';
import { calculateRSI } from '../../../src/indicators/rsi.js';
import { calculateMACD } from '../../../src/indicators/macd.js';
import { calculateBollingerBands } from '../../../src/indicators/bollinger.js';
import { calculateMomentum, calculateROC } from '../../../src/indicators/momentum.js';

describe('moving averages', () => {
  it('computes the SMA at an index', () => {
    expect(calculateSMA([1, 2, 3, 4, 5], 3, 4)).toBe(4);
    expect(calculateSMA([1, 2, 3, 4, 5], 3, 1)).toBeNull();
  });

  it('computes a bias-adjusted EMA from the first value', () => {
    const ema = calculateEMASeries([1, 2], 3);
    expect(ema[0]).toBe(1);
    expect(ema[1]).toBeCloseTo(5 / 3, 12);
  });

  it('detects bullish alignment', () => {
    expect(isBullishAlignment([4, 3, 2, 1])).toBe(true);
    expect(isBullishAlignment([4, 3, 3, 1])).toBe(false);
    expect(isBullishAlignment([4, null, 2])).toBe(false);
    expect(isBullishAlignment([4, 3, 2, null])).toBe(false);
  });

  it('requires the price strictly above a known average', () => {
    expect(isPriceAboveMA(10.5, 10)).toBe(true);
    expect(isPriceAboveMA(10, 10)).toBe(false);
    expect(isPriceAboveMA(10, null)).toBe(false);
  });
});

describe('RSI', () => {
  it('is 100 when there are no losses', () => {
    const closes = Array.from({ length: 15 }, (_, i) => 10 + i);
    expect(calculateRSI(closes, 14, 14)).toBe(100);
  });

  it('is 100 on a flat series', () => {
    expect(calculateRSI([5, 5, 5], 2, 2)).toBe(100);
  });

  it('is 50 when gains equal losses', () => {
    expect(calculateRSI([10, 11, 10], 2, 2)).toBe(50);
  });

  it('needs period + 1 values', () => {
    expect(calculateRSI([10, 11, 12], 3, 2)).toBeNull();
  });
});

describe('MACD', () => {
  it('is zero on a flat series', () => {
    const closes = Array.from({ length: 40 }, () => 10);
    const result = calculateMACD(closes, 39, 12, 26, 9);
    expect(result?.macd).toBeCloseTo(0, 10);
    expect(result?.signal).toBeCloseTo(0, 10);
    expect(result?.histogram).toBeCloseTo(0, 10);
  });

  it('turns positive on a steady rise', () => {
    const closes = Array.from({ length: 40 }, (_, i) => 10 + i);
    const result = calculateMACD(closes, 39, 12, 26, 9);
    expect(result).not.toBeNull();
    expect(result?.macd).toBeGreaterThan(0);
    expect(result?.histogram).toBeGreaterThan(0);
  });

  it('ignores values after the index', () => {
    const closes = [10, 11, 12, 13, 14];
    expect(calculateMACD([...closes, 100, 1], 4, 2, 4, 3)).toEqual(calculateMACD(closes, 4, 2, 4, 3));
  });

  it('returns null for an index outside the series', () => {
    expect(calculateMACD([1, 2], 5, 12, 26, 9)).toBeNull();
  });
});

describe('Bollinger bands', () => {
  it('places the close within the band', () => {
    const bands = calculateBollingerBands([1, 2, 3], 3, 2, 2);
    expect(bands).toEqual({ upper: 4, middle: 2, lower: 0, position: 0.75 });
  });

  it('reports no position for a zero-width band', () => {
    const bands = calculateBollingerBands([5, 5, 5, 5], 4, 2, 3);
    expect(bands?.upper).toBe(5);
    expect(bands?.lower).toBe(5);
    expect(bands?.position).toBeNull();
  });
});

describe('momentum', () => {
  it('measures the change from n bars back', () => {
    expect(calculateMomentum([10, 12, 11], 2, 2)).toBeCloseTo(0.1, 12);
    expect(calculateROC([10, 12, 11], 2, 2)).toBeCloseTo(10, 10);
  });

  it('needs n + 1 values', () => {
    expect(calculateMomentum([10, 12], 2, 1)).toBeNull();
  });
});
