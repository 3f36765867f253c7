/**
 * Base Indicator Types
 * ====================
 * Snapshot shape and helpers shared by the indicator engine and strategies.
 */

import type { IsoDate } from '@rebalancer/core';

/**
 * Indicator values for one instrument as of one date.
 *
 * A `null` value means "not computable": the window is longer than the
 * available history, or the formula would divide by zero.
 */
export interface IndicatorSnapshot {
  /** Requested as-of date */
  readonly asOf: IsoDate;
  /** Date of the last bar that fed the snapshot */
  readonly lastBarDate: IsoDate;
  /** Bars on or before `asOf` */
  readonly barCount: number;
  readonly values: Readonly<Record<string, number | null>>;
}

export type SnapshotResult =
  | { ok: true; snapshot: IndicatorSnapshot }
  | { ok: false; reason: 'insufficient_history'; available: number; required: number };

/**
 * Read one indicator. Unknown names read as not computable.
 */
export function getIndicator(snapshot: IndicatorSnapshot, name: string): number | null {
  const value = snapshot.values[name];
  return value === undefined ? null : value;
}

/**
 * Read several indicators at once, in the order requested; null if any of
 * them is not computable
 */
export function requireIndicators(snapshot: IndicatorSnapshot, names: readonly string[]): number[] | null {
  const out: number[] = [];
  for (const name of names) {
    const value = getIndicator(snapshot, name);
    if (value === null) {
      return null;
    }
    out.push(value);
  }
  return out;
}

/**
 * Map NaN and ±Infinity to the not-computable sentinel
 */
export function finiteOrNull(value: number | null): number | null {
  return value !== null && Number.isFinite(value) ? value : null;
}

export function maKey(period: number): string {
  return `ma${period}`;
}

export function momentumKey(period: number): string {
  return `momentum${period}d`;
}
