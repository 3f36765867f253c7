/**
 * Strategy Types
 * ==============
 */

import type { IndicatorSnapshot } from '../indicators/base.js';

/**
 * Stock-selection strategy.
 *
 * Both predicates are pure functions of one snapshot. A strategy never sees
 * raw price history, so it cannot look past the snapshot's as-of date.
 */
export interface Strategy<P extends object = object> {
  readonly id: string;
  readonly name: string;
  readonly params: Readonly<P>;
  /** False when any field it reads is not computable */
  qualify(snapshot: IndicatorSnapshot): boolean;
  /** Higher is better; null when a field it reads is not computable */
  score(snapshot: IndicatorSnapshot): number | null;
  describe(): string;
}

/**
 * One weighted factor of a multi-factor strategy
 */
export interface Factor {
  readonly weight: number;
  /** Factor score, usually on a 0–100 scale */
  score(snapshot: IndicatorSnapshot): number | null;
}
