/**
 * Candidate selection
 * ===================
 */

import {
  lastIndexOnOrBefore,
  type InstrumentDescriptor,
  type IsoDate,
  type PriceBar,
} from '@rebalancer/core';
import type { BacktestConfig } from '../config.js';
import type { IndicatorSnapshot } from '../indicators/base.js';
import { computeIndicatorSnapshot } from '../indicators/snapshot.js';
import { logger } from '../logger.js';
import type { Strategy } from './types.js';

export interface Candidate {
  code: string;
  name: string;
  score: number;
  /** Close on the last bar at or before the selection date */
  price: number;
  indicators: IndicatorSnapshot['values'];
}

/**
 * Read-only market view shared by selection and ranking
 */
export interface MarketView {
  universe: readonly InstrumentDescriptor[];
  histories: ReadonlyMap<string, readonly PriceBar[]>;
}

export type SelectionConfig = Pick<BacktestConfig, 'maxPositions' | 'minDataDays' | 'indicators' | 'minScore'>;

/**
 * Snapshots for every instrument with enough history on or before `date`,
 * in universe order
 */
export function eligibleSnapshots(
  date: IsoDate,
  market: MarketView,
  config: Pick<BacktestConfig, 'minDataDays' | 'indicators'>
): Array<{ instrument: InstrumentDescriptor; snapshot: IndicatorSnapshot }> {
  const out: Array<{ instrument: InstrumentDescriptor; snapshot: IndicatorSnapshot }> = [];
  for (const instrument of market.universe) {
    const bars = market.histories.get(instrument.code) ?? [];
    if (lastIndexOnOrBefore(bars, date) + 1 < config.minDataDays) {
      continue;
    }
    const result = computeIndicatorSnapshot(bars, date, config.indicators);
    if (!result.ok) {
      continue;
    }
    out.push({ instrument, snapshot: result.snapshot });
  }
  return out;
}

/**
 * Qualified candidates for `date`, best score first, at most `maxPositions`.
 *
 * Equal scores keep universe order.
 */
export function selectCandidates(
  date: IsoDate,
  strategy: Strategy,
  market: MarketView,
  config: SelectionConfig
): Candidate[] {
  const eligible = eligibleSnapshots(date, market, config);
  const candidates: Candidate[] = [];

  for (const { instrument, snapshot } of eligible) {
    if (!strategy.qualify(snapshot)) {
      continue;
    }
    const score = strategy.score(snapshot);
    if (score === null || !Number.isFinite(score)) {
      continue;
    }
    if (config.minScore !== undefined && score < config.minScore) {
      continue;
    }
    const price = snapshot.values.price;
    if (price === null || price === undefined) {
      continue;
    }
    candidates.push({
      code: instrument.code,
      name: instrument.name,
      score,
      price,
      indicators: snapshot.values,
    });
  }

  const selected = candidates.sort((a, b) => b.score - a.score).slice(0, config.maxPositions);

  logger.debug('Selection complete', {
    date,
    strategy: strategy.id,
    evaluated: eligible.length,
    qualified: candidates.length,
    selected: selected.map((c) => c.code),
  });

  return selected;
}
