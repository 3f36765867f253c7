import type { IsoDate } from '@rebalancer/core';
import type { BacktestConfig } from '../config.js';
import { getIndicator } from '../indicators/base.js';
import { eligibleSnapshots, type MarketView } from './selection.js';

export interface InstrumentRanking {
  code: string;
  name: string;
  /** Indicator → rank, 1 for the highest value; null when the value is not computable */
  ranks: Record<string, number | null>;
}

/**
 * Descending ranks with ties sharing the average of the positions they span
 */
export function averageRanksDescending(values: readonly (number | null)[]): Array<number | null> {
  const order = values
    .map((value, index) => ({ value, index }))
    .filter((e): e is { value: number; index: number } => e.value !== null)
    .sort((a, b) => b.value - a.value || a.index - b.index);

  const ranks: Array<number | null> = values.map(() => null);
  let i = 0;
  while (i < order.length) {
    let j = i;
    while (j + 1 < order.length && order[j + 1].value === order[i].value) {
      j++;
    }
    const rank = (i + 1 + (j + 1)) / 2;
    for (let k = i; k <= j; k++) {
      ranks[order[k].index] = rank;
    }
    i = j + 1;
  }
  return ranks;
}

/**
 * Rank every instrument with a snapshot on `date` by each indicator
 */
export function rankUniverse(
  date: IsoDate,
  factors: readonly string[],
  market: MarketView,
  config: Pick<BacktestConfig, 'minDataDays' | 'indicators'>
): InstrumentRanking[] {
  const eligible = eligibleSnapshots(date, market, config);
  const rankings: InstrumentRanking[] = eligible.map(({ instrument }) => ({
    code: instrument.code,
    name: instrument.name,
    ranks: {},
  }));

  for (const factor of factors) {
    const ranks = averageRanksDescending(eligible.map(({ snapshot }) => getIndicator(snapshot, factor)));
    ranks.forEach((rank, i) => {
      rankings[i].ranks[factor] = rank;
    });
  }

  return rankings;
}
