/**
 * Rebalance calendar
 */

import type { DateTime } from 'luxon';
import { parseIsoDate, toIsoDate, type IsoDate, type RebalanceFrequency } from '@rebalancer/core';
import { ConfigurationError } from '@rebalancer/utils';

const PERIOD_UNIT: Readonly<Record<RebalanceFrequency, 'month' | 'quarter' | 'year'>> = {
  M: 'month',
  Q: 'quarter',
  Y: 'year',
};

const PERIOD_STEP = {
  M: { months: 1 },
  Q: { quarters: 1 },
  Y: { years: 1 },
} as const;

export interface DateRange {
  start: DateTime;
  end: DateTime;
}

/**
 * Parse and order-check a backtest window
 *
 * @throws ConfigurationError for a malformed date or an end before the start
 */
export function parseDateRange(startDate: string, endDate: string): DateRange {
  const start = parseIsoDate(startDate);
  if (!start) {
    throw new ConfigurationError(`Invalid start date '${startDate}'; expected YYYY-MM-DD`, 'startDate');
  }
  const end = parseIsoDate(endDate);
  if (!end) {
    throw new ConfigurationError(`Invalid end date '${endDate}'; expected YYYY-MM-DD`, 'endDate');
  }
  if (end.toMillis() < start.toMillis()) {
    throw new ConfigurationError(`End date ${endDate} is before start date ${startDate}`, 'endDate', {
      startDate,
      endDate,
    });
  }
  return { start, end };
}

/**
 * First calendar day of every month, quarter (Jan/Apr/Jul/Oct) or year inside
 * [startDate, endDate], both ends inclusive. Dates are calendar dates; they
 * need not be trading days.
 */
export function generateRebalanceDates(startDate: string, endDate: string, frequency: RebalanceFrequency): IsoDate[] {
  const { start, end } = parseDateRange(startDate, endDate);
  const unit = PERIOD_UNIT[frequency];
  const step = PERIOD_STEP[frequency];

  let cursor = start.startOf(unit);
  if (cursor.toMillis() < start.toMillis()) {
    cursor = cursor.plus(step);
  }

  const dates: IsoDate[] = [];
  while (cursor.toMillis() <= end.toMillis()) {
    dates.push(toIsoDate(cursor));
    cursor = cursor.plus(step);
  }
  return dates;
}
