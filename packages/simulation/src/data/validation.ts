/**
 * Price history validation
 * ========================
 */

import { PriceBarSchema, type InstrumentDescriptor, type PriceBar } from '@rebalancer/core';
import { ValidationError } from '@rebalancer/utils';

/**
 * Check every bar against the schema and the series for strictly increasing dates.
 *
 * @throws ValidationError naming the instrument and the first bad row
 */
export function validatePriceHistory(code: string, bars: readonly unknown[]): PriceBar[] {
  const out: PriceBar[] = [];
  for (let i = 0; i < bars.length; i++) {
    const parsed = PriceBarSchema.safeParse(bars[i]);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ValidationError(`Invalid price bar for ${code} at row ${i}: ${issue.path.join('.')} ${issue.message}`, {
        code,
        row: i,
        field: issue.path.join('.'),
      });
    }
    const bar = parsed.data;
    const prev = out.length > 0 ? out[out.length - 1] : undefined;
    if (prev && bar.date <= prev.date) {
      throw new ValidationError(
        bar.date === prev.date
          ? `Duplicate date ${bar.date} in price history for ${code}`
          : `Price history for ${code} is out of order at ${bar.date}`,
        { code, row: i, date: bar.date, previousDate: prev.date }
      );
    }
    out.push(bar);
  }
  return out;
}

export interface DataQualityIssue {
  code: string;
  issue: 'missing_history' | 'empty_history';
}

/**
 * Instruments in the universe with no usable history
 */
export function auditDataQuality(
  universe: readonly InstrumentDescriptor[],
  histories: ReadonlyMap<string, readonly PriceBar[]>
): DataQualityIssue[] {
  const issues: DataQualityIssue[] = [];
  for (const { code } of universe) {
    const bars = histories.get(code);
    if (bars === undefined) {
      issues.push({ code, issue: 'missing_history' });
    } else if (bars.length === 0) {
      issues.push({ code, issue: 'empty_history' });
    }
  }
  return issues;
}
