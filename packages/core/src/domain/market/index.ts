/**
 * Market data domain
 */

import { z } from 'zod';
import { isIsoDate } from '../../time/dates.js';

export const IsoDateSchema = z
  .string()
  .refine(isIsoDate, { message: 'Expected a calendar date in YYYY-MM-DD form' });

/**
 * One instrument, one trading day
 */
export const PriceBarSchema = z
  .object({
    date: IsoDateSchema,
    open: z.number().finite().nonnegative(),
    high: z.number().finite().nonnegative(),
    low: z.number().finite().nonnegative(),
    close: z.number().finite().positive(),
    volume: z.number().finite().nonnegative(),
  })
  .refine((bar) => bar.high >= bar.low, { message: 'high must be >= low', path: ['high'] });

export type PriceBar = z.infer<typeof PriceBarSchema>;

export const InstrumentDescriptorSchema = z.object({
  code: z.string().min(1),
  name: z.string(),
  attributes: z.record(z.union([z.string(), z.number(), z.boolean()])).optional(),
});

export type InstrumentDescriptor = Readonly<z.infer<typeof InstrumentDescriptorSchema>>;

/**
 * Index of the last bar dated on or before `date`, or -1 when every bar is later.
 * Bars must be in strictly increasing date order.
 */
export function lastIndexOnOrBefore(bars: readonly PriceBar[], date: string): number {
  let lo = 0;
  let hi = bars.length - 1;
  let found = -1;
  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    if (bars[mid].date <= date) {
      found = mid;
      lo = mid + 1;
    } else {
      hi = mid - 1;
    }
  }
  return found;
}

/**
 * The causal prefix of a history: every bar dated on or before `date`
 */
export function barsOnOrBefore(bars: readonly PriceBar[], date: string): readonly PriceBar[] {
  const index = lastIndexOnOrBefore(bars, date);
  return index === bars.length - 1 ? bars : bars.slice(0, index + 1);
}

/**
 * Latest close dated on or before `date`, or null when none exists
 */
export function latestCloseOnOrBefore(bars: readonly PriceBar[], date: string): number | null {
  const index = lastIndexOnOrBefore(bars, date);
  return index === -1 ? null : bars[index].close;
}
