import { z } from 'zod';
import { IsoDateSchema, RebalanceFrequencySchema } from '@rebalancer/core';

export const outputFormatSchema = z.enum(['json', 'table']).default('table');

/**
 * Backtest run schema
 *
 * Values given here override the same keys from the config file.
 */
export const backtestRunSchema = z
  .object({
    data: z.string().min(1),
    universe: z.string().min(1),
    strategy: z.string().min(1),
    /** Strategy parameter overrides, validated by the strategy itself */
    params: z.record(z.unknown()).optional(),
    from: IsoDateSchema,
    to: IsoDateSchema,
    frequency: RebalanceFrequencySchema.optional(),
    config: z.string().min(1).optional(),
    capital: z.number().positive().optional(),
    maxPositions: z.number().int().positive().optional(),
    benchmark: z.number().min(-1).optional(),
    format: outputFormatSchema,
  })
  .refine((args) => args.from <= args.to, { message: 'from must not be after to', path: ['to'] });

export type BacktestRunArgs = z.infer<typeof backtestRunSchema>;
export type BacktestRunInput = z.input<typeof backtestRunSchema>;

export const strategyListSchema = z.object({
  format: outputFormatSchema,
});

export type StrategyListArgs = z.infer<typeof strategyListSchema>;
