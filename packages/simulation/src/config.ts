import { z } from 'zod';
import { ConfigurationError } from '@rebalancer/utils';
import { RebalanceFrequencySchema } from '@rebalancer/core';

/**
 * Backtest configuration schemas.
 *
 * Every tunable lives here with its default. Components receive the parsed
 * struct at construction and never read module-level settings.
 */

export const CostConfigSchema = z.object({
  /** Commission as a fraction of notional, charged on both sides */
  commissionRate: z.number().min(0).max(0.1).default(0.0003),
  /** Flat commission floor per trade */
  minCommission: z.number().min(0).default(5),
  /** Stamp tax as a fraction of notional, sells only */
  stampTaxRate: z.number().min(0).max(0.1).default(0.001),
});

export type CostConfig = z.infer<typeof CostConfigSchema>;

const periodSchema = z.number().int().min(1).max(1_000);

export const IndicatorConfigSchema = z
  .object({
    /** Minimum bars required before any snapshot is produced */
    lookbackDays: z.number().int().min(1).default(60),
    maPeriods: z.array(periodSchema).nonempty().default([5, 10, 20, 60]),
    rsiPeriod: periodSchema.default(14),
    macdFast: periodSchema.default(12),
    macdSlow: periodSchema.default(26),
    macdSignal: periodSchema.default(9),
    bbPeriod: z.number().int().min(2).max(1_000).default(20),
    bbStdDev: z.number().positive().default(2),
    momentumPeriods: z.array(periodSchema).nonempty().default([5, 10, 20, 60]),
    /** Rate-of-change horizon, reported in percent */
    rocPeriod: periodSchema.default(10),
    volatilityWindow: z.number().int().min(2).max(1_000).default(20),
    atrPeriod: periodSchema.default(14),
    volumeWindow: periodSchema.default(20),
    pricePositionWindow: periodSchema.default(60),
    /** Window for 52-week high/low */
    yearWindow: periodSchema.default(252),
    /** Annualization constant for daily volatility */
    tradingDaysPerYear: z.number().positive().default(252),
  })
  .refine((c) => c.macdFast < c.macdSlow, {
    message: 'macdFast must be shorter than macdSlow',
    path: ['macdFast'],
  });

export type IndicatorConfig = z.infer<typeof IndicatorConfigSchema>;

export const BacktestConfigSchema = z.object({
  initialCapital: z.number().finite().positive().default(1_000_000),
  maxPositions: z.number().int().positive().default(6),
  costs: CostConfigSchema.default({}),
  /** Board lot: every trade is a positive multiple of this many shares */
  lotSize: z.number().int().positive().default(100),
  /** Fraction of valuation kept in cash at each rebalance */
  cashReserve: z.number().min(0).lt(1).default(0.1),
  /** Minimum bars on or before the rebalance date for an instrument to be considered */
  minDataDays: z.number().int().min(1).default(100),
  indicators: IndicatorConfigSchema.default({}),
  frequency: RebalanceFrequencySchema.default('Q'),
  /** Candidates scoring below this are dropped; unset keeps every qualified candidate */
  minScore: z.number().finite().optional(),
  /** Annual risk-free rate used by the Sharpe ratio */
  riskFreeRate: z.number().min(-1).max(1).default(0.03),
});

export type BacktestConfig = z.infer<typeof BacktestConfigSchema>;
export type BacktestConfigInput = z.input<typeof BacktestConfigSchema>;

/**
 * Parse and validate a backtest configuration.
 *
 * @throws ConfigurationError naming the first offending key
 */
export function parseBacktestConfig(input: unknown = {}): BacktestConfig {
  const result = BacktestConfigSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const configKey = issue.path.join('.');
    throw new ConfigurationError(`Invalid backtest configuration: ${configKey}: ${issue.message}`, configKey, {
      issues: result.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
    });
  }
  return result.data;
}

export function parseIndicatorConfig(input: unknown = {}): IndicatorConfig {
  const result = IndicatorConfigSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const configKey = `indicators.${issue.path.join('.')}`;
    throw new ConfigurationError(`Invalid indicator configuration: ${configKey}: ${issue.message}`, configKey);
  }
  return result.data;
}
