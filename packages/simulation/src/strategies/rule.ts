/**
 * Rule Strategy
 * =============
 * Declarative strategy: a conjunction of indicator comparisons plus a
 * weighted linear score. Loadable from a config file.
 */

import { z } from 'zod';
import { getIndicator, type IndicatorSnapshot } from '../indicators/base.js';
import { defineStrategy, parseStrategyParams } from './define.js';
import type { Strategy } from './types.js';

export const ComparisonOperatorSchema = z.enum(['>', '>=', '<', '<=', '==', '!=']);
export type ComparisonOperator = z.infer<typeof ComparisonOperatorSchema>;

export const RuleConditionSchema = z
  .object({
    indicator: z.string().min(1),
    operator: ComparisonOperatorSchema,
    /** Compare against a constant */
    value: z.number().finite().optional(),
    /** Compare against another indicator of the same snapshot */
    otherIndicator: z.string().min(1).optional(),
  })
  .refine((c) => (c.value === undefined) !== (c.otherIndicator === undefined), {
    message: 'Exactly one of value or otherIndicator is required',
  });

export type RuleCondition = z.infer<typeof RuleConditionSchema>;

export const RuleStrategySchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().optional(),
  conditions: z.array(RuleConditionSchema).default([]),
  score: z
    .object({
      intercept: z.number().finite().default(0),
      /** Indicator name → coefficient */
      weights: z.record(z.number().finite()).default({}),
    })
    .default({}),
});

export type RuleStrategyParams = z.infer<typeof RuleStrategySchema>;
export type RuleStrategyInput = z.input<typeof RuleStrategySchema>;

export function compare(left: number, operator: ComparisonOperator, right: number): boolean {
  switch (operator) {
    case '>':
      return left > right;
    case '>=':
      return left >= right;
    case '<':
      return left < right;
    case '<=':
      return left <= right;
    case '==':
      return left === right;
    case '!=':
      return left !== right;
  }
}

/**
 * A condition whose operands are not computable is not satisfied
 */
export function evaluateCondition(condition: RuleCondition, snapshot: IndicatorSnapshot): boolean {
  const left = getIndicator(snapshot, condition.indicator);
  const right =
    condition.otherIndicator !== undefined
      ? getIndicator(snapshot, condition.otherIndicator)
      : (condition.value ?? null);
  if (left === null || right === null) {
    return false;
  }
  return compare(left, condition.operator, right);
}

function formatCondition(c: RuleCondition): string {
  return `${c.indicator} ${c.operator} ${c.otherIndicator ?? String(c.value)}`;
}

export function createRuleStrategy(input: RuleStrategyInput): Strategy<RuleStrategyParams> {
  const params = parseStrategyParams(RuleStrategySchema, input, input.id || 'rule');
  return defineStrategy({
    id: params.id,
    name: params.name,
    params,
    qualify: (snapshot, p) => p.conditions.every((c) => evaluateCondition(c, snapshot)),
    score: (snapshot, p) => {
      let total = p.score.intercept;
      for (const [name, weight] of Object.entries(p.score.weights)) {
        const value = getIndicator(snapshot, name);
        if (value === null) {
          return null;
        }
        total += weight * value;
      }
      return total;
    },
    describe: (p) =>
      [
        p.description ?? p.name,
        ...p.conditions.map((c) => `  ${formatCondition(c)}`),
        `  score = ${[String(p.score.intercept), ...Object.entries(p.score.weights).map(([k, w]) => `${w}·${k}`)].join(' + ')}`,
      ].join('\n'),
  });
}
