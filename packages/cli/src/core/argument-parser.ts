/**
 * Argument Parser
 *
 * Validates commander options against a command's zod schema.
 */

import type { z } from 'zod';
import { ValidationError } from '@rebalancer/utils';

/**
 * @throws ValidationError listing every failing option
 */
export function parseArguments<S extends z.ZodTypeAny>(schema: S, rawArgs: Record<string, unknown>): z.output<S> {
  const result = schema.safeParse(rawArgs);
  if (!result.success) {
    const messages = result.error.issues.map((issue) => `  ${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError(`Invalid arguments:\n${messages.join('\n')}`, {
      issues: result.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
    });
  }
  return result.data;
}
