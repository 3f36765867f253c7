/**
 * Standard Command Wrapper
 *
 * - Commander owns flags & parsing
 * - Wrapper owns: value coercion, schema validation, handler invocation,
 *   output formatting and error routing
 *
 * Invariant: coercion never renames keys. Commander already gives camelCase.
 */

import type { Command } from 'commander';
import type { z } from 'zod';
import type { CliIO } from '../types/index.js';
import { parseArguments } from './argument-parser.js';

export interface DefineCommandArgs<S extends z.ZodTypeAny, R> {
  schema: S;
  /** Value coercion only (JSON/numbers), never key renaming */
  coerce?: (raw: Record<string, unknown>) => Record<string, unknown>;
  handler: (args: z.output<S>) => Promise<R> | R;
  format: (result: R, args: z.output<S>) => string;
  io: CliIO;
}

export function defineCommand<S extends z.ZodTypeAny, R>(cmd: Command, def: DefineCommandArgs<S, R>): Command {
  cmd.action(async () => {
    try {
      const rawOpts = cmd.opts();
      const coerced = def.coerce ? def.coerce(rawOpts) : rawOpts;
      const args = parseArguments(def.schema, coerced);
      const result = await def.handler(args);
      def.io.write(`${def.format(result, args)}\n`);
    } catch (error) {
      def.io.onError(error);
    }
  });

  return cmd;
}
