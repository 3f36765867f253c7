/**
 * Value Coercion Helpers
 *
 * These functions coerce values (JSON/numbers) but NEVER rename keys.
 * Use these in defineCommand's coerce() function.
 */

import { ValidationError } from '@rebalancer/utils';

function isString(x: unknown): x is string {
  return typeof x === 'string';
}

/**
 * Coerce a value to a JSON-parsed value
 * Accepts:
 * - JSON string: '{"minMomentum5d":0.02}'
 * - Anything already parsed is returned as-is
 * - undefined/null returns undefined
 */
export function coerceJson(v: unknown, name: string): unknown {
  if (v === null || v === undefined) return undefined;
  if (!isString(v)) return v;
  try {
    const parsed: unknown = JSON.parse(v);
    return parsed;
  } catch (e) {
    const preview = v.length > 80 ? `${v.substring(0, 80)}...` : v;
    throw new ValidationError(`Invalid JSON for ${name}: ${e instanceof Error ? e.message : String(e)}`, {
      name,
      input: preview,
    });
  }
}

/**
 * Coerce a value to a number
 * Accepts:
 * - Number: returns as-is
 * - String number: '123' -> 123
 * - undefined/null returns undefined
 */
export function coerceNumber(v: unknown, name: string): number | undefined {
  if (v === null || v === undefined) return undefined;
  if (typeof v === 'number') return v;
  if (isString(v) && v.trim() !== '') {
    const n = Number(v);
    if (!Number.isFinite(n)) throw new ValidationError(`Invalid number for ${name}`, { name, value: v });
    return n;
  }
  throw new ValidationError(`Invalid number for ${name}`, { name, value: v });
}
