/**
 * Value Coercion Helpers
 *
 * Commander hands option values over as strings; these turn them into the
 * numbers the run options expect.
 */

import { ValidationError } from '@gcmrun/utils';

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
  if (typeof v === 'string' && v.trim() !== '') {
    const n = Number(v);
    if (!Number.isFinite(n))
      throw new ValidationError(`Invalid number for ${name}`, { name, value: v });
    return n;
  }
  throw new ValidationError(`Invalid number for ${name}`, { name, value: v });
}

/**
 * Commander argument parser accepting integers >= 1
 */
export function positiveIntOption(name: string): (value: string) => number {
  return (value) => {
    const n = coerceNumber(value, name);
    if (n === undefined || !Number.isInteger(n) || n < 1) {
      throw new ValidationError(`${name} must be a positive integer`, { name, value });
    }
    return n;
  };
}
