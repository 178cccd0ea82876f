/**
 * Value Converters
 *
 * Plugged into option parsing to turn a raw token into a typed value.
 * Each throws ValidationError with a message that names the offending input.
 */

import { ValidationError } from '@tradekit/utils';

const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

/**
 * Parse a base-10 integer. Rejects fractions, exponents and empty input.
 */
export function integer(raw: string): number {
  if (!INTEGER_PATTERN.test(raw)) {
    throw new ValidationError(`${raw} is not a valid integer value`, { value: raw });
  }
  return Number.parseInt(raw, 10);
}

/**
 * Parse a finite decimal number
 */
export function float(raw: string): number {
  const n = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(n)) {
    throw new ValidationError(`${raw} is not a valid number`, { value: raw });
  }
  return n;
}

/**
 * Parse an integer that must be strictly greater than zero
 */
export function positiveInt(raw: string): number {
  if (INTEGER_PATTERN.test(raw)) {
    const value = Number.parseInt(raw, 10);
    if (value > 0) {
      return value;
    }
  }
  throw new ValidationError(
    `${raw} is invalid for this parameter, should be a positive integer value`,
    { value: raw }
  );
}
