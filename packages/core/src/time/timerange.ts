/**
 * Time range resolution
 *
 * Turns the compact `--timerange` expression into a typed start/stop range
 * for historical data selection. Supported forms:
 *
 *   -20180101            up to a calendar day (UTC midnight)
 *   20180101-            from a calendar day
 *   20180101-20180201    between two calendar days
 *   -1525132800          up to an epoch timestamp (seconds)
 *   1525132800-          from an epoch timestamp
 *   1525132800-1527811200
 *   -200                 the last 200 lines
 *   100-                 from line 100 on
 *   10-50                dataset index span
 */

import { DateTime } from 'luxon';
import { ParseError } from '../errors.js';

export type TimeRangeBound = 'none' | 'date' | 'line' | 'index';

export interface TimeRange {
  readonly startType: TimeRangeBound;
  readonly stopType: TimeRangeBound;
  /** Epoch seconds, line number or index; 0 when startType is 'none' */
  readonly startTs: number;
  /** Epoch seconds, line offset or index; 0 when stopType is 'none' */
  readonly stopTs: number;
}

interface TimeRangeRule {
  readonly pattern: RegExp;
  readonly startType: TimeRangeBound;
  readonly stopType: TimeRangeBound;
}

/**
 * Checked top to bottom, first match wins.
 *
 * The fixed-width date and timestamp forms must stay ahead of the open
 * `\d+` forms: an 8 or 10 digit number is always a date, never a line or index.
 */
const TIMERANGE_RULES: readonly TimeRangeRule[] = [
  { pattern: /^-(\d{8})$/, startType: 'none', stopType: 'date' },
  { pattern: /^(\d{8})-$/, startType: 'date', stopType: 'none' },
  { pattern: /^(\d{8})-(\d{8})$/, startType: 'date', stopType: 'date' },
  { pattern: /^-(\d{10})$/, startType: 'none', stopType: 'date' },
  { pattern: /^(\d{10})-$/, startType: 'date', stopType: 'none' },
  { pattern: /^(\d{10})-(\d{10})$/, startType: 'date', stopType: 'date' },
  { pattern: /^(-\d+)$/, startType: 'none', stopType: 'line' },
  { pattern: /^(\d+)-$/, startType: 'line', stopType: 'none' },
  { pattern: /^(\d+)-(\d+)$/, startType: 'index', stopType: 'index' },
];

const UNBOUNDED: TimeRange = Object.freeze({
  startType: 'none',
  stopType: 'none',
  startTs: 0,
  stopTs: 0,
});

/**
 * Convert one captured bound. Eight digit dates are calendar days in UTC,
 * anything else is taken as a literal integer, which must fit a safe integer.
 */
function boundValue(type: TimeRangeBound, raw: string, input: string): number {
  if (type === 'date' && raw.length === 8) {
    const day = DateTime.fromFormat(raw, 'yyyyMMdd', { zone: 'utc' });
    if (!day.isValid) {
      throw new ParseError(`Invalid date "${raw}" in timerange "${input}"`, input);
    }
    return day.toSeconds();
  }

  const value = Number.parseInt(raw, 10);
  if (!Number.isSafeInteger(value)) {
    throw new ParseError(`Value "${raw}" in timerange "${input}" is out of range`, input);
  }
  // "-0" is a line offset of 0, not negative zero
  return value === 0 ? 0 : value;
}

/**
 * Resolve a `--timerange` value.
 *
 * @param text - raw option value; undefined means no restriction
 * @throws ParseError when the text matches none of the supported forms
 */
export function resolveTimeRange(text: string | undefined): TimeRange {
  if (text === undefined) {
    return UNBOUNDED;
  }

  for (const rule of TIMERANGE_RULES) {
    const match = rule.pattern.exec(text);
    if (!match) continue;

    const groups = match.slice(1);
    let index = 0;
    let startTs = 0;
    let stopTs = 0;

    if (rule.startType !== 'none') {
      startTs = boundValue(rule.startType, groups[index] ?? '', text);
      index += 1;
    }
    if (rule.stopType !== 'none') {
      stopTs = boundValue(rule.stopType, groups[index] ?? '', text);
    }

    return Object.freeze({
      startType: rule.startType,
      stopType: rule.stopType,
      startTs,
      stopTs,
    });
  }

  throw new ParseError(`Incorrect syntax for timerange "${text}"`, text);
}

/**
 * True when neither side of the range restricts the data
 */
export function isUnbounded(range: TimeRange): boolean {
  return range.startType === 'none' && range.stopType === 'none';
}
