/**
 * @tradekit/core
 *
 * Foundational domain types shared by the command surface and the engines
 * that consume it. This package has zero dependencies on other @tradekit packages.
 */

export {
  resolveTimeRange,
  isUnbounded,
  type TimeRange,
  type TimeRangeBound,
} from './time/timerange.js';

export { ParseError } from './errors.js';
