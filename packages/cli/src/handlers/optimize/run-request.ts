/**
 * Run requests handed from the command surface to the optimize engines
 */

import { isUnbounded, resolveTimeRange, type TimeRange } from '@tradekit/core';
import { createLogger } from '@tradekit/utils';
import type { GlobalArgs } from '../../command-defs/global.js';
import type { OptimizerSharedArgs } from '../../command-defs/optimize.js';

const logger = createLogger('cli');

export type OptimizeMode = 'backtesting' | 'edge' | 'hyperopt';

export interface RunRequest<TSettings> {
  readonly mode: OptimizeMode;
  readonly strategy: string;
  readonly configFiles: readonly string[];
  readonly tickerInterval?: string;
  readonly timerange: TimeRange;
  readonly settings: Readonly<TSettings>;
}

/**
 * Resolve the time range and package the arguments an engine needs.
 *
 * @throws ParseError when --timerange matches none of the supported forms
 */
export function createRunRequest<TSettings>(
  mode: OptimizeMode,
  args: GlobalArgs & OptimizerSharedArgs,
  settings: TSettings
): RunRequest<TSettings> {
  const timerange = resolveTimeRange(args.timerange);

  const log = logger.child({ command: mode, strategy: args.strategy });
  log.info(`Starting ${mode}`, {
    config: args.config,
    timerange: isUnbounded(timerange) ? 'all data' : args.timerange,
  });
  log.debug('Run settings', { settings });

  return Object.freeze({
    mode,
    strategy: args.strategy,
    configFiles: Object.freeze([...args.config]),
    tickerInterval: args.tickerInterval,
    timerange,
    settings: Object.freeze(settings),
  });
}
