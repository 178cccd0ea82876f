import type { BacktestingArgs } from '../../command-defs/optimize.js';
import { createRunRequest, type RunRequest } from './run-request.js';

export interface BacktestingSettings {
  positionStacking: boolean;
  useMaxMarketPositions: boolean;
  live: boolean;
  strategyList?: string[];
  maxOpenTrades?: number;
  stakeAmount?: number;
  refreshPairs: boolean;
  export?: string;
  exportfilename: string;
}

export function startBacktesting(args: BacktestingArgs): RunRequest<BacktestingSettings> {
  return createRunRequest('backtesting', args, {
    positionStacking: args.positionStacking,
    useMaxMarketPositions: args.useMaxMarketPositions,
    live: args.live,
    strategyList: args.strategyList,
    maxOpenTrades: args.maxOpenTrades,
    stakeAmount: args.stakeAmount,
    refreshPairs: args.refreshPairs,
    export: args.export,
    exportfilename: args.exportfilename,
  });
}
