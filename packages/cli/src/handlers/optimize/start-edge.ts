import type { EdgeArgs } from '../../command-defs/optimize.js';
import { createRunRequest, type RunRequest } from './run-request.js';

export interface EdgeSettings {
  stoplossRange?: string;
  maxOpenTrades?: number;
  stakeAmount?: number;
  refreshPairs: boolean;
}

export function startEdge(args: EdgeArgs): RunRequest<EdgeSettings> {
  return createRunRequest('edge', args, {
    stoplossRange: args.stoplossRange,
    maxOpenTrades: args.maxOpenTrades,
    stakeAmount: args.stakeAmount,
    refreshPairs: args.refreshPairs,
  });
}
