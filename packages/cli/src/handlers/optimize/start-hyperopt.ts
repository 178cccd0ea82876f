import type { HyperoptArgs } from '../../command-defs/optimize.js';
import { createRunRequest, type RunRequest } from './run-request.js';

export interface HyperoptSettings {
  hyperopt: string;
  epochs: number;
  spaces: HyperoptArgs['spaces'];
  positionStacking: boolean;
  useMaxMarketPositions: boolean;
  printAll: boolean;
  /** -1 all CPUs, -2 all but one, 1 no parallelism */
  jobs: number;
  randomState?: number;
  maxOpenTrades?: number;
  stakeAmount?: number;
  refreshPairs: boolean;
}

export function startHyperopt(args: HyperoptArgs): RunRequest<HyperoptSettings> {
  return createRunRequest('hyperopt', args, {
    hyperopt: args.hyperopt,
    epochs: args.epochs,
    spaces: args.spaces,
    positionStacking: args.positionStacking,
    useMaxMarketPositions: args.useMaxMarketPositions,
    printAll: args.printAll,
    jobs: args.hyperoptJobs,
    randomState: args.hyperoptRandomState,
    maxOpenTrades: args.maxOpenTrades,
    stakeAmount: args.stakeAmount,
    refreshPairs: args.refreshPairs,
  });
}
