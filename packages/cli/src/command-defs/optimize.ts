import { z } from 'zod';
import type { OptionSpec } from '../types/index.js';
import { float, integer, positiveInt } from '../core/coerce.js';
import {
  DEFAULT_EXPORT_FILENAME,
  DEFAULT_HYPEROPT,
  HYPEROPT_EPOCH,
  HYPEROPT_SPACES,
} from '../constants.js';
import { globalArgsSchema } from './global.js';

/**
 * Options common to backtesting, edge and hyperopt
 */
export const optimizerSharedArgsSchema = z.object({
  tickerInterval: z.string().optional(),
  timerange: z.string().optional(),
  maxOpenTrades: z.number().int().optional(),
  stakeAmount: z.number().optional(),
  refreshPairs: z.boolean(),
});

export const backtestingOnlyArgsSchema = z.object({
  positionStacking: z.boolean(),
  useMaxMarketPositions: z.boolean(),
  live: z.boolean(),
  strategyList: z.array(z.string()).min(1).optional(),
  export: z.string().optional(),
  exportfilename: z.string(),
});

export const edgeOnlyArgsSchema = z.object({
  // "min,max,step", parsed by the edge engine
  stoplossRange: z.string().optional(),
});

export const hyperoptOnlyArgsSchema = z.object({
  hyperopt: z.string().min(1),
  positionStacking: z.boolean(),
  useMaxMarketPositions: z.boolean(),
  epochs: z.number().int(),
  spaces: z.array(z.enum(HYPEROPT_SPACES)).min(1),
  printAll: z.boolean(),
  hyperoptJobs: z.number().int(),
  hyperoptRandomState: z.number().int().positive().optional(),
});

export const backtestingArgsSchema = globalArgsSchema
  .merge(optimizerSharedArgsSchema)
  .merge(backtestingOnlyArgsSchema)
  .extend({ subparser: z.literal('backtesting') });

export const edgeArgsSchema = globalArgsSchema
  .merge(optimizerSharedArgsSchema)
  .merge(edgeOnlyArgsSchema)
  .extend({ subparser: z.literal('edge') });

export const hyperoptArgsSchema = globalArgsSchema
  .merge(optimizerSharedArgsSchema)
  .merge(hyperoptOnlyArgsSchema)
  .extend({ subparser: z.literal('hyperopt') });

export const noCommandArgsSchema = globalArgsSchema.extend({ subparser: z.undefined() });

/**
 * Full parse result of the main program: global options alone, or global
 * options plus everything the selected subcommand accepts
 */
export const optimizeArgsSchema = z.union([
  noCommandArgsSchema,
  backtestingArgsSchema,
  edgeArgsSchema,
  hyperoptArgsSchema,
]);

export type OptimizerSharedArgs = z.infer<typeof optimizerSharedArgsSchema>;
export type BacktestingArgs = z.infer<typeof backtestingArgsSchema>;
export type EdgeArgs = z.infer<typeof edgeArgsSchema>;
export type HyperoptArgs = z.infer<typeof hyperoptArgsSchema>;
export type OptimizeArgs = z.infer<typeof optimizeArgsSchema>;

export function optimizerSharedOptions(): OptionSpec<keyof OptimizerSharedArgs>[] {
  return [
    {
      kind: 'value',
      flags: ['-i', '--ticker-interval'],
      dest: 'tickerInterval',
      metavar: 'INTERVAL',
      help: 'Specify ticker interval (1m, 5m, 30m, 1h, 1d)',
    },
    {
      kind: 'value',
      flags: ['--timerange'],
      dest: 'timerange',
      metavar: 'RANGE',
      help: 'Specify what timerange of data to use',
    },
    {
      kind: 'value',
      flags: ['--max_open_trades'],
      dest: 'maxOpenTrades',
      metavar: 'INT',
      convert: integer,
      help: 'Specify max_open_trades to use',
    },
    {
      kind: 'value',
      flags: ['--stake_amount'],
      dest: 'stakeAmount',
      metavar: 'FLOAT',
      convert: float,
      help: 'Specify stake_amount',
    },
    {
      kind: 'flag',
      flags: ['-r', '--refresh-pairs-cached'],
      dest: 'refreshPairs',
      store: true,
      help:
        'Refresh the cached pair files with the latest data from the exchange. ' +
        'Use it to run optimization commands with up-to-date data',
    },
  ];
}

function positionStackingOption(): OptionSpec<'positionStacking'> {
  return {
    kind: 'flag',
    flags: ['--eps', '--enable-position-stacking'],
    dest: 'positionStacking',
    store: true,
    help: 'Allow buying the same pair multiple times (position stacking)',
  };
}

function maxMarketPositionsOption(): OptionSpec<'useMaxMarketPositions'> {
  return {
    kind: 'flag',
    flags: ['--dmmp', '--disable-max-market-positions'],
    dest: 'useMaxMarketPositions',
    store: false,
    help:
      'Disable applying `max_open_trades` during backtest ' +
      '(same as setting `max_open_trades` to a very high number)',
  };
}

export function backtestingOptions(): OptionSpec<keyof z.infer<typeof backtestingOnlyArgsSchema>>[] {
  return [
    positionStackingOption(),
    maxMarketPositionsOption(),
    {
      kind: 'flag',
      flags: ['-l', '--live'],
      dest: 'live',
      store: true,
      help: 'Use live data',
    },
    {
      kind: 'variadic',
      flags: ['--strategy-list'],
      dest: 'strategyList',
      metavar: 'NAME',
      help:
        'Space separated list of strategies to backtest. The ticker interval must be set ' +
        'in the config or with --ticker-interval. Combined with --export trades, the ' +
        'strategy name is injected into the export filename',
    },
    {
      kind: 'value',
      flags: ['--export'],
      dest: 'export',
      metavar: 'MODE',
      help: 'Export backtest results, argument are: trades. Example --export=trades',
    },
    {
      kind: 'value',
      flags: ['--export-filename'],
      dest: 'exportfilename',
      metavar: 'PATH',
      default: DEFAULT_EXPORT_FILENAME,
      help: 'Save backtest results to this filename, requires --export to be set as well',
    },
  ];
}

export function edgeOptions(): OptionSpec<keyof z.infer<typeof edgeOnlyArgsSchema>>[] {
  return [
    {
      kind: 'value',
      flags: ['--stoplosses'],
      dest: 'stoplossRange',
      metavar: 'RANGE',
      help:
        'Range of stoploss values edge assesses the strategy against, ' +
        'formatted "min,max,step" without spaces. Example: --stoplosses=-0.01,-0.1,-0.001',
    },
  ];
}

export function hyperoptOptions(): OptionSpec<keyof z.infer<typeof hyperoptOnlyArgsSchema>>[] {
  return [
    {
      kind: 'value',
      flags: ['--customhyperopt'],
      dest: 'hyperopt',
      metavar: 'NAME',
      default: DEFAULT_HYPEROPT,
      help: 'Specify hyperopt class name',
    },
    positionStackingOption(),
    maxMarketPositionsOption(),
    {
      kind: 'value',
      flags: ['-e', '--epochs'],
      dest: 'epochs',
      metavar: 'INT',
      default: HYPEROPT_EPOCH,
      convert: integer,
      help: 'Specify number of epochs',
    },
    {
      kind: 'variadic',
      flags: ['-s', '--spaces'],
      dest: 'spaces',
      metavar: 'SPACE',
      choices: HYPEROPT_SPACES,
      default: ['all'],
      help: 'Specify which parameters to hyperopt. Space separated list',
    },
    {
      kind: 'flag',
      flags: ['--print-all'],
      dest: 'printAll',
      store: true,
      help: 'Print all results, not only the best ones',
    },
    {
      kind: 'value',
      flags: ['-j', '--job-workers'],
      dest: 'hyperoptJobs',
      metavar: 'JOBS',
      default: -1,
      convert: integer,
      help:
        'Number of concurrently running hyperopt worker processes. -1 uses all CPUs, ' +
        '-2 all CPUs but one, and so on. 1 disables parallel execution',
    },
    {
      kind: 'value',
      flags: ['--random-state'],
      dest: 'hyperoptRandomState',
      metavar: 'INT',
      convert: positiveInt,
      help: 'Set random state to some positive integer for reproducible hyperopt results',
    },
  ];
}
