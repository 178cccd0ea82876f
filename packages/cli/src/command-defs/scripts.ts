import { z } from 'zod';
import type { OptionSpec } from '../types/index.js';
import { integer } from '../core/coerce.js';
import { DEFAULT_EXCHANGE, DOWNLOAD_TIMEFRAMES } from '../constants.js';
import { globalArgsSchema } from './global.js';
import { optimizerSharedArgsSchema } from './optimize.js';

/**
 * Options of the plotting scripts
 */
export const scriptsArgsSchema = z.object({
  // comma-separated, e.g. "ETH/BTC,XRP/BTC"
  pairs: z.string().optional(),
});

/**
 * Options of the historical data download script. It takes its own
 * --config and none of the global options.
 */
export const downloadDataArgsSchema = z.object({
  pairsFile: z.string().optional(),
  export: z.string().optional(),
  config: z.array(z.string()).optional(),
  days: z.number().int().optional(),
  exchange: z.string().min(1),
  timeframes: z.array(z.enum(DOWNLOAD_TIMEFRAMES)).min(1),
  erase: z.boolean(),
});

export const plotArgsSchema = globalArgsSchema
  .merge(optimizerSharedArgsSchema)
  .merge(scriptsArgsSchema)
  .extend({ subparser: z.undefined() });

export const downloadArgsSchema = downloadDataArgsSchema.extend({ subparser: z.undefined() });

export type PlotArgs = z.infer<typeof plotArgsSchema>;
export type DownloadDataArgs = z.infer<typeof downloadArgsSchema>;

export function scriptsOptions(): OptionSpec<keyof z.infer<typeof scriptsArgsSchema>>[] {
  return [
    {
      kind: 'value',
      flags: ['-p', '--pairs'],
      dest: 'pairs',
      metavar: 'PAIRS',
      help: 'Show profits for only these pairs. Pairs are comma-separated',
    },
  ];
}

export function downloadDataOptions(): OptionSpec<keyof z.infer<typeof downloadDataArgsSchema>>[] {
  return [
    {
      kind: 'value',
      flags: ['--pairs-file'],
      dest: 'pairsFile',
      metavar: 'PATH',
      help: 'File containing a list of pairs to download',
    },
    {
      kind: 'value',
      flags: ['--export'],
      dest: 'export',
      metavar: 'PATH',
      help: 'Export files to given dir',
    },
    {
      kind: 'append',
      flags: ['-c', '--config'],
      dest: 'config',
      metavar: 'PATH',
      help: 'Specify configuration file. Multiple --config options may be used',
    },
    {
      kind: 'value',
      flags: ['--days'],
      dest: 'days',
      metavar: 'INT',
      convert: integer,
      help: 'Download data for given number of days',
    },
    {
      kind: 'value',
      flags: ['--exchange'],
      dest: 'exchange',
      metavar: 'NAME',
      default: DEFAULT_EXCHANGE,
      help: 'Exchange name. Only valid if no config is provided',
    },
    {
      kind: 'variadic',
      flags: ['-t', '--timeframes'],
      dest: 'timeframes',
      metavar: 'TIMEFRAME',
      choices: DOWNLOAD_TIMEFRAMES,
      default: ['1m', '5m'],
      help: 'Specify which tickers to download. Space separated list',
    },
    {
      kind: 'flag',
      flags: ['--erase'],
      dest: 'erase',
      store: true,
      help: 'Clean all existing data for the selected exchange/pairs/timeframes',
    },
  ];
}
