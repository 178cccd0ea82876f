import { z } from 'zod';
import type { OptionSpec } from '../types/index.js';
import { integer } from '../core/coerce.js';
import { DEFAULT_CONFIG, DEFAULT_STRATEGY, DYNAMIC_WHITELIST } from '../constants.js';

/**
 * Options accepted before any subcommand
 */
export const globalArgsSchema = z.object({
  loglevel: z.number().int().min(0),
  logfile: z.string().optional(),
  // Always at least one entry after normalization (DEFAULT_CONFIG when none given)
  config: z.array(z.string()).min(1),
  datadir: z.string().optional(),
  strategy: z.string().min(1),
  strategyPath: z.string().optional(),
  dynamicWhitelist: z.number().int().optional(),
  dbUrl: z.string().optional(),
  sdNotify: z.boolean(),
});

export type GlobalArgs = z.infer<typeof globalArgsSchema>;

export function globalOptions(): OptionSpec<keyof GlobalArgs>[] {
  return [
    {
      kind: 'count',
      flags: ['-v', '--verbose'],
      dest: 'loglevel',
      help: 'Verbose mode (-vv for more, -vvv to get all messages)',
    },
    {
      kind: 'value',
      flags: ['--logfile'],
      dest: 'logfile',
      metavar: 'FILE',
      help: 'Log to the file specified',
    },
    {
      kind: 'append',
      flags: ['-c', '--config'],
      dest: 'config',
      metavar: 'PATH',
      fallback: [DEFAULT_CONFIG],
      help: `Specify configuration file (default: ${DEFAULT_CONFIG}). Multiple --config options may be used`,
    },
    {
      kind: 'value',
      flags: ['-d', '--datadir'],
      dest: 'datadir',
      metavar: 'PATH',
      help: 'Path to backtest data',
    },
    {
      kind: 'value',
      flags: ['-s', '--strategy'],
      dest: 'strategy',
      metavar: 'NAME',
      default: DEFAULT_STRATEGY,
      help: 'Specify strategy class name',
    },
    {
      kind: 'value',
      flags: ['--strategy-path'],
      dest: 'strategyPath',
      metavar: 'PATH',
      help: 'Specify additional strategy lookup path',
    },
    {
      kind: 'optional-value',
      flags: ['--dynamic-whitelist'],
      dest: 'dynamicWhitelist',
      metavar: 'INT',
      preset: String(DYNAMIC_WHITELIST),
      convert: integer,
      help: `Dynamically generate and update whitelist based on 24h BaseVolume (default: ${DYNAMIC_WHITELIST}). DEPRECATED`,
    },
    {
      kind: 'value',
      flags: ['--db-url'],
      dest: 'dbUrl',
      metavar: 'PATH',
      help: 'Override trades database URL, useful with dry_run or custom deployments',
    },
    {
      kind: 'flag',
      flags: ['--sd-notify'],
      dest: 'sdNotify',
      store: true,
      help: 'Notify systemd service manager',
    },
  ];
}
