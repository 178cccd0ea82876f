/**
 * Script schemas - single-purpose programs without subcommands
 */

import { SchemaRegistry, composeOptions } from '../core/command-registry.js';
import { globalOptions } from '../command-defs/global.js';
import { optimizerSharedOptions } from '../command-defs/optimize.js';
import {
  downloadArgsSchema,
  downloadDataOptions,
  plotArgsSchema,
  scriptsOptions,
  type DownloadDataArgs,
  type PlotArgs,
} from '../command-defs/scripts.js';
import { PROGRAM_NAME, VERSION } from '../constants.js';

/**
 * Plot scripts: global options, data selection and a pair filter
 */
export function buildPlotSchema(
  description: string = 'Plot candles, indicators and profits for a strategy'
): SchemaRegistry<PlotArgs> {
  return new SchemaRegistry({
    programName: `${PROGRAM_NAME}-plot`,
    description,
    version: VERSION,
    globalOptions: composeOptions(globalOptions(), optimizerSharedOptions(), scriptsOptions()),
    resultSchema: plotArgsSchema,
  });
}

/**
 * Historical data download script
 */
export function buildDownloadDataSchema(
  description: string = 'Download backtesting data from an exchange'
): SchemaRegistry<DownloadDataArgs> {
  return new SchemaRegistry({
    programName: `${PROGRAM_NAME}-download-data`,
    description,
    version: VERSION,
    globalOptions: downloadDataOptions(),
    resultSchema: downloadArgsSchema,
  });
}
