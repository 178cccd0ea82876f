/**
 * Optimize Commands - backtesting, edge and hyperopt
 */

import {
  SchemaRegistry,
  composeOptions,
  defineCommandSpec,
} from '../core/command-registry.js';
import { globalOptions } from '../command-defs/global.js';
import {
  backtestingArgsSchema,
  backtestingOptions,
  edgeArgsSchema,
  edgeOptions,
  hyperoptArgsSchema,
  hyperoptOptions,
  optimizeArgsSchema,
  optimizerSharedOptions,
  type OptimizeArgs,
} from '../command-defs/optimize.js';
import { PROGRAM_NAME, VERSION } from '../constants.js';

export const DEFAULT_DESCRIPTION = 'Strategy backtesting, edge positioning and hyperparameter optimization';

/**
 * Build the main program schema: global options plus the three optimize modes.
 * Handlers are loaded lazily so building the schema never pulls in an engine.
 */
export function buildOptimizeSchema(
  description: string = DEFAULT_DESCRIPTION
): SchemaRegistry<OptimizeArgs> {
  const backtesting = defineCommandSpec({
    name: 'backtesting',
    description: 'Backtesting module',
    options: composeOptions(optimizerSharedOptions(), backtestingOptions()),
    schema: backtestingArgsSchema,
    handler: async (args) => {
      const { startBacktesting } = await import('../handlers/optimize/start-backtesting.js');
      return startBacktesting(args);
    },
    examples: [
      `${PROGRAM_NAME} backtesting --timerange 20180101-20180201`,
      `${PROGRAM_NAME} -s MyStrategy backtesting --eps --export trades`,
    ],
  });

  const edge = defineCommandSpec({
    name: 'edge',
    description: 'Edge module',
    options: composeOptions(optimizerSharedOptions(), edgeOptions()),
    schema: edgeArgsSchema,
    handler: async (args) => {
      const { startEdge } = await import('../handlers/optimize/start-edge.js');
      return startEdge(args);
    },
    examples: [`${PROGRAM_NAME} edge --stoplosses=-0.01,-0.1,-0.001`],
  });

  const hyperopt = defineCommandSpec({
    name: 'hyperopt',
    description: 'Hyperopt module',
    options: composeOptions(optimizerSharedOptions(), hyperoptOptions()),
    schema: hyperoptArgsSchema,
    handler: async (args) => {
      const { startHyperopt } = await import('../handlers/optimize/start-hyperopt.js');
      return startHyperopt(args);
    },
    examples: [`${PROGRAM_NAME} hyperopt -e 500 -s buy sell --random-state 42`],
  });

  return new SchemaRegistry({
    programName: PROGRAM_NAME,
    description,
    version: VERSION,
    globalOptions: globalOptions(),
    commands: [backtesting, edge, hyperopt],
    resultSchema: optimizeArgsSchema,
  });
}
