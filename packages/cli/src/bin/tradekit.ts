#!/usr/bin/env node

/**
 * tradekit CLI Entry Point
 *
 * Parses the command line, configures logging from the global flags and
 * dispatches to the handler bound to the selected subcommand.
 */

import { configureLogging, logger } from '@tradekit/utils';
import { Arguments } from '../core/argument-parser.js';
import { die } from '../core/cliErrors.js';
import { buildOptimizeSchema } from '../commands/optimize.js';
import { PROGRAM_NAME } from '../constants.js';

async function main(argv: readonly string[]): Promise<void> {
  const cli = new Arguments(argv, () => buildOptimizeSchema());
  const args = cli.getParsedArgs();

  configureLogging({ verbosity: args.loglevel, logfile: args.logfile });

  if (args.dynamicWhitelist !== undefined) {
    logger.warn('--dynamic-whitelist is deprecated, configure a pairlist in the config file instead');
  }

  const command = cli.getCommand();
  if (!command) {
    logger.info(`No command given. Run '${PROGRAM_NAME} --help' to list commands.`);
    return;
  }

  await command.handler(args);
}

main(process.argv.slice(2)).catch(die);
