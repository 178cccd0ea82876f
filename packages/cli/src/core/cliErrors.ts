/**
 * CLI boundary errors and process exit
 */

import { CommanderError } from 'commander';
import { ValidationError } from '@tradekit/utils';
import { handleError } from './error-handler.js';

/**
 * Commander rejected the command line (bad option value, unknown option,
 * missing argument). Commander has already printed the diagnostic and a
 * usage hint, so the boundary only has to exit with `exitCode`.
 */
export class ArgumentError extends ValidationError {
  constructor(
    message: string,
    public readonly exitCode: number,
    public readonly commanderCode: string
  ) {
    super(message, { exitCode, commanderCode });
  }
}

/**
 * Terminate the process for an error raised while parsing or dispatching
 */
export function die(error: unknown): never {
  // --help and --version end here with exit code 0
  if (error instanceof CommanderError) {
    process.exit(error.exitCode);
  }
  if (error instanceof ArgumentError) {
    process.exit(error.exitCode);
  }

  const message = handleError(error);
  console.error(`Error: ${message}`);
  process.exit(1);
}
