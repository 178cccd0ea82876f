/**
 * @tradekit/cli - Command surface
 *
 * Public API exports for the CLI package
 */

export * from './core/command-registry.js';
export * from './core/argument-parser.js';
export * from './core/coerce.js';
export * from './core/cliErrors.js';
export { formatError, handleError, logError } from './core/error-handler.js';
export { buildProgram, type BuiltProgram, type OptionBinding } from './core/commander-builder.js';
export * from './command-defs/global.js';
export * from './command-defs/optimize.js';
export * from './command-defs/scripts.js';
export { buildOptimizeSchema, DEFAULT_DESCRIPTION } from './commands/optimize.js';
export { buildPlotSchema, buildDownloadDataSchema } from './commands/scripts.js';
export * from './constants.js';
export type * from './types/index.js';
