/**
 * Argument Parser - the facade between raw argv and the command handlers
 *
 * Builds the schema once, lets Commander parse, then normalizes the raw
 * Commander values into one object keyed by destination key and validates
 * it with the registry's Zod schema.
 *
 * Invariant: fallback values for repeatable options are substituted after
 * parsing, exactly once, and never handed to Commander as defaults.
 */

import { z } from 'zod';
import { CommanderError, type OptionValues } from 'commander';
import { ValidationError } from '@tradekit/utils';
import { buildProgram, type BuiltCommand, type OptionBinding } from './commander-builder.js';
import type { SchemaRegistry } from './command-registry.js';
import { ArgumentError } from './cliErrors.js';
import type { CommandOutput, CommandSpec, OptionSpec } from '../types/index.js';

/**
 * Parse and validate arguments using Zod schema
 */
export function parseArguments<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  rawArgs: Record<string, unknown>
): T {
  try {
    return schema.parse(rawArgs);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const messages = error.issues.map((issue) => {
        const path = issue.path.join('.');
        return `  ${path}: ${issue.message}`;
      });

      throw new ValidationError(`Invalid arguments:\n${messages.join('\n')}`, {
        issues: error.issues,
        formattedMessages: messages,
      });
    }
    throw error;
  }
}

function asList(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [value];
}

/**
 * Read one option back from Commander, merging its hidden aliases.
 * Values of options never given are reported as undefined, defaults are not applied here.
 */
function readRaw(binding: OptionBinding, values: OptionValues): unknown {
  const given: unknown[] = binding.options
    .map((option) => values[option.attributeName()])
    .filter((value) => value !== undefined);

  if (given.length === 0) {
    return undefined;
  }

  switch (binding.spec.kind) {
    case 'flag':
      return true;
    case 'count':
      return given.reduce<number>((sum, value) => sum + (typeof value === 'number' ? value : 0), 0);
    case 'append':
      return given.flatMap(asList);
    default:
      return given[given.length - 1];
  }
}

/**
 * Apply the option's default or store semantics to a raw value
 */
function resolveValue(spec: OptionSpec, raw: unknown): unknown {
  switch (spec.kind) {
    case 'flag':
      return raw === undefined ? !spec.store : spec.store;
    case 'count':
      return raw ?? 0;
    case 'value':
      return raw ?? spec.default;
    case 'variadic':
      return raw ?? (spec.default ? [...spec.default] : undefined);
    case 'append':
    case 'optional-value':
      return raw;
  }
}

/**
 * Read every bound option of a command into a destination-keyed record
 */
export function collectValues(built: BuiltCommand): Record<string, unknown> {
  const values = built.command.opts();
  const collected: Record<string, unknown> = {};
  for (const binding of built.bindings) {
    collected[binding.spec.dest] = resolveValue(binding.spec, readRaw(binding, values));
  }
  return collected;
}

/**
 * Substitute fallbacks for repeatable options that were never given (or given
 * with no values). Returns a new record; the input is left untouched.
 */
export function applyAppendFallbacks(
  values: Readonly<Record<string, unknown>>,
  options: readonly OptionSpec[]
): Record<string, unknown> {
  const normalized = { ...values };
  for (const option of options) {
    if (option.kind !== 'append' || !option.fallback) continue;
    const current = normalized[option.dest];
    if (current === undefined || (Array.isArray(current) && current.length === 0)) {
      normalized[option.dest] = [...option.fallback];
    }
  }
  return normalized;
}

export interface ArgumentsOptions {
  /**
   * Redirect Commander's help, version and error output (defaults to process streams)
   */
  output?: CommandOutput;
}

/**
 * Manage the arguments received on the command line.
 *
 * @example
 * ```typescript
 * const cli = new Arguments(process.argv.slice(2), () => buildOptimizeSchema());
 * const args = cli.getParsedArgs();
 * const range = resolveTimeRange('timerange' in args ? args.timerange : undefined);
 * ```
 */
export class Arguments<T> {
  private result: { args: T; command: CommandSpec | undefined } | undefined;

  constructor(
    private readonly args: readonly string[],
    private readonly buildSchema: () => SchemaRegistry<T>,
    private readonly options: ArgumentsOptions = {}
  ) {}

  /**
   * Parsed and normalized arguments. Parsing happens on the first call only.
   *
   * @throws CommanderError for --help and --version (exit code 0)
   * @throws ArgumentError when Commander rejected the command line
   * @throws ValidationError when the normalized values fail the schema
   */
  getParsedArgs(): T {
    return this.parse().args;
  }

  /**
   * The selected subcommand with its handler, undefined when none was given
   */
  getCommand(): CommandSpec | undefined {
    return this.parse().command;
  }

  private parse(): { args: T; command: CommandSpec | undefined } {
    if (!this.result) {
      this.result = this.parseArgs(this.buildSchema());
    }
    return this.result;
  }

  private parseArgs(registry: SchemaRegistry<T>): { args: T; command: CommandSpec | undefined } {
    const built = buildProgram(registry, this.options.output);

    try {
      built.program.command.parse([...this.args], { from: 'user' });
    } catch (error) {
      if (error instanceof CommanderError && error.exitCode !== 0) {
        throw new ArgumentError(error.message, error.exitCode, error.code);
      }
      throw error;
    }

    const commandName = built.selectedCommand();
    const subcommand = commandName ? built.subcommands.get(commandName) : undefined;
    const command = commandName ? registry.getCommand(commandName) : undefined;

    const raw: Record<string, unknown> = {
      ...collectValues(built.program),
      ...(subcommand ? collectValues(subcommand) : {}),
      subparser: commandName,
    };

    const options = commandName ? registry.optionsFor(commandName) : registry.getGlobalOptions();
    const normalized = applyAppendFallbacks(raw, options);

    return { args: parseArguments(registry.resultSchema, normalized), command };
  }
}
