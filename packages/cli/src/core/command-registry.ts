/**
 * Schema Registry - the immutable set of options and commands for one program
 *
 * Built once per invocation, handed to the argument parser, then discarded.
 */

import type { z } from 'zod';
import { NotFoundError, SchemaError } from '@tradekit/utils';
import type { CommandSpec, OptionGroup, OptionSpec } from '../types/index.js';

/**
 * Merge option groups into one fresh list.
 *
 * Groups are copied, never modified, so one group can feed several commands.
 * Two options writing the same destination key is a schema defect.
 */
export function composeOptions(...groups: OptionGroup[]): OptionSpec[] {
  const merged = groups.flatMap((group) => group.map((option) => Object.freeze({ ...option })));
  assertUniqueDestinations(merged);
  return merged;
}

/**
 * Throw SchemaError when an option list stores two options under one key
 */
export function assertUniqueDestinations(options: OptionGroup, scope?: string): void {
  const seen = new Map<string, OptionSpec>();
  for (const option of options) {
    if (option.flags.length === 0) {
      throw new SchemaError(`Option ${option.dest} has no flags`, { dest: option.dest, scope });
    }
    const previous = seen.get(option.dest);
    if (previous) {
      throw new SchemaError(
        `Duplicate destination key '${option.dest}'${scope ? ` in ${scope}` : ''}: ` +
          `${previous.flags.join('/')} and ${option.flags.join('/')}`,
        { dest: option.dest, scope }
      );
    }
    seen.set(option.dest, option);
  }
}

/**
 * Bind a command name, its options and its handler.
 *
 * The handler receives arguments already checked against `schema`, which
 * keeps handler signatures typed without casting.
 */
export function defineCommandSpec<S extends z.ZodTypeAny>(def: {
  name: string;
  description: string;
  options: OptionGroup;
  schema: S;
  handler: (args: z.infer<S>) => Promise<unknown> | unknown;
  examples?: string[];
}): CommandSpec {
  return Object.freeze({
    name: def.name,
    description: def.description,
    options: Object.freeze(composeOptions(def.options)),
    examples: def.examples ? Object.freeze([...def.examples]) : undefined,
    handler: async (args: unknown) => def.handler(def.schema.parse(args)),
  });
}

export interface SchemaRegistryInit<T> {
  programName: string;
  description: string;
  version: string;
  globalOptions: OptionGroup;
  commands?: readonly CommandSpec[];
  /**
   * Describes the normalized parse result for every command of this program
   */
  resultSchema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

/**
 * Immutable program schema: global options plus named subcommands
 */
export class SchemaRegistry<T> {
  readonly programName: string;
  readonly description: string;
  readonly version: string;
  readonly resultSchema: z.ZodType<T, z.ZodTypeDef, unknown>;
  private readonly globalOptions: OptionGroup;
  private readonly commands: ReadonlyMap<string, CommandSpec>;

  constructor(init: SchemaRegistryInit<T>) {
    this.programName = init.programName;
    this.description = init.description;
    this.version = init.version;
    this.resultSchema = init.resultSchema;
    this.globalOptions = Object.freeze(composeOptions(init.globalOptions));

    const commands = new Map<string, CommandSpec>();
    for (const command of init.commands ?? []) {
      if (commands.has(command.name)) {
        throw new SchemaError(`Command ${command.name} is already registered`, {
          commandName: command.name,
        });
      }
      // Global options are prepended to every command, so they share one key space
      assertUniqueDestinations([...this.globalOptions, ...command.options], command.name);
      commands.set(command.name, command);
    }
    this.commands = commands;

    Object.freeze(this);
  }

  /**
   * Global options, as a fresh list
   */
  getGlobalOptions(): OptionSpec[] {
    return [...this.globalOptions];
  }

  getCommand(name: string): CommandSpec | undefined {
    return this.commands.get(name);
  }

  getCommands(): CommandSpec[] {
    return Array.from(this.commands.values());
  }

  /**
   * Global options followed by the command's own options, as a fresh list
   */
  optionsFor(commandName: string): OptionSpec[] {
    const command = this.commands.get(commandName);
    if (!command) {
      throw new NotFoundError('Command', commandName);
    }
    return [...this.globalOptions, ...command.options];
  }

  /**
   * Generate a short overview of the registered commands
   */
  generateHelp(): string {
    const lines: string[] = [];
    lines.push(`${this.programName} - ${this.description}`);
    if (this.commands.size === 0) {
      return lines.join('\n');
    }

    lines.push('');
    lines.push('Commands:');
    for (const command of this.commands.values()) {
      lines.push(`  ${command.name.padEnd(20)} ${command.description}`);
      for (const example of command.examples ?? []) {
        lines.push(`    Example: ${example}`);
      }
    }

    return lines.join('\n');
  }
}
