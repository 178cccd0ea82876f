/**
 * Commander Builder - Build a Commander program from a SchemaRegistry
 *
 * Each OptionSpec becomes one visible Commander option (first short flag plus
 * last long flag) and one hidden option per extra long spelling. The returned
 * bindings let the parser read values back under the option's destination key.
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { ValidationError } from '@tradekit/utils';
import type { SchemaRegistry } from './command-registry.js';
import type {
  CommandOutput,
  CommandSpec,
  OptionGroup,
  OptionSpec,
  ValueConverter,
} from '../types/index.js';

export interface OptionBinding {
  readonly spec: OptionSpec;
  /** Visible option first, hidden aliases after */
  readonly options: readonly Option[];
}

export interface BuiltCommand {
  readonly command: Command;
  readonly bindings: readonly OptionBinding[];
}

export interface BuiltProgram {
  readonly program: BuiltCommand;
  readonly subcommands: ReadonlyMap<string, BuiltCommand>;
  /**
   * Name of the subcommand Commander dispatched to, undefined for the bare program.
   * Only meaningful after parse().
   */
  selectedCommand(): string | undefined;
}

const SHORT_FLAG = /^-[^-]$/;

/**
 * Split spellings into the visible flags string and hidden long aliases
 */
function splitFlags(spec: OptionSpec): { primary: string; aliases: string[] } {
  const short = spec.flags.find((flag) => SHORT_FLAG.test(flag));
  const longs = spec.flags.filter((flag) => !SHORT_FLAG.test(flag));
  const long = longs[longs.length - 1];

  if (long === undefined) {
    return { primary: short ?? '', aliases: [] };
  }
  const primary = short ? `${short}, ${long}` : long;
  return { primary, aliases: longs.slice(0, -1) };
}

/**
 * Adapt a converter so Commander reports its failure as an invalid argument
 */
function toArgParser(convert: ValueConverter): (value: string) => unknown {
  return (value: string) => {
    try {
      return convert(value);
    } catch (error) {
      if (error instanceof ValidationError) {
        throw new InvalidArgumentError(error.message);
      }
      throw error;
    }
  };
}

/**
 * Variadic option whose latest occurrence replaces the earlier ones:
 * `-s buy -s sell` keeps only `sell`.
 *
 * Commander looks an option up through `is()` each time its flag appears
 * on the command line, and reports following values through the same
 * parser, so the lookup marks where a new occurrence starts.
 */
class ReplacingVariadicOption extends Option {
  private occurrenceStarted = false;

  override is(arg: string): boolean {
    const matched = super.is(arg);
    if (matched) {
      this.occurrenceStarted = true;
    }
    return matched;
  }

  /**
   * True for the first value after the flag, false for the values that follow it
   */
  takeOccurrenceStart(): boolean {
    const started = this.occurrenceStarted;
    this.occurrenceStarted = false;
    return started;
  }
}

function variadicOption(
  flags: string,
  description: string,
  choices: readonly string[] | undefined
): Option {
  const option = new ReplacingVariadicOption(flags, description);
  if (choices) {
    // keeps the choices listed in help; the parser below does the checking
    option.choices(choices);
  }
  return option.argParser((value: string, previous: string[] | undefined) => {
    if (choices && !choices.includes(value)) {
      throw new InvalidArgumentError(`Allowed choices are ${choices.join(', ')}.`);
    }
    const kept = option.takeOccurrenceStart() ? [] : (previous ?? []);
    return [...kept, value];
  });
}

function helpText(spec: OptionSpec, aliases: readonly string[]): string {
  let text = spec.help;
  if ((spec.kind === 'value' || spec.kind === 'variadic') && spec.default !== undefined) {
    const shown = Array.isArray(spec.default) ? spec.default.join(' ') : String(spec.default);
    text += ` (default: ${shown})`;
  }
  if (aliases.length > 0) {
    text += ` (alias: ${aliases.join(', ')})`;
  }
  return text;
}

/**
 * Create one Commander option for a flags string according to the option kind
 */
function createOption(spec: OptionSpec, flags: string, description: string): Option {
  const metavar = spec.metavar ?? 'VALUE';

  switch (spec.kind) {
    case 'value': {
      const option = new Option(`${flags} <${metavar}>`, description);
      return spec.convert ? option.argParser(toArgParser(spec.convert)) : option;
    }
    case 'append':
      return new Option(`${flags} <${metavar}>`, description).argParser(
        (value: string, previous: string[] | undefined) => [...(previous ?? []), value]
      );
    case 'flag':
      return new Option(flags, description);
    case 'count':
      return new Option(flags, description).argParser(
        (_value: string, previous: number | undefined) => (previous ?? 0) + 1
      );
    case 'variadic':
      return variadicOption(`${flags} <${metavar}...>`, description, spec.choices);
    case 'optional-value': {
      const option = new Option(`${flags} [${metavar}]`, description).preset(spec.preset);
      return spec.convert ? option.argParser(toArgParser(spec.convert)) : option;
    }
  }
}

function bindOptions(command: Command, options: OptionGroup): OptionBinding[] {
  return options.map((spec) => {
    const { primary, aliases } = splitFlags(spec);
    const visible = createOption(spec, primary, helpText(spec, aliases));
    const hidden = aliases.map((alias) => createOption(spec, alias, spec.help).hideHelp());

    command.addOption(visible);
    for (const option of hidden) {
      command.addOption(option);
    }
    return { spec, options: [visible, ...hidden] };
  });
}

function addSubcommand(
  program: Command,
  spec: CommandSpec,
  onSelect: (name: string) => void
): BuiltCommand {
  const command = program.command(spec.name).description(spec.description);

  if (spec.examples && spec.examples.length > 0) {
    command.addHelpText('after', `\nExamples:\n  ${spec.examples.join('\n  ')}`);
  }

  const bindings = bindOptions(command, spec.options);
  command.action(() => onSelect(spec.name));
  return { command, bindings };
}

/**
 * Build the Commander program for a registry.
 *
 * Program options are positional (they go before the subcommand), so a
 * subcommand may reuse a short flag of the program, e.g. hyperopt's -s.
 * Commander never exits the process: help, version and usage errors are
 * thrown as CommanderError for the caller to handle.
 */
export function buildProgram<T>(registry: SchemaRegistry<T>, output?: CommandOutput): BuiltProgram {
  const program = new Command(registry.programName)
    .description(registry.description)
    .version(`${registry.programName} ${registry.version}`, '--version', 'Show program version')
    .enablePositionalOptions()
    .allowExcessArguments(false)
    .showHelpAfterError()
    .exitOverride();

  if (output) {
    program.configureOutput({
      writeOut: (str) => output.writeOut(str),
      writeErr: (str) => output.writeErr(str),
    });
  }

  let selected: string | undefined;
  const bindings = bindOptions(program, registry.getGlobalOptions());
  program.action(() => {
    selected = undefined;
  });

  // Subcommands inherit exitOverride and output settings from the program
  const subcommands = new Map<string, BuiltCommand>();
  for (const spec of registry.getCommands()) {
    subcommands.set(
      spec.name,
      addSubcommand(program, spec, (name) => {
        selected = name;
      })
    );
  }

  return {
    program: { command: program, bindings },
    subcommands,
    selectedCommand: () => selected,
  };
}
