/**
 * CLI-specific type definitions
 */

/**
 * Converts one raw command-line token. Throws ValidationError on bad input.
 */
export type ValueConverter<T = unknown> = (raw: string) => T;

interface OptionSpecBase<K extends string> {
  /**
   * Accepted spellings, e.g. ['-c', '--config'] or ['--eps', '--enable-position-stacking']
   */
  readonly flags: readonly string[];

  /**
   * Key the value is stored under in the parsed result (camelCase)
   */
  readonly dest: K;

  readonly help: string;

  /**
   * Placeholder shown in help for options that take a value
   */
  readonly metavar?: string;
}

/** Single value, last occurrence wins */
export interface ValueOptionSpec<K extends string = string> extends OptionSpecBase<K> {
  readonly kind: 'value';
  readonly convert?: ValueConverter;
  readonly default?: string | number;
}

/** Repeatable option, every occurrence is collected in order */
export interface AppendOptionSpec<K extends string = string> extends OptionSpecBase<K> {
  readonly kind: 'append';
  /**
   * Substituted after parsing when the option was never given.
   * Never passed to the parser itself.
   */
  readonly fallback?: readonly string[];
}

/** Boolean switch; `store` is written when present, its negation otherwise */
export interface FlagOptionSpec<K extends string = string> extends OptionSpecBase<K> {
  readonly kind: 'flag';
  readonly store: boolean;
}

/** Repeat counter such as -v / -vv / -vvv */
export interface CountOptionSpec<K extends string = string> extends OptionSpecBase<K> {
  readonly kind: 'count';
}

/** One or more values after a single flag, optionally restricted to a set */
export interface VariadicOptionSpec<K extends string = string> extends OptionSpecBase<K> {
  readonly kind: 'variadic';
  readonly choices?: readonly string[];
  readonly default?: readonly string[];
}

/** Flag with an optional value; `preset` is used when the value is omitted */
export interface OptionalValueOptionSpec<K extends string = string> extends OptionSpecBase<K> {
  readonly kind: 'optional-value';
  readonly preset: string;
  readonly convert?: ValueConverter;
}

export type OptionSpec<K extends string = string> =
  | ValueOptionSpec<K>
  | AppendOptionSpec<K>
  | FlagOptionSpec<K>
  | CountOptionSpec<K>
  | VariadicOptionSpec<K>
  | OptionalValueOptionSpec<K>;

export type OptionKind = OptionSpec['kind'];

/**
 * Named reusable bundle of option definitions
 */
export type OptionGroup<K extends string = string> = readonly OptionSpec<K>[];

/**
 * Opaque reference to the code that runs a command. The command surface
 * stores it; the dispatcher in the bin invokes it.
 */
export type CommandHandler = (args: unknown) => Promise<unknown>;

/**
 * Command definition structure
 */
export interface CommandSpec {
  /**
   * Subcommand name (e.g. 'backtesting')
   */
  readonly name: string;

  /**
   * Command description for help text
   */
  readonly description: string;

  /**
   * Options specific to this command. Global options are prepended by the registry.
   */
  readonly options: OptionGroup;

  readonly handler: CommandHandler;

  /**
   * Optional examples for help text
   */
  readonly examples?: readonly string[];
}

/**
 * Where commander writes help, version and diagnostics
 */
export interface CommandOutput {
  writeOut(str: string): void;
  writeErr(str: string): void;
}
