import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { NotFoundError, SchemaError } from '@tradekit/utils';
import {
  SchemaRegistry,
  assertUniqueDestinations,
  composeOptions,
  defineCommandSpec,
} from '../../src/core/command-registry.js';
import type { OptionSpec } from '../../src/types/index.js';

const verbose: OptionSpec = {
  kind: 'count',
  flags: ['-v', '--verbose'],
  dest: 'loglevel',
  help: 'Verbose mode',
};

const timerange: OptionSpec = {
  kind: 'value',
  flags: ['--timerange'],
  dest: 'timerange',
  help: 'Time range',
};

const live: OptionSpec = {
  kind: 'flag',
  flags: ['-l', '--live'],
  dest: 'live',
  store: true,
  help: 'Use live data',
};

function runCommand(name: string, options: OptionSpec[] = [timerange]) {
  return defineCommandSpec({
    name,
    description: `${name} module`,
    options,
    schema: z.object({ timerange: z.string().optional() }),
    handler: (args) => args.timerange ?? 'all',
  });
}

function createRegistry(commands = [runCommand('backtesting'), runCommand('edge')]) {
  return new SchemaRegistry({
    programName: 'tradekit',
    description: 'Test program',
    version: '1.2.3',
    globalOptions: [verbose],
    commands,
    resultSchema: z.object({ loglevel: z.number() }),
  });
}

describe('command-registry', () => {
  describe('composeOptions', () => {
    it('should concatenate groups in order', () => {
      const merged = composeOptions([verbose], [timerange, live]);

      expect(merged.map((option) => option.dest)).toEqual(['loglevel', 'timerange', 'live']);
    });

    it('should copy options instead of sharing them', () => {
      const group: OptionSpec[] = [timerange];
      const first = composeOptions(group);
      const second = composeOptions(group);

      expect(first[0]).not.toBe(timerange);
      expect(first[0]).not.toBe(second[0]);
      expect(first[0]).toEqual(timerange);
      expect(Object.isFrozen(first[0])).toBe(true);
      expect(group).toHaveLength(1);
    });

    it('should reject two options with one destination key', () => {
      const clash: OptionSpec = { ...live, flags: ['--timerange-alt'], dest: 'timerange' };

      expect(() => composeOptions([timerange], [clash])).toThrow(SchemaError);
      expect(() => composeOptions([timerange], [clash])).toThrow(
        "Duplicate destination key 'timerange': --timerange and --timerange-alt"
      );
    });
  });

  describe('assertUniqueDestinations', () => {
    it('should name the scope of the clash', () => {
      expect(() => assertUniqueDestinations([live, live], 'backtesting')).toThrow(
        "Duplicate destination key 'live' in backtesting: -l/--live and -l/--live"
      );
    });

    it('should reject an option without flags', () => {
      expect(() => assertUniqueDestinations([{ ...live, flags: [] }])).toThrow(
        'Option live has no flags'
      );
    });
  });

  describe('defineCommandSpec', () => {
    it('should validate arguments before calling the handler', async () => {
      const handler = vi.fn(() => 'done');
      const spec = defineCommandSpec({
        name: 'edge',
        description: 'Edge module',
        options: [timerange],
        schema: z.object({ timerange: z.string() }),
        handler,
      });

      await expect(spec.handler({ timerange: '10-50', extra: true })).resolves.toBe('done');
      expect(handler).toHaveBeenCalledWith({ timerange: '10-50' });

      await expect(spec.handler({ timerange: 5 })).rejects.toBeInstanceOf(z.ZodError);
      expect(handler).toHaveBeenCalledTimes(1);
    });

    it('should freeze the command definition', () => {
      const spec = runCommand('edge');

      expect(Object.isFrozen(spec)).toBe(true);
      expect(Object.isFrozen(spec.options)).toBe(true);
    });
  });

  describe('SchemaRegistry', () => {
    it('should look up commands by name', () => {
      const registry = createRegistry();

      expect(registry.getCommand('edge')?.description).toBe('edge module');
      expect(registry.getCommand('hyperopt')).toBeUndefined();
      expect(registry.getCommands().map((command) => command.name)).toEqual([
        'backtesting',
        'edge',
      ]);
    });

    it('should put global options ahead of command options', () => {
      const registry = createRegistry();

      expect(registry.optionsFor('backtesting').map((option) => option.dest)).toEqual([
        'loglevel',
        'timerange',
      ]);
    });

    it('should hand out independent option lists', () => {
      const registry = createRegistry();
      const first = registry.optionsFor('edge');
      first.push(live);
      const globals = registry.getGlobalOptions();
      globals.length = 0;

      expect(registry.optionsFor('edge')).toHaveLength(2);
      expect(registry.getGlobalOptions()).toHaveLength(1);
    });

    it('should throw NotFoundError for an unknown command', () => {
      const registry = createRegistry();

      expect(() => registry.optionsFor('plot')).toThrow(NotFoundError);
    });

    it('should reject a command registered twice', () => {
      expect(() => createRegistry([runCommand('edge'), runCommand('edge')])).toThrow(
        'Command edge is already registered'
      );
    });

    it('should reject a command option that reuses a global destination key', () => {
      const shadow: OptionSpec = { ...verbose, flags: ['--loud'] };

      expect(() => createRegistry([runCommand('edge', [shadow])])).toThrow(
        "Duplicate destination key 'loglevel' in edge: -v/--verbose and --loud"
      );
    });

    it('should be immutable', () => {
      expect(Object.isFrozen(createRegistry())).toBe(true);
    });

    it('should list commands in the generated help', () => {
      const registry = new SchemaRegistry({
        programName: 'tradekit',
        description: 'Test program',
        version: '1.2.3',
        globalOptions: [],
        commands: [
          defineCommandSpec({
            name: 'edge',
            description: 'Edge module',
            options: [],
            schema: z.object({}),
            handler: () => undefined,
            examples: ['tradekit edge'],
          }),
        ],
        resultSchema: z.object({}),
      });

      expect(registry.generateHelp()).toBe(
        [
          'tradekit - Test program',
          '',
          'Commands:',
          `  ${'edge'.padEnd(20)} Edge module`,
          '    Example: tradekit edge',
        ].join('\n')
      );
    });

    it('should only print the title when there are no commands', () => {
      expect(createRegistry([]).generateHelp()).toBe('tradekit - Test program');
    });
  });
});
