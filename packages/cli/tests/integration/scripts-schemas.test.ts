import { describe, it, expect } from 'vitest';
import { Arguments } from '../../src/core/argument-parser.js';
import { ArgumentError } from '../../src/core/cliErrors.js';
import { buildDownloadDataSchema, buildPlotSchema } from '../../src/commands/scripts.js';
import { startDownloadData } from '../../src/handlers/scripts/download-data.js';

describe('script schemas', () => {
  describe('plot', () => {
    it('should accept global, data selection and pair options together', () => {
      const cli = new Arguments(
        ['-s', 'MyStrategy', '--timerange', '100-', '-i', '5m', '-p', 'ETH/BTC,XRP/BTC'],
        () => buildPlotSchema()
      );

      expect(cli.getParsedArgs()).toEqual({
        loglevel: 0,
        config: ['config.json'],
        strategy: 'MyStrategy',
        sdNotify: false,
        tickerInterval: '5m',
        timerange: '100-',
        refreshPairs: false,
        pairs: 'ETH/BTC,XRP/BTC',
        subparser: undefined,
      });
      expect(cli.getCommand()).toBeUndefined();
    });

    it('should list no commands in its overview', () => {
      expect(buildPlotSchema().generateHelp()).toBe(
        'tradekit-plot - Plot candles, indicators and profits for a strategy'
      );
    });
  });

  describe('download-data', () => {
    it('should apply its own defaults without a config fallback', () => {
      const cli = new Arguments([], () => buildDownloadDataSchema());

      expect(cli.getParsedArgs()).toEqual({
        exchange: 'bittrex',
        timeframes: ['1m', '5m'],
        erase: false,
        subparser: undefined,
      });
    });

    it('should package a download request', () => {
      const cli = new Arguments(
        [
          '--pairs-file',
          'pairs.json',
          '--days',
          '30',
          '-t',
          '1h',
          '1d',
          '--exchange',
          'binance',
          '-c',
          'config.json',
          '--export',
          'user_data/data',
          '--erase',
        ],
        () => buildDownloadDataSchema()
      );

      expect(startDownloadData(cli.getParsedArgs())).toEqual({
        exchange: 'binance',
        timeframes: ['1h', '1d'],
        days: 30,
        pairsFile: 'pairs.json',
        exportDir: 'user_data/data',
        configFiles: ['config.json'],
        erase: true,
      });
    });

    it('should keep the timeframes of the last -t', () => {
      const cli = new Arguments(['-t', '1m', '5m', '-t', '1h'], () => buildDownloadDataSchema());

      expect(cli.getParsedArgs()).toMatchObject({ timeframes: ['1h'] });
    });

    it('should reject an unsupported timeframe', () => {
      const cli = new Arguments(['-t', '7m'], () => buildDownloadDataSchema(), {
        output: { writeOut: () => undefined, writeErr: () => undefined },
      });

      expect(() => cli.getParsedArgs()).toThrow(ArgumentError);
    });

    it('should not know the main program options', () => {
      const cli = new Arguments(['-v'], () => buildDownloadDataSchema(), {
        output: { writeOut: () => undefined, writeErr: () => undefined },
      });

      expect(() => cli.getParsedArgs()).toThrow(ArgumentError);
    });
  });
});
