/**
 * Fixed defaults for the command surface
 */

export const PROGRAM_NAME = 'tradekit';
export const VERSION = '0.1.0';

export const DEFAULT_CONFIG = 'config.json';
export const DEFAULT_STRATEGY = 'DefaultStrategy';
export const DEFAULT_HYPEROPT = 'DefaultHyperOpts';
export const HYPEROPT_EPOCH = 100;
export const DYNAMIC_WHITELIST = 20;
export const DEFAULT_EXPORT_FILENAME = 'user_data/backtest_data/backtest-result.json';
export const DEFAULT_EXCHANGE = 'bittrex';

export const HYPEROPT_SPACES = ['all', 'buy', 'sell', 'roi', 'stoploss'] as const;

export const DOWNLOAD_TIMEFRAMES = [
  '1m',
  '3m',
  '5m',
  '15m',
  '30m',
  '1h',
  '2h',
  '4h',
  '6h',
  '8h',
  '12h',
  '1d',
  '3d',
  '1w',
] as const;
