import { createLogger } from '@tradekit/utils';
import type { DownloadDataArgs } from '../../command-defs/scripts.js';

const logger = createLogger('cli');

export interface DownloadRequest {
  readonly exchange: string;
  readonly timeframes: readonly string[];
  readonly days?: number;
  readonly pairsFile?: string;
  readonly exportDir?: string;
  readonly configFiles: readonly string[];
  readonly erase: boolean;
}

/**
 * Package the download script arguments for the data fetcher
 */
export function startDownloadData(args: DownloadDataArgs): DownloadRequest {
  const request: DownloadRequest = Object.freeze({
    exchange: args.exchange,
    timeframes: Object.freeze([...args.timeframes]),
    days: args.days,
    pairsFile: args.pairsFile,
    exportDir: args.export,
    configFiles: Object.freeze([...(args.config ?? [])]),
    erase: args.erase,
  });

  const log = logger.child({ command: 'download-data', exchange: request.exchange });
  if (request.configFiles.length > 0) {
    log.debug('Exchange from --config takes precedence over --exchange', {
      config: request.configFiles,
    });
  }
  log.info('Starting data download', {
    timeframes: request.timeframes,
    days: request.days,
    erase: request.erase,
  });

  return request;
}
