#!/usr/bin/env node

import { Arguments } from '../core/argument-parser.js';
import { die } from '../core/cliErrors.js';
import { buildDownloadDataSchema } from '../commands/scripts.js';
import { startDownloadData } from '../handlers/scripts/download-data.js';

try {
  const cli = new Arguments(process.argv.slice(2), () => buildDownloadDataSchema());
  startDownloadData(cli.getParsedArgs());
} catch (error) {
  die(error);
}
