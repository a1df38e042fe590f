#!/usr/bin/env tsx

/**
 * Format Converter
 *
 * Example:
 *   tsx scripts/converter.ts --input ledger.csv --input-format csv --output-format bin > ledger.bin
 */

import chalk from 'chalk';
import { loadConfig } from '../server/bootstrap/config.js';
import { getLogger, runLogger } from '../server/bootstrap/logger.js';
import { describeError } from '../server/domain/errors.js';
import { runConverter } from '../server/tools/converter-cli.js';

async function main(): Promise<number> {
  const config = loadConfig();
  const logger = runLogger(getLogger(config), 'converter');
  return runConverter(process.argv.slice(2), {
    config,
    logger,
    streams: { stdout: process.stdout, stderr: process.stderr },
    paint: chalk,
  });
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error(chalk.red('Error:'), describeError(error));
    process.exitCode = 1;
  });
