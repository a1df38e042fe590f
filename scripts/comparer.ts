#!/usr/bin/env tsx

/**
 * Record Comparer
 *
 * Exit status: 0 identical, 1 differences found, 2 error.
 */

import chalk from 'chalk';
import { loadConfig } from '../server/bootstrap/config.js';
import { getLogger, runLogger } from '../server/bootstrap/logger.js';
import { describeError } from '../server/domain/errors.js';
import { ComparerExit, runComparer } from '../server/tools/comparer-cli.js';

async function main(): Promise<number> {
  const config = loadConfig();
  const logger = runLogger(getLogger(config), 'comparer');
  return runComparer(process.argv.slice(2), {
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
    process.exitCode = ComparerExit.Error;
  });
