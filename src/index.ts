#!/usr/bin/env node
import { runCli } from './cli/main.js';
import { logger } from './shared/logger.js';

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((err: unknown) => {
    logger.fatal({ err }, 'Fatal error');
    process.exitCode = 1;
  });
