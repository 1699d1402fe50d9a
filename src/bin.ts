#!/usr/bin/env node
import { main } from './cli.js';
import { logger } from './lib/logger.js';

main(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    logger.error(error, 'Fatal error');
    process.exitCode = 1;
  });
