#!/usr/bin/env node
import { main } from './cli.js';
import { logger } from './shared/logger.js';

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.fatal({ err }, 'Fatal bootstrap error');
    process.exit(1);
  });
