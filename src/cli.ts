#!/usr/bin/env node
import { errorMessage } from './errors/custom-errors.js';
import { main } from './index.js';
import { logger } from './utils/logger.js';

process.on('uncaughtException', (error) => {
  logger.error(`Uncaught exception: ${error.message}`);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled rejection: ${errorMessage(reason)}`);
  process.exit(1);
});

main(process.argv.slice(2)).catch((error: unknown) => {
  logger.error(`Fatal error: ${errorMessage(error)}`);
  process.exit(1);
});
