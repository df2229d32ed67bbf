#!/usr/bin/env node
import { configureLoggerFromEnv, flushLoggers, getLogger } from '@ftgate/logger';

import { ExitCodes } from './features/shared/exit-codes.js';
import { createProgram } from './program.js';

configureLoggerFromEnv();

const logger = getLogger('CLI');

async function main(): Promise<void> {
  await createProgram().parseAsync();
}

process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled Rejection: ${String(reason)}`);
  flushLoggers();
  process.exit(ExitCodes.GENERAL_ERROR);
});

main()
  .catch((error: unknown) => {
    logger.error(`CLI failed: ${String(error)}`);
    process.exitCode = ExitCodes.GENERAL_ERROR;
  })
  .finally(() => {
    flushLoggers();
  });
