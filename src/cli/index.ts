#!/usr/bin/env node

/**
 * Task Graph CLI entry point
 */

import dotenv from 'dotenv';
import { executeTaskGraphCLI } from './commands/index.js';
import { CLIUtils } from './utils.js';
import logger, { shutdownLogger } from '../logger.js';

async function main(): Promise<void> {
  const dotenvResult = dotenv.config();
  if (dotenvResult.parsed) {
    logger.debug({ loaded: Object.keys(dotenvResult.parsed) }, 'Loaded environment variables from .env file');
  }

  process.on('SIGINT', () => {
    logger.info('CLI interrupted by user');
    console.log('\nOperation cancelled by user.');
    shutdownLogger();
    process.exit(130);
  });

  const exitCode = await executeTaskGraphCLI(process.argv);
  shutdownLogger();
  process.exitCode = exitCode;
}

// Only run if this file is executed directly, including through the npm bin link
if (CLIUtils.isEntryPoint(process.argv[1], import.meta.url)) {
  main().catch((error) => {
    logger.error({ err: error }, 'Failed to start CLI');
    console.error('Failed to start task-graph CLI');
    shutdownLogger();
    process.exit(1);
  });
}

export { createTaskGraphCLI, executeTaskGraphCLI } from './commands/index.js';
