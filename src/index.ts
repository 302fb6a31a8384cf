#!/usr/bin/env node

/**
 * CLI entry point
 */

import 'dotenv/config';
import { createProgram } from './cli.js';
import { ApiDocService } from './doc-service.js';
import { getErrorDetails, toError } from './errors.js';
import { createLogger } from './logger.js';
import { FileSpecLoader } from './spec-loader.js';

async function main(): Promise<void> {
  const logger = createLogger(process.env.LOG_FORMAT);
  const service = new ApiDocService(new FileSpecLoader(), logger);

  try {
    await createProgram(service).parseAsync(process.argv);
  } catch (error) {
    logger.debug('Command failed', getErrorDetails(error));
    console.error(`Error: ${toError(error).message}`);
    process.exitCode = 1;
  }
}

void main();
