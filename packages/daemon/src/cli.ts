#!/usr/bin/env tsx

import { LoggerFactory } from '@wlanctl/logging';

import { createProgram } from './program.js';

const cliLogger = LoggerFactory.createConsoleLogger('cli');

createProgram(cliLogger)
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    cliLogger.error('Command failed', error);
    process.exit(1);
  });
