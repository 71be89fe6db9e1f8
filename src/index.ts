#!/usr/bin/env node
/**
 * @fileoverview Entry point for the `mhc-curate` command.
 * @module src/index
 */
import 'reflect-metadata';

import { runCli } from './cli/run.js';
import { logger } from './utils/index.js';

runCli(process.argv.slice(2)).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    logger.error('Unhandled failure', { error });
    process.exitCode = 1;
  },
);
