#!/usr/bin/env node
import { buildProgram } from './cli/program.js';
import { defaultContext } from './cli/context.js';
import { errorMessage } from './utils/errors.js';
import { log } from './utils/logger.js';

buildProgram(defaultContext())
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    log.error(errorMessage(err));
    process.exit(1);
  });
