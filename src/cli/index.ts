#!/usr/bin/env node
/**
 * rolerag command line entry point
 */

import { createProgram } from './program.js';
import { handleCLIError } from './errors.js';
import { setLogLevelFromEnv } from '../shared/utils.js';

setLogLevelFromEnv(process.env.ROLERAG_LOG_LEVEL);

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => handleCLIError(error));
